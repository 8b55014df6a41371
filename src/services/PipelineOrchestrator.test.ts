import { describe, it, expect } from 'vitest';
import { PncpClient } from '../clients/PncpClient.js';
import type { AppConfig } from '../config/env.js';
import {
  createFakePortal,
  createFakeTransport,
  noSleep,
  page,
  pncpRecord,
  smtpError,
  testConfig,
  type PortalReply,
  type TransportStep,
} from '../testing/fixtures.js';
import { exitCodeFor, runPipeline } from './PipelineOrchestrator.js';
import { NodemailerEmailService } from './infrastructure/EmailService.js';

const NOW = () => new Date('2026-10-19T12:00:00Z');

const SCHOOL = pncpRecord(1, { objetoCompra: 'Reforma da escola municipal', dataPublicacaoPncp: '2026-10-15T10:00:00' });
const CLINIC = pncpRecord(3, { objetoCompra: 'Reforma do posto de saúde', dataPublicacaoPncp: '2026-10-17T08:00:00' });
const PAPER = pncpRecord(2, { objetoCompra: 'Aquisição de papel A4' });

function setup(
  handler: (params: Record<string, unknown>, index: number) => PortalReply,
  steps: TransportStep[] = [],
  config: AppConfig = testConfig()
) {
  const portal = createFakePortal(handler);
  const transport = createFakeTransport(steps);
  const source = new PncpClient(config.pncp, { http: portal.http, sleep: noSleep });
  const emailService = new NodemailerEmailService(config.email, { createTransport: transport.factory, sleep: noSleep });
  const run = () => runPipeline(config, { source, emailService, now: NOW });
  return { run, requests: portal.requests, transport };
}

function textOf(mail: { text?: unknown } | undefined): string {
  return typeof mail?.text === 'string' ? mail.text : '';
}

describe('runPipeline', () => {
  it('delivers deduplicated matches ordered by publication date', async () => {
    const { run, requests, transport } = setup((params) =>
      params.pagina === 1
        ? page([SCHOOL, PAPER, CLINIC], { totalPaginas: 2, paginasRestantes: 1 })
        : page([CLINIC, pncpRecord(4)], { totalPaginas: 2, paginasRestantes: 0 })
    );

    const outcome = await run();

    expect(outcome).toEqual({ kind: 'success', delivered: 2 });
    expect(exitCodeFor(outcome)).toBe(0);
    expect(requests.map((r) => r.pagina)).toEqual([1, 2]);

    expect(transport.sent).toHaveLength(1);
    const [mail] = transport.sent;
    expect(mail).toMatchObject({
      to: 'recipient@example.com',
      subject: 'Licitações PNCP - 19/10/2026 - 2 encontradas',
      attachments: [{ filename: 'licitacoes_2026-10-19.csv' }],
    });
    expect(textOf(mail).split('\n').filter((line) => line.startsWith('   Objeto:'))).toEqual([
      '   Objeto: Reforma do posto de saúde',
      '   Objeto: Reforma da escola municipal',
    ]);
  });

  it('sends nothing when the first page keeps timing out', async () => {
    const { run, requests, transport } = setup(() => ({ network: 'timeout' }));

    const outcome = await run();

    expect(outcome).toEqual({
      kind: 'failure',
      stage: 'fetch',
      reason: 'PNCP request for modality 6 page 1 failed after 3 attempt(s): timeout of 30000ms exceeded',
    });
    expect(exitCodeFor(outcome)).toBe(4);
    expect(requests).toHaveLength(3);
    expect(transport.created).toBe(0);
  });

  it('sends the no-matches digest when nothing matches', async () => {
    const { run, transport } = setup(() => page([PAPER], { paginasRestantes: 0 }));

    const outcome = await run();

    expect(outcome).toEqual({ kind: 'success-empty', warning: false });
    expect(exitCodeFor(outcome)).toBe(0);
    expect(transport.sent).toHaveLength(1);
    expect(transport.sent[0]).toMatchObject({ subject: 'Licitações PNCP - 19/10/2026 - nenhuma encontrada' });
    expect(transport.sent[0]).not.toHaveProperty('attachments');
    expect(textOf(transport.sent[0])).toBe(
      'Licitações PNCP - 19/10/2026\n\nNenhuma licitação encontrada hoje para os critérios configurados.\n'
    );
  });

  it('fails the notify stage when every delivery attempt fails', async () => {
    const { run, transport } = setup(
      () => page([SCHOOL], { paginasRestantes: 0 }),
      [smtpError('Connection closed', { code: 'ECONNECTION' }), smtpError('Connection closed', { code: 'ECONNECTION' })]
    );

    const outcome = await run();

    expect(outcome).toEqual({
      kind: 'failure',
      stage: 'notify',
      reason: 'Email delivery failed after 2 attempt(s): Connection closed',
    });
    expect(exitCodeFor(outcome)).toBe(5);
    expect(transport.sent).toHaveLength(2);
  });

  it('delivers partial results and flags the run', async () => {
    const { run, transport } = setup((params) =>
      params.pagina === 1 ? page([SCHOOL], { paginasRestantes: 1 }) : { status: 500 }
    );

    const outcome = await run();

    expect(outcome).toMatchObject({ kind: 'partial-failure', delivered: 1 });
    expect(exitCodeFor(outcome)).toBe(3);
    expect(textOf(transport.sent[0]).split('\n')[3]).toBe(
      'Atenção: a consulta ao PNCP foi interrompida antes do fim; a lista pode estar incompleta.'
    );
  });

  it('warns on an empty digest built from partial results', async () => {
    const { run, transport } = setup((params) =>
      params.pagina === 1 ? page([PAPER], { paginasRestantes: 1 }) : { status: 503 }
    );

    const outcome = await run();

    expect(outcome).toEqual({ kind: 'success-empty', warning: true });
    expect(exitCodeFor(outcome)).toBe(0);
    expect(transport.sent).toHaveLength(1);
  });

  it('flags the digest when the page limit cuts pagination short', async () => {
    const { run, requests, transport } = setup(() => page([SCHOOL]), [], testConfig({ PNCP_MAX_PAGES: '2' }));

    const outcome = await run();

    expect(outcome).toEqual({ kind: 'success', delivered: 1 });
    expect(requests).toHaveLength(2);
    expect(textOf(transport.sent[0]).split('\n')[3]).toBe(
      'Atenção: a consulta ao PNCP foi interrompida antes do fim; a lista pode estar incompleta.'
    );
  });

  it('still delivers the other modalities when one is rejected', async () => {
    const { run, requests, transport } = setup(
      (params) =>
        params.codigoModalidadeContratacao === 4 ? { status: 422 } : page([SCHOOL], { paginasRestantes: 0 }),
      [],
      testConfig({ PNCP_MODALITIES: '4,6' })
    );

    const outcome = await run();

    expect(outcome).toEqual({
      kind: 'partial-failure',
      delivered: 1,
      fetchError: 'PNCP request for modality 4 page 1 failed after 1 attempt(s): PNCP responded HTTP 422',
    });
    expect(requests.map((r) => r.codigoModalidadeContratacao)).toEqual([4, 6]);
    expect(transport.sent).toHaveLength(1);
  });

  it('rethrows errors that are not fetch or delivery failures', async () => {
    const transport = createFakeTransport();
    const config = testConfig();
    const emailService = new NodemailerEmailService(config.email, { createTransport: transport.factory });
    const source = { fetchAllNotices: async () => Promise.reject(new Error('boom')) };

    await expect(runPipeline(config, { source, emailService, now: NOW })).rejects.toThrow('boom');
    expect(transport.created).toBe(0);
  });
});

describe('exitCodeFor', () => {
  it('keeps fetch and delivery failures apart', () => {
    expect(exitCodeFor({ kind: 'success', delivered: 1 })).toBe(0);
    expect(exitCodeFor({ kind: 'success-empty', warning: true })).toBe(0);
    expect(exitCodeFor({ kind: 'partial-failure', delivered: 1, fetchError: 'x' })).toBe(3);
    expect(exitCodeFor({ kind: 'failure', stage: 'fetch', reason: 'x' })).toBe(4);
    expect(exitCodeFor({ kind: 'failure', stage: 'notify', reason: 'x' })).toBe(5);
  });
});
