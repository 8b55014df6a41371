/**
 * In-process stand-ins for the portal and the SMTP server, plus record builders
 */

import axios, { AxiosError, type AxiosInstance } from 'axios';
import type { SendMailOptions } from 'nodemailer';
import { loadConfig, type AppConfig } from '../config/env.js';
import type { MailTransport, TransportFactory } from '../services/infrastructure/EmailService.js';
import type { Notice, RawNotice } from '../types/notice.js';

export const TEST_CNPJ = '12345678000190';

export type PortalReply =
  | { status: number; data?: unknown; headers?: Record<string, string> }
  | { network: 'timeout' | 'reset' };

export interface FakePortal {
  http: AxiosInstance;
  requests: Record<string, unknown>[];
}

/**
 * axios instance whose adapter answers from `handler` instead of the network
 */
export function createFakePortal(handler: (params: Record<string, unknown>, index: number) => PortalReply): FakePortal {
  const requests: Record<string, unknown>[] = [];

  const http = axios.create({
    baseURL: 'https://pncp.test/api/consulta',
    adapter: async (config) => {
      const params: Record<string, unknown> = { ...config.params };
      requests.push(params);
      const reply = handler(params, requests.length - 1);

      if ('network' in reply) {
        if (reply.network === 'timeout') {
          throw new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED', config);
        }
        throw new AxiosError('socket hang up', 'ECONNRESET', config);
      }

      return {
        data: reply.data ?? '',
        status: reply.status,
        statusText: String(reply.status),
        headers: reply.headers ?? {},
        config,
      };
    },
  });

  return { http, requests };
}

/**
 * Portal listing page
 */
export function page(data: RawNotice[], meta: { totalPaginas?: number; paginasRestantes?: number } = {}): PortalReply {
  return { status: 200, data: { data, ...meta } };
}

/**
 * PNCP-shaped record; `seq` drives the identifier
 */
export function pncpRecord(seq: number, overrides: Record<string, unknown> = {}): RawNotice {
  return {
    numeroControlePNCP: `${TEST_CNPJ}-1-${String(seq).padStart(6, '0')}/2026`,
    objetoCompra: `Aquisição de material de expediente ${seq}`,
    informacaoComplementar: null,
    anoCompra: 2026,
    sequencialCompra: seq,
    modalidadeId: 6,
    modalidadeNome: 'Pregão - Eletrônico',
    valorTotalEstimado: 10000,
    dataPublicacaoPncp: '2026-10-15T10:00:00',
    dataEncerramentoProposta: '2026-11-05T09:00:00',
    linkSistemaOrigem: `https://compras.example.gov.br/edital/${seq}`,
    orgaoEntidade: { cnpj: TEST_CNPJ, razaoSocial: 'MUNICIPIO DE EXEMPLO' },
    unidadeOrgao: { ufSigla: 'PR', municipioNome: 'Exemplo' },
    ...overrides,
  };
}

export function notice(overrides: Partial<Notice> = {}): Notice {
  return {
    id: 'N-1',
    title: 'Aquisição de material de expediente',
    description: null,
    organ: 'MUNICIPIO DE EXEMPLO',
    publishedAt: '2026-10-15',
    estimatedValue: 10000,
    url: 'https://compras.example.gov.br/edital/1',
    category: 6,
    categoryName: 'Pregão - Eletrônico',
    uf: 'PR',
    municipality: 'Exemplo',
    proposalDeadline: '2026-11-05',
    ...overrides,
  };
}

export const BASE_ENV: NodeJS.ProcessEnv = {
  SENDER_EMAIL: 'sender@example.com',
  SENDER_CREDENTIAL: 'test-secret',
  RECIPIENT_EMAIL: 'recipient@example.com',
  SEARCH_KEYWORDS: 'reforma',
  SEARCH_DATE_FROM: '2026-10-12',
  SEARCH_DATE_TO: '2026-10-19',
  PNCP_BASE_URL: 'https://pncp.test/api/consulta',
  PNCP_MODALITIES: '6',
  PNCP_RETRY_BASE_DELAY_MS: '0',
  SMTP_RETRY_BASE_DELAY_MS: '0',
};

export function testConfig(env: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({ ...BASE_ENV, ...env }, new Date('2026-10-19T12:00:00Z'));
}

export type TransportStep = 'ok' | Error | 'hang';

export interface FakeTransport {
  factory: TransportFactory;
  sent: SendMailOptions[];
  closed: number;
  created: number;
}

/**
 * SMTP stand-in: each sendMail consumes the next step; once the steps run out every send succeeds
 */
export function createFakeTransport(steps: TransportStep[] = []): FakeTransport {
  const queue = [...steps];
  const fake: FakeTransport = {
    sent: [],
    closed: 0,
    created: 0,
    factory: () => {
      fake.created++;
      const transport: MailTransport = {
        sendMail: async (mail) => {
          fake.sent.push(mail);
          const step = queue.shift() ?? 'ok';
          if (step === 'hang') return new Promise<never>(() => undefined);
          if (step instanceof Error) throw step;
          return { messageId: `<${fake.sent.length}@example.com>` };
        },
        close: () => {
          fake.closed++;
        },
      };
      return transport;
    },
  };
  return fake;
}

export function smtpError(message: string, fields: { code?: string; responseCode?: number }): Error {
  return Object.assign(new Error(message), fields);
}

export const noSleep = async (): Promise<void> => undefined;
