/**
 * Maps raw PNCP records to canonical notices and removes duplicates across pages.
 */

import { z } from 'zod';
import { PNCP_DEFAULTS, modalityName } from '../../config/constants.js';
import { MalformedRecordError } from '../../types/errors.js';
import type { Notice, RawNotice } from '../../types/notice.js';
import { extractIsoDate } from '../../utils/dateUtils.js';
import { createChildLogger } from '../../utils/logger.js';

const log = createChildLogger({ component: 'NoticeNormalizer' });

const text = z
  .preprocess((value) => {
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    if (typeof value !== 'string') return undefined;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }, z.string().optional())
  .catch(undefined);

const numeric = z
  .preprocess((value) => {
    if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
    if (typeof value === 'string' && value.trim() !== '') {
      const parsed = Number(value.trim());
      return Number.isFinite(parsed) ? parsed : undefined;
    }
    return undefined;
  }, z.number().optional())
  .catch(undefined);

/**
 * Lenient view of a portal record: every field optional, malformed values read as absent
 */
const rawNoticeSchema = z.object({
  numeroControlePNCP: text,
  objetoCompra: text,
  informacaoComplementar: text,
  anoCompra: numeric,
  sequencialCompra: numeric,
  modalidadeId: numeric,
  modalidadeNome: text,
  valorTotalEstimado: numeric,
  dataPublicacaoPncp: text,
  dataEncerramentoProposta: text,
  linkSistemaOrigem: text,
  orgaoEntidade: z
    .object({ cnpj: text, razaoSocial: text })
    .optional()
    .catch(undefined),
  unidadeOrgao: z
    .object({ ufSigla: text, municipioNome: text })
    .optional()
    .catch(undefined),
});

type ParsedRecord = z.infer<typeof rawNoticeSchema>;

export interface NormalizeResult {
  notices: Notice[];
  /** Records dropped for missing an identifier or a title */
  skipped: number;
  /** Records collapsed into an earlier notice with the same identifier */
  duplicates: number;
}

function portalUrl(record: ParsedRecord, id: string): string {
  if (record.linkSistemaOrigem && /^https?:\/\//i.test(record.linkSistemaOrigem)) {
    return record.linkSistemaOrigem;
  }
  const cnpj = record.orgaoEntidade?.cnpj;
  if (cnpj && record.anoCompra !== undefined && record.sequencialCompra !== undefined) {
    return `${PNCP_DEFAULTS.PUBLIC_URL}/app/editais/${cnpj}/${record.anoCompra}/${record.sequencialCompra}`;
  }
  return `${PNCP_DEFAULTS.PUBLIC_URL}/app/editais?q=${encodeURIComponent(id)}`;
}

function canonicalId(record: ParsedRecord): string {
  if (record.numeroControlePNCP) {
    return record.numeroControlePNCP;
  }
  const cnpj = record.orgaoEntidade?.cnpj;
  if (cnpj && record.anoCompra !== undefined && record.sequencialCompra !== undefined) {
    return `${cnpj}-${record.anoCompra}-${record.sequencialCompra}`;
  }
  throw new MalformedRecordError('no control number and no organ/year/sequence composite', 'numeroControlePNCP');
}

/**
 * Map one portal record to a Notice
 *
 * @throws MalformedRecordError when the identifier or the title is missing
 */
export function toNotice(raw: RawNotice): Notice {
  // Every field schema catches its own failures, so this parse cannot fail
  const record = rawNoticeSchema.parse(raw);

  const id = canonicalId(record);
  if (!record.objetoCompra) {
    throw new MalformedRecordError(`notice ${id} has no title`, 'objetoCompra');
  }

  const category = record.modalidadeId ?? null;

  return {
    id,
    title: record.objetoCompra,
    description: record.informacaoComplementar ?? null,
    organ: record.orgaoEntidade?.razaoSocial ?? null,
    publishedAt: extractIsoDate(record.dataPublicacaoPncp),
    estimatedValue: record.valorTotalEstimado ?? null,
    url: portalUrl(record, id),
    category,
    categoryName: record.modalidadeNome ?? (category !== null ? modalityName(category) : null),
    uf: record.unidadeOrgao?.ufSigla ?? null,
    municipality: record.unidadeOrgao?.municipioNome ?? null,
    proposalDeadline: extractIsoDate(record.dataEncerramentoProposta),
  };
}

/**
 * Normalize and deduplicate a run's raw records. Total: bad records are skipped
 * and counted, never fatal. First-seen order and field values are kept.
 */
export function normalize(rawNotices: readonly RawNotice[]): NormalizeResult {
  const notices: Notice[] = [];
  const seen = new Set<string>();
  let skipped = 0;
  let duplicates = 0;

  for (const raw of rawNotices) {
    let notice: Notice;
    try {
      notice = toNotice(raw);
    } catch (error) {
      if (!(error instanceof MalformedRecordError)) throw error;
      skipped++;
      log.debug({ field: error.field, reason: error.message }, 'Skipping malformed PNCP record');
      continue;
    }

    if (seen.has(notice.id)) {
      duplicates++;
      continue;
    }
    seen.add(notice.id);
    notices.push(notice);
  }

  if (skipped > 0) {
    log.warn({ skipped, total: rawNotices.length }, 'Malformed PNCP records skipped');
  }
  log.info({ received: rawNotices.length, unique: notices.length, duplicates, skipped }, 'PNCP records normalized');

  return { notices, skipped, duplicates };
}
