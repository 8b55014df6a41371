/**
 * Digest Composer
 *
 * Orders a run's matches and renders them as the email body (plain text and
 * HTML), the subject line and a CSV report. Output depends only on the
 * Digest, so the same digest always renders byte-identically.
 */

import Papa from 'papaparse';
import type { Digest, MatchResult, Notice } from '../../types/notice.js';
import { toDisplayDate } from '../../utils/dateUtils.js';

export interface ComposeOptions {
  /** YYYY-MM-DD */
  runDate: string;
  incomplete?: boolean;
}

const currency = new Intl.NumberFormat('pt-BR', { style: 'currency', currency: 'BRL' });

const NO_MATCHES = 'Nenhuma licitação encontrada hoje para os critérios configurados.';
const INCOMPLETE_WARNING = 'Atenção: a consulta ao PNCP foi interrompida antes do fim; a lista pode estar incompleta.';

/**
 * Publication date descending (unknown dates last), then identifier ascending
 */
export function compareMatches(a: MatchResult, b: MatchResult): number {
  const da = a.notice.publishedAt;
  const db = b.notice.publishedAt;
  if (da !== db) {
    if (da === null) return 1;
    if (db === null) return -1;
    return da < db ? 1 : -1;
  }
  if (a.notice.id === b.notice.id) return 0;
  return a.notice.id < b.notice.id ? -1 : 1;
}

export function compose(matches: readonly MatchResult[], options: ComposeOptions): Digest {
  const entries = [...matches].sort(compareMatches);
  return {
    runDate: options.runDate,
    entries,
    count: entries.length,
    incomplete: options.incomplete ?? false,
  };
}

export function formatValue(value: number | null): string {
  return value === null ? 'não informado' : currency.format(value);
}

function formatDate(isoDate: string | null): string {
  return isoDate === null ? 'não informada' : toDisplayDate(isoDate);
}

function countLine(count: number): string {
  return count === 1 ? '1 licitação encontrada' : `${count} licitações encontradas`;
}

interface EntryFields {
  organ: string;
  title: string;
  value: string;
  publishedAt: string;
  modality: string;
  keyword: string;
  url: string;
}

function entryFields({ notice, keyword }: MatchResult): EntryFields {
  return {
    organ: notice.organ ?? 'Órgão não informado',
    title: notice.title,
    value: formatValue(notice.estimatedValue),
    publishedAt: formatDate(notice.publishedAt),
    modality: notice.categoryName ?? 'não informada',
    keyword,
    url: notice.url,
  };
}

export function subjectFor(digest: Digest): string {
  const date = toDisplayDate(digest.runDate);
  if (digest.count === 0) {
    return `Licitações PNCP - ${date} - nenhuma encontrada`;
  }
  return `Licitações PNCP - ${date} - ${digest.count} encontrada${digest.count === 1 ? '' : 's'}`;
}

/**
 * Plain-text email body
 */
export function render(digest: Digest): string {
  const lines: string[] = [`Licitações PNCP - ${toDisplayDate(digest.runDate)}`];

  if (digest.count === 0) {
    lines.push('', NO_MATCHES);
    if (digest.incomplete) lines.push('', INCOMPLETE_WARNING);
    return lines.join('\n') + '\n';
  }

  lines.push(countLine(digest.count));
  if (digest.incomplete) lines.push('', INCOMPLETE_WARNING);

  digest.entries.forEach((entry, index) => {
    const f = entryFields(entry);
    lines.push(
      '',
      `${index + 1}. ${f.organ}`,
      `   Objeto: ${f.title}`,
      `   Valor estimado: ${f.value}`,
      `   Publicação: ${f.publishedAt}`,
      `   Modalidade: ${f.modality}`,
      `   Palavra-chave: ${f.keyword}`,
      `   Link: ${f.url}`
    );
  });

  return lines.join('\n') + '\n';
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * HTML alternative of the email body, same content as render()
 */
export function renderHtml(digest: Digest): string {
  const parts: string[] = [
    '<html>',
    '<body>',
    `<h2>Licitações PNCP - ${toDisplayDate(digest.runDate)}</h2>`,
  ];

  if (digest.incomplete) {
    parts.push(`<p><strong>${escapeHtml(INCOMPLETE_WARNING)}</strong></p>`);
  }

  if (digest.count === 0) {
    parts.push(`<p>${escapeHtml(NO_MATCHES)}</p>`);
  } else {
    parts.push(`<p>${countLine(digest.count)}</p>`, '<ol>');
    for (const entry of digest.entries) {
      const f = entryFields(entry);
      parts.push(
        '<li>',
        `<p><strong>${escapeHtml(f.organ)}</strong><br>`,
        `${escapeHtml(f.title)}<br>`,
        `Valor estimado: ${escapeHtml(f.value)}<br>`,
        `Publicação: ${escapeHtml(f.publishedAt)}<br>`,
        `Modalidade: ${escapeHtml(f.modality)}<br>`,
        `Palavra-chave: ${escapeHtml(f.keyword)}<br>`,
        `<a href="${escapeHtml(f.url)}">${escapeHtml(f.url)}</a></p>`,
        '</li>'
      );
    }
    parts.push('</ol>');
  }

  parts.push('</body>', '</html>');
  return parts.join('\n') + '\n';
}

const CSV_FIELDS = [
  'Número',
  'Órgão',
  'UF',
  'Município',
  'Objeto',
  'Valor Estimado',
  'Data Publicação',
  'Encerramento Propostas',
  'Modalidade',
  'Palavra-chave',
  'URL',
];

function csvRow(notice: Notice, keyword: string): (string | number)[] {
  return [
    notice.id,
    notice.organ ?? '',
    notice.uf ?? '',
    notice.municipality ?? '',
    notice.title,
    notice.estimatedValue ?? '',
    notice.publishedAt ?? '',
    notice.proposalDeadline ?? '',
    notice.categoryName ?? '',
    keyword,
    notice.url,
  ];
}

/**
 * CSV report of the digest entries, in digest order
 */
export function renderCsv(digest: Digest): string {
  return Papa.unparse({
    fields: CSV_FIELDS,
    data: digest.entries.map(({ notice, keyword }) => csvRow(notice, keyword)),
  });
}
