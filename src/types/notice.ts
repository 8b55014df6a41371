import type { FetchError } from './errors.js';

/**
 * Publication window, both ends inclusive, as YYYY-MM-DD
 */
export interface DateWindow {
  from: string;
  to: string;
}

/**
 * Match criteria, built once per run from configuration
 */
export interface SearchCriteria {
  readonly keywords: readonly string[];
  readonly window: Readonly<DateWindow>;
  readonly minValue?: number;
  readonly maxValue?: number;
  /** PNCP modality codes (codigoModalidadeContratacao) */
  readonly categories?: readonly number[];
  /** State code sent to the portal (e.g. PR) */
  readonly uf?: string;
}

/**
 * Record as received in a portal page's `data` array
 */
export type RawNotice = Record<string, unknown>;

/**
 * Canonical procurement notice
 */
export interface Notice {
  id: string;
  title: string;
  description: string | null;
  organ: string | null;
  /** YYYY-MM-DD */
  publishedAt: string | null;
  estimatedValue: number | null;
  url: string;
  category: number | null;
  categoryName: string | null;
  uf: string | null;
  municipality: string | null;
  proposalDeadline: string | null;
}

export interface MatchResult {
  notice: Notice;
  /** First criteria keyword (declaration order) found in the notice */
  keyword: string;
}

export interface Digest {
  /** YYYY-MM-DD */
  runDate: string;
  entries: MatchResult[];
  count: number;
  /** Set when the fetch stopped early and results may be missing */
  incomplete: boolean;
}

export interface FetchResult {
  notices: RawNotice[];
  pagesFetched: number;
  /** Set when the page limit stopped pagination before the portal's last page */
  truncated: boolean;
  /** First page failure, when other pages still succeeded */
  error?: FetchError;
}

export type RunOutcome =
  | { kind: 'success'; delivered: number }
  | { kind: 'success-empty'; warning: boolean }
  | { kind: 'partial-failure'; delivered: number; fetchError: string }
  | { kind: 'failure'; stage: 'fetch' | 'notify'; reason: string };
