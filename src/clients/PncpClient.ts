/**
 * PncpClient - Client for the PNCP consultation API
 *
 * Walks the paginated `/v1/contratacoes/publicacao` listing for every
 * configured modality. Each page goes through the shared retry policy;
 * when a page finally fails after earlier pages succeeded, the client
 * returns what it has together with the error instead of throwing.
 *
 * @see https://pncp.gov.br/api/consulta/swagger-ui/index.html
 */

import { type AxiosInstance, isAxiosError } from 'axios';
import { z } from 'zod';
import { createHttpClient } from '../config/httpClient.js';
import { RETRY_DEFAULTS } from '../config/constants.js';
import type { PncpConfig } from '../config/env.js';
import { FetchError } from '../types/errors.js';
import type { DateWindow, FetchResult, RawNotice } from '../types/notice.js';
import { toPortalDate } from '../utils/dateUtils.js';
import { createChildLogger } from '../utils/logger.js';
import { parseRetryAfter, retryWithBackoff, RetryError, type RetryPolicy } from '../utils/retry.js';

const log = createChildLogger({ component: 'PncpClient' });

/**
 * Pagination envelope returned by the consultation API
 */
const pncpPageSchema = z
  .object({
    data: z.array(z.record(z.unknown())),
    totalRegistros: z.number().optional(),
    totalPaginas: z.number().optional(),
    numeroPagina: z.number().optional(),
    paginasRestantes: z.number().optional(),
    empty: z.boolean().optional(),
  })
  .passthrough();

export type PncpPage = z.infer<typeof pncpPageSchema>;

/**
 * Non-2xx answer from the portal
 */
export class PncpHttpError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly retryAfterMs: number | null,
    body: string
  ) {
    super(`PNCP responded HTTP ${statusCode}${body ? `: ${body.slice(0, 200)}` : ''}`);
    this.name = 'PncpHttpError';
  }
}

/**
 * 2xx answer whose body is not a listing page
 */
export class PncpResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PncpResponseError';
  }
}

/**
 * Transient failures: rate limiting, server errors and anything that never got a response
 */
export function isRetryablePncpError(error: unknown): boolean {
  if (error instanceof PncpHttpError) {
    return error.statusCode === 429 || (error.statusCode >= 500 && error.statusCode < 600);
  }
  if (error instanceof PncpResponseError) {
    return false;
  }
  if (isAxiosError(error)) {
    return !error.response;
  }
  return false;
}

export interface PncpClientOptions {
  http?: AxiosInstance;
  sleep?: (ms: number) => Promise<void>;
}

export interface FetchFilters {
  /** State code forwarded to the portal */
  uf?: string;
}

function bodyPreview(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  return JSON.stringify(data);
}

export class PncpClient {
  private readonly http: AxiosInstance;
  private readonly policy: RetryPolicy;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(private readonly config: PncpConfig, options: PncpClientOptions = {}) {
    this.http = options.http ?? createHttpClient({ baseURL: config.baseUrl, timeout: config.timeoutMs });
    this.sleep = options.sleep;
    this.policy = {
      maxAttempts: config.maxAttempts,
      initialDelay: config.retryBaseDelayMs,
      maxDelay: RETRY_DEFAULTS.MAX_DELAY_MS,
      multiplier: RETRY_DEFAULTS.MULTIPLIER,
      isRetryable: isRetryablePncpError,
      getRetryAfter: (error) => (error instanceof PncpHttpError && error.statusCode === 429 ? error.retryAfterMs : null),
    };
  }

  /**
   * Fetch every notice published in the window, for all configured modalities.
   * A page that fails ends its modality only; the walk moves on to the next one.
   *
   * @throws FetchError when no page at all could be retrieved
   */
  async fetchAllNotices(window: DateWindow, filters: FetchFilters = {}): Promise<FetchResult> {
    const notices: RawNotice[] = [];
    let pagesFetched = 0;
    let truncated = false;
    let firstError: FetchError | undefined;

    for (const modality of this.config.modalities) {
      for (let page = 1; ; page++) {
        if (page > this.config.maxPages) {
          truncated = true;
          log.warn(
            { modality, maxPages: this.config.maxPages },
            'Page limit reached before the portal reported the last page; remaining pages skipped'
          );
          break;
        }

        let result: PncpPage;
        try {
          result = await this.fetchPage(window, modality, page, filters);
        } catch (error) {
          const fetchError = this.toFetchError(error, modality, page, pagesFetched);
          firstError ??= fetchError;
          log.warn(
            { modality, page, pagesFetched, notices: notices.length, error: fetchError.message },
            'PNCP modality interrupted; moving on to the next one'
          );
          break;
        }

        pagesFetched++;
        notices.push(...result.data);
        log.debug(
          { modality, page, totalPaginas: result.totalPaginas, records: result.data.length },
          'PNCP page retrieved'
        );

        if (this.isLastPage(result, page)) break;
      }
    }

    if (firstError) {
      if (pagesFetched === 0) {
        log.error({ error: firstError.message }, 'PNCP fetch failed before any page was retrieved');
        throw firstError;
      }
      log.warn({ pagesFetched, notices: notices.length }, 'PNCP fetch finished with partial results');
      return { notices, pagesFetched, truncated, error: firstError };
    }

    log.info({ pagesFetched, notices: notices.length, truncated }, 'PNCP fetch completed');
    return { notices, pagesFetched, truncated };
  }

  private isLastPage(result: PncpPage, page: number): boolean {
    if (result.data.length === 0 || result.empty === true) return true;
    if (result.paginasRestantes !== undefined) return result.paginasRestantes <= 0;
    if (result.totalPaginas !== undefined) return page >= result.totalPaginas;
    return false;
  }

  private async fetchPage(window: DateWindow, modality: number, page: number, filters: FetchFilters): Promise<PncpPage> {
    const params: Record<string, string | number> = {
      dataInicial: toPortalDate(window.from),
      dataFinal: toPortalDate(window.to),
      codigoModalidadeContratacao: modality,
      pagina: page,
      tamanhoPagina: this.config.pageSize,
    };
    if (filters.uf) params.uf = filters.uf;

    return retryWithBackoff<PncpPage>(
      async () => {
        const response = await this.http.get<unknown>('/v1/contratacoes/publicacao', {
          params,
          validateStatus: () => true,
        });

        if (response.status === 204) {
          return { data: [] };
        }
        if (response.status < 200 || response.status >= 300) {
          throw new PncpHttpError(
            response.status,
            parseRetryAfter(response.headers['retry-after']),
            bodyPreview(response.data)
          );
        }

        const parsed = pncpPageSchema.safeParse(response.data);
        if (!parsed.success) {
          throw new PncpResponseError(`Unexpected PNCP response body: ${bodyPreview(response.data).slice(0, 200)}`);
        }
        return parsed.data;
      },
      this.policy,
      { context: `PNCP modality ${modality} page ${page}`, sleep: this.sleep }
    );
  }

  private toFetchError(error: unknown, modality: number, page: number, pagesFetched: number): FetchError {
    const attempts = error instanceof RetryError ? error.attempts : 1;
    const cause = error instanceof RetryError ? error.lastError : error;
    const statusCode = cause instanceof PncpHttpError ? cause.statusCode : undefined;
    const reason = cause instanceof Error ? cause.message : String(cause);

    return new FetchError(
      `PNCP request for modality ${modality} page ${page} failed after ${attempts} attempt(s): ${reason}`,
      { statusCode, attempts, pagesFetched, context: { modality, page } }
    );
  }
}
