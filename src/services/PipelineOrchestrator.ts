/**
 * Pipeline Orchestrator
 *
 * One run: FETCH -> NORMALIZE -> MATCH -> COMPOSE -> NOTIFY. Fetch and
 * delivery failures end the run with a failure outcome; everything else
 * unexpected propagates to the caller.
 */

import { EXIT_CODES, type ExitCode } from '../config/constants.js';
import type { AppConfig } from '../config/env.js';
import type { FetchFilters } from '../clients/PncpClient.js';
import { DeliveryError, FetchError } from '../types/errors.js';
import type { DateWindow, FetchResult, RunOutcome } from '../types/notice.js';
import { formatIsoDate } from '../utils/dateUtils.js';
import { createChildLogger } from '../utils/logger.js';
import { compose, render, renderCsv, renderHtml, subjectFor } from './digest/DigestComposer.js';
import type { IEmailService } from './infrastructure/EmailService.js';
import { match } from './notices/NoticeMatcher.js';
import { normalize } from './notices/NoticeNormalizer.js';

const log = createChildLogger({ component: 'PipelineOrchestrator' });

export interface NoticeSource {
  fetchAllNotices(window: DateWindow, filters?: FetchFilters): Promise<FetchResult>;
}

export interface PipelineDependencies {
  source: NoticeSource;
  emailService: IEmailService;
  now?: () => Date;
}

export async function runPipeline(config: AppConfig, deps: PipelineDependencies): Promise<RunOutcome> {
  const now = deps.now ?? (() => new Date());
  const { criteria } = config;
  const runDate = formatIsoDate(now(), config.timeZone);

  log.info({ runDate, window: criteria.window, keywords: criteria.keywords.length }, 'Starting PNCP digest run');

  let fetched: FetchResult;
  try {
    fetched = await deps.source.fetchAllNotices(criteria.window, { uf: criteria.uf });
  } catch (error) {
    if (error instanceof FetchError) {
      log.error({ error: error.message, attempts: error.attempts }, 'Fetch failed; no digest will be sent');
      return { kind: 'failure', stage: 'fetch', reason: error.message };
    }
    throw error;
  }

  const { notices, skipped } = normalize(fetched.notices);
  const matches = match(notices, criteria);
  const incomplete = fetched.error !== undefined || fetched.truncated;
  const digest = compose(matches, { runDate, incomplete });

  log.info(
    { pages: fetched.pagesFetched, notices: notices.length, skipped, matches: digest.count, incomplete },
    'Digest composed'
  );

  try {
    await deps.emailService.send(config.email.recipientEmail, subjectFor(digest), render(digest), {
      html: renderHtml(digest),
      attachments:
        digest.count > 0
          ? [{ filename: `licitacoes_${runDate}.csv`, content: renderCsv(digest), contentType: 'text/csv; charset=utf-8' }]
          : [],
    });
  } catch (error) {
    if (error instanceof DeliveryError) {
      return { kind: 'failure', stage: 'notify', reason: error.message };
    }
    throw error;
  }

  if (fetched.error) {
    log.warn({ error: fetched.error.message }, 'Digest delivered from partial fetch results');
    return digest.count > 0
      ? { kind: 'partial-failure', delivered: digest.count, fetchError: fetched.error.message }
      : { kind: 'success-empty', warning: true };
  }

  if (fetched.truncated) {
    log.warn({ maxPages: config.pncp.maxPages }, 'Digest delivered from results cut short by the page limit');
  }
  return digest.count > 0 ? { kind: 'success', delivered: digest.count } : { kind: 'success-empty', warning: incomplete };
}

export function exitCodeFor(outcome: RunOutcome): ExitCode {
  switch (outcome.kind) {
    case 'success':
    case 'success-empty':
      return EXIT_CODES.SUCCESS;
    case 'partial-failure':
      return EXIT_CODES.PARTIAL_FAILURE;
    case 'failure':
      return outcome.stage === 'fetch' ? EXIT_CODES.FETCH_FAILURE : EXIT_CODES.DELIVERY_FAILURE;
  }
}
