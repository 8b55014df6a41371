/**
 * Filters canonical notices against the run's search criteria.
 *
 * A notice matches when a keyword occurs in its title or description, its
 * estimated value (if known) sits inside the configured range, and its
 * modality is one of the configured categories.
 */

import type { MatchResult, Notice, SearchCriteria } from '../../types/notice.js';
import { createChildLogger } from '../../utils/logger.js';

const log = createChildLogger({ component: 'NoticeMatcher' });

const LOCALE = 'pt-BR';

function fold(value: string): string {
  return value.toLocaleLowerCase(LOCALE);
}

/**
 * First keyword, in declaration order, found in the title or description
 */
export function findKeyword(notice: Notice, keywords: readonly string[]): string | null {
  const haystacks = [fold(notice.title)];
  if (notice.description) haystacks.push(fold(notice.description));

  for (const keyword of keywords) {
    const needle = fold(keyword.trim());
    if (needle.length === 0) continue;
    if (haystacks.some((haystack) => haystack.includes(needle))) {
      return keyword;
    }
  }
  return null;
}

/**
 * Unknown values are never excluded by the range
 */
export function withinValueRange(notice: Notice, criteria: SearchCriteria): boolean {
  if (notice.estimatedValue === null) return true;
  if (criteria.minValue !== undefined && notice.estimatedValue < criteria.minValue) return false;
  if (criteria.maxValue !== undefined && notice.estimatedValue > criteria.maxValue) return false;
  return true;
}

export function inCategories(notice: Notice, criteria: SearchCriteria): boolean {
  if (!criteria.categories || criteria.categories.length === 0) return true;
  return notice.category !== null && criteria.categories.includes(notice.category);
}

export function match(notices: readonly Notice[], criteria: SearchCriteria): MatchResult[] {
  const results: MatchResult[] = [];

  for (const notice of notices) {
    const keyword = findKeyword(notice, criteria.keywords);
    if (keyword === null) continue;
    if (!withinValueRange(notice, criteria)) continue;
    if (!inCategories(notice, criteria)) continue;
    results.push({ notice, keyword });
  }

  log.info({ candidates: notices.length, matches: results.length }, 'Notices matched against criteria');
  return results;
}
