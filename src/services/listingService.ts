import { JobRecord, SearchParameters, TimeWindow } from '../types/types';
import { HttpGetter, QueryParams } from './httpClient';
import { ScrapeTiming, defaultTiming } from '../config/settings';
import { SleepFn, pause, sleep } from '../utils/pacing';
import { describeError, isRateLimitError } from '../utils/errorHandler';
import { extractJobCard, parseListingPage, NOT_AVAILABLE } from '../utils/listingParser';
import { isJobRelevant } from '../utils/relevance';
import { logger } from '../utils/logger';

export const SEARCH_ENDPOINTS = [
  'https://www.linkedin.com/jobs-guest/jobs/api/seeMoreJobPostings/search',
  'https://www.linkedin.com/jobs/search'
] as const;

export const PAGE_SIZE = 25;
export const MAX_PAGES_WITHOUT_RESULTS = 2;
export const MAX_RATE_LIMIT_ERRORS = 3;

export const TIME_WINDOW_CODES: Record<TimeWindow, string> = {
  '24h': 'r86400',
  '48h': 'r172800',
  '1w': 'r604800',
  '2w': 'r1209600'
};

export const TIME_WINDOW_LABELS: Record<TimeWindow, string> = {
  '24h': '24 hours',
  '48h': '48 hours',
  '1w': '1 week',
  '2w': '2 weeks'
};

export interface ListingQuery {
  keywords: string;
  location: string;
  experience: number | null;
  timeWindow: TimeWindow;
  maxApplicants: number;
}

export interface ScraperDeps {
  http: HttpGetter;
  sleep?: SleepFn;
  timing?: ScrapeTiming;
  signal?: AbortSignal;
  now?: () => Date;
}

type EndpointStop = 'budget' | 'no-results' | 'rate-limited' | 'aborted';

interface EndpointResult {
  records: JobRecord[];
  stop: EndpointStop;
}

/**
 * LinkedIn's f_E experience filter for a number of years
 */
export function experienceLevelCode(experience: number | null): string | undefined {
  if (experience === null) {
    return undefined;
  }
  if (experience <= 1) {
    return '1';
  }
  if (experience <= 3) {
    return '2';
  }
  if (experience <= 7) {
    return '3,4';
  }
  return '5,6';
}

export function buildSearchParams(query: ListingQuery, start: number): QueryParams {
  return {
    keywords: query.keywords,
    location: query.location,
    start,
    count: PAGE_SIZE,
    f_TPR: TIME_WINDOW_CODES[query.timeWindow],
    f_JT: 'F,P,C',
    sortBy: 'R',
    f_E: experienceLevelCode(query.experience)
  };
}

export function passesApplicantCap(record: Pick<JobRecord, 'applicants'>, maxApplicants: number): boolean {
  return record.applicants === null || record.applicants <= maxApplicants;
}

export function resolveLocations(location: string | readonly string[]): string[] {
  if (typeof location === 'string') {
    return [location];
  }
  return location.length > 0 ? [...location] : [''];
}

function recordKey(record: JobRecord): string {
  return record.jobId ?? record.link;
}

function applicantLabel(record: JobRecord): string {
  return record.applicants === null ? '(applicants unknown)' : `(${record.applicants} applicants)`;
}

async function paginateEndpoint(
  endpoint: string,
  query: ListingQuery,
  budget: number,
  seen: Set<string>,
  deps: ScraperDeps
): Promise<EndpointResult> {
  const timing = deps.timing ?? defaultTiming;
  const sleepFn = deps.sleep ?? sleep;
  const now = deps.now ?? (() => new Date());

  const records: JobRecord[] = [];
  let start = 0;
  let pagesWithoutResults = 0;
  let rateLimitErrors = 0;

  while (records.length < budget &&
         pagesWithoutResults < MAX_PAGES_WITHOUT_RESULTS &&
         rateLimitErrors < MAX_RATE_LIMIT_ERRORS) {
    if (deps.signal?.aborted) {
      return { records, stop: 'aborted' };
    }

    const page = start / PAGE_SIZE + 1;
    await pause(timing.pageDelay, sleepFn);

    let html: string;
    try {
      const response = await deps.http.get(endpoint, {
        params: buildSearchParams(query, start),
        timeoutMs: timing.listingTimeoutMs
      });
      html = response.body;
    } catch (error) {
      if (isRateLimitError(error)) {
        rateLimitErrors++;
        logger.warn(`Rate limited on page ${page} (${rateLimitErrors}/${MAX_RATE_LIMIT_ERRORS}), backing off`);
        await pause(timing.rateLimitBackoff, sleepFn);
        continue;
      }

      pagesWithoutResults++;
      logger.error(`Network error on page ${page}: ${describeError(error)}`);
      if (pagesWithoutResults >= MAX_PAGES_WITHOUT_RESULTS) {
        break;
      }
      await pause(timing.errorBackoff, sleepFn);
      start += PAGE_SIZE;
      continue;
    }

    const { cards } = parseListingPage(html);
    if (cards.length === 0) {
      logger.info(`No job cards found on page ${page}`);
      pagesWithoutResults++;
      start += PAGE_SIZE;
      continue;
    }

    logger.info(`Processing page ${page} - found ${cards.length} job cards`);
    let pageKept = 0;

    for (const card of cards) {
      if (records.length >= budget) {
        break;
      }

      let record: JobRecord;
      try {
        record = extractJobCard(card, now());
      } catch (error) {
        logger.warn(`Error processing job card: ${describeError(error)}`);
        continue;
      }

      if (record.title === NOT_AVAILABLE) {
        continue;
      }

      if (!isJobRelevant(record.title, query.keywords)) {
        logger.debug(`Skipped irrelevant: ${record.title} at ${record.company}`);
        continue;
      }

      if (!passesApplicantCap(record, query.maxApplicants)) {
        logger.debug(`Skipped crowded: ${record.title} ${applicantLabel(record)}`);
        continue;
      }

      const key = recordKey(record);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);

      records.push(record);
      pageKept++;
      const where = query.location ? ` | ${query.location}` : '';
      logger.info(`${records.length}. ${record.title} at ${record.company} ${applicantLabel(record)}${where}`);
    }

    pagesWithoutResults = pageKept === 0 ? pagesWithoutResults + 1 : 0;
    start += PAGE_SIZE;
  }

  if (records.length >= budget) {
    return { records, stop: 'budget' };
  }
  if (rateLimitErrors >= MAX_RATE_LIMIT_ERRORS) {
    return { records, stop: 'rate-limited' };
  }
  return { records, stop: 'no-results' };
}

/**
 * Page through the search endpoints for one location. An endpoint that gets
 * rate limited out, or yields nothing, hands over to the next one.
 */
export async function searchLocation(query: ListingQuery, budget: number, deps: ScraperDeps): Promise<JobRecord[]> {
  const records: JobRecord[] = [];
  const seen = new Set<string>();

  for (const endpoint of SEARCH_ENDPOINTS) {
    const remaining = budget - records.length;
    if (remaining <= 0) {
      break;
    }

    logger.info(`Trying endpoint: ${endpoint.split('/').pop()}`);
    const result = await paginateEndpoint(endpoint, query, remaining, seen, deps);
    records.push(...result.records);

    if (result.stop === 'aborted' || result.stop === 'budget') {
      break;
    }

    if (result.stop === 'rate-limited') {
      logger.warn('Too many rate limit errors, trying alternative endpoint');
      continue;
    }

    if (records.length > 0) {
      break;
    }
  }

  const where = query.location ? ` in ${query.location}` : '';
  logger.info(`Found ${records.length} qualifying jobs${where}`);
  return records;
}

/**
 * Listing phase of a search: every location in turn, the result budget split
 * evenly between them, truncated to the overall cap
 */
export async function searchListings(params: SearchParameters, deps: ScraperDeps): Promise<JobRecord[]> {
  const locations = resolveLocations(params.location);
  const perLocation = Math.max(1, Math.floor(params.maxResults / locations.length));

  logger.info(`Searching LinkedIn for '${params.jobTitle}' jobs`);
  logger.info(`Time range: last ${TIME_WINDOW_LABELS[params.timeWindow]}`);
  logger.info(`Looking for jobs with <= ${params.maxApplicants} applicants`);

  const results: JobRecord[] = [];

  for (const location of locations) {
    if (deps.signal?.aborted) {
      break;
    }

    if (location) {
      logger.info(`Searching in: ${location}`);
    }

    const records = await searchLocation({
      keywords: params.jobTitle.trim(),
      location,
      experience: params.experience,
      timeWindow: params.timeWindow,
      maxApplicants: params.maxApplicants
    }, perLocation, deps);

    results.push(...records);
    if (results.length >= params.maxResults) {
      break;
    }
  }

  return results.slice(0, params.maxResults);
}
