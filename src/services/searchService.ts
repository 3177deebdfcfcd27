import type NodeCache from 'node-cache';
import { JobRecord, SearchParameters } from '../types/types';
import { defaultTiming } from '../config/settings';
import { pause, sleep } from '../utils/pacing';
import { logger } from '../utils/logger';
import { ScraperDeps, passesApplicantCap, searchListings } from './listingService';
import { createDetailCache, fetchJobDetails } from './detailService';

export interface SearchDeps extends ScraperDeps {
  cache?: NodeCache;
}

export interface SearchOutcome {
  records: JobRecord[];
  interrupted: boolean;
}

/**
 * Detail phase: one posting at a time, paced. Records whose now-known
 * applicant count exceeds the cap are dropped; on interruption the rest are
 * kept as listed.
 */
export async function enrichJobs(
  records: readonly JobRecord[],
  maxApplicants: number,
  deps: SearchDeps
): Promise<JobRecord[]> {
  const timing = deps.timing ?? defaultTiming;
  const cache = deps.cache ?? createDetailCache();
  const enriched: JobRecord[] = [];

  logger.info(`Fetching detailed job descriptions for ${records.length} jobs`);

  for (const [index, record] of records.entries()) {
    if (deps.signal?.aborted) {
      logger.warn(`Interrupted, keeping ${records.length - index} jobs without details`);
      enriched.push(...records.slice(index));
      break;
    }

    logger.info(`${index + 1}/${records.length}: Getting details for ${record.title} at ${record.company}`);
    const detailed = await fetchJobDetails(record, { http: deps.http, timing, cache });

    if (passesApplicantCap(detailed, maxApplicants)) {
      enriched.push(detailed);
    } else {
      logger.info(`Dropped ${detailed.title}: ${detailed.applicants} applicants is over the cap`);
    }

    if (index < records.length - 1) {
      await pause(timing.detailDelay, deps.sleep ?? sleep);
    }
  }

  return enriched;
}

/**
 * Listing phase, then the detail phase when requested. An aborted signal
 * stops either phase and returns what was collected so far.
 */
export async function runSearch(params: SearchParameters, deps: SearchDeps): Promise<SearchOutcome> {
  const listed = await searchListings(params, deps);

  let records = listed;
  if (params.fetchDetails && listed.length > 0 && !deps.signal?.aborted) {
    records = await enrichJobs(listed, params.maxApplicants, deps);
  }

  const interrupted = deps.signal?.aborted ?? false;
  logger.info(`Completed: found ${records.length} jobs${interrupted ? ' before interruption' : ''}`);

  return { records, interrupted };
}
