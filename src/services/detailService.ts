import NodeCache from 'node-cache';
import { load } from 'cheerio';
import { JobRecord, notFound } from '../types/types';
import { HttpGetter } from './httpClient';
import { ScrapeTiming, defaultTiming, settings } from '../config/settings';
import { describeError } from '../utils/errorHandler';
import {
  DESCRIPTION_FETCH_FAILED,
  extractApplicantCount,
  extractJobDescription,
  extractPostingDetails,
  pageLines,
  parsePostingJson
} from '../utils/parser';
import { NOT_AVAILABLE } from '../utils/listingParser';
import { logger } from '../utils/logger';

export const JOB_POSTING_API = 'https://www.linkedin.com/jobs-guest/jobs/api/jobPosting';
const LINKEDIN_ORIGIN = 'https://www.linkedin.com';

type DetailPatch = Partial<Pick<JobRecord,
  'description' | 'jobType' | 'seniorityLevel' | 'industry' | 'skills' | 'salaryRange' | 'applicants'>>;

export interface DetailDeps {
  http: HttpGetter;
  timing?: ScrapeTiming;
  cache?: NodeCache;
}

export function createDetailCache(): NodeCache {
  return new NodeCache({
    stdTTL: settings.detailCacheTtlSeconds,
    checkperiod: 0,
    useClones: false
  });
}

/**
 * Absolute posting URL without tracking parameters, or null when the card had no link
 */
export function normalizePostingUrl(link: string): string | null {
  if (!link || link === NOT_AVAILABLE) {
    return null;
  }

  const withoutQuery = link.split('?')[0];
  return withoutQuery.startsWith('http') ? withoutQuery : `${LINKEDIN_ORIGIN}${withoutQuery}`;
}

function patchFromHtml(html: string, record: JobRecord): DetailPatch {
  const $ = load(html);
  const details = extractPostingDetails($);

  const applicants = record.applicants === null
    ? extractApplicantCount(pageLines($).join('\n'))
    : notFound<number>();

  return {
    description: extractJobDescription($),
    jobType: details.jobType.found ? details.jobType.value : null,
    seniorityLevel: details.seniorityLevel.found ? details.seniorityLevel.value : null,
    industry: details.industry.found ? details.industry.value : null,
    skills: details.skills.found ? details.skills.value : null,
    salaryRange: details.salaryRange.found ? details.salaryRange.value : null,
    ...(applicants.found ? { applicants: applicants.value } : {})
  };
}

async function patchFromApi(record: JobRecord, deps: DetailDeps): Promise<DetailPatch> {
  if (!record.jobId) {
    return { description: DESCRIPTION_FETCH_FAILED };
  }

  const apiUrl = `${JOB_POSTING_API}/${record.jobId}`;
  logger.info(`Trying API endpoint: ${apiUrl}`);

  try {
    const response = await deps.http.get(apiUrl, {
      timeoutMs: (deps.timing ?? defaultTiming).detailTimeoutMs
    });

    if (response.contentType.includes('application/json')) {
      const description = parsePostingJson(response.body);
      logger.info(`Got details via API for ${record.title}`);
      return { description: description.found ? description.value : DESCRIPTION_FETCH_FAILED };
    }

    logger.info(`Got details via API (HTML) for ${record.title}`);
    return patchFromHtml(response.body, record);
  } catch (error) {
    logger.warn(`API fallback also failed for ${record.title}: ${describeError(error)}`);
    return { description: DESCRIPTION_FETCH_FAILED };
  }
}

/**
 * Full description and metadata for a listing record. Falls back to the
 * posting API when the page cannot be fetched; never throws.
 */
export async function fetchJobDetails(record: JobRecord, deps: DetailDeps): Promise<JobRecord> {
  const cacheKey = record.jobId ?? record.link;
  const cached = deps.cache?.get<DetailPatch>(cacheKey);
  if (cached) {
    logger.debug(`Detail cache hit for ${record.title}`);
    return { ...record, ...cached };
  }

  let patch: DetailPatch;

  try {
    const url = normalizePostingUrl(record.link);

    if (url) {
      try {
        logger.info(`Fetching: ${url}`);
        const response = await deps.http.get(url, {
          timeoutMs: (deps.timing ?? defaultTiming).detailTimeoutMs
        });
        patch = patchFromHtml(response.body, record);
        logger.info(`Got full details for ${record.title}`);
      } catch (error) {
        logger.warn(`Network error getting details for ${record.title}: ${describeError(error)}`);
        patch = await patchFromApi(record, deps);
      }
    } else {
      logger.warn(`No job link available for ${record.title}`);
      patch = await patchFromApi(record, deps);
    }
  } catch (error) {
    logger.error(`Error getting details for ${record.title}: ${describeError(error)}`);
    patch = { description: DESCRIPTION_FETCH_FAILED };
  }

  if (patch.description !== DESCRIPTION_FETCH_FAILED) {
    deps.cache?.set(cacheKey, patch);
  }

  return { ...record, ...patch };
}
