import fs from 'fs/promises';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import {
  JobRecord,
  JobRecordRow,
  SearchParameters,
  SearchReport,
  SearchReportMetadata
} from '../types/types';
import { describeError } from '../utils/errorHandler';
import { isRecord } from '../utils/validators';
import { formatClock, formatDate, formatDateTime } from '../utils/dates';
import { logger } from '../utils/logger';

export const CSV_COLUMNS: (keyof JobRecordRow)[] = [
  'title',
  'company',
  'location',
  'link',
  'job_id',
  'applicants',
  'posting_date',
  'job_description',
  'job_type',
  'seniority_level',
  'industry',
  'skills_required',
  'salary_range',
  'source',
  'scraped_at'
];

export interface ReportPaths {
  csv: string;
  json: string;
}

export interface ReportResult {
  success: boolean;
  paths: ReportPaths;
}

/**
 * Lowercase, underscore separated form of a job title for file names
 */
export function sanitizeTitle(jobTitle: string): string {
  return jobTitle
    .replace(/[^\w\s-]/g, '')
    .trim()
    .replace(/[-\s]+/g, '_')
    .toLowerCase();
}

/**
 * <outputRoot>/<YYYY-MM-DD>/<title>_<HHMMSS>.csv|.json
 */
export function reportPaths(outputRoot: string, jobTitle: string, now: Date): ReportPaths {
  const dir = path.join(outputRoot, formatDate(now));
  const base = `${sanitizeTitle(jobTitle)}_${formatClock(now)}`;
  return {
    csv: path.join(dir, `${base}.csv`),
    json: path.join(dir, `${base}.json`)
  };
}

export function toRow(record: JobRecord): JobRecordRow {
  return {
    title: record.title,
    company: record.company,
    location: record.location,
    link: record.link,
    job_id: record.jobId,
    applicants: record.applicants,
    posting_date: record.postingDate,
    job_description: record.description,
    job_type: record.jobType,
    seniority_level: record.seniorityLevel,
    industry: record.industry,
    skills_required: record.skills,
    salary_range: record.salaryRange,
    source: record.source,
    scraped_at: record.scrapedAt
  };
}

function displayLocation(location: SearchParameters['location']): string {
  if (typeof location === 'string') {
    return location || 'Any';
  }
  return location.length > 0 ? location.join('; ') : 'Any';
}

export function buildMetadata(params: SearchParameters, total: number, now: Date): SearchReportMetadata {
  return {
    search_date: formatDateTime(now),
    job_title: params.jobTitle,
    experience: params.experience ?? 'Any',
    location: typeof params.location === 'string' ? params.location || 'Any' : [...params.location],
    max_applicants: params.maxApplicants,
    total_results: total,
    search_mode: params.fetchDetails ? 'Detailed' : 'Basic'
  };
}

export function renderCsv(rows: JobRecordRow[], params: SearchParameters, now: Date): string {
  const header = [
    '# Job Search Results',
    `# Search Date: ${formatDateTime(now)}`,
    `# Job Title: ${params.jobTitle}`,
    `# Experience: ${params.experience ?? 'Any'} years`,
    `# Location: ${displayLocation(params.location)}`,
    `# Max Applicants: ${params.maxApplicants}`,
    `# Total Results: ${rows.length}`,
    '#'
  ].join('\n');

  const body = stringify(rows, { header: true, columns: CSV_COLUMNS });
  return `${header}\n${body}`;
}

/**
 * Write the CSV and JSON reports. Each file is attempted independently;
 * failures are logged and reflected in `success`, never thrown.
 */
export async function writeSearchReport(
  records: readonly JobRecord[],
  params: SearchParameters,
  outputRoot: string,
  now: Date = new Date()
): Promise<ReportResult> {
  const paths = reportPaths(outputRoot, params.jobTitle, now);

  if (records.length === 0) {
    logger.warn('No results to save');
    return { success: false, paths };
  }

  const rows = records.map(toRow);
  let success = true;

  try {
    await fs.mkdir(path.dirname(paths.csv), { recursive: true });
  } catch (error) {
    logger.error(`Could not create output directory: ${describeError(error)}`);
    return { success: false, paths };
  }

  try {
    await fs.writeFile(paths.csv, renderCsv(rows, params, now), 'utf-8');
    logger.info(`CSV results saved to: ${paths.csv}`);
  } catch (error) {
    logger.error(`Error saving CSV results: ${describeError(error)}`);
    success = false;
  }

  try {
    const report: SearchReport = {
      metadata: buildMetadata(params, rows.length, now),
      jobs: rows
    };
    await fs.writeFile(paths.json, JSON.stringify(report, null, 2), 'utf-8');
    logger.info(`JSON results saved to: ${paths.json}`);
  } catch (error) {
    logger.error(`Error saving JSON results: ${describeError(error)}`);
    success = false;
  }

  return { success, paths };
}

function isRow(value: unknown): value is JobRecordRow {
  return isRecord(value) &&
    typeof value.title === 'string' &&
    typeof value.company === 'string' &&
    typeof value.location === 'string' &&
    typeof value.link === 'string';
}

function isMetadata(value: unknown): value is SearchReportMetadata {
  return isRecord(value) &&
    typeof value.job_title === 'string' &&
    typeof value.total_results === 'number';
}

/**
 * Read back a JSON search report
 * @throws Error if the file is missing or is not a search report
 */
export async function readSearchReport(file: string): Promise<SearchReport> {
  const parsed: unknown = JSON.parse(await fs.readFile(file, 'utf-8'));

  if (!isRecord(parsed) || !isMetadata(parsed.metadata) || !Array.isArray(parsed.jobs)) {
    throw new Error(`${file} is not a job search report`);
  }

  const jobs = parsed.jobs.filter(isRow);
  if (jobs.length !== parsed.jobs.length) {
    throw new Error(`${file} contains malformed job entries`);
  }

  return { metadata: parsed.metadata, jobs };
}
