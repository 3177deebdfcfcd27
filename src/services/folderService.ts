import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { JobDetailsFile, JobRecordRow, SearchReport } from '../types/types';
import { InputError } from '../utils/errorHandler';
import { logger } from '../utils/logger';

export const TEMPLATE_FOLDER = 'default';
export const JOB_DETAILS_FILE = 'job_details.json';

export interface FolderOptions {
  resumesRoot: string;
  now?: () => Date;
}

/**
 * Lowercase company name with every run of other characters turned into one underscore
 */
export function cleanCompanyName(company: string): string {
  return company
    .replace(/[^a-zA-Z0-9]/g, '_')
    .toLowerCase()
    .replace(/__+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * Folder name for a job: clean company name plus a short hash of the posting,
 * so two openings at one company do not collide
 */
export function folderNameFor(job: JobRecordRow): string {
  const description = (job.job_description ?? '').slice(0, 100);
  const fingerprint = `${job.title}_${job.company}_${job.location}_${description}`;
  const hexId = crypto.createHash('md5').update(fingerprint).digest('hex').slice(0, 6);
  const company = cleanCompanyName(job.company) || 'company';
  return `${company}_${hexId}`;
}

export function jobDetailsFor(job: JobRecordRow, searchTitle: string, reportPath: string, createdAt: Date): JobDetailsFile {
  return {
    job_title: job.title,
    company_name: job.company,
    job_description: job.job_description ?? '',
    location: job.location,
    job_link: job.link,
    applicants: job.applicants === null ? 'unknown' : String(job.applicants),
    salary_range: job.salary_range ?? '',
    job_type: job.job_type ?? '',
    seniority_level: job.seniority_level ?? '',
    skills_required: job.skills_required ?? '',
    source_search_title: searchTitle,
    created_at: createdAt.toISOString(),
    source_json_file: path.resolve(reportPath)
  };
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Copy the default resume folder to <resumesRoot>/<title>/<name>, minus any built PDF
 * @throws Error if the template is missing or the target already exists
 */
export async function copyResumeTemplate(resumesRoot: string, title: string, name: string): Promise<string> {
  const templateDir = path.join(resumesRoot, TEMPLATE_FOLDER);
  const target = path.join(resumesRoot, title, name);

  if (!(await exists(templateDir))) {
    throw new Error(`Default template not found at '${templateDir}'`);
  }

  if (await exists(target)) {
    throw new Error(`Resume '${name}' already exists at '${target}'`);
  }

  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.cp(templateDir, target, { recursive: true });
  await fs.rm(path.join(target, 'resume.pdf'), { force: true });

  logger.info(`Created resume folder: ${title}/${name}`);
  return target;
}

/**
 * One resume folder per selected job, each with a job_details.json
 * @param selection zero-based indexes into report.jobs
 * @returns the created folders
 */
export async function createJobFolders(
  report: SearchReport,
  reportPath: string,
  selection: number[],
  options: FolderOptions
): Promise<string[]> {
  const now = options.now ?? (() => new Date());
  const searchTitle = report.metadata.job_title;
  const created: string[] = [];

  for (const index of selection) {
    const job = report.jobs[index];
    if (!job) {
      throw new InputError(`There is no job number ${index + 1}`);
    }

    logger.info(`Processing job ${index + 1}: ${job.title} at ${job.company} (${job.location})`);

    const folder = await copyResumeTemplate(options.resumesRoot, searchTitle, folderNameFor(job));
    const details = jobDetailsFor(job, searchTitle, reportPath, now());
    await fs.writeFile(path.join(folder, JOB_DETAILS_FILE), JSON.stringify(details, null, 2), 'utf-8');

    logger.info(`Job details saved to ${path.join(folder, JOB_DETAILS_FILE)}`);
    created.push(folder);
  }

  return created;
}

export function describeJobs(report: SearchReport): string {
  return report.jobs
    .map((job, i) => [
      `${i + 1}. ${job.title}`,
      `   Company: ${job.company}`,
      `   Location: ${job.location}`,
      `   Applicants: ${job.applicants ?? 'unknown'}`
    ].join('\n'))
    .join('\n\n');
}
