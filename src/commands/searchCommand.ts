import { Command } from 'commander';
import { JobRecord, SearchParameters } from '../types/types';
import { settings } from '../config/settings';
import { HttpClient } from '../services/httpClient';
import { runSearch } from '../services/searchService';
import { writeSearchReport } from '../services/reportService';
import { TIME_WINDOW_LABELS } from '../services/listingService';
import { SearchInput, buildSearchParameters } from '../utils/validators';
import { Prompter, confirm, createPrompter } from '../utils/prompt';
import { abortableSleep } from '../utils/pacing';
import { logger } from '../utils/logger';

export interface SearchCommandOptions {
  title?: string;
  experience?: string;
  location?: string;
  timeWindow?: string;
  maxApplicants?: string;
  numResults?: string;
  details?: boolean;
  outputRoot?: string;
}

async function askSearchInput(prompter: Prompter): Promise<SearchInput> {
  process.stdout.write('\nLinkedIn Job Search\n\n');

  const title = await prompter.ask('Job title: ');
  const experience = await prompter.ask('Years of experience (blank for any): ');
  const location = await prompter.ask("Location (blank for any, 'canada' for major Canadian cities): ");
  process.stdout.write('\nPosted within:\n  1. 24 hours\n  2. 48 hours\n  3. 1 week\n  4. 2 weeks\n');
  const timeWindow = await prompter.ask('Choice [2]: ');
  const maxApplicants = await prompter.ask('Maximum applicants [10]: ');
  const maxResults = await prompter.ask('Maximum results [50]: ');
  const details = await confirm(prompter, 'Fetch full job descriptions? (slower)', false);

  return { title, experience, location, timeWindow, maxApplicants, maxResults, details };
}

export function describeSearch(params: SearchParameters): string[] {
  const location = Array.isArray(params.location)
    ? `${params.location.length} cities (${params.location.join(', ')})`
    : params.location || 'Any';

  return [
    `Job Title: ${params.jobTitle}`,
    `Experience: ${params.experience === null ? 'Any' : `${params.experience} years`}`,
    `Location: ${location}`,
    `Posted within: ${TIME_WINDOW_LABELS[params.timeWindow]}`,
    `Max Applicants: ${params.maxApplicants}`,
    `Max Results: ${params.maxResults}`,
    `Mode: ${params.fetchDetails ? 'Detailed' : 'Basic'}`
  ];
}

export function summarizeJobs(records: readonly JobRecord[], limit = 5): string {
  const lines = records.slice(0, limit).flatMap((job, i) => {
    const entry = [
      `${i + 1}. ${job.title}`,
      `   Company: ${job.company}`,
      `   Location: ${job.location}`,
      `   Applicants: ${job.applicants ?? 'Unknown'}`
    ];
    if (job.salaryRange) {
      entry.push(`   Salary: ${job.salaryRange}`);
    }
    if (job.jobType) {
      entry.push(`   Type: ${job.jobType}`);
    }
    entry.push(`   Link: ${job.link}`, '');
    return entry;
  });

  if (records.length > limit) {
    lines.push(`... and ${records.length - limit} more jobs`);
  }
  return lines.join('\n');
}

/**
 * Search, then write the CSV and JSON reports.
 * Ctrl+C stops the search and still writes what was found.
 * @returns process exit code
 */
export async function runSearchCommand(options: SearchCommandOptions): Promise<number> {
  let input: SearchInput = {
    title: options.title,
    experience: options.experience,
    location: options.location,
    timeWindow: options.timeWindow,
    maxApplicants: options.maxApplicants,
    maxResults: options.numResults,
    details: options.details
  };

  if (!options.title) {
    const prompter = createPrompter();
    try {
      input = await askSearchInput(prompter);
    } finally {
      prompter.close();
    }
  }

  const params = buildSearchParameters(input);
  for (const line of describeSearch(params)) {
    logger.info(line);
  }

  const controller = new AbortController();
  const onInterrupt = (): void => {
    logger.warn('Search interrupted, saving partial results');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const { records, interrupted } = await runSearch(params, {
      http: new HttpClient(),
      signal: controller.signal,
      sleep: abortableSleep(controller.signal)
    });

    if (records.length === 0) {
      logger.warn('No jobs found matching your criteria');
      return interrupted ? 1 : 0;
    }

    const result = await writeSearchReport(records, params, options.outputRoot ?? settings.outputRoot);
    process.stdout.write(`\nTop results:\n\n${summarizeJobs(records)}\n`);

    if (!result.success) {
      logger.error('Some results could not be saved');
      return 1;
    }
    return interrupted ? 1 : 0;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

export function registerSearchCommand(program: Command): void {
  program
    .command('search')
    .description('Search LinkedIn job listings and save them as CSV and JSON')
    .option('-t, --title <title>', 'job title to search for (prompts for everything when omitted)')
    .option('-e, --experience <years>', 'years of experience (0-30)')
    .option('-l, --location <location>', "location, or 'canada' for a multi-city search")
    .option('-w, --time-window <window>', 'posted within: 24h, 48h, 1w or 2w', '48h')
    .option('-a, --max-applicants <n>', 'maximum number of applicants', '10')
    .option('-n, --num-results <n>', 'maximum number of results', '50')
    .option('-d, --details', 'fetch full job descriptions (slower)', false)
    .option('-o, --output-root <dir>', 'directory for the dated report folders')
    .action(async (options: SearchCommandOptions) => {
      process.exitCode = await runSearchCommand(options);
    });
}
