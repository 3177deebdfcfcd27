import path from 'path';
import { Command } from 'commander';
import { settings } from '../config/settings';
import { readSearchReport } from '../services/reportService';
import { copyResumeTemplate, createJobFolders, describeJobs } from '../services/folderService';
import { InputError } from '../utils/errorHandler';
import { parseSelection } from '../utils/validators';
import { Prompter, createPrompter } from '../utils/prompt';
import { logger } from '../utils/logger';

export interface FoldersCommandOptions {
  jsonPath: string;
  select?: string;
  resumesRoot?: string;
}

export interface NewResumeOptions {
  title: string;
  name: string;
  resumesRoot?: string;
}

async function askSelection(prompter: Prompter, count: number): Promise<number[]> {
  for (;;) {
    const answer = await prompter.ask(`\nEnter job number(s) (e.g. 1 or 1,3,5) or 'all' [1-${count}]: `);
    try {
      return parseSelection(answer, count);
    } catch (error) {
      if (!(error instanceof InputError)) {
        throw error;
      }
      logger.warn(error.message);
    }
  }
}

/**
 * @returns process exit code
 */
export async function runFoldersCommand(options: FoldersCommandOptions): Promise<number> {
  const report = await readSearchReport(options.jsonPath);
  if (report.jobs.length === 0) {
    logger.warn(`No jobs in ${options.jsonPath}`);
    return 1;
  }

  logger.info(`Found ${report.jobs.length} jobs for '${report.metadata.job_title}'`);
  process.stdout.write(`\n${describeJobs(report)}\n`);

  let selection: number[];
  if (options.select) {
    selection = parseSelection(options.select, report.jobs.length);
  } else {
    const prompter = createPrompter();
    try {
      selection = await askSelection(prompter, report.jobs.length);
    } finally {
      prompter.close();
    }
  }

  const created = await createJobFolders(report, options.jsonPath, selection, {
    resumesRoot: options.resumesRoot ?? settings.resumesRoot
  });

  logger.info(`Created ${created.length} resume folders:`);
  for (const folder of created) {
    logger.info(`   - ${folder}`);
  }
  return 0;
}

const RESUME_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

export async function runNewResumeCommand(options: NewResumeOptions): Promise<number> {
  if (!RESUME_NAME_PATTERN.test(options.name)) {
    throw new InputError(`Resume name can only contain letters, numbers, underscores, and hyphens: '${options.name}'`);
  }

  const resumesRoot = options.resumesRoot ?? settings.resumesRoot;
  const folder = await copyResumeTemplate(resumesRoot, options.title, options.name);

  logger.info(`New resume created at ${folder}`);
  logger.info(`Build it with: scripts/build.sh --title "${options.title}" --path ${path.basename(folder)}`);
  return 0;
}

export function registerFolderCommands(program: Command): void {
  program
    .command('create-folders')
    .description('Create a resume folder for each selected job of a search report')
    .requiredOption('-j, --json-path <file>', 'JSON report written by the search command')
    .option('-s, --select <selection>', "jobs to use: 'all', '3' or '1,2,4' (prompts when omitted)")
    .option('-r, --resumes-root <dir>', 'directory holding default/ and the per-title folders')
    .action(async (options: FoldersCommandOptions) => {
      process.exitCode = await runFoldersCommand(options);
    });

  program
    .command('new-resume')
    .description('Copy the default resume into <resumes-root>/<title>/<name>')
    .requiredOption('-t, --title <title>', 'resume title, used as the parent folder')
    .requiredOption('-n, --name <name>', 'folder name (letters, numbers, _ and -)')
    .option('-r, --resumes-root <dir>', 'directory holding default/ and the per-title folders')
    .action(async (options: NewResumeOptions) => {
      process.exitCode = await runNewResumeCommand(options);
    });
}
