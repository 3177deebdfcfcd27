import { Command } from 'commander';
import { tailorResume } from '../services/aiService';
import { createDefaultTemplate } from '../scripts/createDefaultTemplate';
import { logger } from '../utils/logger';

export interface TailorCommandOptions {
  path: string;
  template?: string;
  dryRun?: boolean;
}

export interface InitTemplateOptions {
  resumesRoot?: string;
  force?: boolean;
}

export async function runTailorCommand(options: TailorCommandOptions): Promise<number> {
  const result = await tailorResume(options.path, {
    templatePath: options.template,
    dryRun: options.dryRun
  });

  if (options.dryRun) {
    const rule = '='.repeat(80);
    process.stdout.write(`\n${rule}\nRENDERED PROMPT (DRY RUN)\n${rule}\n${result.prompt}\n${rule}\n`);
    return 0;
  }

  if (result.reply?.raw_response !== undefined) {
    logger.error('The model did not return resume sections; see ai_response.json');
    return 1;
  }

  if (result.reply?.summary) {
    logger.info(result.reply.summary);
  }
  logger.info('Resume sections have been tailored for this job application');
  return 0;
}

export function registerTailorCommands(program: Command): void {
  program
    .command('tailor')
    .description('Tailor the resume sections of a folder to its job_details.json with Gemini')
    .requiredOption('-p, --path <folder>', 'resume folder containing job_details.json and sections/')
    .option('-t, --template <file>', 'prompt template with {placeholders}')
    .option('--dry-run', 'print the rendered prompt without calling the model', false)
    .action(async (options: TailorCommandOptions) => {
      process.exitCode = await runTailorCommand(options);
    });

  program
    .command('init-template')
    .description('Create <resumes-root>/default from the bundled LaTeX resume')
    .option('-r, --resumes-root <dir>', 'directory to create default/ in')
    .option('-f, --force', 'overwrite an existing default folder', false)
    .action(async (options: InitTemplateOptions) => {
      await createDefaultTemplate(options.resumesRoot, options.force);
    });
}
