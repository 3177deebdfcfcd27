import { Command, Option } from 'commander';
import { DEFAULT_CONFIG_FILE, listProfiles, loadProfile } from '../config/workflowConfig';
import { Confirmer, ProcessRunner, RESUME_POINTS, ResumePoint, WorkflowOrchestrator } from '../services/workflowService';
import { InputError, InterruptedError, isAbortError } from '../utils/errorHandler';
import { configureLogger, logger } from '../utils/logger';
import { confirm, createPrompter } from '../utils/prompt';

export interface WorkflowCommandOptions {
  config?: string;
  configFile: string;
  resumeFrom?: ResumePoint;
  listConfigs?: boolean;
}

export function runListConfigs(configFile: string): number {
  const profiles = listProfiles(configFile);
  const rule = '='.repeat(80);
  const lines = ['', 'Available Configurations:', rule];

  for (const profile of profiles) {
    lines.push(
      '',
      `* ${profile.key}`,
      `   Name: ${profile.name}`,
      `   Description: ${profile.description || 'N/A'}`,
      `   Job Title: ${profile.title || 'N/A'}`,
      `   Location: ${profile.location || 'N/A'}`
    );
  }

  lines.push('', rule, '', 'Usage: job-scout workflow --config <config_name>', '');
  process.stdout.write(lines.join('\n'));
  return 0;
}

/**
 * Opens stdin only while asking, so step subprocesses can prompt on the same terminal
 */
async function askToContinue(message: string): Promise<boolean> {
  const prompter = createPrompter();
  try {
    return await confirm(prompter, message);
  } finally {
    prompter.close();
  }
}

export function interruptedMessage(configName: string): string {
  return `Workflow interrupted by user. Resume with: job-scout workflow --config ${configName}`;
}

/**
 * Ctrl+C while a confirmation is pending ends the run like a SIGINT
 */
export function interruptible(confirmStep: Confirmer, configName: string): Confirmer {
  return async (message) => {
    try {
      return await confirmStep(message);
    } catch (error) {
      if (isAbortError(error)) {
        throw new InterruptedError(interruptedMessage(configName));
      }
      throw error;
    }
  };
}

/**
 * @returns process exit code; a pause exits 0 with the state kept for later
 */
export async function runWorkflowCommand(options: WorkflowCommandOptions): Promise<number> {
  if (options.listConfigs) {
    return runListConfigs(options.configFile);
  }
  if (!options.config) {
    throw new InputError('--config is required (or use list-configs)');
  }

  const loaded = loadProfile(options.configFile, options.config);
  const { logging } = loaded.profile;
  const logFile = configureLogger({
    level: logging.level,
    console: logging.console,
    file: logging.file ?? undefined,
    baseDir: loaded.baseDir
  });
  if (logFile) {
    logger.info(`Logging to ${logFile}`);
  }

  const onInterrupt = (): void => {
    logger.info(interruptedMessage(loaded.name));
    process.exit(1);
  };
  process.once('SIGINT', onInterrupt);

  try {
    const orchestrator = new WorkflowOrchestrator(loaded, {
      runner: new ProcessRunner(),
      confirm: interruptible(askToContinue, loaded.name)
    });
    const outcome = await orchestrator.run(options.resumeFrom);
    return outcome === 'missing-input' ? 1 : 0;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

export function registerWorkflowCommands(program: Command): void {
  program
    .command('workflow')
    .description('Run search, folder creation, AI tailoring and PDF build from a YAML profile')
    .option('-c, --config <name>', 'profile name from the config file')
    .option('-f, --config-file <file>', 'YAML config file', DEFAULT_CONFIG_FILE)
    .addOption(new Option('-r, --resume-from <step>', 'start at a step; earlier outputs come from the state file').choices(RESUME_POINTS))
    .option('--list-configs', 'list the profiles and exit', false)
    .action(async (options: WorkflowCommandOptions) => {
      process.exitCode = await runWorkflowCommand(options);
    });

  program
    .command('list-configs')
    .description('List the profiles of a workflow config file')
    .option('-f, --config-file <file>', 'YAML config file', DEFAULT_CONFIG_FILE)
    .action((options: { configFile: string }) => {
      process.exitCode = runListConfigs(options.configFile);
    });
}
