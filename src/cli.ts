#!/usr/bin/env node
import dotenv from 'dotenv';
dotenv.config();

import fs from 'fs';
import path from 'path';
import { Command } from 'commander';
import { registerSearchCommand } from './commands/searchCommand';
import { registerFolderCommands } from './commands/foldersCommand';
import { registerTailorCommands } from './commands/tailorCommand';
import { registerWorkflowCommands } from './commands/workflowCommand';
import { handleCliError } from './utils/errorHandler';
import { logger } from './utils/logger';

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.resolve(__dirname, '../package.json'), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (error) {
    logger.debug(`Could not read package version: ${error instanceof Error ? error.message : String(error)}`);
  }
  return '0.0.0';
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('job-scout')
    .description('Search LinkedIn jobs and tailor a LaTeX resume for each one')
    .version(readVersion());

  registerSearchCommand(program);
  registerFolderCommands(program);
  registerTailorCommands(program);
  registerWorkflowCommands(program);

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      process.exitCode = handleCliError(error);
    });

  process.on('unhandledRejection', (error: unknown) => {
    logger.error('Unhandled rejection', error);
    process.exit(1);
  });
}
