import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildProgram } from '../src/cli';
import { describeSearch, summarizeJobs } from '../src/commands/searchCommand';
import { runNewResumeCommand } from '../src/commands/foldersCommand';
import { interruptedMessage, interruptible } from '../src/commands/workflowCommand';
import { createDefaultTemplate } from '../src/scripts/createDefaultTemplate';
import { InputError, InterruptedError, handleCliError } from '../src/utils/errorHandler';
import { jobRecord, makeTempDir, removeDir } from './helpers';

describe('buildProgram', () => {
  it('registers every subcommand', () => {
    expect(buildProgram().commands.map((command) => command.name())).toEqual([
      'search',
      'create-folders',
      'new-resume',
      'tailor',
      'init-template',
      'workflow',
      'list-configs'
    ]);
  });
});

describe('search output', () => {
  it('describes a multi-city search', () => {
    expect(describeSearch({
      jobTitle: 'Data Analyst',
      experience: null,
      location: ['Toronto, ON, Canada', 'Ottawa, ON, Canada'],
      timeWindow: '1w',
      maxApplicants: 10,
      maxResults: 50,
      fetchDetails: true
    })).toEqual([
      'Job Title: Data Analyst',
      'Experience: Any',
      'Location: 2 cities (Toronto, ON, Canada, Ottawa, ON, Canada)',
      'Posted within: 1 week',
      'Max Applicants: 10',
      'Max Results: 50',
      'Mode: Detailed'
    ]);
  });

  it('summarizes the first results', () => {
    const records = [
      jobRecord({ salaryRange: '$90,000' }),
      jobRecord({ title: 'BI Analyst', applicants: null }),
      jobRecord({ title: 'Data Engineer' })
    ];

    expect(summarizeJobs(records, 2).split('\n')).toEqual([
      '1. Data Analyst',
      '   Company: Acme',
      '   Location: Toronto, ON',
      '   Applicants: 8',
      '   Salary: $90,000',
      '   Link: https://ca.linkedin.com/jobs/view/data-analyst-4001',
      '',
      '2. BI Analyst',
      '   Company: Acme',
      '   Location: Toronto, ON',
      '   Applicants: Unknown',
      '   Link: https://ca.linkedin.com/jobs/view/data-analyst-4001',
      '',
      '... and 1 more jobs'
    ]);
  });
});

describe('resume templates', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    removeDir(root);
  });

  it('installs the bundled resume once', async () => {
    const first = await createDefaultTemplate(root);
    fs.writeFileSync(path.join(first.folder, 'resume.tex'), 'edited');
    const second = await createDefaultTemplate(root);

    expect(first).toEqual({ folder: path.join(root, 'default'), written: true });
    expect(fs.existsSync(path.join(first.folder, 'sections', 'experience.tex'))).toBe(true);
    expect(second.written).toBe(false);
    expect(fs.readFileSync(path.join(first.folder, 'resume.tex'), 'utf-8')).toBe('edited');
  });

  it('overwrites the default folder when forced', async () => {
    await createDefaultTemplate(root);
    fs.writeFileSync(path.join(root, 'default', 'resume.tex'), 'edited');

    await createDefaultTemplate(root, true);

    expect(fs.readFileSync(path.join(root, 'default', 'resume.tex'), 'utf-8')).not.toBe('edited');
  });

  it('copies the default resume under a new name', async () => {
    await createDefaultTemplate(root);

    const code = await runNewResumeCommand({ title: 'Data Analyst', name: 'acme-v2', resumesRoot: root });

    expect(code).toBe(0);
    expect(fs.existsSync(path.join(root, 'Data Analyst', 'acme-v2', 'resume.tex'))).toBe(true);
  });

  it('rejects resume names with path characters', async () => {
    await expect(runNewResumeCommand({ title: 'Data Analyst', name: '../escape', resumesRoot: root }))
      .rejects.toThrow(InputError);
  });
});

describe('interruptible', () => {
  const ctrlC = (): Error => {
    const error = new Error('Aborted with Ctrl+C');
    error.name = 'AbortError';
    return error;
  };

  it('turns Ctrl+C at a prompt into an interruption with the resume hint', async () => {
    const confirmStep = interruptible(async () => {
      throw ctrlC();
    }, 'analyst');

    const result = confirmStep('Continue to next step (AI Tailoring)?');

    await expect(result).rejects.toBeInstanceOf(InterruptedError);
    await expect(result).rejects.toThrow('Workflow interrupted by user. Resume with: job-scout workflow --config analyst');
    expect(interruptedMessage('analyst')).toBe('Workflow interrupted by user. Resume with: job-scout workflow --config analyst');
  });

  it('passes answers and other errors through', async () => {
    expect(await interruptible(async () => false, 'analyst')('Continue?')).toBe(false);
    await expect(interruptible(async () => {
      throw new Error('stdin closed');
    }, 'analyst')('Continue?')).rejects.toThrow('stdin closed');
  });

  it('exits 1 on an interruption', () => {
    expect(handleCliError(new InterruptedError(interruptedMessage('analyst')))).toBe(1);
  });
});
