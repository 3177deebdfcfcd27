import fs from 'fs';
import path from 'path';
import { spawn } from 'child_process';
import { StepName, WorkflowState, WorkflowStateData } from '../types/types';
import { LoadedProfile, StepConfig } from '../config/workflowConfig';
import { ConfigError, StepError, describeError } from '../utils/errorHandler';
import { isRecord } from '../utils/validators';
import { logger } from '../utils/logger';
import { readSearchReport } from './reportService';

export const STEP_NAMES: readonly StepName[] = [
  'step1_job_search',
  'step2_folder_creation',
  'step3_ai_tailoring',
  'step4_build_pdfs'
];

export const RESUME_POINTS = ['step1', 'step2', 'step3', 'step4', 'beginning'] as const;
export type ResumePoint = (typeof RESUME_POINTS)[number];

const MTIME_SLACK_MS = 1000;

export type WorkflowOutcome = 'completed' | 'paused' | 'missing-input';

export interface RunOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
}

export interface CommandRunner {
  /** resolves with the exit code */
  run(command: string, args: string[], options: RunOptions): Promise<number>;
}

export type Confirmer = (message: string) => Promise<boolean>;

export interface WorkflowDeps {
  runner: CommandRunner;
  confirm: Confirmer;
  now?: () => Date;
}

type StepResult<T> =
  | { status: 'done'; output: T | undefined }
  | { status: 'paused' }
  | { status: 'missing' };

/**
 * Subprocess with the terminal attached, so interactive collaborators can prompt
 */
export class ProcessRunner implements CommandRunner {
  run(command: string, args: string[], options: RunOptions): Promise<number> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: 'inherit'
      });
      child.on('error', reject);
      child.on('close', (code, signal) => resolve(code ?? (signal ? 130 : 1)));
    });
  }
}

/**
 * Command and leading arguments to run a script by its extension
 */
export function interpreterFor(scriptPath: string): { command: string; args: string[] } {
  switch (path.extname(scriptPath).toLowerCase()) {
    case '.sh':
      return { command: 'bash', args: [scriptPath] };
    case '.py':
      return { command: 'python3', args: [scriptPath] };
    case '.js':
    case '.cjs':
    case '.mjs':
      return { command: process.execPath, args: [scriptPath] };
    default:
      return { command: scriptPath, args: [] };
  }
}

/**
 * Most recently modified *.json anywhere under dir, ignoring files older than sinceMs
 */
export function findNewestJson(dir: string, sinceMs = 0): string | null {
  const candidates: { file: string; mtime: number }[] = [];

  const visit = (current: string): void => {
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        visit(full);
      } else if (entry.isFile() && entry.name.endsWith('.json')) {
        const mtime = fs.statSync(full).mtimeMs;
        if (mtime >= sinceMs) {
          candidates.push({ file: full, mtime });
        }
      }
    }
  };

  visit(dir);
  candidates.sort((a, b) => b.mtime - a.mtime);
  return candidates.length > 0 ? candidates[0].file : null;
}

/**
 * Directories under dir modified within the last windowSeconds
 */
export function findRecentFolders(dir: string, windowSeconds: number, now: Date): string[] {
  const cutoff = now.getTime() - windowSeconds * 1000;
  return fs.readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => path.join(dir, entry.name))
    .filter((full) => fs.statSync(full).mtimeMs > cutoff)
    .sort();
}

function emptyState(): WorkflowState {
  return { completed_steps: [], data: {} };
}

function isStepName(value: unknown): value is StepName {
  return STEP_NAMES.some((step) => step === value);
}

export function parseState(raw: unknown, source: string): WorkflowState {
  if (!isRecord(raw) || !Array.isArray(raw.completed_steps) || !isRecord(raw.data)) {
    throw new ConfigError(`State file ${source} is not a workflow state`);
  }

  const completed = raw.completed_steps.filter(isStepName);
  const data: WorkflowStateData = {};
  const { job_search_output, created_folders, job_title } = raw.data;

  if (typeof job_search_output === 'string') {
    data.job_search_output = job_search_output;
  }
  if (Array.isArray(created_folders)) {
    data.created_folders = created_folders.filter((folder): folder is string => typeof folder === 'string');
  }
  if (typeof job_title === 'string') {
    data.job_title = job_title;
  }

  return { completed_steps: completed, data };
}

/**
 * JSON checkpoint of completed steps and their outputs. With no file the
 * state lives in memory only.
 */
export class StateStore {
  constructor(private readonly file: string | null) {}

  load(): WorkflowState {
    if (!this.file || !fs.existsSync(this.file)) {
      return emptyState();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.file, 'utf-8'));
    } catch (error) {
      throw new ConfigError(`Could not read state file ${this.file}: ${describeError(error)}`);
    }
    return parseState(raw, this.file);
  }

  save(state: WorkflowState): void {
    if (!this.file) {
      return;
    }
    fs.mkdirSync(path.dirname(this.file), { recursive: true });
    fs.writeFileSync(this.file, JSON.stringify(state, null, 2), 'utf-8');
  }
}

/**
 * Four-step pipeline: search, folder creation, AI tailoring, PDF build.
 * Each step is an external command; progress is checkpointed after every
 * step so a later run picks up where this one stopped.
 */
export class WorkflowOrchestrator {
  private readonly store: StateStore;
  private state: WorkflowState;
  private readonly now: () => Date;

  constructor(
    private readonly loaded: LoadedProfile,
    private readonly deps: WorkflowDeps
  ) {
    const { workflow } = loaded.profile;
    this.store = new StateStore(workflow.save_state ? this.resolve(workflow.state_file) : null);
    this.state = this.store.load();
    this.now = deps.now ?? (() => new Date());
  }

  get currentState(): WorkflowState {
    return this.state;
  }

  private get profile() {
    return this.loaded.profile;
  }

  private resolve(target: string): string {
    return path.resolve(this.loaded.baseDir, target);
  }

  private isCompleted(step: StepName): boolean {
    return this.state.completed_steps.includes(step);
  }

  private complete(step: StepName, data: WorkflowStateData = {}): void {
    this.state = {
      completed_steps: this.isCompleted(step) ? this.state.completed_steps : [...this.state.completed_steps, step],
      data: { ...this.state.data, ...data }
    };
    this.store.save(this.state);
  }

  private async shouldContinue(confirmation: boolean, message: string): Promise<boolean> {
    if (!confirmation || (await this.deps.confirm(message))) {
      return true;
    }
    logger.info(`Workflow paused. Resume with: job-scout workflow --config ${this.loaded.name}`);
    return false;
  }

  private async invoke(step: StepName, config: StepConfig, flags: string[], env?: NodeJS.ProcessEnv): Promise<void> {
    const script = this.resolve(config.script_path);
    const { command, args } = interpreterFor(script);
    const fullArgs = [...args, ...config.script_args, ...flags];

    logger.debug(`Running command: ${command} ${fullArgs.join(' ')}`);

    let code: number;
    try {
      code = await this.deps.runner.run(command, fullArgs, { cwd: this.loaded.baseDir, env });
    } catch (error) {
      throw new StepError(step, `Could not start ${command}: ${describeError(error)}`);
    }

    if (code !== 0) {
      throw new StepError(step, `Command failed with return code ${code}`);
    }
  }

  private banner(title: string): void {
    logger.info('='.repeat(60));
    logger.info(title);
    logger.info('='.repeat(60));
  }

  async jobSearch(): Promise<StepResult<string>> {
    if (this.isCompleted('step1_job_search')) {
      logger.info('Step 1 (Job Search) already completed, skipping');
      return { status: 'done', output: this.state.data.job_search_output };
    }

    const config = this.profile.job_search;
    if (!config.enabled) {
      logger.info('Step 1 (Job Search) disabled, skipping');
      return { status: 'done', output: this.state.data.job_search_output };
    }

    this.banner('STEP 1: JOB SEARCH');
    logger.info(`Job Title: ${config.title}`);
    logger.info(`Location: ${config.location || 'Any'}`);
    logger.info(`Results: ${config.num_results}`);

    const outputDir = this.resolve(config.output_dir);
    const flags = [
      '--title', config.title,
      '--location', config.location,
      '--num-results', String(config.num_results),
      '--max-applicants', String(config.max_applicants),
      '--time-window', config.time_window,
      '--output-root', outputDir
    ];
    if (config.experience !== null) {
      flags.push('--experience', String(config.experience));
    }
    if (config.fetch_details) {
      flags.push('--details');
    }

    // file clocks can trail the wall clock by a tick
    const startedAt = this.now().getTime() - MTIME_SLACK_MS;
    await this.invoke('step1_job_search', config, flags);

    if (!fs.existsSync(outputDir)) {
      throw new StepError('step1_job_search', `Job search output directory not found: ${outputDir}`);
    }
    const outputFile = findNewestJson(outputDir, startedAt);
    if (!outputFile) {
      throw new StepError('step1_job_search', `The search wrote no new report under ${outputDir}`);
    }

    logger.info(`Job search completed: ${outputFile}`);
    this.complete('step1_job_search', { job_search_output: outputFile });

    if (this.profile.workflow.confirmations.after_search) {
      const count = await readSearchReport(outputFile)
        .then((report) => String(report.jobs.length))
        .catch(() => 'an unknown number of');
      logger.info(`Found ${count} jobs`);
    }

    const proceed = await this.shouldContinue(
      this.profile.workflow.confirmations.after_search,
      'Continue to next step (Folder Creation)?'
    );
    return proceed ? { status: 'done', output: outputFile } : { status: 'paused' };
  }

  async folderCreation(searchOutput: string | undefined): Promise<StepResult<string[]>> {
    if (this.isCompleted('step2_folder_creation')) {
      logger.info('Step 2 (Folder Creation) already completed, skipping');
      return { status: 'done', output: this.state.data.created_folders };
    }

    const config = this.profile.folder_creation;
    if (!config.enabled) {
      logger.info('Step 2 (Folder Creation) disabled, skipping');
      return { status: 'done', output: this.state.data.created_folders };
    }

    if (!searchOutput) {
      logger.error('No job search output available');
      return { status: 'missing' };
    }

    this.banner('STEP 2: FOLDER CREATION');
    logger.info(`Selection mode: ${config.selection_mode}`);
    logger.info(`Job search output: ${searchOutput}`);

    const outputBase = this.resolve(config.output_base);
    const flags = ['--json-path', searchOutput, '--resumes-root', outputBase];
    if (config.selection_mode === 'all') {
      flags.push('--select', 'all');
    }

    await this.invoke('step2_folder_creation', config, flags);

    let jobTitle: string;
    try {
      jobTitle = (await readSearchReport(searchOutput)).metadata.job_title;
    } catch (error) {
      throw new StepError('step2_folder_creation', describeError(error));
    }

    const titleDir = path.join(outputBase, jobTitle);
    const created = fs.existsSync(titleDir)
      ? findRecentFolders(titleDir, config.recent_window_seconds, this.now())
      : [];

    logger.info(`Created ${created.length} resume folders`);
    for (const folder of created) {
      logger.info(`   - ${path.basename(folder)}`);
    }

    this.complete('step2_folder_creation', { created_folders: created, job_title: jobTitle });

    const proceed = await this.shouldContinue(
      this.profile.workflow.confirmations.after_folder_creation,
      'Continue to next step (AI Tailoring)?'
    );
    return proceed ? { status: 'done', output: created } : { status: 'paused' };
  }

  /**
   * Run one per-folder command; with continue_on_error a failure is logged and skipped
   */
  private async forEachFolder(
    step: StepName,
    folders: string[],
    action: (folder: string) => Promise<void>
  ): Promise<void> {
    for (const [i, folder] of folders.entries()) {
      logger.info(`[${i + 1}/${folders.length}] ${path.basename(folder)}`);
      try {
        await action(folder);
      } catch (error) {
        logger.error(`Failed for ${path.basename(folder)}: ${describeError(error)}`);
        if (!this.profile.workflow.continue_on_error) {
          throw error instanceof StepError ? error : new StepError(step, describeError(error));
        }
      }
    }
  }

  async aiTailoring(folders: string[]): Promise<StepResult<void>> {
    if (this.isCompleted('step3_ai_tailoring')) {
      logger.info('Step 3 (AI Tailoring) already completed, skipping');
      return { status: 'done', output: undefined };
    }

    const config = this.profile.ai_tailoring;
    if (!config.enabled) {
      logger.info('Step 3 (AI Tailoring) disabled, skipping');
      return { status: 'done', output: undefined };
    }

    this.banner('STEP 3: AI TAILORING');
    logger.info(`Tailoring ${folders.length} resumes`);

    await this.forEachFolder('step3_ai_tailoring', folders, async (folder) => {
      const flags = ['--path', folder];
      if (config.prompt_template) {
        flags.push('--template', this.resolve(config.prompt_template));
      }
      await this.invoke('step3_ai_tailoring', config, flags);
      logger.info(`Tailored: ${path.basename(folder)}`);
    });

    this.complete('step3_ai_tailoring');

    const proceed = await this.shouldContinue(
      this.profile.workflow.confirmations.after_tailoring,
      'Continue to next step (PDF Build)?'
    );
    return proceed ? { status: 'done', output: undefined } : { status: 'paused' };
  }

  async buildPdfs(folders: string[]): Promise<StepResult<string[]>> {
    if (this.isCompleted('step4_build_pdfs')) {
      logger.info('Step 4 (PDF Build) already completed, skipping');
      return { status: 'done', output: [] };
    }

    const config = this.profile.build;
    if (!config.enabled) {
      logger.info('Step 4 (PDF Build) disabled, skipping');
      return { status: 'done', output: [] };
    }

    this.banner('STEP 4: BUILD PDFS');
    logger.info(`Building PDFs for ${folders.length} resumes`);

    const env = { ...process.env, RESUMES_ROOT: this.resolve(this.profile.folder_creation.output_base) };
    const pdfs: string[] = [];

    await this.forEachFolder('step4_build_pdfs', folders, async (folder) => {
      const jobTitle = this.state.data.job_title ?? path.basename(path.dirname(folder));
      await this.invoke('step4_build_pdfs', config, ['--title', jobTitle, '--path', path.basename(folder)], env);

      const pdfPath = path.join(folder, 'resume.pdf');
      if (fs.existsSync(pdfPath)) {
        logger.info(`PDF created: ${pdfPath}`);
        pdfs.push(pdfPath);
      } else {
        logger.warn(`PDF not found at expected location: ${pdfPath}`);
      }
    });

    this.complete('step4_build_pdfs');

    if (this.profile.workflow.confirmations.after_build) {
      this.banner('WORKFLOW COMPLETED');
      logger.info(`Processed ${folders.length} resumes`);
      for (const pdf of pdfs) {
        logger.info(`   - ${pdf}`);
      }
    }

    return { status: 'done', output: pdfs };
  }

  /**
   * Run the pipeline. Steps before resumeFrom are not run and their outputs
   * come from the state file; "beginning" clears the state first.
   */
  async run(resumeFrom?: ResumePoint): Promise<WorkflowOutcome> {
    logger.info(`Starting resume workflow with config: ${this.loaded.name}`);
    if (this.profile.description) {
      logger.info(`Description: ${this.profile.description}`);
    }

    if (resumeFrom === 'beginning') {
      this.state = emptyState();
      this.store.save(this.state);
    }

    const start = resumeFrom && resumeFrom !== 'beginning' ? RESUME_POINTS.indexOf(resumeFrom) + 1 : 1;

    let searchOutput = this.state.data.job_search_output;
    if (start <= 1) {
      const result = await this.jobSearch();
      if (result.status !== 'done') {
        return 'paused';
      }
      searchOutput = result.output;
    }

    let folders = this.state.data.created_folders;
    if (start <= 2) {
      const result = await this.folderCreation(searchOutput);
      if (result.status === 'paused') {
        return 'paused';
      }
      if (result.status === 'missing') {
        return 'missing-input';
      }
      folders = result.output;
    }

    if (!folders) {
      logger.error('No resume folders recorded; run the folder creation step first');
      return 'missing-input';
    }
    if (folders.length === 0) {
      logger.warn('No resume folders created');
      return 'missing-input';
    }

    if (start <= 3) {
      const result = await this.aiTailoring(folders);
      if (result.status !== 'done') {
        return 'paused';
      }
    }

    await this.buildPdfs(folders);

    logger.info('All done! Your tailored resumes are ready.');
    return 'completed';
  }
}
