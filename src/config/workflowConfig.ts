import fs from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { settings } from './settings';
import { ConfigError, describeError } from '../utils/errorHandler';
import { isRecord } from '../utils/validators';

export const DEFAULT_CONFIG_FILE = 'workflow_config.yaml';
export const DEFAULT_STATE_FILE = '.workflow_state.json';

/** the job-scout entry point, so the default steps call back into this CLI */
export const CLI_ENTRY = path.resolve(__dirname, '../cli.js');

export interface StepConfig {
  enabled: boolean;
  script_path: string;
  /** inserted before the step's own flags */
  script_args: string[];
}

export interface JobSearchConfig extends StepConfig {
  title: string;
  location: string;
  num_results: number;
  max_applicants: number;
  time_window: string;
  /** null searches every experience level */
  experience: number | null;
  fetch_details: boolean;
  output_dir: string;
}

export type SelectionMode = 'interactive' | 'all';

export interface FolderCreationConfig extends StepConfig {
  output_base: string;
  selection_mode: SelectionMode;
  recent_window_seconds: number;
}

export interface AITailoringConfig extends StepConfig {
  prompt_template: string | null;
}

export type BuildConfig = StepConfig;

export interface Confirmations {
  after_search: boolean;
  after_folder_creation: boolean;
  after_tailoring: boolean;
  after_build: boolean;
}

export interface WorkflowSettings {
  save_state: boolean;
  state_file: string;
  continue_on_error: boolean;
  confirmations: Confirmations;
}

export interface LoggingConfig {
  level: string;
  console: boolean;
  file: string | null;
}

export interface WorkflowProfile {
  name: string;
  description: string;
  job_search: JobSearchConfig;
  folder_creation: FolderCreationConfig;
  ai_tailoring: AITailoringConfig;
  build: BuildConfig;
  workflow: WorkflowSettings;
  logging: LoggingConfig;
}

export interface LoadedProfile {
  name: string;
  profile: WorkflowProfile;
  /** directory of the config file; relative paths in the profile resolve against it */
  baseDir: string;
}

export interface ProfileSummary {
  key: string;
  name: string;
  description: string;
  title: string;
  location: string;
}

export const builtinDefaults: WorkflowProfile = {
  name: '',
  description: '',
  job_search: {
    enabled: true,
    script_path: CLI_ENTRY,
    script_args: ['search'],
    title: '',
    location: '',
    num_results: 10,
    max_applicants: 10,
    time_window: '48h',
    experience: null,
    fetch_details: false,
    output_dir: settings.outputRoot
  },
  folder_creation: {
    enabled: true,
    script_path: CLI_ENTRY,
    script_args: ['create-folders'],
    output_base: settings.resumesRoot,
    selection_mode: 'interactive',
    recent_window_seconds: 60
  },
  ai_tailoring: {
    enabled: true,
    script_path: CLI_ENTRY,
    script_args: ['tailor'],
    prompt_template: null
  },
  build: {
    enabled: true,
    script_path: 'scripts/build.sh',
    script_args: []
  },
  workflow: {
    save_state: true,
    state_file: DEFAULT_STATE_FILE,
    continue_on_error: false,
    confirmations: {
      after_search: true,
      after_folder_creation: true,
      after_tailoring: true,
      after_build: true
    }
  },
  logging: {
    level: 'info',
    console: true,
    file: null
  }
};

/**
 * Recursive merge; nested objects merge key by key, everything else (arrays
 * included) is replaced by the override
 */
export function deepMerge(base: unknown, override: unknown): unknown {
  if (override === undefined) {
    return base;
  }
  if (!isRecord(base) || !isRecord(override)) {
    return override;
  }

  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = deepMerge(base[key], value);
  }
  return merged;
}

/**
 * Typed reads from a parsed YAML mapping with errors that name the offending key
 */
class ProfileReader {
  constructor(
    private readonly source: Record<string, unknown>,
    private readonly where: string
  ) {}

  private fail(key: string, expected: string): never {
    throw new ConfigError(`${this.where}.${key} must be ${expected}`);
  }

  section(key: string): ProfileReader {
    const value = this.source[key];
    if (!isRecord(value)) {
      this.fail(key, 'a mapping');
    }
    return new ProfileReader(value, `${this.where}.${key}`);
  }

  string(key: string): string {
    const value = this.source[key];
    if (value === null || value === undefined) {
      return '';
    }
    if (typeof value === 'number') {
      return String(value);
    }
    if (typeof value !== 'string') {
      this.fail(key, 'a string');
    }
    return value;
  }

  optionalString(key: string): string | null {
    return this.string(key) || null;
  }

  boolean(key: string): boolean {
    const value = this.source[key];
    if (typeof value !== 'boolean') {
      this.fail(key, 'true or false');
    }
    return value;
  }

  integer(key: string, min: number): number {
    const value = this.source[key];
    if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
      this.fail(key, `a whole number of at least ${min}`);
    }
    return value;
  }

  optionalInteger(key: string, min: number): number | null {
    const value = this.source[key];
    if (value === null || value === undefined || value === 'any') {
      return null;
    }
    return this.integer(key, min);
  }

  stringList(key: string): string[] {
    const value = this.source[key];
    if (!Array.isArray(value)) {
      this.fail(key, 'a list');
    }
    return value.map((item) => (typeof item === 'string' || typeof item === 'number' ? String(item) : this.fail(key, 'a list of strings')));
  }

  oneOf<T extends string>(key: string, choices: readonly T[]): T {
    const value = this.string(key);
    const match = choices.find((choice) => choice === value);
    if (match === undefined) {
      this.fail(key, `one of ${choices.join(', ')}`);
    }
    return match;
  }
}

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'];

function normalizeLogLevel(raw: string, key: string): string {
  const level = raw.toLowerCase() === 'warning' ? 'warn' : raw.toLowerCase();
  if (!LOG_LEVELS.includes(level)) {
    throw new ConfigError(`${key}.logging.level must be one of ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

function readStep(reader: ProfileReader): StepConfig {
  return {
    enabled: reader.boolean('enabled'),
    script_path: reader.string('script_path'),
    script_args: reader.stringList('script_args')
  };
}

/**
 * Validate a merged profile
 * @throws ConfigError naming the first invalid key
 */
export function validateProfile(raw: unknown, key: string): WorkflowProfile {
  if (!isRecord(raw)) {
    throw new ConfigError(`Profile '${key}' must be a mapping`);
  }

  const root = new ProfileReader(raw, key);
  const search = root.section('job_search');
  const folders = root.section('folder_creation');
  const tailoring = root.section('ai_tailoring');
  const workflow = root.section('workflow');
  const confirmations = workflow.section('confirmations');
  const logging = root.section('logging');

  const profile: WorkflowProfile = {
    name: root.string('name') || key,
    description: root.string('description'),
    job_search: {
      ...readStep(search),
      title: search.string('title'),
      location: search.string('location'),
      num_results: search.integer('num_results', 1),
      max_applicants: search.integer('max_applicants', 1),
      time_window: search.string('time_window'),
      experience: search.optionalInteger('experience', 0),
      fetch_details: search.boolean('fetch_details'),
      output_dir: search.string('output_dir')
    },
    folder_creation: {
      ...readStep(folders),
      output_base: folders.string('output_base'),
      selection_mode: folders.oneOf('selection_mode', ['interactive', 'all'] as const),
      recent_window_seconds: folders.integer('recent_window_seconds', 1)
    },
    ai_tailoring: {
      ...readStep(tailoring),
      prompt_template: tailoring.optionalString('prompt_template')
    },
    build: readStep(root.section('build')),
    workflow: {
      save_state: workflow.boolean('save_state'),
      state_file: workflow.string('state_file') || DEFAULT_STATE_FILE,
      continue_on_error: workflow.boolean('continue_on_error'),
      confirmations: {
        after_search: confirmations.boolean('after_search'),
        after_folder_creation: confirmations.boolean('after_folder_creation'),
        after_tailoring: confirmations.boolean('after_tailoring'),
        after_build: confirmations.boolean('after_build')
      }
    },
    logging: {
      level: normalizeLogLevel(logging.string('level'), key),
      console: logging.boolean('console'),
      file: logging.optionalString('file')
    }
  };

  if (profile.job_search.enabled && !profile.job_search.title) {
    throw new ConfigError(`${key}.job_search.title is required when the search step is enabled`);
  }

  return profile;
}

interface ConfigDocument {
  defaults: unknown;
  configs: Record<string, unknown>;
}

export function parseConfigDocument(text: string, source: string): ConfigDocument {
  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (error) {
    throw new ConfigError(`Could not parse ${source}: ${describeError(error)}`);
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`${source} must be a mapping with a 'configs' section`);
  }
  if (!isRecord(parsed.configs)) {
    throw new ConfigError(`${source} has no 'configs' section`);
  }
  if (parsed.defaults !== undefined && parsed.defaults !== null && !isRecord(parsed.defaults)) {
    throw new ConfigError(`'defaults' in ${source} must be a mapping`);
  }

  return { defaults: parsed.defaults ?? undefined, configs: parsed.configs };
}

function readConfigDocument(configFile: string): ConfigDocument {
  let text: string;
  try {
    text = fs.readFileSync(configFile, 'utf-8');
  } catch {
    throw new ConfigError(`Config file not found: ${configFile}`);
  }
  return parseConfigDocument(text, configFile);
}

/**
 * Merge one named profile: profile values over file defaults over built-in defaults
 * @throws ConfigError for an unknown name, listing the available ones
 */
export function resolveProfile(document: ConfigDocument, key: string): WorkflowProfile {
  if (!Object.prototype.hasOwnProperty.call(document.configs, key)) {
    const available = Object.keys(document.configs).join(', ') || 'none';
    throw new ConfigError(`Config '${key}' not found. Available: ${available}`);
  }

  const merged = deepMerge(deepMerge(builtinDefaults, document.defaults), document.configs[key]);
  return validateProfile(merged, key);
}

export function loadProfile(configFile: string, key: string): LoadedProfile {
  const resolved = path.resolve(configFile);
  const document = readConfigDocument(resolved);
  return {
    name: key,
    profile: resolveProfile(document, key),
    baseDir: path.dirname(resolved)
  };
}

export function listProfiles(configFile: string): ProfileSummary[] {
  const document = readConfigDocument(path.resolve(configFile));
  return Object.keys(document.configs).map((key) => {
    const profile = resolveProfile(document, key);
    return {
      key,
      name: profile.name,
      description: profile.description,
      title: profile.job_search.title,
      location: profile.job_search.location
    };
  });
}
