/**
 * Result of a heuristic field extractor
 */
export type Extraction<T> =
  | { found: true; value: T }
  | { found: false };

export const found = <T>(value: T): Extraction<T> => ({ found: true, value });
export const notFound = <T>(): Extraction<T> => ({ found: false });

export type TimeWindow = '24h' | '48h' | '1w' | '2w';

/**
 * A single job posting as scraped from a listing page and, optionally,
 * enriched by the detail fetcher
 */
export interface JobRecord {
  readonly title: string;
  readonly company: string;
  readonly location: string;
  readonly link: string;
  readonly jobId: string | null;
  /** null when the listing does not reveal the count */
  readonly applicants: number | null;
  readonly postingDate: string;
  readonly description: string | null;
  readonly jobType: string | null;
  readonly seniorityLevel: string | null;
  readonly industry: string | null;
  readonly skills: string | null;
  readonly salaryRange: string | null;
  readonly source: string;
  readonly scrapedAt: string;
}

export interface SearchParameters {
  readonly jobTitle: string;
  readonly experience: number | null;
  /** empty string means any location; an array runs a multi-city search */
  readonly location: string | readonly string[];
  readonly timeWindow: TimeWindow;
  readonly maxApplicants: number;
  readonly maxResults: number;
  readonly fetchDetails: boolean;
}

export type StepName =
  | 'step1_job_search'
  | 'step2_folder_creation'
  | 'step3_ai_tailoring'
  | 'step4_build_pdfs';

export interface WorkflowStateData {
  job_search_output?: string;
  created_folders?: string[];
  job_title?: string;
}

export interface WorkflowState {
  completed_steps: StepName[];
  data: WorkflowStateData;
}

/**
 * Wire shape of a job in the JSON and CSV reports
 */
export interface JobRecordRow {
  title: string;
  company: string;
  location: string;
  link: string;
  job_id: string | null;
  applicants: number | null;
  posting_date: string;
  job_description: string | null;
  job_type: string | null;
  seniority_level: string | null;
  industry: string | null;
  skills_required: string | null;
  salary_range: string | null;
  source: string;
  scraped_at: string;
}

export interface SearchReportMetadata {
  search_date: string;
  job_title: string;
  experience: number | 'Any';
  location: string | string[];
  max_applicants: number;
  total_results: number;
  search_mode: 'Detailed' | 'Basic';
}

export interface SearchReport {
  metadata: SearchReportMetadata;
  jobs: JobRecordRow[];
}

/**
 * Contents of job_details.json inside a resume folder
 */
export interface JobDetailsFile {
  job_title: string;
  company_name: string;
  job_description: string;
  location: string;
  job_link: string;
  applicants: string;
  salary_range: string;
  job_type: string;
  seniority_level: string;
  skills_required: string;
  source_search_title: string;
  created_at: string;
  source_json_file: string;
}
