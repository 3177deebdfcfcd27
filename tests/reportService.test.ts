import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  readSearchReport,
  reportPaths,
  sanitizeTitle,
  toRow,
  writeSearchReport
} from '../src/services/reportService';
import { SearchParameters } from '../src/types/types';
import { jobRecord, makeTempDir, removeDir } from './helpers';

const params: SearchParameters = {
  jobTitle: 'Data Analyst',
  experience: 3,
  location: 'Toronto',
  timeWindow: '48h',
  maxApplicants: 10,
  maxResults: 50,
  fetchDetails: false
};

const now = new Date(2026, 9, 19, 14, 5, 9);

describe('report naming', () => {
  it('sanitizes job titles for file names', () => {
    expect(sanitizeTitle('Senior Data Scientist (ML)')).toBe('senior_data_scientist_ml');
    expect(sanitizeTitle('  Front-end  Developer ')).toBe('front_end_developer');
  });

  it('puts reports in a dated folder with a time stamp', () => {
    expect(reportPaths('out', 'Data Analyst', now)).toEqual({
      csv: path.join('out', '2026-10-19', 'data_analyst_140509.csv'),
      json: path.join('out', '2026-10-19', 'data_analyst_140509.json')
    });
  });
});

describe('writeSearchReport', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('writes a JSON report whose total matches its jobs', async () => {
    const records = [jobRecord(), jobRecord({ jobId: '4002', title: 'Junior Data Analyst', applicants: null })];

    const result = await writeSearchReport(records, params, dir, now);
    const report = await readSearchReport(result.paths.json);

    expect(result.success).toBe(true);
    expect(report.metadata).toEqual({
      search_date: '2026-10-19 14:05:09',
      job_title: 'Data Analyst',
      experience: 3,
      location: 'Toronto',
      max_applicants: 10,
      total_results: 2,
      search_mode: 'Basic'
    });
    expect(report.jobs).toHaveLength(report.metadata.total_results);
    expect(report.jobs).toEqual(records.map(toRow));
  });

  it('writes a CSV with a commented metadata header', async () => {
    const result = await writeSearchReport([jobRecord()], { ...params, experience: null, location: '' }, dir, now);
    const lines = fs.readFileSync(result.paths.csv, 'utf-8').split('\n');

    expect(lines.slice(0, 10)).toEqual([
      '# Job Search Results',
      '# Search Date: 2026-10-19 14:05:09',
      '# Job Title: Data Analyst',
      '# Experience: Any years',
      '# Location: Any',
      '# Max Applicants: 10',
      '# Total Results: 1',
      '#',
      'title,company,location,link,job_id,applicants,posting_date,job_description,job_type,seniority_level,industry,skills_required,salary_range,source,scraped_at',
      'Data Analyst,Acme,"Toronto, ON",https://ca.linkedin.com/jobs/view/data-analyst-4001,4001,8,2026-10-17,,,,,,,LinkedIn,2026-10-19T12:00:00.000Z'
    ]);
  });

  it('reports failure without writing anything when there are no results', async () => {
    const result = await writeSearchReport([], params, dir, now);

    expect(result.success).toBe(false);
    expect(fs.existsSync(result.paths.json)).toBe(false);
  });

  it('reports failure instead of throwing when the output folder cannot be created', async () => {
    const blocker = path.join(dir, 'not-a-dir');
    fs.writeFileSync(blocker, 'x');

    const result = await writeSearchReport([jobRecord()], params, blocker, now);

    expect(result.success).toBe(false);
  });
});

describe('readSearchReport', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('rejects files that are not search reports', async () => {
    const file = path.join(dir, 'other.json');
    fs.writeFileSync(file, JSON.stringify({ hello: 'world' }));

    await expect(readSearchReport(file)).rejects.toThrow(`${file} is not a job search report`);
  });
});
