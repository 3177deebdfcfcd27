import fs from 'fs';
import os from 'os';
import path from 'path';
import { GetOptions, HttpGetter, HttpResponse, QueryParams } from '../src/services/httpClient';
import { JobRecord } from '../src/types/types';
import { ScrapeTiming } from '../src/config/settings';

export type Route = (url: string, params: QueryParams) => HttpResponse | Error;

/**
 * In-process HttpGetter: a route function answers every request
 */
export class FakeHttp implements HttpGetter {
  readonly calls: { url: string; params: QueryParams }[] = [];

  constructor(private readonly route: Route) {}

  async get(url: string, options: GetOptions = {}): Promise<HttpResponse> {
    const params = options.params ?? {};
    this.calls.push({ url, params });
    const result = this.route(url, params);
    if (result instanceof Error) {
      throw result;
    }
    return result;
  }
}

export function htmlResponse(body: string, contentType = 'text/html; charset=utf-8'): HttpResponse {
  return { status: 200, url: '', contentType, body };
}

export const noSleep = async (): Promise<void> => {};

export const instantTiming: ScrapeTiming = {
  pageDelay: [0, 0],
  rateLimitBackoff: [0, 0],
  errorBackoff: [0, 0],
  detailDelay: [0, 0],
  listingTimeoutMs: 1000,
  detailTimeoutMs: 1000
};

export interface CardFixture {
  id: string;
  title: string;
  company?: string;
  location?: string;
  applicants?: string;
}

export function jobCard({ id, title, company = 'Acme', location = 'Toronto, ON', applicants }: CardFixture): string {
  const slug = title.toLowerCase().replace(/\s+/g, '-');
  return `
    <div class="base-card job-search-card" data-entity-urn="urn:li:jobPosting:${id}">
      <a class="base-card__full-link" href="https://ca.linkedin.com/jobs/view/${slug}-${id}?refId=test"></a>
      <h3 class="base-search-card__title"> ${title} </h3>
      <h4 class="base-search-card__subtitle"> ${company} </h4>
      <span class="job-search-card__location">${location}</span>
      ${applicants ? `<span class="job-search-card__applicant-count">${applicants}</span>` : ''}
      <time class="job-search-card__listdate" datetime="2026-10-17">2 days ago</time>
    </div>`;
}

export function listingPage(cards: CardFixture[]): string {
  return `<ul>${cards.map((card) => `<li>${jobCard(card)}</li>`).join('')}</ul>`;
}

export function jobRecord(overrides: Partial<JobRecord> = {}): JobRecord {
  return {
    title: 'Data Analyst',
    company: 'Acme',
    location: 'Toronto, ON',
    link: 'https://ca.linkedin.com/jobs/view/data-analyst-4001',
    jobId: '4001',
    applicants: 8,
    postingDate: '2026-10-17',
    description: null,
    jobType: null,
    seniorityLevel: null,
    industry: null,
    skills: null,
    salaryRange: null,
    source: 'LinkedIn',
    scrapedAt: '2026-10-19T12:00:00.000Z',
    ...overrides
  };
}

export function makeTempDir(prefix = 'job-scout-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
