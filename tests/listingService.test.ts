import { describe, expect, it } from 'vitest';
import {
  MAX_RATE_LIMIT_ERRORS,
  SEARCH_ENDPOINTS,
  buildSearchParams,
  experienceLevelCode,
  passesApplicantCap,
  resolveLocations,
  searchListings
} from '../src/services/listingService';
import { HttpError, RateLimitError } from '../src/utils/errorHandler';
import { SearchParameters } from '../src/types/types';
import { FakeHttp, htmlResponse, instantTiming, listingPage, noSleep } from './helpers';

const baseParams: SearchParameters = {
  jobTitle: 'Data Analyst',
  experience: null,
  location: '',
  timeWindow: '48h',
  maxApplicants: 10,
  maxResults: 10,
  fetchDetails: false
};

describe('experienceLevelCode', () => {
  it('maps years to LinkedIn experience levels', () => {
    expect(experienceLevelCode(null)).toBeUndefined();
    expect(experienceLevelCode(0)).toBe('1');
    expect(experienceLevelCode(1)).toBe('1');
    expect(experienceLevelCode(2)).toBe('2');
    expect(experienceLevelCode(3)).toBe('2');
    expect(experienceLevelCode(5)).toBe('3,4');
    expect(experienceLevelCode(7)).toBe('3,4');
    expect(experienceLevelCode(8)).toBe('5,6');
  });
});

describe('buildSearchParams', () => {
  it('builds the listing query for a page', () => {
    expect(buildSearchParams({
      keywords: 'data analyst',
      location: 'Toronto',
      experience: 4,
      timeWindow: '1w',
      maxApplicants: 10
    }, 50)).toEqual({
      keywords: 'data analyst',
      location: 'Toronto',
      start: 50,
      count: 25,
      f_TPR: 'r604800',
      f_JT: 'F,P,C',
      sortBy: 'R',
      f_E: '3,4'
    });
  });
});

describe('passesApplicantCap', () => {
  it('keeps unknown counts and counts at the cap', () => {
    expect(passesApplicantCap({ applicants: null }, 10)).toBe(true);
    expect(passesApplicantCap({ applicants: 10 }, 10)).toBe(true);
    expect(passesApplicantCap({ applicants: 11 }, 10)).toBe(false);
  });
});

describe('resolveLocations', () => {
  it('wraps a single location and keeps lists', () => {
    expect(resolveLocations('Toronto')).toEqual(['Toronto']);
    expect(resolveLocations(['Toronto', 'Ottawa'])).toEqual(['Toronto', 'Ottawa']);
    expect(resolveLocations([])).toEqual(['']);
  });
});

describe('searchListings', () => {
  it('filters by relevance and applicant cap and stops after two empty pages', async () => {
    const http = new FakeHttp((_url, params) => htmlResponse(params.start === 0
      ? listingPage([
        { id: '4001', title: 'Data Analyst', applicants: '8 applicants' },
        { id: '4002', title: 'Senior Data Analyst', applicants: 'Over 200 applicants' },
        { id: '4003', title: 'Barista' }
      ])
      : ''));

    const records = await searchListings(baseParams, { http, sleep: noSleep, timing: instantTiming });

    expect(records.map((r) => r.jobId)).toEqual(['4001']);
    expect(records[0].applicants).toBe(8);
    expect(http.calls.map((c) => c.params.start)).toEqual([0, 25, 50]);
    expect(http.calls.every((c) => c.url === SEARCH_ENDPOINTS[0])).toBe(true);
  });

  it('never returns a record over the applicant cap', async () => {
    const http = new FakeHttp((_url, params) => htmlResponse(params.start === 0
      ? listingPage([
        { id: '4101', title: 'Data Analyst', applicants: '11 applicants' },
        { id: '4102', title: 'Data Analyst II', applicants: 'Be among the first 25 applicants' },
        { id: '4103', title: 'Lead Data Analyst' }
      ])
      : ''));

    const records = await searchListings(baseParams, { http, sleep: noSleep, timing: instantTiming });

    expect(records.map((r) => [r.jobId, r.applicants])).toEqual([['4102', 5], ['4103', null]]);
  });

  it('moves to the next endpoint after repeated rate limiting', async () => {
    const http = new FakeHttp((url, params) => {
      if (url === SEARCH_ENDPOINTS[0]) {
        return new RateLimitError(url);
      }
      return htmlResponse(params.start === 0 ? listingPage([{ id: '4201', title: 'Data Analyst' }]) : '');
    });

    const records = await searchListings(baseParams, { http, sleep: noSleep, timing: instantTiming });

    expect(records.map((r) => r.jobId)).toEqual(['4201']);
    expect(http.calls.filter((c) => c.url === SEARCH_ENDPOINTS[0])).toHaveLength(MAX_RATE_LIMIT_ERRORS);
    expect(http.calls.filter((c) => c.url === SEARCH_ENDPOINTS[1])).toHaveLength(3);
  });

  it('gives up on an endpoint after two failed pages', async () => {
    const http = new FakeHttp((url) => new HttpError(500, url));

    const records = await searchListings(baseParams, { http, sleep: noSleep, timing: instantTiming });

    expect(records).toEqual([]);
    expect(http.calls.map((c) => [c.url, c.params.start])).toEqual([
      [SEARCH_ENDPOINTS[0], 0],
      [SEARCH_ENDPOINTS[0], 25],
      [SEARCH_ENDPOINTS[1], 0],
      [SEARCH_ENDPOINTS[1], 25]
    ]);
  });

  it('falls through to the next endpoint when the first yields nothing', async () => {
    const http = new FakeHttp((url, params) => htmlResponse(url === SEARCH_ENDPOINTS[1] && params.start === 0
      ? listingPage([{ id: '4501', title: 'Data Analyst' }])
      : ''));

    const records = await searchListings(baseParams, { http, sleep: noSleep, timing: instantTiming });

    expect(records.map((r) => r.jobId)).toEqual(['4501']);
    expect(http.calls.filter((c) => c.url === SEARCH_ENDPOINTS[0]).map((c) => c.params.start)).toEqual([0, 25]);
    expect(http.calls.filter((c) => c.url === SEARCH_ENDPOINTS[1]).map((c) => c.params.start)).toEqual([0, 25, 50]);
  });

  it('splits the result budget across locations', async () => {
    const http = new FakeHttp((_url, params) => {
      const prefix = params.location === 'Toronto' ? '51' : '52';
      return htmlResponse(listingPage([
        { id: `${prefix}01`, title: 'Data Analyst', location: String(params.location) },
        { id: `${prefix}02`, title: 'Data Analyst', location: String(params.location) }
      ]));
    });

    const records = await searchListings(
      { ...baseParams, location: ['Toronto', 'Vancouver'], maxResults: 3 },
      { http, sleep: noSleep, timing: instantTiming }
    );

    expect(records.map((r) => r.jobId)).toEqual(['5101', '5201']);
    expect(http.calls.map((c) => c.params.location)).toEqual(['Toronto', 'Vancouver']);
  });

  it('skips duplicate postings within a location', async () => {
    const http = new FakeHttp((_url, params) => htmlResponse(params.start === 0
      ? listingPage([{ id: '4301', title: 'Data Analyst' }, { id: '4301', title: 'Data Analyst' }])
      : ''));

    const records = await searchListings(baseParams, { http, sleep: noSleep, timing: instantTiming });

    expect(records.map((r) => r.jobId)).toEqual(['4301']);
  });

  it('returns nothing once the signal has fired', async () => {
    const controller = new AbortController();
    controller.abort();
    const http = new FakeHttp(() => htmlResponse(''));

    const records = await searchListings(baseParams, {
      http,
      sleep: noSleep,
      timing: instantTiming,
      signal: controller.signal
    });

    expect(records).toEqual([]);
    expect(http.calls).toHaveLength(0);
  });
});
