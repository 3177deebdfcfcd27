import dotenv from 'dotenv';

dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? fallback : value;
}

/** [min, max] in milliseconds */
export type DelayRange = readonly [number, number];

export interface ScrapeTiming {
  pageDelay: DelayRange;
  rateLimitBackoff: DelayRange;
  errorBackoff: DelayRange;
  detailDelay: DelayRange;
  listingTimeoutMs: number;
  detailTimeoutMs: number;
}

const delayScale = intFromEnv('SCRAPE_DELAY_SCALE_PERCENT', 100) / 100;
const scaled = (min: number, max: number): DelayRange => [min * delayScale, max * delayScale];

export const defaultTiming: ScrapeTiming = {
  pageDelay: scaled(3000, 6000),
  rateLimitBackoff: scaled(10000, 15000),
  errorBackoff: scaled(5000, 8000),
  detailDelay: scaled(2000, 4000),
  listingTimeoutMs: intFromEnv('LISTING_TIMEOUT_MS', 20000),
  detailTimeoutMs: intFromEnv('DETAIL_TIMEOUT_MS', 15000)
};

export const settings = {
  outputRoot: process.env.OUTPUT_ROOT || 'job_search_output',
  resumesRoot: process.env.RESUMES_ROOT || 'resumes',
  geminiApiKey: process.env.GEMINI_API_KEY || '',
  geminiModel: process.env.GEMINI_MODEL || 'gemini-1.5-flash',
  detailCacheTtlSeconds: intFromEnv('DETAIL_CACHE_TTL', 3600)
};
