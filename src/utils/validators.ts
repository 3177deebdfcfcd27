import { SearchParameters, TimeWindow } from '../types/types';
import { expandLocation } from '../config/locations';
import { InputError } from './errorHandler';

export const DEFAULT_MAX_APPLICANTS = 10;
export const DEFAULT_MAX_RESULTS = 50;
export const DEFAULT_TIME_WINDOW: TimeWindow = '48h';
export const MAX_EXPERIENCE_YEARS = 30;

const TIME_WINDOW_ALIASES: Record<string, TimeWindow> = {
  '1': '24h',
  '2': '48h',
  '3': '1w',
  '4': '2w',
  '24h': '24h',
  '48h': '48h',
  '1w': '1w',
  '2w': '2w',
  'r86400': '24h',
  'r172800': '48h',
  'r604800': '1w',
  'r1209600': '2w'
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Raw search input, from flags or interactive answers
 */
export interface SearchInput {
  title?: string;
  experience?: string;
  location?: string;
  timeWindow?: string;
  maxApplicants?: string;
  maxResults?: string;
  details?: boolean;
}

/**
 * Years of experience; blank means any
 * @throws InputError outside 0..30 or when not a number
 */
export function parseExperience(raw: string | undefined): number | null {
  if (raw === undefined || raw.trim() === '') {
    return null;
  }

  const value = Number(raw.trim());
  if (!Number.isInteger(value)) {
    throw new InputError('Experience must be a whole number of years');
  }
  if (value < 0 || value > MAX_EXPERIENCE_YEARS) {
    throw new InputError(`Experience must be between 0 and ${MAX_EXPERIENCE_YEARS}`);
  }
  return value;
}

/**
 * Menu choice (1-4), shorthand (24h, 48h, 1w, 2w) or LinkedIn code; blank or unknown falls back to 48h
 */
export function parseTimeWindow(raw: string | undefined): TimeWindow {
  if (!raw) {
    return DEFAULT_TIME_WINDOW;
  }
  return TIME_WINDOW_ALIASES[raw.trim().toLowerCase()] ?? DEFAULT_TIME_WINDOW;
}

/**
 * Positive integer with a fallback for blank or unparsable input
 */
export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = parseInt(raw.trim(), 10);
  return Number.isNaN(value) || value < 1 ? fallback : value;
}

export function buildSearchParameters(input: SearchInput): SearchParameters {
  const jobTitle = (input.title ?? '').trim();
  if (!jobTitle) {
    throw new InputError('A job title is required');
  }

  return {
    jobTitle,
    experience: parseExperience(input.experience),
    location: expandLocation(input.location ?? ''),
    timeWindow: parseTimeWindow(input.timeWindow),
    maxApplicants: parsePositiveInt(input.maxApplicants, DEFAULT_MAX_APPLICANTS),
    maxResults: parsePositiveInt(input.maxResults, DEFAULT_MAX_RESULTS),
    fetchDetails: input.details ?? false
  };
}

/**
 * Job selection for folder creation: "all", "3" or "1,2,4" (1-based)
 * @returns zero-based indexes in the order given
 * @throws InputError on anything else or an out-of-range number
 */
export function parseSelection(raw: string, count: number): number[] {
  const selection = raw.trim().toLowerCase();

  if (selection === 'all') {
    return Array.from({ length: count }, (_, i) => i);
  }

  if (!/^[\d,\s]+$/.test(selection)) {
    throw new InputError(`Invalid selection '${raw}'. Enter a job number, numbers separated by commas, or 'all'`);
  }

  const numbers = selection
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean)
    .map((part) => parseInt(part, 10));

  if (numbers.length === 0) {
    throw new InputError('No job number given');
  }

  for (const n of numbers) {
    if (n < 1 || n > count) {
      throw new InputError(`Invalid job number '${n}'. Please enter numbers between 1 and ${count}`);
    }
  }

  return numbers.map((n) => n - 1);
}
