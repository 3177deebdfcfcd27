import { load } from 'cheerio';
import { Extraction, found, notFound } from '../types/types';

export type CheerioRoot = ReturnType<typeof load>;
export type CheerioSelection = ReturnType<CheerioRoot>;

export const DESCRIPTION_UNAVAILABLE = 'Job description not available';
export const DESCRIPTION_FETCH_FAILED = 'Could not fetch job description';

/** reported when a posting invites you to be among the first applicants */
export const LOW_APPLICANT_ESTIMATE = 5;

const BLOCK_TAGS = 'p, li, ul, ol, div, section, article, main, h1, h2, h3, h4, h5, h6, tr, header, footer';

const DESCRIPTION_SELECTORS = [
  'div.show-more-less-html__markup',
  'div.jobs-description__content',
  'div.description__text',
  'section.jobs-description',
  'div.jobs-box__html-content',
  'div.jobs-description-content__text',
  '[data-section="description"]',
  'div[class*="description"]',
  'section[class*="description"]',
  '.jobs-description',
  '.job-description',
  'div.job-view-layout',
  'article',
  'main'
];

const NAVIGATION_PREFIXES = ['sign in', 'linkedin', 'home'];
const NAVIGATION_PHRASES = ['sign in', 'linkedin', 'home', 'jobs', 'messaging', 'notifications'];
const JOB_KEYWORDS = ['responsibilities', 'requirements', 'qualifications', 'experience', 'skills', 'role', 'position'];

const JOB_TYPE_PATTERN = /(Full-time|Part-time|Contract|Temporary|Internship)/i;
const SENIORITY_PATTERN = /(Entry level|Associate|Mid-Senior level|Director|Executive)/i;
const INDUSTRY_PATTERN = /(Technology|Healthcare|Finance|Education|Manufacturing)/i;
const SALARY_PATTERN = /\$[\d,]+(?:\.\d+)?(?:\s*-\s*\$[\d,]+(?:\.\d+)?)?(?:\s*(?:per|\/)\s*(?:year|hour|month))?/i;

const APPLICANT_PATTERNS = [
  /over\s+([\d,]+)\s+applicants?/,
  /([\d,]+)\s+applicants?/,
  /([\d,]+)\s+people\s+(?:have\s+)?applied/
];

export interface PostingDetails {
  jobType: Extraction<string>;
  seniorityLevel: Extraction<string>;
  industry: Extraction<string>;
  skills: Extraction<string>;
  salaryRange: Extraction<string>;
}

/**
 * Collapse whitespace runs and trim
 */
export function cleanText(text: string): string {
  return text
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Text of a selection with one line per block element, blank lines dropped
 */
export function blockText($: CheerioRoot, selection: CheerioSelection): string {
  const clone = selection.clone();
  clone.find('script, style, noscript').remove();
  clone.find('br').replaceWith('\n');
  clone.find(BLOCK_TAGS).each((_, el) => {
    $(el).prepend('\n').append('\n');
  });

  return clone
    .text()
    .split('\n')
    .map(cleanText)
    .filter((line) => line.length > 0)
    .join('\n');
}

export function pageLines($: CheerioRoot): string[] {
  const body = $('body');
  const text = blockText($, body.length ? body : $.root());
  return text.split('\n').filter((line) => line.length > 0);
}

/**
 * Applicant count from free text. "Be among the first N applicants" is a
 * LinkedIn teaser, not a count, so it maps to the fixed low estimate.
 */
export function extractApplicantCount(text: string): Extraction<number> {
  const lower = text.toLowerCase();

  if (/be\s+among\s+the\s+first/.test(lower) && lower.includes('applicant')) {
    return found(LOW_APPLICANT_ESTIMATE);
  }

  for (const pattern of APPLICANT_PATTERNS) {
    const match = lower.match(pattern);
    if (match) {
      const count = parseInt(match[1].replace(/,/g, ''), 10);
      if (!Number.isNaN(count)) {
        return found(count);
      }
    }
  }

  return notFound();
}

function looksLikeNavigation(text: string): boolean {
  const lower = text.toLowerCase();
  return NAVIGATION_PREFIXES.some((prefix) => lower.startsWith(prefix));
}

/**
 * Job description from a posting page: ranked selectors first, then
 * keyword paragraphs, then the first long paragraphs of the page
 */
export function extractJobDescription($: CheerioRoot): string {
  for (const selector of DESCRIPTION_SELECTORS) {
    for (const node of $(selector).toArray()) {
      const description = blockText($, $(node));
      if (description.length > 200 && !looksLikeNavigation(description)) {
        return description;
      }
    }
  }

  const lines = pageLines($);

  const paragraphs = lines.filter((line) => line.length > 30);
  const picked = new Set<number>();
  paragraphs.forEach((paragraph, index) => {
    const lower = paragraph.toLowerCase();
    if (JOB_KEYWORDS.some((keyword) => lower.includes(keyword))) {
      for (let i = Math.max(0, index - 2); i < Math.min(paragraphs.length, index + 3); i++) {
        picked.add(i);
      }
    }
  });

  if (picked.size > 0) {
    return [...picked]
      .sort((a, b) => a - b)
      .slice(0, 15)
      .map((i) => paragraphs[i])
      .join('\n');
  }

  if (lines.join('\n').length > 500) {
    const substantial = lines
      .filter((line) => line.length > 50)
      .slice(0, 20)
      .filter((line) => !NAVIGATION_PHRASES.some((phrase) => line.toLowerCase().includes(phrase)));

    if (substantial.length > 0) {
      return substantial.slice(0, 10).join('\n');
    }
  }

  return DESCRIPTION_UNAVAILABLE;
}

/**
 * LinkedIn's "job criteria" list, keyed by lowercased subheader
 */
function parseCriteria($: CheerioRoot): Map<string, string> {
  const criteria = new Map<string, string>();

  $('li.description__job-criteria-item').each((_, el) => {
    const item = $(el);
    const header = cleanText(item.find('h3').first().text()).toLowerCase();
    const value = cleanText(item.find('span').first().text());
    if (header && value) {
      criteria.set(header, value);
    }
  });

  return criteria;
}

function scanLines(lines: string[], pattern: RegExp): Extraction<string> {
  for (const line of lines) {
    const match = line.match(pattern);
    if (match) {
      return found(match[1] ?? match[0]);
    }
  }
  return notFound();
}

function fromCriteria(criteria: Map<string, string>, key: string, lines: string[], pattern: RegExp): Extraction<string> {
  const value = criteria.get(key);
  return value ? found(value) : scanLines(lines, pattern);
}

function extractSkills($: CheerioRoot): Extraction<string> {
  const section = $('section[class*="skill"], section[class*="Skill"]').first();
  if (!section.length) {
    return notFound();
  }

  const skills: string[] = [];
  section.find('span, div').each((_, el) => {
    const text = cleanText($(el).text());
    if (text && !skills.includes(text)) {
      skills.push(text);
    }
  });

  return skills.length > 0 ? found(skills.slice(0, 10).join(', ')) : notFound();
}

/**
 * Job type, seniority, industry, skills and salary; each scan is independent
 */
export function extractPostingDetails($: CheerioRoot): PostingDetails {
  const criteria = parseCriteria($);
  const lines = pageLines($);

  const salary = lines.join('\n').match(SALARY_PATTERN);

  return {
    jobType: fromCriteria(criteria, 'employment type', lines, JOB_TYPE_PATTERN),
    seniorityLevel: fromCriteria(criteria, 'seniority level', lines, SENIORITY_PATTERN),
    industry: fromCriteria(criteria, 'industries', lines, INDUSTRY_PATTERN),
    skills: extractSkills($),
    salaryRange: salary ? found(salary[0]) : notFound()
  };
}

/**
 * Description text from the JSON flavour of the job posting endpoint
 */
export function parsePostingJson(body: string): Extraction<string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return notFound();
  }

  if (typeof parsed !== 'object' || parsed === null || !('description' in parsed)) {
    return notFound();
  }

  const description = parsed.description;
  if (typeof description === 'string' && description.trim()) {
    return found(description.trim());
  }

  if (typeof description === 'object' && description !== null && 'text' in description &&
      typeof description.text === 'string' && description.text.trim()) {
    return found(description.text.trim());
  }

  return notFound();
}
