import { load } from 'cheerio';
import { JobRecord } from '../types/types';
import { CheerioRoot, CheerioSelection, cleanText, extractApplicantCount } from './parser';

export const NOT_AVAILABLE = 'N/A';
export const JOB_SOURCE = 'LinkedIn';

const CARD_SELECTORS = [
  'div.job-search-card',
  'div.jobs-search-results__list-item',
  'div.result-card',
  'li.result-card'
];

export interface ListingPage {
  $: CheerioRoot;
  cards: CheerioSelection[];
}

/**
 * Load a search results fragment and pick the first card selector that matches
 */
export function parseListingPage(html: string): ListingPage {
  const $ = load(html);

  for (const selector of CARD_SELECTORS) {
    const nodes = $(selector).toArray();
    if (nodes.length > 0) {
      return { $, cards: nodes.map((node) => $(node)) };
    }
  }

  return { $, cards: [] };
}

function textOf(card: CheerioSelection, selector: string): string {
  const text = cleanText(card.find(selector).first().text());
  return text || NOT_AVAILABLE;
}

function attrOf(card: CheerioSelection, selector: string, attr: string): string {
  const value = card.find(selector).first().attr(attr);
  return value && value.trim() ? value.trim() : NOT_AVAILABLE;
}

/**
 * Numeric posting id from a /jobs/view/ link, with or without the title slug,
 * falling back to the card's entity urn
 */
export function extractJobId(link: string, entityUrn?: string): string | null {
  const match = link.match(/\/jobs\/view\/(?:[^/?#]*?-)?(\d+)/);
  if (match) {
    return match[1];
  }

  const urnMatch = entityUrn?.match(/jobPosting:(\d+)/);
  return urnMatch ? urnMatch[1] : null;
}

/**
 * One listing card as a JobRecord; absent fields degrade to "N/A"
 */
export function extractJobCard(card: CheerioSelection, scrapedAt: Date = new Date()): JobRecord {
  const link = attrOf(card, 'a.base-card__full-link, a.base-card, a.result-card__full-card-link', 'href');
  const dateAttr = attrOf(card, 'time.job-search-card__listdate, time.job-search-card__listdate--new, time', 'datetime');
  const applicants = extractApplicantCount(card.text());

  return {
    title: textOf(card, 'h3.base-search-card__title, h3.result-card__title'),
    company: textOf(card, 'h4.base-search-card__subtitle, h4.result-card__subtitle'),
    location: textOf(card, 'span.job-search-card__location'),
    link,
    jobId: extractJobId(link, card.attr('data-entity-urn') ?? card.find('[data-entity-urn]').first().attr('data-entity-urn')),
    applicants: applicants.found ? applicants.value : null,
    postingDate: dateAttr,
    description: null,
    jobType: null,
    seniorityLevel: null,
    industry: null,
    skills: null,
    salaryRange: null,
    source: JOB_SOURCE,
    scrapedAt: scrapedAt.toISOString()
  };
}
