const CORPORATE_COMMUNICATIONS = 'corporate communications';

const COMMUNICATIONS_ALLOW = [
  'communications',
  'communication',
  'corporate communications',
  'internal communications',
  'external communications',
  'strategic communications',
  'public relations',
  'pr',
  'media relations',
  'content strategy',
  'brand communications',
  'marketing communications',
  'marcom',
  'corporate affairs'
];

const COMMUNICATIONS_DENY = [
  'talent manager',
  'people',
  'culture',
  'hr',
  'human resources',
  'administrative assistant',
  'admin',
  'care facilitator',
  'case manager',
  'events manager',
  'retail',
  'sales',
  'customer service',
  'account manager'
];

/** share of query words that must show up inside some title word */
export const WORD_MATCH_THRESHOLD = 0.6;

function matchesCorporateCommunications(title: string): boolean {
  if (COMMUNICATIONS_DENY.some((term) => title.includes(term))) {
    return false;
  }
  return COMMUNICATIONS_ALLOW.some((term) => title.includes(term));
}

/**
 * Whether a scraped job title fits what the user searched for
 */
export function isJobRelevant(jobTitle: string, keywords: string): boolean {
  const title = jobTitle.toLowerCase();
  const query = keywords.toLowerCase();

  if (query.includes(CORPORATE_COMMUNICATIONS)) {
    return matchesCorporateCommunications(title);
  }

  const queryWords = query.split(/\s+/).filter(Boolean);
  const titleWords = title.split(/\s+/).filter(Boolean);

  const matches = queryWords.filter((word) => titleWords.some((titleWord) => titleWord.includes(word))).length;
  return matches >= queryWords.length * WORD_MATCH_THRESHOLD;
}
