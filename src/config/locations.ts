export const CANADIAN_CITIES = [
  'Toronto, ON, Canada',
  'Vancouver, BC, Canada',
  'Calgary, AB, Canada',
  'Ottawa, ON, Canada',
  'Montreal, QC, Canada',
  'Edmonton, AB, Canada',
  'Winnipeg, MB, Canada',
  'Quebec City, QC, Canada',
  'Hamilton, ON, Canada',
  'Kitchener, ON, Canada'
] as const;

/**
 * Expand shorthand location input; "canada" becomes a multi-city search
 */
export function expandLocation(input: string): string | string[] {
  const trimmed = input.trim();
  if (trimmed.toLowerCase() === 'canada') {
    return [...CANADIAN_CITIES];
  }
  return trimmed;
}
