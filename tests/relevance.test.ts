import { describe, expect, it } from 'vitest';
import { isJobRelevant } from '../src/utils/relevance';

describe('isJobRelevant', () => {
  describe('corporate communications searches', () => {
    it('keeps communications roles', () => {
      expect(isJobRelevant('Corporate Communications Specialist', 'corporate communications')).toBe(true);
      expect(isJobRelevant('Media Relations Lead', 'Corporate Communications')).toBe(true);
    });

    it('excludes talent manager titles even when they mention communications', () => {
      expect(isJobRelevant('Talent Manager, Communications', 'corporate communications')).toBe(false);
    });

    it('excludes titles that match neither list', () => {
      expect(isJobRelevant('Software Engineer', 'corporate communications')).toBe(false);
    });
  });

  describe('other searches', () => {
    it('keeps titles containing every query word', () => {
      expect(isJobRelevant('Senior Data Analyst', 'data analyst')).toBe(true);
      expect(isJobRelevant('Analyst, Data Platform', 'data analyst')).toBe(true);
    });

    it('excludes titles sharing no query word', () => {
      expect(isJobRelevant('Barista', 'data analyst')).toBe(false);
    });

    it('needs at least 60% of the query words', () => {
      expect(isJobRelevant('Data Engineer', 'data analyst')).toBe(false);
      expect(isJobRelevant('Machine Learning Developer', 'machine learning engineer')).toBe(true);
    });

    it('matches query words inside longer title words', () => {
      expect(isJobRelevant('Backend Developer', 'end developer')).toBe(true);
    });

    it('accepts anything for an empty query', () => {
      expect(isJobRelevant('Anything At All', '')).toBe(true);
    });
  });
});
