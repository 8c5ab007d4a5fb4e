import { describe, expect, it } from 'vitest';

import { extractKeywords } from '../../src/detection/keywords.js';

describe('extractKeywords', () => {
  it('drops short words and stopwords', () => {
    expect(extractKeywords('Will Trump win the 2024 U.S. presidential election?')).toEqual([
      'trump',
      '2024',
      'presidential',
      'election',
    ]);
    expect(extractKeywords('Will Bitcoin drop below $40,000 by end of 2024?')).toEqual([
      'bitcoin',
      'drop',
      '2024',
    ]);
  });

  it('deduplicates case-insensitively', () => {
    expect(extractKeywords('Taiwan taiwan TAIWAN invasion')).toEqual(['taiwan', 'invasion']);
  });

  it('honours the limit', () => {
    expect(extractKeywords('alpha bravo charlie delta echo foxtrot', 2)).toEqual(['alpha', 'bravo']);
    expect(extractKeywords('alpha bravo charlie delta echo foxtrot')).toHaveLength(5);
  });
});
