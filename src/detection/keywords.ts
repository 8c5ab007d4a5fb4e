const STOPWORDS = new Set([
  'will', 'with', 'that', 'this', 'from', 'have', 'what', 'when', 'where', 'which',
  'before', 'after', 'than', 'more', 'less', 'into', 'over', 'under', 'below', 'above',
]);

/**
 * Search keywords for the social-mention feed, taken from a market question.
 */
export function extractKeywords(question: string, limit = 5): string[] {
  const seen = new Set<string>();
  const keywords: string[] = [];
  for (const word of question.toLowerCase().split(/[^a-z0-9]+/)) {
    if (word.length <= 3 || STOPWORDS.has(word) || seen.has(word)) continue;
    seen.add(word);
    keywords.push(word);
    if (keywords.length >= limit) break;
  }
  return keywords;
}
