/**
 * Text processing utilities for keyword overlap between history entries
 */

const STOP_WORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'been', 'but', 'by', 'did',
  'do', 'does', 'for', 'from', 'had', 'has', 'have', 'he', 'if', 'in', 'is',
  'it', 'its', 'no', 'not', 'of', 'on', 'or', 'so', 'such', 'than', 'that',
  'the', 'then', 'there', 'these', 'they', 'this', 'those', 'to', 'was',
  'were', 'will', 'with', 'what', 'when', 'where', 'who', 'how', 'about',
  'all', 'any', 'can', 'you', 'your'
]);

export class TextProcessor {
  /**
   * Extract keywords from text by removing stop words and normalizing
   */
  static extractKeywords(text: string): string[] {
    return text
      .toLowerCase()
      .replace(/[^\p{L}\p{N}_\s]/gu, ' ') // Remove punctuation
      .split(/\s+/)
      .filter(word => word.length > 2 && !STOP_WORDS.has(word));
  }

  /**
   * Jaccard similarity of the keyword sets of two texts (0 when either is empty)
   */
  static jaccardSimilarity(text1: string, text2: string): number {
    const words1 = new Set(this.extractKeywords(text1));
    const words2 = new Set(this.extractKeywords(text2));
    if (words1.size === 0 || words2.size === 0) return 0;

    let intersection = 0;
    for (const word of words1) {
      if (words2.has(word)) intersection++;
    }
    const union = words1.size + words2.size - intersection;
    return union === 0 ? 0 : intersection / union;
  }

  /**
   * Capitalized alphabetic words longer than two characters, a rough proxy
   * for names
   */
  static capitalizedTokens(text: string): Set<string> {
    const tokens = new Set<string>();
    for (const raw of text.split(/\s+/)) {
      const word = raw.replace(/^\P{L}+|\P{L}+$/gu, '');
      if (word.length > 2 && /^\p{Lu}\p{L}*$/u.test(word)) {
        tokens.add(word);
      }
    }
    return tokens;
  }
}
