/**
 * Flesch-Kincaid grade level.
 *
 *   grade = 0.39 * (words / sentences) + 11.8 * (syllables / words) - 15.59
 *
 * Syllables are approximated by counting vowel groups.
 */

const WORD_CHAR = /[\p{L}\p{N}]/u;
const SENTENCE_BREAK = /[.!?]+(?=\s|$)/;

export interface TextStatistics {
  words: number;
  sentences: number;
  syllables: number;
}

/** Count syllables in a word (approximation via vowel group counting) */
export function countSyllables(word: string): number {
  let letters = word.toLowerCase().replace(/[^a-z]/g, '');
  if (letters.length <= 3) return 1;
  letters = letters.replace(/(?:[^laeiouy]es|ed|[^laeiouy]e)$/, '');
  letters = letters.replace(/^y/, '');
  const matches = letters.match(/[aeiouy]{1,2}/g);
  return matches ? matches.length : 1;
}

function tokenizeWords(text: string): string[] {
  return text.split(/\s+/).filter((token) => WORD_CHAR.test(token));
}

export function textStatistics(text: string): TextStatistics {
  const words = tokenizeWords(text);

  let sentences = 0;
  for (const segment of text.split(SENTENCE_BREAK)) {
    if (tokenizeWords(segment).length > 0) {
      sentences++;
    }
  }

  const syllables = words.reduce((sum, word) => sum + countSyllables(word), 0);

  return { words: words.length, sentences, syllables };
}

/**
 * Grade level rounded to two decimals, or `null` when the text has no words
 */
export function fleschKincaidGrade(text: string): number | null {
  const { words, sentences, syllables } = textStatistics(text);
  if (words === 0 || sentences === 0) {
    return null;
  }

  const grade = 0.39 * (words / sentences) + 11.8 * (syllables / words) - 15.59;
  if (!Number.isFinite(grade)) {
    return null;
  }

  return Math.round(grade * 100) / 100;
}
