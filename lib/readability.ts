import { ReadabilityMetrics } from '@/types';
import { clamp, splitSentences, tokenizeWords } from './text_utils';

/**
 * ReadabilityScorer
 * Syllable-based readability indices (Flesch, Flesch-Kincaid, Gunning Fog, SMOG)
 * plus a normalized 0-100 score averaged from the first three.
 */

const EMPTY_METRICS: ReadabilityMetrics = {
  flesch_reading_ease: 0,
  flesch_kincaid_grade: 0,
  gunning_fog: 0,
  smog_index: 0,
  avg_sentence_length: 0,
  complex_word_percentage: 0,
  readability_score: 0,
};

// Grade levels at or above this map to a sub-score of 0
const MAX_GRADE = 18;

export function countSyllables(word: string): number {
  const lower = word.toLowerCase();
  if (lower.length <= 3) return 1;

  const stem = lower.replace(/(?:es|ed|e)$/, '');
  const groups = stem.match(/[aeiouy]+/g);
  return groups ? groups.length : 1;
}

export function scoreReadability(text: string): ReadabilityMetrics {
  const words = tokenizeWords(text);
  const sentenceCount = splitSentences(text).length;
  const wordCount = words.length;

  if (wordCount === 0 || sentenceCount === 0) {
    return { ...EMPTY_METRICS };
  }

  let syllableCount = 0;
  let complexWordCount = 0;
  for (const word of words) {
    const syllables = countSyllables(word);
    syllableCount += syllables;
    if (syllables >= 3) complexWordCount++;
  }

  const avgSentenceLength = wordCount / sentenceCount;
  const syllablesPerWord = syllableCount / wordCount;

  const fleschReadingEase = 206.835 - 1.015 * avgSentenceLength - 84.6 * syllablesPerWord;
  const fleschKincaidGrade = 0.39 * avgSentenceLength + 11.8 * syllablesPerWord - 15.59;
  const gunningFog = 0.4 * (avgSentenceLength + 100 * (complexWordCount / wordCount));
  const smogIndex = 1.043 * Math.sqrt(complexWordCount * (30 / sentenceCount)) + 3.1291;

  return {
    flesch_reading_ease: fleschReadingEase,
    flesch_kincaid_grade: fleschKincaidGrade,
    gunning_fog: gunningFog,
    smog_index: smogIndex,
    avg_sentence_length: avgSentenceLength,
    complex_word_percentage: (complexWordCount / wordCount) * 100,
    readability_score: normalizeReadability(fleschReadingEase, fleschKincaidGrade, gunningFog),
  };
}

function normalizeReadability(
  fleschReadingEase: number,
  fleschKincaidGrade: number,
  gunningFog: number
): number {
  const ease = clamp(fleschReadingEase, 0, 100);
  // Lower grade / fog is easier to read
  const grade = (clamp(MAX_GRADE - fleschKincaidGrade, 0, MAX_GRADE) / MAX_GRADE) * 100;
  const fog = (clamp(MAX_GRADE - gunningFog, 0, MAX_GRADE) / MAX_GRADE) * 100;

  return (ease + grade + fog) / 3;
}
