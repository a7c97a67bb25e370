import { describe, expect, it } from 'vitest';
import { countSyllables, scoreReadability } from './readability';

describe('countSyllables', () => {
  it('counts short words as one syllable', () => {
    expect(countSyllables('cat')).toBe(1);
    expect(countSyllables('the')).toBe(1);
    expect(countSyllables('xyz')).toBe(1);
  });

  it('counts vowel groups', () => {
    expect(countSyllables('garden')).toBe(2);
    expect(countSyllables('reading')).toBe(2);
    expect(countSyllables('beautiful')).toBe(3);
  });

  it('drops a silent trailing e, es or ed', () => {
    expect(countSyllables('jumped')).toBe(1);
    expect(countSyllables('celebrate')).toBe(3);
  });

  it('never returns less than one', () => {
    expect(countSyllables('brrr')).toBe(1);
  });
});

describe('scoreReadability', () => {
  it('returns zeros for empty text', () => {
    expect(scoreReadability('')).toEqual({
      flesch_reading_ease: 0,
      flesch_kincaid_grade: 0,
      gunning_fog: 0,
      smog_index: 0,
      avg_sentence_length: 0,
      complex_word_percentage: 0,
      readability_score: 0,
    });
  });

  it('returns zeros for punctuation-only text', () => {
    expect(scoreReadability('... !!! ???').readability_score).toBe(0);
  });

  it('scores simple monosyllabic prose', () => {
    const metrics = scoreReadability('The cat sat. The dog ran.');

    expect(metrics.avg_sentence_length).toBe(3);
    expect(metrics.complex_word_percentage).toBe(0);
    expect(metrics.flesch_reading_ease).toBeCloseTo(119.19, 2);
    expect(metrics.flesch_kincaid_grade).toBeCloseTo(-2.62, 2);
    expect(metrics.gunning_fog).toBeCloseTo(1.2, 5);
    expect(metrics.smog_index).toBeCloseTo(3.1291, 4);
    // ease clamps to 100, grade to 100, fog (18 - 1.2) / 18
    expect(metrics.readability_score).toBeCloseTo((100 + 100 + (16.8 / 18) * 100) / 3, 5);
  });

  it('treats three-syllable words as complex', () => {
    const metrics = scoreReadability('Beautiful elephants celebrate.');

    expect(metrics.complex_word_percentage).toBe(100);
    expect(metrics.gunning_fog).toBeCloseTo(41.2, 5);
  });

  it('floors the normalized score at zero for dense prose', () => {
    const hard = scoreReadability(
      'Incomprehensibility notwithstanding, institutionalization of multidimensional organizational paradigms necessitates extraordinary interdisciplinary collaboration.'
    );
    expect(hard.flesch_reading_ease).toBeLessThan(0);
    expect(hard.readability_score).toBe(0);
  });
});
