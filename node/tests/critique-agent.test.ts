import { describe, expect, it } from 'vitest';
import { countWords, extractCritiqueScore } from '../src/services/critique-agent';

describe('extractCritiqueScore', () => {
  it('reads the score line', () => {
    expect(extractCritiqueScore('Strengths: clear.\nSCORE: 7.5')).toBe(7.5);
  });

  it('takes the last score when the line repeats', () => {
    expect(extractCritiqueScore('e.g., SCORE: 7.5\n...\nscore: 6')).toBe(6);
  });

  it('clamps to the 0-10 scale', () => {
    expect(extractCritiqueScore('SCORE: 12')).toBe(10);
  });

  it('returns null without a score line', () => {
    expect(extractCritiqueScore('No numeric verdict here.')).toBeNull();
  });
});

describe('countWords', () => {
  it('counts whitespace-separated words', () => {
    expect(countWords('  one two\nthree\tfour  ')).toBe(4);
    expect(countWords('')).toBe(0);
  });
});
