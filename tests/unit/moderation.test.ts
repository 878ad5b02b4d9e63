import { describe, it, expect } from 'vitest';
import { classifyScores } from '@/llm/moderation.js';

describe('classifyScores', () => {
  it('rates low scores safe / tier1', () => {
    expect(classifyScores({ sexual: 0.1, violence: 0.05, hate: 0.01 })).toEqual({
      rating: 'safe',
      tier: 'tier1',
      scores: { sexual: 0.1, violence: 0.05, hate: 0.01 },
      flaggedCategories: [],
    });
  });

  it('treats a missing category as zero', () => {
    expect(classifyScores({}).tier).toBe('tier1');
  });

  it('rates moderate sexual content suggestive / tier2', () => {
    const verdict = classifyScores({ sexual: 0.5, violence: 0, hate: 0 });
    expect(verdict.rating).toBe('suggestive');
    expect(verdict.tier).toBe('tier2');
  });

  it('uses inclusive tier limits', () => {
    expect(classifyScores({ sexual: 0.2 }).tier).toBe('tier1');
    expect(classifyScores({ sexual: 0.6 }).tier).toBe('tier2');
  });

  it('rates high-but-allowed scores borderline / tier3', () => {
    const verdict = classifyScores({ sexual: 0.85, violence: 0.1, hate: 0 });
    expect(verdict.rating).toBe('borderline');
    expect(verdict.tier).toBe('tier3');
  });

  it('does not reject a score equal to its threshold', () => {
    const verdict = classifyScores({ sexual: 0.9 });
    expect(verdict.rating).toBe('borderline');
    expect(verdict.tier).toBe('tier3');
  });

  it('falls back to tier3 past every tier limit but under rejection', () => {
    const verdict = classifyScores({ violence: 0.6 });
    expect(verdict.rating).toBe('borderline');
    expect(verdict.tier).toBe('tier3');
  });

  it('rejects a score strictly above its threshold', () => {
    expect(classifyScores({ sexual: 0.95, violence: 0 })).toEqual({
      rating: 'rejected',
      scores: { sexual: 0.95, violence: 0 },
      flaggedCategories: ['sexual'],
      reason: 'Rejected by moderation: sexual 0.95',
    });
  });

  it('lists every flagged category in the reason', () => {
    const verdict = classifyScores({ violence: 0.75, harassment: 0.61 });
    expect(verdict.flaggedCategories).toEqual(['violence', 'harassment']);
    expect(verdict.reason).toBe('Rejected by moderation: violence 0.75, harassment 0.61');
  });

  it('applies a 0.5 threshold to categories without their own', () => {
    expect(classifyScores({ 'sexual/minors': 0.51 }).rating).toBe('rejected');
    expect(classifyScores({ 'sexual/minors': 0.5 }).rating).toBe('safe');
  });
});
