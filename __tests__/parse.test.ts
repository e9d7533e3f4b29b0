import { describe, it, expect } from 'vitest';
import { parseAnalysis } from '../src/lib/parse.js';
import { analysisJson } from './helpers.js';

describe('parseAnalysis', () => {
  it('maps a well-formed response onto analysis fields', () => {
    const raw = JSON.stringify({
      significance: 0.82,
      novelty: 0.6,
      summary: '  Introduces a new decoder.  ',
      key_insights: ['Faster decoding', '  ', 'Smaller memory footprint '],
      business_relevance: 'Cuts serving cost.',
      implementation_difficulty: 'High',
      tags: ['inference', 'llm', 'inference'],
    });

    expect(parseAnalysis(raw)).toEqual({
      ok: true,
      fields: {
        significance: 0.82,
        novelty: 0.6,
        summary: 'Introduces a new decoder.',
        keyInsights: ['Faster decoding', 'Smaller memory footprint'],
        businessRelevance: 'Cuts serving cost.',
        implementationDifficulty: 'high',
        tags: ['inference', 'llm'],
      },
    });
  });

  it('accepts a fenced JSON block', () => {
    const result = parseAnalysis('```json\n' + analysisJson(0.5) + '\n```');
    expect(result.ok).toBe(true);
  });

  it('accepts the boundary scores 0 and 1', () => {
    expect(parseAnalysis(analysisJson(0)).ok).toBe(true);
    expect(parseAnalysis(analysisJson(1)).ok).toBe(true);
  });

  it.each([
    ['significance above 1', analysisJson(1.2), 'significance must be a number between 0 and 1'],
    ['negative novelty', analysisJson(0.5, { novelty: -0.1 }), 'novelty must be a number between 0 and 1'],
    ['score as a string', analysisJson(0.5, { significance: '0.5' }), 'significance must be a number between 0 and 1'],
    ['missing summary', analysisJson(0.5, { summary: undefined }), 'summary must be a string'],
    ['insights not a list', analysisJson(0.5, { key_insights: 'one' }), 'key_insights must be a list of strings'],
    [
      'unknown difficulty',
      analysisJson(0.5, { implementation_difficulty: 'extreme' }),
      'implementation_difficulty must be one of low, medium, high',
    ],
    ['a JSON array', '[1, 2]', 'response is not a JSON object'],
  ])('rejects %s', (_name, raw, error) => {
    expect(parseAnalysis(raw)).toEqual({ ok: false, error, raw });
  });

  it('rejects prose and keeps the raw text', () => {
    const result = parseAnalysis('I think this paper is great.');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.raw).toBe('I think this paper is great.');
    expect(result.error).toMatch(/^response is not valid JSON: /);
  });
});
