import { describe, it, expect } from 'vitest';
import { buildSemanticPrompt, describeValidationType, extractJsonObject } from './index.js';

describe('buildSemanticPrompt', () => {
  it('includes the type, level and content', () => {
    const prompt = buildSemanticPrompt({
      validationType: 'recommendation',
      validationLevel: 'basic',
      payload: { recommendation_text: 'Try the green tea.' },
      schema: { recommendation_text: { type: 'string', description: 'A drink to order' } },
      structuralErrors: [],
    });

    expect(prompt).toContain('## OUTPUT TYPE\nrecommendation');
    expect(prompt).toContain('## STRICTNESS\nbasic: ');
    expect(prompt).toContain('"recommendation_text": "Try the green tea."');
    expect(prompt).toContain('## SCHEMA\n```json\n{\n  "recommendation_text": {\n    "type": "string",\n    "description": "A drink to order"\n  }\n}\n```');
    expect(prompt).not.toContain('## KNOWN STRUCTURAL PROBLEMS');
    expect(prompt.endsWith('Respond with the JSON object only.')).toBe(true);
  });

  it('lists known structural problems by path', () => {
    const prompt = buildSemanticPrompt({
      validationType: 'generic',
      validationLevel: 'strict',
      payload: { items: [{ email: 'nope' }] },
      schema: { items: { type: 'array' } },
      structuralErrors: [
        {
          loc: ['items', 0, 'email'],
          type: 'invalid_email',
          msg: 'Value is not a valid email address',
          suggestion: 'Use an address like name@example.com',
        },
      ],
    });

    expect(prompt).toContain('- items[0].email: Value is not a valid email address');
  });
});

describe('describeValidationType', () => {
  it('has guidance for unknown types', () => {
    expect(describeValidationType('invoice')).toBe(
      'Check that this invoice output is coherent and serves its purpose.'
    );
  });
});

describe('extractJsonObject', () => {
  it('reads a bare object', () => {
    expect(extractJsonObject('{"semantic_score": 0.5}')).toEqual({ semantic_score: 0.5 });
  });

  it('reads an object inside a code fence', () => {
    expect(extractJsonObject('Sure.\n```json\n{"issues": ["a"]}\n```\nDone.')).toEqual({
      issues: ['a'],
    });
  });

  it('reads an object surrounded by prose', () => {
    expect(extractJsonObject('My grade: {"semantic_score": 1} as requested')).toEqual({
      semantic_score: 1,
    });
  });

  it('throws when there is no object', () => {
    expect(() => extractJsonObject('no json here')).toThrow(SyntaxError);
  });
});
