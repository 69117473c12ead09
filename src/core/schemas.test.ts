import { describe, expect, it } from 'vitest';
import { answerQuestionSchema, embedCollectionSchema, parseInput } from './schemas';
import { ValidationError } from './errors';
import { config } from '../config';

describe('parseInput', () => {
  it('trims the question and applies default limits', () => {
    expect(parseInput(answerQuestionSchema, { collections: ['coins'], question: '  What is Bitcoin?  ' })).toEqual({
      collections: ['coins'],
      question: 'What is Bitcoin?',
      topKPerKnowledge: config.rag.topKPerKnowledge,
      finalTopK: config.rag.finalTopK
    });
  });

  it('requires at least one collection', () => {
    expect(() => parseInput(answerQuestionSchema, { collections: [], question: 'What?' })).toThrow(
      'Invalid request: collections: At least one collection is required'
    );
  });

  it('rejects a blank question', () => {
    expect(() => parseInput(answerQuestionSchema, { collections: ['coins'], question: '   ' })).toThrow(
      'Invalid request: question: Question is required'
    );
  });

  it('reports the path of an out-of-range limit', () => {
    let caught: unknown;
    try {
      parseInput(answerQuestionSchema, { collections: ['coins'], question: 'What?', topKPerKnowledge: 11 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.code).toBe('VALIDATION');
      expect(caught.issues.map((issue) => issue.path)).toEqual([['topKPerKnowledge']]);
    }
  });

  it('defaults embedding to an incremental run', () => {
    expect(parseInput(embedCollectionSchema, { collection: 'coins' })).toEqual({
      collection: 'coins',
      forceRecreate: false
    });
  });
});
