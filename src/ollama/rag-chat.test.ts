import { describe, expect, it } from 'vitest';
import { NO_INFORMATION_ANSWER, RAGChat, buildUserPrompt, formatContext, previewContent } from './rag-chat';
import { FakeLanguageModel } from '../test-utils/fakes';
import type { RetrievedDocument } from '../types';

const documents: RetrievedDocument[] = [
  {
    content: 'Bitcoin is a decentralized coin.',
    metadata: {
      source: 'guide.pdf',
      kind: 'pdf',
      collection: 'coins',
      chunkIndex: 0,
      start: 0,
      end: 32,
      page: 1
    },
    score: 0.9,
    collection: 'coins'
  },
  {
    content: 'Coin: BTC',
    metadata: {
      source: 'report_table1_rates.csv',
      kind: 'tabular',
      collection: 'chain',
      chunkIndex: 0,
      start: 0,
      end: 9
    },
    score: 0.7,
    collection: 'chain'
  }
];

function createChat(llm: FakeLanguageModel): RAGChat {
  return new RAGChat({ llm, defaultModel: 'test-model', previewLength: 10, systemPrompt: () => 'SYSTEM' });
}

describe('previewContent', () => {
  it('truncates long content with an ellipsis', () => {
    expect(previewContent('abcdef', 3)).toBe('abc...');
    expect(previewContent('abc', 3)).toBe('abc');
  });

  it('never splits a character outside the basic plane', () => {
    expect(previewContent('\u{1F4B0}\u{1F4B0}coin', 1)).toBe('\u{1F4B0}...');
    expect(previewContent('\u{1F4B0}ab', 3)).toBe('\u{1F4B0}ab');
  });
});

describe('prompt building', () => {
  it('numbers every context block', () => {
    expect(formatContext(documents)).toBe('[source 1]\nBitcoin is a decentralized coin.\n\n[source 2]\nCoin: BTC');
  });

  it('places the question after the context', () => {
    expect(buildUserPrompt('ctx', 'Why?')).toBe('Context:\nctx\n\nQuestion: Why?\n\nAnswer:');
  });
});

describe('RAGChat', () => {
  it('answers without the model when nothing was retrieved', async () => {
    const llm = new FakeLanguageModel();

    const result = await createChat(llm).generateAnswer([], 'What is Bitcoin?');

    expect(result).toEqual({ answer: NO_INFORMATION_ANSWER, sources: [] });
    expect(llm.calls).toHaveLength(0);
  });

  it('asks the model once, deterministically, with numbered context', async () => {
    const llm = new FakeLanguageModel('Bitcoin is a coin [1].');

    const result = await createChat(llm).generateAnswer(documents, 'What is Bitcoin?');

    expect(result.answer).toBe('Bitcoin is a coin [1].');
    expect(llm.calls).toEqual([
      {
        systemPrompt: 'SYSTEM',
        userPrompt:
          'Context:\n[source 1]\nBitcoin is a decentralized coin.\n\n[source 2]\nCoin: BTC\n\nQuestion: What is Bitcoin?\n\nAnswer:',
        model: 'test-model',
        temperature: 0
      }
    ]);
  });

  it('cites every document in order', async () => {
    const result = await createChat(new FakeLanguageModel()).generateAnswer(documents, 'What is Bitcoin?');

    expect(result.sources).toEqual([
      {
        index: 1,
        collection: 'coins',
        sourceFile: 'guide.pdf',
        page: 1,
        score: 0.9,
        contentPreview: 'Bitcoin is...'
      },
      {
        index: 2,
        collection: 'chain',
        sourceFile: 'report_table1_rates.csv',
        page: 'N/A',
        score: 0.7,
        contentPreview: 'Coin: BTC'
      }
    ]);
  });

  it('uses the requested model', async () => {
    const llm = new FakeLanguageModel();

    await createChat(llm).generateAnswer(documents, 'What is Bitcoin?', 'other-model');

    expect(llm.calls[0].model).toBe('other-model');
  });
});
