import { ollamaClient } from './client';
import { config } from '../config';
import { getRAGPersonality } from '../core/personality';
import type { Citation, LanguageModel, RetrievedDocument, SynthesizedAnswer } from '../types';

export const NO_INFORMATION_ANSWER =
  'I could not find relevant information in the selected knowledge collections.';

// Grounded answers are generated deterministically
const ANSWER_TEMPERATURE = 0;

export function previewContent(content: string, maxLength: number): string {
  const chars = Array.from(content);
  return chars.length > maxLength ? `${chars.slice(0, maxLength).join('')}...` : content;
}

export function buildCitations(documents: RetrievedDocument[], previewLength: number): Citation[] {
  return documents.map((document, i) => ({
    index: i + 1,
    collection: document.collection,
    sourceFile: document.metadata.source,
    page: document.metadata.page ?? 'N/A',
    score: document.score,
    contentPreview: previewContent(document.content, previewLength)
  }));
}

export function formatContext(documents: RetrievedDocument[]): string {
  return documents
    .map((document, i) => `[source ${i + 1}]\n${document.content}`)
    .join('\n\n');
}

export function buildUserPrompt(context: string, question: string): string {
  return `Context:
${context}

Question: ${question}

Answer:`;
}

export interface RAGChatOptions {
  llm?: LanguageModel;
  defaultModel?: string;
  previewLength?: number;
  systemPrompt?: () => string;
}

/**
 * Turns retrieved documents and a question into a cited answer
 */
export class RAGChat {
  private llm: LanguageModel;
  private defaultModel: string;
  private previewLength: number;
  private systemPrompt: () => string;

  constructor(options: RAGChatOptions = {}) {
    this.llm = options.llm ?? ollamaClient;
    this.defaultModel = options.defaultModel ?? config.ollama.model;
    this.previewLength = options.previewLength ?? config.rag.previewLength;
    this.systemPrompt = options.systemPrompt ?? getRAGPersonality;
  }

  async generateAnswer(
    documents: RetrievedDocument[],
    question: string,
    model: string = this.defaultModel
  ): Promise<SynthesizedAnswer> {
    if (documents.length === 0) {
      return { answer: NO_INFORMATION_ANSWER, sources: [] };
    }

    const startTime = Date.now();
    const sources = buildCitations(documents, this.previewLength);
    const userPrompt = buildUserPrompt(formatContext(documents), question);

    const answer = await this.llm.complete(this.systemPrompt(), userPrompt, model, ANSWER_TEMPERATURE);

    console.log(`Answer generated with ${model} in ${Date.now() - startTime}ms (${sources.length} sources)`);

    return { answer, sources };
  }
}

// Singleton instance
export const ragChat = new RAGChat();
