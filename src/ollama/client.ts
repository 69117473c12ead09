import { z } from 'zod';
import { config } from '../config';
import { ExternalServiceError, errorMessage } from '../core/errors';
import type { LanguageModel, OllamaConfig } from '../types';

export interface OllamaMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatOptions {
  model?: string;
  temperature?: number;
}

const HEALTH_TIMEOUT_MS = 5000;

const chatResponseSchema = z.object({
  message: z.object({
    role: z.string(),
    content: z.string()
  })
});

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number()))
});

const tagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([])
});

/**
 * Non-streaming client for the Ollama HTTP API
 */
export class OllamaClient implements LanguageModel {
  private endpoint: string;
  private model: string;
  private timeoutMs: number;
  private enableThinking: boolean;

  constructor(options: Partial<OllamaConfig> = {}) {
    this.endpoint = options.endpoint ?? config.ollama.endpoint;
    this.model = options.model ?? config.ollama.model;
    this.timeoutMs = options.timeoutMs ?? config.ollama.timeoutMs;
    this.enableThinking = options.enableThinking ?? config.ollama.enableThinking;
  }

  async checkHealth(): Promise<boolean> {
    try {
      const response = await fetch(`${this.endpoint}/api/tags`, { signal: AbortSignal.timeout(HEALTH_TIMEOUT_MS) });
      return response.ok;
    } catch (error) {
      console.warn(`Ollama health check failed: ${errorMessage(error)}`);
      return false;
    }
  }

  async complete(systemPrompt: string, userPrompt: string, model: string, temperature: number): Promise<string> {
    const messages: OllamaMessage[] = [
      { role: 'system', content: systemPrompt },
      { role: 'user', content: userPrompt }
    ];
    return this.chat(messages, { model, temperature });
  }

  async chat(messages: OllamaMessage[], options: ChatOptions = {}): Promise<string> {
    const body = await this.request('/api/chat', {
      model: options.model ?? this.model,
      messages,
      stream: false,
      // qwen3 thinking mode
      think: this.enableThinking,
      options: { temperature: options.temperature ?? 0.7 }
    });

    const parsed = chatResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ExternalServiceError('ollama', 'Unexpected response from Ollama chat API');
    }

    const content = parsed.data.message.content.trim();
    if (!content) {
      throw new ExternalServiceError('ollama', 'Ollama returned an empty answer');
    }
    return content;
  }

  /**
   * One vector per input text, in input order
   */
  async embed(texts: string[], model: string): Promise<number[][]> {
    const body = await this.request('/api/embed', { model, input: texts });

    const parsed = embedResponseSchema.safeParse(body);
    if (!parsed.success || parsed.data.embeddings.length !== texts.length) {
      throw new ExternalServiceError('ollama', 'Unexpected response from Ollama embed API');
    }
    return parsed.data.embeddings;
  }

  /**
   * Names of the locally installed models; empty when Ollama cannot be reached
   */
  async listModels(): Promise<string[]> {
    try {
      const response = await fetch(`${this.endpoint}/api/tags`, { signal: AbortSignal.timeout(HEALTH_TIMEOUT_MS) });
      if (!response.ok) {
        throw new Error(`status ${response.status}`);
      }
      const { models } = tagsResponseSchema.parse(await response.json());
      return models.map((m) => m.name);
    } catch (error) {
      console.error(`Failed to list Ollama models: ${errorMessage(error)}`);
      return [];
    }
  }

  getModel(): string {
    return this.model;
  }

  getEndpoint(): string {
    return this.endpoint;
  }

  private async request(apiPath: string, payload: unknown): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(`${this.endpoint}${apiPath}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw new ExternalServiceError('ollama', `Ollama did not answer within ${this.timeoutMs}ms`);
      }
      throw new ExternalServiceError('ollama', `Failed to reach Ollama: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      throw new ExternalServiceError('ollama', `Ollama API error: ${response.status} ${response.statusText}`);
    }

    try {
      return await response.json();
    } catch {
      throw new ExternalServiceError('ollama', `Unexpected response from Ollama ${apiPath}`);
    }
  }
}

export const ollamaClient = new OllamaClient();
