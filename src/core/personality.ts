import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { cwd } from 'process';

const DEFAULT_RAG_PERSONALITY = `You are an AI assistant that answers questions accurately based on the provided documents.

Follow these rules:
1. Use only the information in the provided context.
2. Never guess or make up anything that is not in the context.
3. Cite the source of every piece of information inline with its number, e.g. [source 2].
4. Answer in the same language and style as the question.
5. Be as detailed and specific as possible, including examples and figures from the context.
6. Explain each main point fully and use several paragraphs when needed.
7. If the context does not contain the answer, say plainly that the provided documents do not contain the relevant information.`;

/**
 * System prompt for grounded answers; rag-personality.txt (or RAG_PERSONALITY_FILE) overrides the default
 */
export function getRAGPersonality(): string {
  const ragPersonalityPath = process.env.RAG_PERSONALITY_FILE || join(cwd(), 'rag-personality.txt');

  try {
    if (existsSync(ragPersonalityPath)) {
      const content = readFileSync(ragPersonalityPath, 'utf-8').trim();
      if (content) {
        return content;
      }
    }
  } catch (error) {
    console.warn(`Warning: Could not load personality from ${ragPersonalityPath}, using default.`, error);
  }

  return DEFAULT_RAG_PERSONALITY;
}
