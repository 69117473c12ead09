import { indexIdFor } from './collection-store';
import { KeyedLock, indexLock } from './index-lock';
import { vectorDb } from './vector-db';
import { NotFoundError } from './errors';
import type { RetrievedDocument, VectorIndex } from '../types';

/**
 * Cosine distance (0 = identical) to similarity (higher is better)
 */
export function similarityFromDistance(distance: number): number {
  return 1 - distance;
}

export class Retriever {
  private index: VectorIndex;
  private lock: KeyedLock;

  constructor(index: VectorIndex = vectorDb, lock: KeyedLock = indexLock) {
    this.index = index;
    this.lock = lock;
  }

  /**
   * Up to k documents of one collection, best first, each tagged with the collection
   */
  async retrieve(collection: string, question: string, k: number): Promise<RetrievedDocument[]> {
    const indexId = indexIdFor(collection);

    // Never read an index while it is being written
    await this.lock.whenIdle(collection);

    if (!(await this.index.exists(indexId))) {
      throw new NotFoundError(`Collection "${collection}" has no index; embed it first`);
    }

    const matches = await this.index.query(indexId, question, k);

    return matches
      .slice(0, k)
      .map(({ chunk, distance }) => ({
        content: chunk.content,
        metadata: chunk.metadata,
        score: similarityFromDistance(distance),
        collection
      }))
      .sort((a, b) => b.score - a.score);
  }
}

export const retriever = new Retriever();
