import { Retriever, retriever } from './retriever';
import { errorMessage } from './errors';
import type { RetrievalResult, RetrievedDocument } from '../types';

export interface MergeOptions {
  topKPerKnowledge: number;
  finalTopK: number;
}

/**
 * Pool per-collection results in request order, sort by score (stable, so the
 * first-listed collection wins ties) and keep the best finalTopK.
 */
export function mergeAndRerank(resultSets: RetrievedDocument[][], finalTopK: number): RetrievedDocument[] {
  return resultSets
    .flat()
    .sort((a, b) => b.score - a.score)
    .slice(0, finalTopK);
}

export function countByCollection(collections: string[], documents: RetrievedDocument[]): Record<string, number> {
  const counts = new Map<string, number>(collections.map((name) => [name, 0]));
  for (const document of documents) {
    const count = counts.get(document.collection);
    if (count !== undefined) {
      counts.set(document.collection, count + 1);
    }
  }
  // fromEntries defines own keys, so names such as __proto__ survive
  return Object.fromEntries(counts);
}

/**
 * Multi-collection retrieval: query every collection, merge and re-rank
 */
export class CrossCollectionMerger {
  private retriever: Retriever;

  constructor(collectionRetriever: Retriever = retriever) {
    this.retriever = collectionRetriever;
  }

  async retrieve(collections: string[], question: string, options: MergeOptions): Promise<RetrievalResult> {
    const names = [...new Set(collections)];

    // allSettled keeps request order regardless of which query finishes first
    const settled = await Promise.allSettled(
      names.map((name) => this.retriever.retrieve(name, question, options.topKPerKnowledge))
    );

    const resultSets: RetrievedDocument[][] = [];
    settled.forEach((outcome, i) => {
      if (outcome.status === 'fulfilled') {
        resultSets.push(outcome.value);
      } else {
        console.warn(`Retrieval failed for collection "${names[i]}": ${errorMessage(outcome.reason)}`);
      }
    });

    const documents = mergeAndRerank(resultSets, options.finalTopK);
    const knowledgeStats = countByCollection(names, documents);

    console.log(
      `Merged ${resultSets.flat().length} documents from ${resultSets.length}/${names.length} collections into ${documents.length}`
    );

    return { documents, knowledgeStats };
  }
}

export const crossCollectionMerger = new CrossCollectionMerger();
