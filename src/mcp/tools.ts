import * as fs from 'fs/promises';
import * as path from 'path';
import { ragService, RAGService } from '../core/rag-service';
import { RagError, errorMessage } from '../core/errors';
import {
  addPdfSchema,
  answerQuestionSchema,
  collectionSchema,
  embedCollectionSchema,
  parseInput,
  saveMetadataSchema,
  saveTableSchema
} from '../core/schemas';
import type { AnswerResult, EmbedResult } from '../types';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

function text(value: string): ToolResult {
  return { content: [{ type: 'text', text: value }] };
}

export function errorResult(error: unknown): ToolResult {
  const message = error instanceof RagError
    ? `Error [${error.code}]: ${error.message}`
    : `Error: ${errorMessage(error)}`;
  return { content: [{ type: 'text', text: message }], isError: true };
}

export function formatAnswer(result: AnswerResult): string {
  const sourcesText = result.sources.length > 0
    ? `\n\nSources (${result.sources.length}):\n${result.sources
        .map((s) => `  [${s.index}] ${s.collection} / ${s.sourceFile} (page ${s.page}, score: ${s.score.toFixed(3)})`)
        .join('\n')}`
    : '';

  const stats = Object.entries(result.knowledgeStats)
    .map(([name, count]) => `${name}: ${count}`)
    .join(', ');

  return `${result.answer}${sourcesText}\n\nDocuments used per collection: ${stats}`;
}

export function formatEmbedResult(result: EmbedResult): string {
  const lines = [
    `Embedding ${result.mode === 'full' ? '(full rebuild)' : '(incremental)'} of "${result.collection}" finished`,
    `Documents: ${result.totalDocuments} (PDF: ${result.pdfCount}, CSV: ${result.csvCount})`,
    `Chunks: ${result.newChunks} new, ${result.totalChunks} total`
  ];
  if (result.newFiles && result.newFiles.length > 0) {
    lines.push(`New files: ${result.newFiles.join(', ')}`);
  }
  if (result.message) {
    lines.push(result.message);
  }
  for (const warning of result.warnings ?? []) {
    lines.push(`Warning: ${warning}`);
  }
  return lines.join('\n');
}

export async function askQuestionTool(args: unknown, service: RAGService = ragService): Promise<ToolResult> {
  const request = parseInput(answerQuestionSchema, args);
  return text(formatAnswer(await service.answerQuestion(request)));
}

export async function embedCollectionTool(args: unknown, service: RAGService = ragService): Promise<ToolResult> {
  const { collection, forceRecreate } = parseInput(embedCollectionSchema, args);
  return text(formatEmbedResult(await service.embedCollection(collection, forceRecreate)));
}

export async function uploadDocumentTool(args: unknown, service: RAGService = ragService): Promise<ToolResult> {
  const { collection, filePath } = parseInput(addPdfSchema, args);

  const { size } = await fs.stat(filePath);
  service.checkUploadSize(size);

  const content = await fs.readFile(filePath);
  const info = await service.addPdf(collection, path.basename(filePath), new Uint8Array(content));

  return text(`Stored ${info.filename} (${info.size} bytes) in "${collection}". Run embed_collection to index it.`);
}

export async function saveTableTool(args: unknown, service: RAGService = ragService): Promise<ToolResult> {
  const { collection, ...table } = parseInput(saveTableSchema, args);
  const { csvFilename } = await service.saveTable(collection, table);
  return text(`Saved ${table.rows.length} rows to ${csvFilename} in "${collection}"`);
}

export async function saveMetadataTool(args: unknown, service: RAGService = ragService): Promise<ToolResult> {
  const { collection, description } = parseInput(saveMetadataSchema, args);
  const metadata = await service.saveCollectionMetadata(collection, description);
  return text(JSON.stringify(metadata, null, 2));
}

export async function listFilesTool(args: unknown, service: RAGService = ragService): Promise<ToolResult> {
  const { collection } = parseInput(collectionSchema, args);
  return text(JSON.stringify(await service.listFiles(collection), null, 2));
}

export async function listCollectionsTool(service: RAGService = ragService): Promise<ToolResult> {
  const collections = await service.listCollections();

  if (collections.length === 0) {
    return text('No collections found. Use upload_document or save_collection_metadata to create one.');
  }

  const list = collections
    .map((c) => {
      const description = c.description ? ` - ${c.description}` : '';
      return `  - ${c.name}${description}: ${c.pdfCount} PDFs, ${c.csvCount} CSVs, ${c.indexed ? 'indexed' : 'not indexed'}`;
    })
    .join('\n');

  return text(`Collections (${collections.length}):\n${list}`);
}

export async function getStatusTool(service: RAGService = ragService): Promise<ToolResult> {
  return text(JSON.stringify(await service.getStatus(), null, 2));
}

export async function getMetadataTool(args: unknown, service: RAGService = ragService): Promise<ToolResult> {
  const { collection } = parseInput(collectionSchema, args);
  return text(JSON.stringify(await service.getCollectionMetadata(collection), null, 2));
}

export async function listAvailableCollectionsTool(service: RAGService = ragService): Promise<ToolResult> {
  const collections = await service.listAvailableCollections();

  if (collections.length === 0) {
    return text('No indexed collections. Use embed_collection first.');
  }

  const list = collections
    .map((c) => `  - ${c.name}${c.description ? ` - ${c.description}` : ''}`)
    .join('\n');
  return text(`Indexed collections (${collections.length}):\n${list}`);
}

/**
 * Dispatch a tool call; every failure becomes an error result
 */
export async function callTool(name: string, args: unknown, service: RAGService = ragService): Promise<ToolResult> {
  try {
    switch (name) {
      case 'ask_question':
        return await askQuestionTool(args, service);
      case 'embed_collection':
        return await embedCollectionTool(args, service);
      case 'upload_document':
        return await uploadDocumentTool(args, service);
      case 'save_table':
        return await saveTableTool(args, service);
      case 'save_collection_metadata':
        return await saveMetadataTool(args, service);
      case 'list_files':
        return await listFilesTool(args, service);
      case 'get_collection_metadata':
        return await getMetadataTool(args, service);
      case 'list_collections':
        return await listCollectionsTool(service);
      case 'list_available_collections':
        return await listAvailableCollectionsTool(service);
      case 'get_status':
        return await getStatusTool(service);
      default:
        return { content: [{ type: 'text', text: `Unknown tool: ${name}` }], isError: true };
    }
  } catch (error) {
    return errorResult(error);
  }
}
