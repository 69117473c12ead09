import { z } from 'zod';
import { config } from '../config';
import { ValidationError } from './errors';

const collectionName = z.string().trim().min(1, 'Collection name is required');

export const answerQuestionSchema = z.object({
  collections: z.array(collectionName).min(1, 'At least one collection is required'),
  question: z.string().trim().min(1, 'Question is required'),
  topKPerKnowledge: z.number().int().min(1).max(10).default(config.rag.topKPerKnowledge),
  finalTopK: z.number().int().min(1).max(20).default(config.rag.finalTopK),
  model: z.string().trim().min(1).optional()
});

export const embedCollectionSchema = z.object({
  collection: collectionName,
  forceRecreate: z.boolean().default(false)
});

export const collectionSchema = z.object({
  collection: collectionName
});

export const saveMetadataSchema = z.object({
  collection: collectionName,
  description: z.string().default('')
});

export const addPdfSchema = z.object({
  collection: collectionName,
  filePath: z.string().min(1, 'File path is required')
});

export const saveTableSchema = z.object({
  collection: collectionName,
  pdfFilename: z.string().min(1),
  page: z.number().int().min(1),
  tableIndex: z.number().int().min(1),
  columns: z.array(z.string()).min(1),
  rows: z.array(z.array(z.string())),
  description: z.string().optional()
});

export const extractTablesSchema = z.object({
  collection: collectionName,
  pdfFilename: z.string().min(1)
});

export const renderPageSchema = extractTablesSchema.extend({
  page: z.number().int().min(1)
});

/**
 * Parse untrusted input, reporting every problem at once
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(`Invalid request: ${details}`, result.error.issues);
  }
  return result.data;
}
