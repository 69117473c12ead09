import type { ZodIssue } from 'zod';

export type RagErrorCode = 'NOT_FOUND' | 'EMPTY_INPUT' | 'VALIDATION' | 'EXTERNAL_SERVICE';

export class RagError extends Error {
  readonly code: RagErrorCode;

  constructor(code: RagErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = 'RagError';
  }
}

/** A referenced collection, file or index does not exist */
export class NotFoundError extends RagError {
  constructor(message: string) {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

export class EmptyInputError extends RagError {
  constructor(message: string) {
    super('EMPTY_INPUT', message);
    this.name = 'EmptyInputError';
  }
}

export class ValidationError extends RagError {
  readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super('VALIDATION', message);
    this.issues = issues;
    this.name = 'ValidationError';
  }
}

/** Embedding engine, vector store or language model failed or is unreachable */
export class ExternalServiceError extends RagError {
  readonly service: string;

  constructor(service: string, message: string) {
    super('EXTERNAL_SERVICE', message);
    this.service = service;
    this.name = 'ExternalServiceError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
