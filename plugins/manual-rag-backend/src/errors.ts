/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

/**
 * Error taxonomy of the retrieval pipeline
 *
 * @packageDocumentation
 */

export enum ErrorCode {
  EMBEDDING_UNAVAILABLE = 'EMBEDDING_UNAVAILABLE',
  GENERATION_UNAVAILABLE = 'GENERATION_UNAVAILABLE',
  TIMEOUT = 'TIMEOUT',
  IMAGE_INDEX_ERROR = 'IMAGE_INDEX_ERROR',
  STORE_UNAVAILABLE = 'STORE_UNAVAILABLE',
  INVALID_PARAMETERS = 'INVALID_PARAMETERS',
}

export const EMBEDDING_UNAVAILABLE_MESSAGE =
  'The question could not be processed right now. Please try again in a moment.';

/**
 * Base class for every error raised by the pipeline
 */
export class RagError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    cause?: unknown
  ) {
    super(message);
    this.name = 'RagError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class EmbeddingUnavailableError extends RagError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.EMBEDDING_UNAVAILABLE, message, cause);
    this.name = 'EmbeddingUnavailableError';
  }
}

export class GenerationUnavailableError extends RagError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.GENERATION_UNAVAILABLE, message, cause);
    this.name = 'GenerationUnavailableError';
  }
}

export class TimeoutError extends RagError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(ErrorCode.TIMEOUT, `${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class ImageIndexError extends RagError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.IMAGE_INDEX_ERROR, message, cause);
    this.name = 'ImageIndexError';
  }
}

export class StoreUnavailableError extends RagError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.STORE_UNAVAILABLE, message, cause);
    this.name = 'StoreUnavailableError';
  }
}

export class InvalidParametersError extends RagError {
  constructor(message: string) {
    super(ErrorCode.INVALID_PARAMETERS, message);
    this.name = 'InvalidParametersError';
  }
}

/**
 * Narrow an unknown error to a RagError, optionally of a given code
 */
export function isRagError(error: unknown, code?: ErrorCode): error is RagError {
  return error instanceof RagError && (code === undefined || error.code === code);
}

/**
 * Get a user-facing message from an error
 */
export function getErrorMessage(error: unknown): string {
  if (isRagError(error, ErrorCode.EMBEDDING_UNAVAILABLE)) {
    return EMBEDDING_UNAVAILABLE_MESSAGE;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

/**
 * Errors caused by unavailable resources; the caller may retry the request
 */
export function isRetryable(error: unknown): boolean {
  return (
    isRagError(error, ErrorCode.EMBEDDING_UNAVAILABLE) ||
    isRagError(error, ErrorCode.STORE_UNAVAILABLE) ||
    isRagError(error, ErrorCode.TIMEOUT)
  );
}
