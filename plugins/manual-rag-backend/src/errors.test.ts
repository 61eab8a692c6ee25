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

import { describe, expect, it } from '@jest/globals';
import {
  EMBEDDING_UNAVAILABLE_MESSAGE,
  EmbeddingUnavailableError,
  ErrorCode,
  GenerationUnavailableError,
  getErrorMessage,
  InvalidParametersError,
  isRagError,
  isRetryable,
  RagError,
  StoreUnavailableError,
  TimeoutError,
} from './errors';

describe('errors', () => {
  it('describes a timeout with its operation and limit', () => {
    const error = new TimeoutError('Query embedding', 50);

    expect(error.message).toBe('Query embedding timed out after 50ms');
    expect(error.code).toBe(ErrorCode.TIMEOUT);
    expect(error).toBeInstanceOf(RagError);
    expect(error.name).toBe('TimeoutError');
  });

  it('keeps the underlying cause', () => {
    const cause = new Error('connection refused');
    const error = new StoreUnavailableError('Chunk store unavailable', cause);

    expect(error.cause).toBe(cause);
  });

  it('narrows by code', () => {
    const error: unknown = new InvalidParametersError('topK must be >= 1');

    expect(isRagError(error)).toBe(true);
    expect(isRagError(error, ErrorCode.INVALID_PARAMETERS)).toBe(true);
    expect(isRagError(error, ErrorCode.TIMEOUT)).toBe(false);
    expect(isRagError(new Error('plain'))).toBe(false);
  });

  describe('getErrorMessage', () => {
    it('hides provider details behind a retry message', () => {
      expect(getErrorMessage(new EmbeddingUnavailableError('HTTP 500 from provider'))).toBe(
        EMBEDDING_UNAVAILABLE_MESSAGE
      );
    });

    it('uses the message of other errors', () => {
      expect(getErrorMessage(new Error('boom'))).toBe('boom');
      expect(getErrorMessage('plain text')).toBe('plain text');
    });
  });

  it('marks unavailable resources as retryable', () => {
    expect(isRetryable(new EmbeddingUnavailableError('down'))).toBe(true);
    expect(isRetryable(new StoreUnavailableError('down'))).toBe(true);
    expect(isRetryable(new TimeoutError('Answer generation', 10))).toBe(true);
    expect(isRetryable(new InvalidParametersError('bad'))).toBe(false);
    expect(isRetryable(new GenerationUnavailableError('down'))).toBe(false);
    expect(isRetryable(new Error('unknown'))).toBe(false);
  });
});
