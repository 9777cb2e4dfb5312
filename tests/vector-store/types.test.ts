/**
 * Tests for vector store errors and the stored payload
 */

import { describe, it, expect } from 'vitest';
import {
  VectorStoreError,
  VectorStoreErrorCode,
  VectorStoreBackendSchema,
  fromStoredDocument,
  isConnectionError,
  isVectorStoreError,
  toStoredDocument,
} from '../../lib/src/vector-store/types.js';

describe('VectorStoreErrorCode', () => {
  it('should list only the codes the stores raise', () => {
    expect(Object.values(VectorStoreErrorCode)).toEqual([
      'CONNECTION_ERROR',
      'INSERT_FAILED',
      'SEARCH_FAILED',
      'DIMENSION_MISMATCH',
      'UNKNOWN',
    ]);
  });
});

describe('VectorStoreError.fromError', () => {
  it('should keep the message and the cause', () => {
    const cause = new Error('socket hang up');
    const error = VectorStoreError.fromError(cause, VectorStoreErrorCode.INSERT_FAILED);

    expect(error.message).toBe('socket hang up');
    expect(error.code).toBe(VectorStoreErrorCode.INSERT_FAILED);
    expect(error.cause).toBe(cause);
  });

  it('should default to UNKNOWN for non-errors', () => {
    const error = VectorStoreError.fromError('nope');

    expect(error.code).toBe(VectorStoreErrorCode.UNKNOWN);
    expect(error.cause).toBeUndefined();
  });

  it('should pass an existing VectorStoreError through', () => {
    const original = new VectorStoreError('down', VectorStoreErrorCode.CONNECTION_ERROR);

    expect(VectorStoreError.fromError(original, VectorStoreErrorCode.INSERT_FAILED)).toBe(original);
  });
});

describe('error guards', () => {
  it('should recognize connection errors only', () => {
    const connection = new VectorStoreError('down', VectorStoreErrorCode.CONNECTION_ERROR);
    const insert = new VectorStoreError('bad row', VectorStoreErrorCode.INSERT_FAILED);

    expect(isVectorStoreError(insert)).toBe(true);
    expect(isVectorStoreError(new Error('plain'))).toBe(false);
    expect(isConnectionError(connection)).toBe(true);
    expect(isConnectionError(insert)).toBe(false);
  });
});

describe('VectorStoreBackendSchema', () => {
  it('should accept the two backends', () => {
    expect(VectorStoreBackendSchema.options).toEqual(['pgvector', 'qdrant']);
  });
});

describe('stored documents', () => {
  it('should write snake_case page content', () => {
    const stored = toStoredDocument({
      pageContent: 'text',
      metadata: { source: 'A', hadith_number: 1, chapter_number: 2, chapter: 'C', chain_index: '3' },
    });

    expect(stored).toEqual({
      page_content: 'text',
      metadata: { source: 'A', hadith_number: 1, chapter_number: 2, chapter: 'C', chain_index: '3' },
    });
  });

  it('should fill missing metadata with defaults on the way out', () => {
    expect(fromStoredDocument({ page_content: 'text', metadata: { source: 'A' } })).toEqual({
      pageContent: 'text',
      metadata: { source: 'A', hadith_number: 0, chapter_number: 0, chapter: '', chain_index: '' },
    });
  });

  it('should reject a payload without page content', () => {
    expect(() => fromStoredDocument({ metadata: {} })).toThrow();
  });
});
