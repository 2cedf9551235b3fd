import { describe, it, expect } from 'vitest';
import {
  createVectorDocument,
  DocumentIdSchema,
  VectorDocumentSchema,
  withDocumentChanges,
} from './vector.js';

const ID = '11111111-1111-1111-1111-111111111111';

describe('createVectorDocument', () => {
  it('fills lifecycle defaults from the clock', () => {
    const now = new Date('2024-03-01T10:00:00.000Z');
    const document = createVectorDocument({ id: ID, content: 'Alice', embedding: [1, 0] }, now);

    expect(document).toEqual({
      id: ID,
      content: 'Alice',
      embedding: [1, 0],
      metadata: undefined,
      isDeleted: false,
      createdAt: now,
      updatedAt: now,
      deletedAt: null,
    });
    expect(Object.isFrozen(document)).toBe(true);
  });

  it('defaults updatedAt to createdAt when only createdAt is given', () => {
    const createdAt = new Date('2024-01-01T00:00:00.000Z');
    const document = createVectorDocument({ id: ID, content: 'Alice', embedding: [], createdAt });

    expect(document.updatedAt).toBe(createdAt);
  });

  it('produces documents the schema accepts', () => {
    const document = createVectorDocument({ id: ID, content: 'Alice', embedding: [0.5], metadata: { team: 'blue' } });

    expect(VectorDocumentSchema.safeParse(document).success).toBe(true);
  });
});

describe('withDocumentChanges', () => {
  it('returns a new frozen document and leaves the source untouched', () => {
    const original = createVectorDocument({ id: ID, content: 'Alice', embedding: [1] });
    const deletedAt = new Date('2024-05-05T05:05:05.000Z');

    const changed = withDocumentChanges(original, { isDeleted: true, deletedAt });

    expect(changed).not.toBe(original);
    expect(changed.isDeleted).toBe(true);
    expect(changed.deletedAt).toBe(deletedAt);
    expect(changed.id).toBe(ID);
    expect(original.isDeleted).toBe(false);
    expect(original.deletedAt).toBeNull();
    expect(Object.isFrozen(changed)).toBe(true);
  });
});

describe('DocumentIdSchema', () => {
  it('accepts hyphenated GUIDs in either case regardless of version bits', () => {
    expect(DocumentIdSchema.safeParse(ID).success).toBe(true);
    expect(DocumentIdSchema.safeParse('A2C4E6F8-1B3D-4F5A-8C7E-9D0B2A4C6E8F').success).toBe(true);
  });

  it('rejects anything that is not 8-4-4-4-12 hex', () => {
    expect(DocumentIdSchema.safeParse('not-a-uuid').success).toBe(false);
    expect(DocumentIdSchema.safeParse('11111111111111111111111111111111').success).toBe(false);
    expect(DocumentIdSchema.safeParse('').success).toBe(false);
  });
});
