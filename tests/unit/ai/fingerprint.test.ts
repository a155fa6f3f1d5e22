import { describe, it, expect } from '@jest/globals';
import { contextIdentity, fingerprint, normalizeQuestion } from '../../../src/ai/fingerprint.js';
import type { FileDescriptor, SchemaDescription } from '../../../src/ai/types.js';

function makeFile(contentHash: string): FileDescriptor {
  return { ref: 'sales.csv', name: 'sales.csv', sizeBytes: 120, contentHash, columns: ['region', 'revenue'] };
}

function makeSchema(version: string, connectionId = 'default'): SchemaDescription {
  return {
    connectionId,
    version,
    tables: [{ name: 'sales', columns: [{ name: 'date', dataType: 'date' }] }],
  };
}

describe('normalizeQuestion', () => {
  it('lowercases, collapses whitespace and strips trailing punctuation', () => {
    expect(normalizeQuestion('  Show   Monthly\tRevenue?! ')).toBe('show monthly revenue');
  });

  it('keeps punctuation inside the question', () => {
    expect(normalizeQuestion('Revenue by region, 2024?')).toBe('revenue by region, 2024');
  });
});

describe('contextIdentity', () => {
  it('takes the file content hash and the schema version', () => {
    expect(contextIdentity({ file: makeFile('abc'), connection: makeSchema('v1', 'warehouse') })).toEqual({
      fileContentHash: 'abc',
      connectionId: 'warehouse',
      schemaVersion: 'v1',
    });
  });

  it('is empty without context', () => {
    expect(contextIdentity({})).toEqual({
      fileContentHash: undefined,
      connectionId: undefined,
      schemaVersion: undefined,
    });
  });
});

describe('fingerprint', () => {
  it('is a 64-character hex digest', () => {
    expect(fingerprint('show monthly revenue trend', {})).toMatch(/^[0-9a-f]{64}$/);
  });

  it('is deterministic for the same question and context', () => {
    const identity = contextIdentity({ file: makeFile('abc'), connection: makeSchema('v1') });
    expect(fingerprint('top products', identity)).toBe(fingerprint('top products', identity));
  });

  it('treats questions that normalise the same as identical', () => {
    expect(fingerprint('Top Products?', {})).toBe(fingerprint('  top   products ', {}));
  });

  it('changes when the attached file content changes', () => {
    const before = fingerprint('top products', contextIdentity({ file: makeFile('abc') }));
    const after = fingerprint('top products', contextIdentity({ file: makeFile('abd') }));
    expect(before).not.toBe(after);
  });

  it('changes when the schema version changes', () => {
    const before = fingerprint('top products', contextIdentity({ connection: makeSchema('v1') }));
    const after = fingerprint('top products', contextIdentity({ connection: makeSchema('v2') }));
    expect(before).not.toBe(after);
  });

  it('changes when the connection changes', () => {
    const a = fingerprint('top products', contextIdentity({ connection: makeSchema('v1', 'a') }));
    const b = fingerprint('top products', contextIdentity({ connection: makeSchema('v1', 'b') }));
    expect(a).not.toBe(b);
  });

  it('distinguishes a file hash from a connection with the same text', () => {
    const asFile = fingerprint('q', { fileContentHash: 'x:' });
    const asConnection = fingerprint('q', { connectionId: 'x' });
    expect(asFile).not.toBe(asConnection);
  });
});
