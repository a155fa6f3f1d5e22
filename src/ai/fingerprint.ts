/**
 * Fingerprint engine — derives the cache key for a question under a given
 * context state. Pure: no I/O, same input always yields the same key.
 */

import { createHash } from 'node:crypto';
import type { ContextIdentity, ResolvedContext } from './types.js';

const TRAILING_PUNCTUATION = /[\s.,;:!?…]+$/u;

export function normalizeQuestion(question: string): string {
  return question
    .toLowerCase()
    .trim()
    .replace(/\s+/g, ' ')
    .replace(TRAILING_PUNCTUATION, '');
}

export function contextIdentity(context: ResolvedContext): ContextIdentity {
  return {
    fileContentHash: context.file?.contentHash,
    connectionId: context.connection?.connectionId,
    schemaVersion: context.connection?.version,
  };
}

export function fingerprint(question: string, identity: ContextIdentity): string {
  const fileIdentity = identity.fileContentHash ?? '';
  const connectionIdentity = identity.connectionId
    ? `${identity.connectionId}:${identity.schemaVersion ?? ''}`
    : '';

  // Length-prefixed fields keep "ab"+"c" distinct from "a"+"bc"
  const material = [normalizeQuestion(question), fileIdentity, connectionIdentity]
    .map((part) => `${part.length}:${part}`)
    .join('|');

  return createHash('sha256').update(material, 'utf8').digest('hex');
}
