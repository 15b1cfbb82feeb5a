// ABOUTME: Deterministic call signatures for memoized remote calls.
// ABOUTME: Operation name + named parameters sorted by name, slugged into a filename.

import { createHash } from 'node:crypto';
import { CACHE_CONFIG } from '@tunescope/config';
import { generateSlug } from '@tunescope/shared';

export type SignatureValue = string | number | boolean | null | readonly SignatureValue[];

/**
 * Named parameters of a call. Only these contribute to the signature: anything a
 * remote function closes over (its positional inputs) is deliberately ignored, so
 * every input that should split the cache must be passed here by name.
 */
export type NamedParams = Readonly<Record<string, SignatureValue>>;

export interface CallSignature {
  operation: string;
  /** Canonical text: `"<operation> [k1=v1, k2=v2]"` with keys sorted */
  text: string;
  /** Filesystem-safe key: slug of `text` plus a digest of it */
  key: string;
}

export function signatureText(operation: string, named: NamedParams = {}): string {
  const pairs = Object.keys(named)
    .sort()
    .map((key) => `${key}=${JSON.stringify(named[key])}`);
  return `${operation} [${pairs.join(', ')}]`;
}

export function signatureFor(operation: string, named: NamedParams = {}): CallSignature {
  const text = signatureText(operation, named);
  // Slugging folds case and punctuation, so the digest keeps such inputs apart.
  const slug = generateSlug(text).slice(0, CACHE_CONFIG.slugMaxLength).replace(/-+$/, '');
  const digest = createHash('sha256').update(text).digest('hex').slice(0, CACHE_CONFIG.digestLength);

  return {
    operation,
    text,
    key: slug ? `${slug}-${digest}` : digest,
  };
}
