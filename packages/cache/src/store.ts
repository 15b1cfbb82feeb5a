// ABOUTME: Disk-backed memoization of remote calls, one JSON file per call signature.
// ABOUTME: Single-flight per signature, atomic writes, unreadable entries recomputed.

import { mkdir, readFile, readdir, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { CACHE_CONFIG } from '@tunescope/config';
import { CacheCorruptionError, RequestDeduplicator, describeError } from '@tunescope/shared';
import { isNotFoundError, writeFileAtomic } from './atomic';
import { signatureFor, type CallSignature, type NamedParams } from './signature';

/**
 * Envelope stored on disk around each raw value. The full signature text is
 * kept so a digest collision reads as a miss instead of someone else's data.
 */
const CacheEnvelopeSchema = z.object({
  signature: z.string(),
  storedAt: z.string(),
  value: z.unknown(),
});

type CacheEnvelope = z.infer<typeof CacheEnvelopeSchema>;

/** A raw value together with what the caller's decoder made of it */
type Decoded<T> = { raw: unknown; value: T };

type Lookup<T> = ({ hit: true } & Decoded<T>) | { hit: false };

const MISS = { hit: false } as const;

/**
 * Turns a stored (or freshly computed) raw value into the caller's type.
 * Throwing marks a stored value as corrupt; on fresh data the error propagates.
 */
export type Decoder<T> = (raw: unknown) => T;

export interface CacheStats {
  hits: number;
  misses: number;
  corruptions: number;
}

export class CacheStore {
  private readonly inflight = new RequestDeduplicator<unknown>();
  private enabled = true;
  private readonly stats: CacheStats = { hits: 0, misses: 0, corruptions: 0 };

  constructor(public readonly root: string) {}

  /**
   * Create a store and its root directory.
   */
  static async open(root: string): Promise<CacheStore> {
    await mkdir(root, { recursive: true });
    return new CacheStore(root);
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  getStats(): CacheStats {
    return { ...this.stats };
  }

  /**
   * Return the value stored for `signature`, or compute, store and return it.
   *
   * Concurrent callers for one signature share a single lookup, so `compute`
   * runs at most once per miss. Once the store is cleared every call computes.
   * Each caller decodes the raw value once.
   */
  async getOrCompute<T>(
    signature: CallSignature,
    compute: () => Promise<unknown>,
    decode: Decoder<T>
  ): Promise<T> {
    if (!this.enabled) {
      return decode(await compute());
    }

    const pending = this.inflight.pending(signature.key);
    if (pending) {
      return decode(await pending);
    }

    const own = this.lookup(signature, compute, decode);
    const [{ value }] = await Promise.all([
      own,
      this.inflight.run(signature.key, async () => (await own).raw),
    ]);
    return value;
  }

  /**
   * The one wrapper every memoized remote call goes through.
   */
  cachedCall<T>(
    operation: string,
    named: NamedParams,
    remote: () => Promise<unknown>,
    decode: Decoder<T>
  ): Promise<T> {
    return this.getOrCompute(signatureFor(operation, named), remote, decode);
  }

  async has(signature: CallSignature): Promise<boolean> {
    try {
      await stat(this.pathFor(signature));
      return true;
    } catch (error) {
      if (isNotFoundError(error)) return false;
      throw error;
    }
  }

  async delete(signature: CallSignature): Promise<void> {
    await rm(this.pathFor(signature), { force: true });
    console.log(`[Cache] Deleted ${signature.key}`);
  }

  /**
   * Keys of all stored entries, sorted.
   */
  async list(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.root);
    } catch (error) {
      if (isNotFoundError(error)) return [];
      throw error;
    }
    return names
      .filter((name) => name.endsWith(CACHE_CONFIG.entryExtension) && name !== CACHE_CONFIG.tokenFile)
      .map((name) => name.slice(0, -CACHE_CONFIG.entryExtension.length))
      .sort();
  }

  /**
   * Remove the whole cache root and stop memoizing for the rest of the session.
   */
  async clear(): Promise<void> {
    this.enabled = false;
    await rm(this.root, { recursive: true, force: true });
    console.log(`[Cache] Cleared ${this.root}, memoization disabled`);
  }

  private pathFor(signature: CallSignature): string {
    return join(this.root, `${signature.key}${CACHE_CONFIG.entryExtension}`);
  }

  private async lookup<T>(
    signature: CallSignature,
    compute: () => Promise<unknown>,
    decode: Decoder<T>
  ): Promise<Decoded<T>> {
    const cached = await this.read(signature, decode);
    if (cached.hit) {
      this.stats.hits++;
      console.log(`[Cache] Hit for ${signature.key}`);
      return { raw: cached.raw, value: cached.value };
    }

    this.stats.misses++;
    console.log(`[Cache] Miss for ${signature.key}, calling ${signature.operation}`);
    const raw = await compute();
    // Decoded before storing so malformed remote data is never memoized.
    const value = decode(raw);
    await this.write(signature, raw);
    return { raw, value };
  }

  private async read<T>(signature: CallSignature, decode: Decoder<T>): Promise<Lookup<T>> {
    let envelope: CacheEnvelope;
    let value: T;
    try {
      const text = await readFile(this.pathFor(signature), 'utf8');
      envelope = CacheEnvelopeSchema.parse(JSON.parse(text));
      value = decode(envelope.value);
    } catch (cause) {
      if (isNotFoundError(cause)) return MISS;
      this.stats.corruptions++;
      const corruption = new CacheCorruptionError(signature.text, cause);
      console.warn(`[Cache] ${corruption.message} - treating as miss`);
      return MISS;
    }

    if (envelope.signature !== signature.text) {
      console.warn(`[Cache] Key ${signature.key} holds "${envelope.signature}" - treating as miss`);
      return MISS;
    }

    return { hit: true, raw: envelope.value, value };
  }

  private async write(signature: CallSignature, raw: unknown): Promise<void> {
    if (!this.enabled) return;

    const envelope: CacheEnvelope = {
      signature: signature.text,
      storedAt: new Date().toISOString(),
      value: raw,
    };

    try {
      await mkdir(this.root, { recursive: true });
      await writeFileAtomic(this.pathFor(signature), JSON.stringify(envelope));
      console.log(`[Cache] Stored ${signature.key}`);
    } catch (error) {
      // The computed value is still good; only memoization is lost.
      console.error(`[Cache] Failed to store ${signature.key}: ${describeError(error)}`);
    }
  }
}
