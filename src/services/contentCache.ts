import { promises as fs } from 'fs';
import path from 'path';
import {
  CONTENT_KINDS,
  naturalKeyOf,
  type CacheStore,
  type ContentKind,
  type ContentOfKind,
  type GeneratedContent,
} from '../types/content.js';
import { KeyedMutex } from '../utils/concurrency.js';
import { validateStoredContent } from './responseRepairer.js';

export const MAX_ENTRIES_PER_KIND = 100;

export interface ContentCacheOptions {
  maxPerKind?: number;
  /** Uniform in [0, 1). */
  random?: () => number;
}

// Shared by every cache instance in the process, so two caches on one file still serialize.
const fileLocks = new KeyedMutex();

export const emptyStore = (): CacheStore => ({ question: [], fact: [], formula: [], language: [] });

const entriesFor = <K extends ContentKind>(raw: unknown, kind: K): ContentOfKind<K>[] => {
  if (typeof raw !== 'object' || raw === null) return [];
  const list: unknown = Reflect.get(raw, kind);
  if (!Array.isArray(list)) return [];
  const valid: ContentOfKind<K>[] = [];
  for (const item of list) {
    // Entries may predate the kind tag.
    const tagged: unknown = typeof item === 'object' && item !== null ? { kind, ...item } : item;
    if (validateStoredContent(kind, tagged)) valid.push(tagged);
  }
  return valid;
};

/**
 * Deduplicating, size-bounded store of previously generated content, one JSON file on disk.
 * Every access reloads the file; `add` rewrites it whole.
 */
export class ContentCache {
  readonly filePath: string;
  private readonly maxPerKind: number;
  private readonly random: () => number;

  constructor(filePath: string, options: ContentCacheOptions = {}) {
    this.filePath = path.resolve(filePath);
    this.maxPerKind = Math.max(1, options.maxPerKind ?? MAX_ENTRIES_PER_KIND);
    this.random = options.random ?? Math.random;
  }

  /**
   * Never throws: a missing, unreadable or corrupt file reads as an empty store.
   */
  async load(): Promise<CacheStore> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf-8');
    } catch (e) {
      const code: unknown = typeof e === 'object' && e !== null ? Reflect.get(e, 'code') : undefined;
      if (code !== 'ENOENT') {
        console.error(`⚠️ Failed to read content cache ${this.filePath}:`, e);
      }
      return emptyStore();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (e) {
      console.error(`⚠️ Content cache ${this.filePath} is corrupt; treating it as empty:`, e);
      return emptyStore();
    }

    return {
      question: entriesFor(raw, 'question'),
      fact: entriesFor(raw, 'fact'),
      formula: entriesFor(raw, 'formula'),
      language: entriesFor(raw, 'language'),
    };
  }

  /**
   * Appends `content` unless its natural key is already cached, evicting the
   * oldest entries past the per-kind cap. Resolves `true` when the file was rewritten.
   * Write failures reject.
   */
  async add(content: GeneratedContent): Promise<boolean> {
    return fileLocks.runExclusive(this.filePath, async () => {
      const store = await this.load();
      const appended = this.append(store, content);
      if (!appended) return false;
      await this.persist(store);
      return true;
    });
  }

  private append(store: CacheStore, content: GeneratedContent): boolean {
    switch (content.kind) {
      case 'question':
        return this.appendTo(store.question, content);
      case 'fact':
        return this.appendTo(store.fact, content);
      case 'formula':
        return this.appendTo(store.formula, content);
      case 'language':
        return this.appendTo(store.language, content);
    }
  }

  private appendTo<T extends GeneratedContent>(list: T[], content: T): boolean {
    const key = naturalKeyOf(content);
    if (list.some(existing => naturalKeyOf(existing) === key)) return false;
    list.push(content);
    if (list.length > this.maxPerKind) {
      list.splice(0, list.length - this.maxPerKind);
    }
    return true;
  }

  private async persist(store: CacheStore): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.writeFile(tmp, JSON.stringify(store, null, 2), 'utf-8');
      await fs.rename(tmp, this.filePath);
    } catch (e) {
      await fs.rm(tmp, { force: true }).catch((cleanupError: unknown) => {
        console.error(`⚠️ Could not remove ${tmp}:`, cleanupError);
      });
      throw e;
    }
  }

  /**
   * A uniformly random cached entry of `kind`, or `undefined` when there is none.
   */
  async sample<K extends ContentKind>(kind: K): Promise<ContentOfKind<K> | undefined> {
    const store = await this.load();
    const list: ContentOfKind<K>[] = store[kind];
    if (list.length === 0) return undefined;
    const index = Math.min(list.length - 1, Math.floor(this.random() * list.length));
    return list[index];
  }

  async size(kind?: ContentKind): Promise<number> {
    const store = await this.load();
    const kinds = kind ? [kind] : CONTENT_KINDS;
    return kinds.reduce((n, k) => n + store[k].length, 0);
  }
}
