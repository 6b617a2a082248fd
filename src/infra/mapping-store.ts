import { promises as fsp, mkdirSync, watch, type FSWatcher } from 'fs';
import * as path from 'path';
import { EventEmitter } from 'eventemitter3';
import { createChildLogger } from '../utils/logger.js';
import { ErrorCode, StoreError } from '../utils/errors.js';
import { normalizeMac, parseMac } from '../utils/mac.js';

const logger = createChildLogger('mapping-store');

const RELOAD_DEBOUNCE_MS = 200;
const EMPTY_TAGS: ReadonlySet<string> = new Set();

export interface MappingSnapshot<T> {
  readonly version: number;
  readonly loadedAt: Date;
  readonly entries: ReadonlyMap<string, T>;
}

export interface MappingStoreEvents {
  reloaded: (version: number) => void;
  loadFailed: (error: StoreError) => void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Key/value mapping kept in a JSON object file. Readers always see one whole
 * snapshot; a reload swaps it in one assignment. Entries that fail validation
 * are dropped one by one.
 */
export abstract class JsonMappingStore<T> extends EventEmitter<MappingStoreEvents> {
  readonly filePath: string;
  protected current: MappingSnapshot<T> = { version: 0, loadedAt: new Date(0), entries: new Map() };
  private watcher: FSWatcher | null = null;
  private reloadTimer: NodeJS.Timeout | null = null;

  constructor(filePath: string, private readonly storeName: string) {
    super();
    this.filePath = filePath;
  }

  /** null marks a malformed entry */
  protected abstract parseEntry(key: string, value: unknown): T | null;

  protected abstract serializeEntry(value: T): unknown;

  protected normalizeKey(key: string): string {
    return key.trim();
  }

  /** Written when the file does not exist yet. */
  protected sample(): Record<string, unknown> | null {
    return null;
  }

  protected onReplace(_snapshot: MappingSnapshot<T>): void {}

  snapshot(): MappingSnapshot<T> {
    return this.current;
  }

  get version(): number {
    return this.current.version;
  }

  /**
   * Read the file and swap in a new snapshot. An unreadable file keeps the
   * previous snapshot and emits loadFailed.
   */
  async load(): Promise<MappingSnapshot<T>> {
    let raw: string;
    try {
      raw = await fsp.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) {
        return this.createFromSample();
      }
      return this.failLoad(`Cannot read ${this.storeName} file`, err);
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (err) {
      return this.failLoad(`${this.storeName} file is not valid JSON`, err);
    }

    if (!isRecord(document)) {
      return this.failLoad(`${this.storeName} file must hold a JSON object`);
    }

    return this.replace(this.parseDocument(document));
  }

  reload(): Promise<MappingSnapshot<T>> {
    return this.load();
  }

  /**
   * Reload whenever the file changes on disk. The directory is watched, not
   * the file, so replacing the file by rename and creating it later both count.
   */
  watch(): void {
    if (this.watcher) return;

    const directory = path.dirname(this.filePath);
    const fileName = path.basename(this.filePath);
    try {
      mkdirSync(directory, { recursive: true });
      this.watcher = watch(directory, (_event, changed) => {
        if (changed === null || changed === fileName) this.scheduleReload();
      });
      this.watcher.on('error', (err) => {
        logger.warn({ store: this.storeName, err }, 'File watch failed');
        this.unwatch();
      });
    } catch (err) {
      logger.warn({ store: this.storeName, file: this.filePath, err }, 'Cannot watch file, reload hook only');
    }
  }

  unwatch(): void {
    if (this.reloadTimer) {
      clearTimeout(this.reloadTimer);
      this.reloadTimer = null;
    }
    this.watcher?.close();
    this.watcher = null;
  }

  protected async persist(entries: Map<string, T>): Promise<MappingSnapshot<T>> {
    const document: Record<string, unknown> = {};
    for (const [key, value] of entries) {
      document[key] = this.serializeEntry(value);
    }

    try {
      await fsp.mkdir(path.dirname(this.filePath), { recursive: true });
      await fsp.writeFile(this.filePath, JSON.stringify(document, null, 2), 'utf-8');
    } catch (err) {
      throw new StoreError(ErrorCode.STORE_WRITE_FAILED, `Cannot write ${this.storeName} file`, {
        cause: err instanceof Error ? err : undefined,
        context: { file: this.filePath },
      });
    }

    return this.replace(entries);
  }

  private parseDocument(document: Record<string, unknown>): Map<string, T> {
    const entries = new Map<string, T>();
    let ignored = 0;

    for (const [rawKey, value] of Object.entries(document)) {
      const key = this.normalizeKey(rawKey);
      const entry = key ? this.parseEntry(key, value) : null;
      if (entry === null) {
        ignored++;
        continue;
      }
      entries.set(key, entry);
    }

    if (ignored > 0) {
      logger.warn({ store: this.storeName, ignored }, 'Ignored malformed entries');
    }
    return entries;
  }

  private async createFromSample(): Promise<MappingSnapshot<T>> {
    const sample = this.sample();
    if (sample) {
      try {
        await fsp.mkdir(path.dirname(this.filePath), { recursive: true });
        await fsp.writeFile(this.filePath, JSON.stringify(sample, null, 2), 'utf-8');
        logger.info({ store: this.storeName, file: this.filePath }, 'Created sample file');
      } catch (err) {
        logger.warn({ store: this.storeName, file: this.filePath, err }, 'Cannot create sample file');
      }
      return this.replace(this.parseDocument(sample));
    }
    return this.replace(new Map());
  }

  private failLoad(message: string, cause?: unknown): MappingSnapshot<T> {
    const error = new StoreError(ErrorCode.STORE_READ_FAILED, message, {
      cause: cause instanceof Error ? cause : undefined,
      context: { file: this.filePath },
    });
    logger.error({ store: this.storeName, file: this.filePath, err: error }, 'Keeping previous snapshot');
    this.emit('loadFailed', error);
    return this.current;
  }

  private replace(entries: Map<string, T>): MappingSnapshot<T> {
    const snapshot: MappingSnapshot<T> = {
      version: this.current.version + 1,
      loadedAt: new Date(),
      entries,
    };
    this.current = snapshot;
    this.onReplace(snapshot);
    this.emit('reloaded', snapshot.version);
    return snapshot;
  }

  private scheduleReload(): void {
    if (this.reloadTimer) {
      clearTimeout(this.reloadTimer);
    }
    this.reloadTimer = setTimeout(() => {
      this.reloadTimer = null;
      this.load().catch((err: unknown) => {
        logger.error({ store: this.storeName, err }, 'Reload failed');
      });
    }, RELOAD_DEBOUNCE_MS);
  }
}

export interface TagLookup {
  tagsFor(mac: string): ReadonlySet<string>;
  knownTags(): readonly string[];
}

/** tag -> list of device MACs */
export class TagStore extends JsonMappingStore<readonly string[]> implements TagLookup {
  private byMac = new Map<string, ReadonlySet<string>>();

  constructor(filePath: string) {
    super(filePath, 'device tags');
  }

  protected parseEntry(_tag: string, value: unknown): readonly string[] | null {
    if (!Array.isArray(value)) return null;
    const items: unknown[] = value;
    const macs: string[] = [];
    for (const item of items) {
      const mac = typeof item === 'string' ? parseMac(item) : null;
      if (mac && !macs.includes(mac)) macs.push(mac);
    }
    return macs;
  }

  protected serializeEntry(value: readonly string[]): unknown {
    return [...value];
  }

  protected override sample(): Record<string, unknown> {
    return {
      homeowners: ['place_mac_addresses_here'],
      visitors: ['place_mac_addresses_here'],
    };
  }

  protected override onReplace(snapshot: MappingSnapshot<readonly string[]>): void {
    const index = new Map<string, Set<string>>();
    for (const [tag, macs] of snapshot.entries) {
      for (const mac of macs) {
        const tags = index.get(mac) ?? new Set<string>();
        tags.add(tag);
        index.set(mac, tags);
      }
    }
    this.byMac = index;
  }

  tagsFor(mac: string): ReadonlySet<string> {
    return this.byMac.get(normalizeMac(mac)) ?? EMPTY_TAGS;
  }

  knownTags(): readonly string[] {
    return [...this.current.entries.keys()].sort();
  }

  devicesFor(tag: string): readonly string[] {
    return this.current.entries.get(tag) ?? [];
  }

  async addTag(tag: string, mac: string): Promise<void> {
    const normalized = parseMac(mac);
    const key = this.normalizeKey(tag);
    if (!normalized || !key) {
      throw new StoreError(ErrorCode.STORE_WRITE_FAILED, `Cannot tag '${mac}' with '${tag}'`);
    }

    const entries = new Map(this.current.entries);
    const macs = entries.get(key) ?? [];
    if (macs.includes(normalized)) return;
    entries.set(key, [...macs, normalized]);
    await this.persist(entries);
  }

  async removeTag(tag: string, mac: string): Promise<void> {
    const normalized = normalizeMac(mac);
    const key = this.normalizeKey(tag);
    const macs = this.current.entries.get(key);
    if (!macs || !macs.includes(normalized)) return;

    const entries = new Map(this.current.entries);
    entries.set(key, macs.filter(m => m !== normalized));
    await this.persist(entries);
  }
}

export interface ZoneLookup {
  zoneFor(routerId: string): string | null;
}

/** routerId -> zone id */
export class ZoneStore extends JsonMappingStore<string> implements ZoneLookup {
  constructor(filePath: string) {
    super(filePath, 'router zones');
  }

  // Satellite ids are MACs; accept them in any notation.
  protected override normalizeKey(key: string): string {
    return parseMac(key) ?? key.trim();
  }

  protected parseEntry(_routerId: string, value: unknown): string | null {
    if (typeof value !== 'string') return null;
    const zone = value.trim();
    return zone ? zone : null;
  }

  protected serializeEntry(value: string): unknown {
    return value;
  }

  zoneFor(routerId: string): string | null {
    return this.current.entries.get(this.normalizeKey(routerId)) ?? null;
  }

  async setZone(routerId: string, zone: string | null): Promise<void> {
    const key = this.normalizeKey(routerId);
    const entries = new Map(this.current.entries);
    const trimmed = zone?.trim();
    if (trimmed) {
      entries.set(key, trimmed);
    } else {
      entries.delete(key);
    }
    await this.persist(entries);
  }
}
