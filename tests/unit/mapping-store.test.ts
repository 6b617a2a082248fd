import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fsp } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { TagStore, ZoneStore } from '../../src/infra/mapping-store.js';
import { ErrorCode, StoreError } from '../../src/utils/errors.js';

describe('mapping stores', () => {
  let dir: string;
  let watched: Array<TagStore | ZoneStore>;

  // Saves the way editors do: write a sibling file, then rename it over.
  const replaceFile = async (file: string, content: unknown): Promise<void> => {
    const temp = `${file}.tmp`;
    await fsp.writeFile(temp, JSON.stringify(content));
    await fsp.rename(temp, file);
  };

  beforeEach(async () => {
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), 'meshwatch-store-'));
    watched = [];
  });

  afterEach(async () => {
    for (const store of watched) store.unwatch();
    await fsp.rm(dir, { recursive: true, force: true });
  });

  describe('TagStore', () => {
    it('should create a sample file when none exists', async () => {
      const file = path.join(dir, 'nested', 'device-tags.json');
      const store = new TagStore(file);

      const snapshot = await store.load();

      const written: unknown = JSON.parse(await fsp.readFile(file, 'utf-8'));
      expect(written).toEqual({
        homeowners: ['place_mac_addresses_here'],
        visitors: ['place_mac_addresses_here'],
      });
      expect(snapshot.version).toBe(1);
      expect(store.knownTags()).toEqual(['homeowners', 'visitors']);
      expect(store.devicesFor('homeowners')).toEqual([]);
    });

    it('should index tags by normalized mac', async () => {
      const file = path.join(dir, 'tags.json');
      await fsp.writeFile(file, JSON.stringify({
        family: ['AA-BB-CC-DD-EE-01', 'aa:bb:cc:dd:ee:02'],
        phones: ['AABBCCDDEE01'],
      }));
      const store = new TagStore(file);

      await store.load();

      expect([...store.tagsFor('aa:bb:cc:dd:ee:01')].sort()).toEqual(['family', 'phones']);
      expect([...store.tagsFor('AA:BB:CC:DD:EE:02')]).toEqual(['family']);
      expect(store.tagsFor('aa:bb:cc:dd:ee:09').size).toBe(0);
    });

    it('should drop malformed entries and keep the rest', async () => {
      const file = path.join(dir, 'tags.json');
      await fsp.writeFile(file, JSON.stringify({
        family: ['aa:bb:cc:dd:ee:01', 42, 'nonsense'],
        broken: 'aa:bb:cc:dd:ee:02',
      }));
      const store = new TagStore(file);

      await store.load();

      expect(store.knownTags()).toEqual(['family']);
      expect(store.devicesFor('family')).toEqual(['aa:bb:cc:dd:ee:01']);
    });

    it('should keep the previous snapshot when the file turns invalid', async () => {
      const file = path.join(dir, 'tags.json');
      await fsp.writeFile(file, JSON.stringify({ family: ['aa:bb:cc:dd:ee:01'] }));
      const store = new TagStore(file);
      const onFailed = vi.fn();
      store.on('loadFailed', onFailed);
      await store.load();

      await fsp.writeFile(file, '{ not json');
      const snapshot = await store.reload();

      expect(snapshot.version).toBe(1);
      expect(store.knownTags()).toEqual(['family']);
      expect(onFailed).toHaveBeenCalledTimes(1);
      const [error] = onFailed.mock.calls[0] ?? [];
      expect(error).toBeInstanceOf(StoreError);
      expect(error).toMatchObject({ code: ErrorCode.STORE_READ_FAILED });
    });

    it('should reject a document that is not an object', async () => {
      const file = path.join(dir, 'tags.json');
      await fsp.writeFile(file, JSON.stringify(['aa:bb:cc:dd:ee:01']));
      const store = new TagStore(file);

      const snapshot = await store.load();

      expect(snapshot.version).toBe(0);
      expect(store.knownTags()).toEqual([]);
    });

    it('should persist added and removed tags', async () => {
      const file = path.join(dir, 'tags.json');
      await fsp.writeFile(file, JSON.stringify({}));
      const store = new TagStore(file);
      await store.load();

      await store.addTag('family', 'AA-BB-CC-DD-EE-01');
      await store.addTag('family', 'aa:bb:cc:dd:ee:01');
      expect(store.devicesFor('family')).toEqual(['aa:bb:cc:dd:ee:01']);

      const reread = new TagStore(file);
      await reread.load();
      expect([...reread.tagsFor('aa:bb:cc:dd:ee:01')]).toEqual(['family']);

      await store.removeTag('family', 'AA:BB:CC:DD:EE:01');
      expect(store.devicesFor('family')).toEqual([]);
      expect(store.tagsFor('aa:bb:cc:dd:ee:01').size).toBe(0);
    });

    it('should reload after every replace by rename', async () => {
      const file = path.join(dir, 'tags.json');
      await fsp.writeFile(file, JSON.stringify({ a: [] }));
      const store = new TagStore(file);
      await store.load();
      store.watch();
      watched.push(store);

      await replaceFile(file, { b: [] });
      await vi.waitFor(() => {
        expect(store.knownTags()).toEqual(['b']);
      }, { timeout: 3000 });

      await replaceFile(file, { c: [] });
      await vi.waitFor(() => {
        expect(store.knownTags()).toEqual(['c']);
      }, { timeout: 3000 });
    });

    it('should refuse to tag something that is not a mac', async () => {
      const store = new TagStore(path.join(dir, 'tags.json'));
      await expect(store.addTag('family', 'printer')).rejects.toThrow(StoreError);
    });
  });

  describe('ZoneStore', () => {
    it('should start empty without a file', async () => {
      const file = path.join(dir, 'zones.json');
      const store = new ZoneStore(file);

      await store.load();

      expect(store.zoneFor('primary')).toBeNull();
      await expect(fsp.access(file)).rejects.toThrow();
    });

    it('should pick up a file created after watching started', async () => {
      const file = path.join(dir, 'zones.json');
      const store = new ZoneStore(file);
      await store.load();
      store.watch();
      watched.push(store);

      await replaceFile(file, { primary: 'office' });

      await vi.waitFor(() => {
        expect(store.zoneFor('primary')).toBe('office');
      }, { timeout: 3000 });
    });

    it('should match satellite ids in any notation', async () => {
      const file = path.join(dir, 'zones.json');
      await fsp.writeFile(file, JSON.stringify({
        primary: 'ground-floor',
        'AA-BB-CC-00-00-0A': ' attic ',
        garage: '',
      }));
      const store = new ZoneStore(file);

      await store.load();

      expect(store.zoneFor('primary')).toBe('ground-floor');
      expect(store.zoneFor('aa:bb:cc:00:00:0a')).toBe('attic');
      expect(store.zoneFor('garage')).toBeNull();
    });

    it('should set and clear zones', async () => {
      const file = path.join(dir, 'zones.json');
      const store = new ZoneStore(file);
      await store.load();

      await store.setZone('primary', 'office');
      expect(store.zoneFor('primary')).toBe('office');
      expect(JSON.parse(await fsp.readFile(file, 'utf-8'))).toEqual({ primary: 'office' });

      await store.setZone('primary', null);
      expect(store.zoneFor('primary')).toBeNull();
    });

    it('should bump the version on every load', async () => {
      const file = path.join(dir, 'zones.json');
      await fsp.writeFile(file, JSON.stringify({ primary: 'office' }));
      const store = new ZoneStore(file);
      const onReloaded = vi.fn();
      store.on('reloaded', onReloaded);

      await store.load();
      await store.reload();

      expect(store.version).toBe(2);
      expect(onReloaded).toHaveBeenLastCalledWith(2);
    });
  });
});
