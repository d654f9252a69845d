import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_CONFIG, type MeterConfig } from '../../types/config.js';
import {
  ConfigStore,
  ConfigValidationError,
  YamlConfigFile,
} from '../config.js';
import { MemoryBackingStore } from './fakes.js';

describe('ConfigStore', () => {
  describe('load', () => {
    it('writes and returns the defaults when nothing is stored', async () => {
      const backing = new MemoryBackingStore();
      const store = new ConfigStore({ backingStore: backing });

      const config = await store.load();

      expect(config).toEqual(DEFAULT_CONFIG);
      expect(backing.saves).toEqual([DEFAULT_CONFIG]);
    });

    it('falls back to defaults for an invalid document', async () => {
      const backing = new MemoryBackingStore({
        interval_consumed_lower: 'fast',
      });
      const store = new ConfigStore({ backingStore: backing });

      await expect(store.load()).resolves.toEqual(DEFAULT_CONFIG);
      expect(backing.stored).toEqual(DEFAULT_CONFIG);
    });

    it('falls back to defaults when the store cannot be read', async () => {
      const backing = new MemoryBackingStore();
      jest.spyOn(backing, 'load').mockRejectedValue(new Error('disk gone'));
      const store = new ConfigStore({ backingStore: backing });

      await expect(store.load()).resolves.toEqual(DEFAULT_CONFIG);
    });

    it('does not reject when persisting the defaults fails', async () => {
      const backing = new MemoryBackingStore();
      jest.spyOn(backing, 'save').mockRejectedValue(new Error('read-only'));
      const store = new ConfigStore({ backingStore: backing });

      await expect(store.load()).resolves.toEqual(DEFAULT_CONFIG);
    });

    it('fills keys missing from the stored document with defaults', async () => {
      const backing = new MemoryBackingStore({
        mqtt_host: 'broker.local',
        mqtt_port: 8883,
      });
      const store = new ConfigStore({ backingStore: backing });

      const config = await store.load();

      expect(config).toEqual({
        ...DEFAULT_CONFIG,
        mqtt_host: 'broker.local',
        mqtt_port: 8883,
      });
      expect(backing.saves).toHaveLength(0);
    });
  });

  describe('get and all', () => {
    it('returns the fallback only for null values', async () => {
      const store = new ConfigStore({ backingStore: new MemoryBackingStore() });
      await store.load();

      expect(store.get('mqtt_host')).toBeNull();
      expect(store.get('mqtt_host', 'fallback.local')).toBe('fallback.local');
      expect(store.get('mqtt_port', 9999)).toBe(1883);
    });

    it('hands out frozen copies', async () => {
      const store = new ConfigStore({ backingStore: new MemoryBackingStore() });
      await store.load();

      const first = store.all();
      const second = store.all();

      expect(first).not.toBe(second);
      expect(Object.isFrozen(first)).toBe(true);
    });
  });

  describe('update', () => {
    let backing: MemoryBackingStore;
    let store: ConfigStore;

    beforeEach(async () => {
      backing = new MemoryBackingStore();
      store = new ConfigStore({ backingStore: backing });
      await store.load();
    });

    it('merges, persists and exposes the change', async () => {
      await store.update({ interval_consumed_lower: 1.0, interval_consumed_upper: 1.0 });

      expect(store.get('interval_consumed_lower')).toBe(1.0);
      expect(store.get('interval_consumed_upper')).toBe(1.0);
      expect(store.get('interval_generated_upper')).toBe(5.0);
      expect(backing.stored).toEqual(store.all());
    });

    it('ignores keys explicitly set to undefined', async () => {
      await store.update({ mqtt_host: 'broker.local' });
      await store.update({ mqtt_host: undefined, mqtt_port: 8883 });

      expect(store.get('mqtt_host')).toBe('broker.local');
      expect(store.get('mqtt_port')).toBe(8883);
    });

    it('rejects updates that break the interval bounds and keeps the old config', async () => {
      await expect(
        store.update({ interval_generated_lower: 9, interval_generated_upper: 1 })
      ).rejects.toBeInstanceOf(ConfigValidationError);

      expect(store.all()).toEqual(DEFAULT_CONFIG);
    });

    it('rejects negative bounds', async () => {
      await expect(store.update({ interval_consumed_lower: -1 })).rejects.toThrow(
        ConfigValidationError
      );
    });

    it('keeps the old config when persisting fails', async () => {
      jest.spyOn(backing, 'save').mockRejectedValueOnce(new Error('disk full'));

      await expect(store.update({ mqtt_port: 8883 })).rejects.toThrow('disk full');
      expect(store.get('mqtt_port')).toBe(1883);
    });

    it('does not lose concurrent updates to distinct keys', async () => {
      const slowBacking = new MemoryBackingStore(undefined, 5);
      const slowStore = new ConfigStore({ backingStore: slowBacking });
      await slowStore.load();

      await Promise.all([
        slowStore.update({ mqtt_host: 'broker.local' }),
        slowStore.update({ mqtt_port: 8883 }),
        slowStore.update({ mqtt_username: 'meter' }),
        slowStore.update({ mqtt_password: 'test-secret' }),
        slowStore.update({ mqtt_publish_enabled: true }),
      ]);

      expect(slowBacking.stored).toEqual({
        ...DEFAULT_CONFIG,
        mqtt_host: 'broker.local',
        mqtt_port: 8883,
        mqtt_username: 'meter',
        mqtt_password: 'test-secret',
        mqtt_publish_enabled: true,
      });
    });

    it('notifies listeners after the change is persisted', async () => {
      const seen: unknown[] = [];
      store.onChange({
        onConfigChange: () => {
          seen.push(backing.stored);
        },
      });

      const snapshot = await store.update({ mqtt_publish_enabled: true });

      expect(seen).toEqual([snapshot]);
    });

    it('passes listeners a frozen snapshot', async () => {
      const received: Array<Readonly<MeterConfig>> = [];
      store.onChange({ onConfigChange: (config) => void received.push(config) });

      await store.update({ mqtt_port: 8883 });

      expect(received).toHaveLength(1);
      expect(Object.isFrozen(received[0])).toBe(true);
      expect(received[0].mqtt_port).toBe(8883);
    });

    it('keeps notifying the other listeners when one fails', async () => {
      const first = jest.fn(() => {
        throw new Error('listener failed');
      });
      const second = jest.fn(async () => {
        throw new Error('async listener failed');
      });
      const third = jest.fn<() => void>();
      store.onChange({ onConfigChange: first });
      store.onChange({ onConfigChange: second });
      store.onChange({ onConfigChange: third });

      await expect(store.update({ mqtt_port: 8883 })).resolves.toMatchObject({
        mqtt_port: 8883,
      });
      expect(first).toHaveBeenCalledTimes(1);
      expect(second).toHaveBeenCalledTimes(1);
      expect(third).toHaveBeenCalledTimes(1);
    });

    it('lets a listener update the store again without deadlocking', async () => {
      let reentered = false;
      store.onChange({
        onConfigChange: async (config) => {
          if (!reentered && config.mqtt_port === 8883) {
            reentered = true;
            await store.update({ mqtt_host: 'broker.local' });
          }
        },
      });

      await store.update({ mqtt_port: 8883 });

      expect(store.get('mqtt_host')).toBe('broker.local');
    });
  });

  describe('with a YAML file', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'meter-config-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('materializes the defaults on first run', async () => {
      const path = join(dir, 'config.yaml');
      const store = new ConfigStore({ backingStore: new YamlConfigFile(path) });

      await store.load();

      const content = await readFile(path, 'utf8');
      expect(content).toContain('interval_consumed_lower: 2\n');
      expect(content).toContain('mqtt_host: null\n');
    });

    it('loads back exactly what was saved', async () => {
      const path = join(dir, 'config.yaml');
      const store = new ConfigStore({ backingStore: new YamlConfigFile(path) });
      await store.load();
      await store.update({
        interval_consumed_lower: 1.5,
        interval_consumed_upper: 3.25,
        mqtt_host: 'broker.local',
        mqtt_password: 'test-secret',
      });
      await store.save();

      const reloaded = new ConfigStore({ backingStore: new YamlConfigFile(path) });

      await expect(reloaded.load()).resolves.toEqual(store.all());
    });

    it('recovers from a corrupt file', async () => {
      const path = join(dir, 'config.yaml');
      await writeFile(path, 'interval_consumed_lower: [unclosed\n', 'utf8');
      const store = new ConfigStore({ backingStore: new YamlConfigFile(path) });

      await expect(store.load()).resolves.toEqual(DEFAULT_CONFIG);
      const reloaded = new ConfigStore({ backingStore: new YamlConfigFile(path) });
      await expect(reloaded.load()).resolves.toEqual(DEFAULT_CONFIG);
    });
  });

  describe('saveCertFile', () => {
    let dir: string;
    let store: ConfigStore;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'meter-certs-'));
      store = new ConfigStore({
        backingStore: new MemoryBackingStore(),
        certDir: join(dir, 'certs'),
      });
      await store.load();
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('stores the certificate and points the config at it', async () => {
      const filename = await store.saveCertFile('ca.crt', 'test-certificate');

      expect(filename).toBe('ca.crt');
      expect(store.get('mqtt_cert_filename')).toBe('ca.crt');
      await expect(readFile(join(dir, 'certs', 'ca.crt'), 'utf8')).resolves.toBe(
        'test-certificate'
      );
    });

    it('strips directory parts from the filename', async () => {
      const filename = await store.saveCertFile('../../evil.crt', 'test-certificate');

      expect(filename).toBe('evil.crt');
      await expect(readFile(join(dir, 'certs', 'evil.crt'), 'utf8')).resolves.toBe(
        'test-certificate'
      );
    });

    it('refuses files that are not .crt and keeps the previous certificate', async () => {
      await store.saveCertFile('ca.crt', 'test-certificate');

      const filename = await store.saveCertFile('key.pem', 'test-key');

      expect(filename).toBe('ca.crt');
      expect(store.get('mqtt_cert_filename')).toBe('ca.crt');
    });
  });
});
