import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { parse, stringify } from 'yaml';
import type { ZodIssue } from 'zod';
import {
  DEFAULT_CONFIG,
  MeterConfigSchema,
  type ConfigBackingStore,
  type ConfigChangeListener,
  type MeterConfig,
  type MeterConfigKey,
  type MeterConfigUpdate,
} from '../types/config.js';
import { logError, logInfo, logWarn } from '../utils/logger/index.js';
import { Mutex } from '../utils/mutex.js';

const COMPONENT = 'ConfigService';

export const DEFAULT_CONFIG_FILE = './config.yaml';
export const DEFAULT_CERT_DIR = 'certs';

export class ConfigValidationError extends Error {
  constructor(public readonly issues: ZodIssue[]) {
    super(
      `Invalid configuration: ${issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`
    );
    this.name = 'ConfigValidationError';
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * YAML document on disk. Each save rewrites the whole file through a
 * temporary sibling so readers never see a half-written document.
 */
export class YamlConfigFile implements ConfigBackingStore {
  constructor(public readonly path: string = DEFAULT_CONFIG_FILE) {}

  async load(): Promise<unknown> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return undefined;
      throw error;
    }
    return parse(content);
  }

  async save(config: Readonly<MeterConfig>): Promise<void> {
    const tempPath = `${this.path}.tmp`;
    await writeFile(tempPath, stringify(config), 'utf8');
    await rename(tempPath, this.path);
  }
}

export interface ConfigStoreOptions {
  backingStore?: ConfigBackingStore;
  certDir?: string;
}

export class ConfigStore {
  private config: Readonly<MeterConfig> = DEFAULT_CONFIG;
  private readonly listeners: ConfigChangeListener[] = [];
  private readonly lock = new Mutex();
  private readonly backingStore: ConfigBackingStore;
  public readonly certDir: string;

  constructor(options: ConfigStoreOptions = {}) {
    this.backingStore = options.backingStore ?? new YamlConfigFile();
    this.certDir = options.certDir ?? DEFAULT_CERT_DIR;
  }

  /**
   * Loads the stored configuration. A missing or unreadable document is
   * replaced by the defaults, which are then written back.
   */
  public load(): Promise<Readonly<MeterConfig>> {
    return this.lock.runExclusive(async () => {
      let stored: unknown;
      try {
        stored = await this.backingStore.load();
      } catch (error) {
        logWarn(COMPONENT, 'Failed to read configuration, using defaults', {
          err: error,
        });
        return this.resetToDefaults();
      }

      if (stored === undefined) {
        logInfo(COMPONENT, 'No stored configuration, writing defaults');
        return this.resetToDefaults();
      }

      const result = MeterConfigSchema.safeParse(stored);
      if (!result.success) {
        logWarn(COMPONENT, 'Stored configuration is invalid, using defaults', {
          issues: result.error.issues,
        });
        return this.resetToDefaults();
      }

      this.config = Object.freeze(result.data);
      logInfo(COMPONENT, 'Configuration loaded');
      return this.config;
    });
  }

  private async resetToDefaults(): Promise<Readonly<MeterConfig>> {
    this.config = DEFAULT_CONFIG;
    try {
      await this.backingStore.save(this.config);
    } catch (error) {
      logError(COMPONENT, 'Failed to persist default configuration', error);
    }
    return this.config;
  }

  public get<K extends MeterConfigKey>(
    key: K,
    fallback?: MeterConfig[K]
  ): MeterConfig[K] {
    const value = this.config[key];
    if (value === null && fallback !== undefined) return fallback;
    return value;
  }

  public all(): Readonly<MeterConfig> {
    return Object.freeze({ ...this.config });
  }

  public async save(): Promise<void> {
    await this.lock.runExclusive(() => this.backingStore.save(this.config));
    logInfo(COMPONENT, 'Configuration saved');
  }

  /**
   * Merges, validates and persists `changes`, then notifies listeners once
   * the lock is released. Nothing changes when validation or the write fails.
   */
  public async update(changes: MeterConfigUpdate): Promise<Readonly<MeterConfig>> {
    const snapshot = await this.lock.runExclusive(async () => {
      const defined = Object.fromEntries(
        Object.entries(changes).filter(([, value]) => value !== undefined)
      );
      const result = MeterConfigSchema.safeParse({ ...this.config, ...defined });
      if (!result.success) {
        throw new ConfigValidationError(result.error.issues);
      }

      const next = Object.freeze(result.data);
      await this.backingStore.save(next);
      this.config = next;
      logInfo(COMPONENT, 'Configuration updated', {
        keys: Object.keys(changes),
      });
      return next;
    });

    await this.notify(snapshot);
    return snapshot;
  }

  public onChange(listener: ConfigChangeListener): void {
    this.listeners.push(listener);
  }

  private async notify(snapshot: Readonly<MeterConfig>): Promise<void> {
    await Promise.all(
      this.listeners.map(async (listener) => {
        try {
          await listener.onConfigChange(snapshot);
        } catch (error) {
          logError(COMPONENT, 'Config listener error', error);
        }
      })
    );
  }

  /**
   * Stores an uploaded CA certificate and points the configuration at it.
   * Returns the certificate filename now in effect.
   */
  public async saveCertFile(
    filename: string,
    contents: Buffer | string
  ): Promise<string | null> {
    const previous = this.config.mqtt_cert_filename;
    const name = basename(filename);
    if (!name.endsWith('.crt')) {
      logWarn(COMPONENT, `Rejected certificate upload: ${filename}`);
      return previous;
    }

    const certPath = join(this.certDir, name);
    try {
      await mkdir(this.certDir, { recursive: true });
      await writeFile(certPath, contents);
      await this.update({ mqtt_cert_filename: name });
      logInfo(COMPONENT, `Certificate saved: ${certPath}`);
      return name;
    } catch (error) {
      logError(COMPONENT, 'Failed to save certificate', error);
      return previous;
    }
  }
}
