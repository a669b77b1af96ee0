/**
 * Configuration Management
 *
 * Loads server settings from a JSON file and the environment.
 */

import { readFile } from 'node:fs/promises';
import { Environment } from '../runtime/environment.ts';
import { parseLogLevel, type LogLevel } from '../telemetry/logger.ts';
import type { ListenAddress } from '../http/types.ts';

export interface ConfigOptions {
  host?: string;
  port?: number;
  env?: string;
  logLevel?: LogLevel;
  openBrowser?: boolean;
  [key: string]: unknown;
}

const DEFAULT_CONFIG: ConfigOptions = {
  host: '127.0.0.1',
  port: 8000,
  env: 'development',
  logLevel: 'info',
  openBrowser: false,
};

const DEFAULT_PATHS = ['./config/app.json', './config.json'];

// Key under which a shared config file carries this server's settings
export const CONFIG_KEY = 'plainserve';

export class AddressError extends Error {
  constructor(address: string) {
    super(`Invalid address "${address}", expected host:port`);
    this.name = 'AddressError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNotFound(error: unknown): boolean {
  return isRecord(error) && error.code === 'ENOENT';
}

/**
 * Split `host:port` into its parts. Port 0 asks for an ephemeral port.
 */
export function parseAddress(address: string): ListenAddress {
  const idx = address.lastIndexOf(':');
  if (idx <= 0) throw new AddressError(address);

  const host = address.slice(0, idx).replace(/^\[(.*)\]$/, '$1');
  const portText = address.slice(idx + 1);
  const port = Number(portText);

  if (!host || !/^\d+$/.test(portText) || port > 65535) {
    throw new AddressError(address);
  }

  return { host, port };
}

/**
 * Configuration manager
 */
export class Config {
  private config: Record<string, unknown>;

  constructor(options: ConfigOptions | Record<string, unknown> = {}) {
    this.config = this.mergeConfig(DEFAULT_CONFIG, options);
  }

  /**
   * Get a configuration value by dotted key
   */
  get(key: string): unknown {
    return this.getNestedValue(this.config, key);
  }

  string(key: string, defaultValue: string): string {
    const value = this.get(key);
    return typeof value === 'string' ? value : defaultValue;
  }

  number(key: string, defaultValue: number): number {
    const value = this.get(key);
    return typeof value === 'number' && Number.isFinite(value) ? value : defaultValue;
  }

  boolean(key: string, defaultValue: boolean): boolean {
    const value = this.get(key);
    return typeof value === 'boolean' ? value : defaultValue;
  }

  /**
   * Set a configuration value by dotted key
   */
  set(key: string, value: unknown): void {
    this.setNestedValue(this.config, key, value);
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  /**
   * Get all configuration
   */
  all(): Record<string, unknown> {
    return { ...this.config };
  }

  /**
   * Bind address as `host:port`
   */
  address(): string {
    const host = this.string('host', '127.0.0.1');
    const port = this.number('port', 8000);
    return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
  }

  private mergeConfig(
    base: Record<string, unknown>,
    override: Record<string, unknown>
  ): Record<string, unknown> {
    const result = { ...base };

    for (const [key, value] of Object.entries(override)) {
      if (value === undefined) continue;
      result[key] = isRecord(value)
        ? this.mergeConfig(isRecord(base[key]) ? base[key] : {}, value)
        : value;
    }

    return result;
  }

  private getNestedValue(obj: Record<string, unknown>, path: string): unknown {
    return path.split('.').reduce<unknown>((current, key) => {
      return isRecord(current) ? current[key] : undefined;
    }, obj);
  }

  private setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
    const parts = path.split('.');
    const last = parts.pop();
    if (last === undefined) return;

    let current = obj;
    for (const part of parts) {
      const next = current[part];
      if (isRecord(next)) {
        current = next;
      } else {
        const created: Record<string, unknown> = {};
        current[part] = created;
        current = created;
      }
    }

    current[last] = value;
  }
}

async function readConfigFile(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, 'utf8'));
}

/**
 * Load configuration from a config file, then the environment.
 *
 * An explicit `configPath` must exist. Otherwise the default locations are
 * tried in order, and a file only counts when it has a `plainserve` key.
 */
export async function loadConfig(configPath?: string): Promise<Config> {
  let fileConfig: Record<string, unknown> = {};

  if (configPath) {
    const parsed = await readConfigFile(configPath);
    if (isRecord(parsed)) {
      fileConfig = parsed;
    }
  } else {
    for (const path of DEFAULT_PATHS) {
      let parsed: unknown;
      try {
        parsed = await readConfigFile(path);
      } catch (error) {
        if (isNotFound(error)) continue;
        throw error;
      }
      const section = isRecord(parsed) ? parsed[CONFIG_KEY] : undefined;
      if (isRecord(section)) {
        fileConfig = section;
        break;
      }
    }
  }

  const port = Environment.get('PORT');
  const openBrowser = Environment.get('OPEN_BROWSER');
  const envConfig: ConfigOptions = {
    host: Environment.get('HOST'),
    port: port !== undefined && /^\d+$/.test(port) ? Number(port) : undefined,
    env: Environment.get('NODE_ENV'),
    logLevel: parseLogLevel(Environment.get('LOG_LEVEL')),
    openBrowser: openBrowser === undefined ? undefined : openBrowser === 'true',
  };

  const config = new Config(fileConfig);
  for (const [key, value] of Object.entries(envConfig)) {
    if (value !== undefined) {
      config.set(key, value);
    }
  }

  return config;
}
