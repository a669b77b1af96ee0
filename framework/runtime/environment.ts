/**
 * Environment Detection
 *
 * Access to environment variables and the current run mode.
 */

export type RunMode = 'development' | 'production' | 'test';

/**
 * Environment variable access
 */
export class Environment {
  /**
   * Get an environment variable with optional default
   */
  static get(key: string, defaultValue?: string): string | undefined {
    return process.env[key] ?? defaultValue;
  }

  /**
   * Get a required environment variable (throws if not set)
   */
  static require(key: string): string {
    const value = process.env[key];
    if (value === undefined) {
      throw new Error(`Required environment variable ${key} is not set`);
    }
    return value;
  }

  /**
   * Current run mode, from NODE_ENV
   */
  static mode(): RunMode {
    const env = process.env.NODE_ENV;
    if (env === 'production' || env === 'test') return env;
    return 'development';
  }

  /**
   * Check if running in production mode
   */
  static isProduction(): boolean {
    return Environment.mode() === 'production';
  }

  /**
   * Check if running in test mode
   */
  static isTest(): boolean {
    return Environment.mode() === 'test';
  }
}
