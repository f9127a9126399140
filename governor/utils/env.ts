/**
 * Environment Variables Utility
 * Reads process environment (after dotenv) with typed accessors
 */

import * as dotenv from 'dotenv';

dotenv.config();

export type EnvSource = Record<string, string | undefined>;

class EnvironmentManager {
  private cache: Map<string, string> = new Map();

  constructor(private source: EnvSource = process.env) {}

  get(key: string, defaultValue?: string): string | undefined {
    if (this.cache.has(key)) {
      return this.cache.get(key);
    }

    const raw = this.source[key];
    const value = raw === undefined || raw === '' ? defaultValue : raw;

    if (value !== undefined) {
      this.cache.set(key, value);
    }

    return value;
  }

  /**
   * Get a required environment variable (throws if not found)
   */
  require(key: string): string {
    const value = this.get(key);
    if (value === undefined) {
      throw new Error(`Required environment variable ${key} is not set`);
    }
    return value;
  }

  getBoolean(key: string, defaultValue: boolean = false): boolean {
    const value = this.get(key);
    if (value === undefined) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  getNumber(key: string, defaultValue?: number): number | undefined {
    const value = this.get(key);
    if (value === undefined) {
      return defaultValue;
    }
    const num = Number(value);
    return Number.isFinite(num) ? num : defaultValue;
  }

  /**
   * Set an environment variable (for testing)
   */
  set(key: string, value: string): void {
    this.source[key] = value;
    this.cache.set(key, value);
  }

  clearCache(): void {
    this.cache.clear();
  }
}

export { EnvironmentManager };

// Process-wide instance backed by process.env
const env = new EnvironmentManager();
export default env;
