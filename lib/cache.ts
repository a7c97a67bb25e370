import * as fs from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';

export interface CacheOptions {
  dir: string;
  maxAgeMs?: number;
}

const DEFAULT_MAX_AGE_MS = 24 * 60 * 60 * 1000;

function ensureCacheDir(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * `${prefix}_${md5(JSON.stringify(args))}`
 */
export function generateCacheKey(prefix: string, ...args: unknown[]): string {
  const hash = crypto.createHash('md5').update(JSON.stringify(args)).digest('hex');
  return `${prefix}_${hash}`;
}

/**
 * Read failures are logged and count as a miss.
 */
export function getCache<T>(key: string, options: CacheOptions): T | null {
  const filePath = path.join(options.dir, `${key}.json`);
  const maxAgeMs = options.maxAgeMs ?? DEFAULT_MAX_AGE_MS;

  try {
    if (fs.existsSync(filePath)) {
      const stats = fs.statSync(filePath);
      const age = Date.now() - stats.mtimeMs;

      if (age < maxAgeMs) {
        const data = fs.readFileSync(filePath, 'utf-8');
        console.log(`Cache HIT for ${key}`);
        return JSON.parse(data) as T;
      }
      console.log(`Cache EXPIRED for ${key} (age: ${Math.round(age / 1000 / 60)} min)`);
    }
  } catch (error) {
    console.warn(`Cache read error for ${key}:`, error);
  }

  return null;
}

export function setCache<T>(key: string, data: T, options: CacheOptions): void {
  try {
    ensureCacheDir(options.dir);
    fs.writeFileSync(path.join(options.dir, `${key}.json`), JSON.stringify(data, null, 2));
    console.log(`Cache SET for ${key}`);
  } catch (error) {
    console.warn(`Cache write error for ${key}:`, error);
  }
}

// Removes every entry, or only those whose key starts with prefix
export function clearCache(options: CacheOptions, prefix?: string): void {
  if (!fs.existsSync(options.dir)) return;

  try {
    for (const file of fs.readdirSync(options.dir)) {
      if (!prefix || file.startsWith(prefix)) {
        fs.unlinkSync(path.join(options.dir, file));
      }
    }
    console.log(`Cache cleared${prefix ? ` for prefix: ${prefix}` : ''}`);
  } catch (error) {
    console.warn('Cache clear error:', error);
  }
}
