/**
 * On-disk cache of harvested configs: one Lua file per repository plus a
 * JSON sidecar with its metadata
 */

import { existsSync, readFileSync, writeFileSync, readdirSync, statSync, mkdirSync, renameSync } from 'fs';
import { join, dirname } from 'path';
import { createHash } from 'crypto';
import { CachedConfig, ConfigSidecar, RepositoryRef } from './types.js';
import { validateSidecar } from './validation.js';
import { Logger, defaultLogger } from './logger.js';
import { errorMessage } from './error-handler.js';

/**
 * Write through a temp file and rename so readers never see a partial file
 */
export function writeFileAtomic(filePath: string, content: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.tmp-${process.pid}`;
  writeFileSync(tempPath, content, 'utf-8');
  renameSync(tempPath, filePath);
}

export function hashContent(content: string): string {
  return createHash('sha256').update(content, 'utf-8').digest('hex');
}

/**
 * "owner/name" -> "owner__name"
 */
export function identityToStem(id: string): string {
  return id.replace('/', '__');
}

/**
 * "owner__name" -> "owner/name". Owners cannot contain underscores, so the
 * first double underscore is always the separator.
 */
export function stemToIdentity(stem: string): string | null {
  const separator = stem.indexOf('__');
  if (separator <= 0 || separator + 2 >= stem.length) {
    return null;
  }
  return `${stem.slice(0, separator)}/${stem.slice(separator + 2)}`;
}

/**
 * Config cache keyed by repository identity
 */
export class ConfigCache {
  private cacheDir: string;
  private logger: Logger;

  constructor(cacheDir: string, logger: Logger = defaultLogger) {
    this.cacheDir = cacheDir;
    this.logger = logger;
  }

  get directory(): string {
    return this.cacheDir;
  }

  private contentPath(id: string): string {
    return join(this.cacheDir, `${identityToStem(id)}.lua`);
  }

  private sidecarPath(id: string): string {
    return join(this.cacheDir, `${identityToStem(id)}.meta.json`);
  }

  /**
   * Check if a config for this identity is cached
   */
  has(id: string): boolean {
    return existsSync(this.contentPath(id));
  }

  /**
   * Store a config. The sidecar lands first and the content rename last, so
   * the presence of the .lua file marks a complete entry.
   */
  write(repo: RepositoryRef, path: string, content: string, fetchedAt: Date = new Date()): CachedConfig {
    const cached: CachedConfig = {
      repo,
      path,
      content,
      fetchedAt: fetchedAt.toISOString(),
      contentHash: hashContent(content)
    };

    const sidecar: ConfigSidecar = {
      repo: repo.id,
      url: repo.url,
      stars: repo.stars,
      defaultBranch: repo.defaultBranch,
      pushedAt: repo.pushedAt,
      path,
      strategy: repo.strategy,
      fetchedAt: cached.fetchedAt,
      contentHash: cached.contentHash
    };

    writeFileAtomic(this.sidecarPath(repo.id), JSON.stringify(sidecar, null, 2));
    writeFileAtomic(this.contentPath(repo.id), content);
    return cached;
  }

  /**
   * Identities of every cached config, sorted
   */
  listIdentities(): string[] {
    if (!existsSync(this.cacheDir)) {
      return [];
    }

    const ids: string[] = [];
    for (const file of readdirSync(this.cacheDir)) {
      if (!file.endsWith('.lua')) {
        continue;
      }
      const id = stemToIdentity(file.slice(0, -'.lua'.length));
      if (id) {
        ids.push(id);
      }
    }
    return ids.sort();
  }

  /**
   * Read one cached config. A missing or unreadable sidecar falls back to defaults.
   */
  read(id: string): CachedConfig | null {
    const contentPath = this.contentPath(id);
    if (!existsSync(contentPath)) {
      return null;
    }

    const content = readFileSync(contentPath, 'utf-8');
    const sidecar = this.readSidecar(id);
    const [owner, name] = id.split('/');

    if (!sidecar) {
      return {
        repo: {
          id,
          owner,
          name,
          url: `https://github.com/${id}`,
          stars: 0,
          defaultBranch: 'main',
          pushedAt: null,
          strategy: 'unknown'
        },
        path: 'init.lua',
        content,
        fetchedAt: statSync(contentPath).mtime.toISOString(),
        contentHash: hashContent(content)
      };
    }

    return {
      repo: {
        id,
        owner,
        name,
        url: sidecar.url,
        stars: sidecar.stars,
        defaultBranch: sidecar.defaultBranch,
        pushedAt: sidecar.pushedAt,
        strategy: sidecar.strategy
      },
      path: sidecar.path,
      content,
      fetchedAt: sidecar.fetchedAt,
      contentHash: sidecar.contentHash
    };
  }

  private readSidecar(id: string): ConfigSidecar | null {
    const sidecarPath = this.sidecarPath(id);
    if (!existsSync(sidecarPath)) {
      return null;
    }

    try {
      return validateSidecar(JSON.parse(readFileSync(sidecarPath, 'utf-8')));
    } catch (error) {
      this.logger.warn(`Ignoring unreadable sidecar for ${id}: ${errorMessage(error)}`);
      return null;
    }
  }

  /**
   * Load every cached config, ordered by identity
   */
  loadAll(): CachedConfig[] {
    const configs: CachedConfig[] = [];
    for (const id of this.listIdentities()) {
      const config = this.read(id);
      if (config) {
        configs.push(config);
      }
    }
    return configs;
  }
}

/**
 * Create a config cache instance
 */
export function createConfigCache(cacheDir: string, logger?: Logger): ConfigCache {
  return new ConfigCache(cacheDir, logger);
}
