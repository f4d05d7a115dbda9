/**
 * Inventory orchestrator
 *
 * Decides per call whether the cached inventory can be served or a live fetch is needed.
 * Every live fetch replaces the cache file wholesale.
 *
 * Two concurrent calls against the same cache path may both see a stale cache, both fetch
 * and both write; the last writer wins. There is no lock around the cache file.
 */

import * as path from 'path';
import { ConfigurationError, DecodeError } from '../errors/index.js';
import type { Logger } from '../logger/index.js';
import type { InventoryCacheStore } from './cache.js';
import type { InventoryDocument, InventoryOrigin, InventoryRequest, InventorySource } from './types.js';

export interface OrchestratorSettings {
  cachePath: string;
  /** Seconds */
  cacheTTL: number;
}

export interface InventoryResult {
  document: InventoryDocument;
  origin: InventoryOrigin;
}

export class InventoryOrchestrator {
  private readonly settings: OrchestratorSettings;
  private readonly source: InventorySource;
  private readonly store: InventoryCacheStore;
  private readonly logger?: Logger;

  constructor(
    settings: OrchestratorSettings,
    source: InventorySource,
    store: InventoryCacheStore,
    logger?: Logger
  ) {
    this.settings = settings;
    this.source = source;
    this.store = store;
    this.logger = logger;
  }

  /**
   * Current inventory, from the cache or from a live fetch
   */
  async getInventory(request: InventoryRequest): Promise<InventoryDocument> {
    const { document } = await this.resolve(request);
    return document;
  }

  /**
   * Like getInventory, but also reports where the document came from
   */
  async resolve(request: InventoryRequest): Promise<InventoryResult> {
    const cachePath = this.requireCachePath();

    if (request.refresh) {
      this.logger?.debug('Cache refresh requested', { path: cachePath });
      return { document: await this.fetchAndSave(cachePath), origin: 'live' };
    }

    if (await this.store.isFresh(cachePath, this.settings.cacheTTL)) {
      try {
        const document = await this.store.read(cachePath);
        this.logger?.debug('Serving inventory from cache', { path: cachePath });
        return { document, origin: 'cache' };
      } catch (error) {
        if (!(error instanceof DecodeError)) {
          throw error;
        }
        this.logger?.warn('Inventory cache is unreadable, rebuilding', {
          path: cachePath,
          reason: error.originalError?.message ?? error.message,
        });
      }
    } else {
      this.logger?.debug('Inventory cache is missing or stale', {
        path: cachePath,
        ttl: this.settings.cacheTTL,
      });
    }

    await this.store.ensureDirectory(path.dirname(cachePath));
    return { document: await this.fetchAndSave(cachePath), origin: 'live' };
  }

  private async fetchAndSave(cachePath: string): Promise<InventoryDocument> {
    const started = Date.now();
    const document = await this.source();
    this.logger?.info('Fetched live inventory', { durationMs: Date.now() - started });

    await this.store.write(cachePath, document);
    return document;
  }

  private requireCachePath(): string {
    const cachePath = this.settings.cachePath.trim();
    if (!cachePath) {
      throw new ConfigurationError('cache_path not defined', { cachePath: this.settings.cachePath });
    }
    return cachePath;
  }
}
