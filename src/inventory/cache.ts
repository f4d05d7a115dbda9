/**
 * Inventory cache store
 * One JSON inventory document per file; freshness comes from the file's mtime.
 */

import type { Stats } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { CacheWriteError, DecodeError, PermissionError, errnoCode, toError } from '../errors/index.js';
import { META_KEY, type HostVars, type InventoryDocument } from './types.js';

const HostVarsSchema = z
  .object({
    ansible_host: z.string().nullable(),
  })
  .passthrough();

const GroupMembersSchema = z.array(z.string());

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface InventoryCacheOptions {
  /** Clock in epoch milliseconds */
  now?: () => number;
}

export class InventoryCacheStore {
  private readonly now: () => number;

  constructor(options: InventoryCacheOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Read and decode the cached inventory
   */
  async read(cachePath: string): Promise<InventoryDocument> {
    let content: string;
    try {
      content = await fs.readFile(cachePath, 'utf-8');
    } catch (error) {
      throw new DecodeError(`Cannot read inventory cache ${cachePath}`, { path: cachePath }, toError(error));
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new DecodeError(`Inventory cache ${cachePath} is not valid JSON`, { path: cachePath }, toError(error));
    }

    return this.decode(raw, cachePath);
  }

  /**
   * Replace the cache file with the given document, creating parent directories first
   */
  async write(cachePath: string, document: InventoryDocument): Promise<void> {
    await this.ensureDirectory(path.dirname(cachePath));

    try {
      await fs.writeFile(cachePath, JSON.stringify(document), 'utf-8');
    } catch (error) {
      throw new CacheWriteError(`Failed to write inventory cache ${cachePath}`, { path: cachePath }, toError(error));
    }
  }

  /**
   * True iff the path is an existing file younger than `ttl` seconds
   */
  async isFresh(cachePath: string, ttl: number): Promise<boolean> {
    let stats: Stats;
    try {
      stats = await fs.stat(cachePath);
    } catch {
      return false;
    }

    if (!stats.isFile()) {
      return false;
    }

    return this.now() - stats.mtimeMs < ttl * 1000;
  }

  /**
   * Create a directory and its parents.
   * An already existing directory is fine; a refused creation is a PermissionError.
   */
  async ensureDirectory(dir: string): Promise<void> {
    try {
      await fs.mkdir(dir, { recursive: true });
    } catch (error) {
      const code = errnoCode(error);
      if (code === 'EEXIST') {
        return;
      }
      if (code === 'EACCES' || code === 'EPERM') {
        throw new PermissionError(`Permission denied creating cache directory ${dir}`, { path: dir }, toError(error));
      }
      throw error;
    }
  }

  /**
   * Schemas check single values only; keys are copied with Object.entries so that
   * names such as `__proto__` survive the round trip.
   */
  private decode(raw: unknown, cachePath: string): InventoryDocument {
    const notInventory = (): DecodeError =>
      new DecodeError(`Inventory cache ${cachePath} is not an inventory document`, { path: cachePath });

    if (!isPlainObject(raw)) {
      throw notInventory();
    }

    let meta: unknown;
    const groups = new Map<string, string[]>();
    for (const [group, value] of Object.entries(raw)) {
      if (group === META_KEY) {
        meta = value;
        continue;
      }
      const members = GroupMembersSchema.safeParse(value);
      if (!members.success) {
        throw new DecodeError(`Inventory cache ${cachePath} has a malformed group`, { path: cachePath, group });
      }
      groups.set(group, members.data);
    }

    if (!isPlainObject(meta) || !isPlainObject(meta['hostvars'])) {
      throw notInventory();
    }

    const hostvars = new Map<string, HostVars>();
    for (const [host, value] of Object.entries(meta['hostvars'])) {
      const vars = HostVarsSchema.safeParse(value);
      if (!vars.success) {
        throw notInventory();
      }
      hostvars.set(host, vars.data);
    }

    return {
      _meta: { hostvars: Object.fromEntries(hostvars) },
      ...Object.fromEntries(groups),
    };
  }
}
