import { tmpdir } from 'os';
import { join } from 'path';
import type { Config } from './schema.js';

export const DEFAULT_INI_FILENAME = 'xen-inventory.ini';

export const DEFAULT_CACHE_PATH = join(tmpdir(), 'ansible-xen-inventory-cache.tmp');

/**
 * Default configuration values.
 * There is no cache TTL here; it has to come from the INI file or the environment.
 */
export const defaultConfig: Omit<Config, 'cache'> & { cache: { path: string } } = {
  cache: {
    path: DEFAULT_CACHE_PATH,
  },
  xen: {
    host: '',
    username: '',
    password: '',
  },
  logging: {
    level: 'warn',
    format: 'simple',
    file: undefined,
    silent: false,
  },
};
