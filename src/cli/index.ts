/**
 * Command-line interface
 *
 * Follows the Ansible dynamic inventory contract: `--list` prints the whole inventory as JSON,
 * `--host <name>` prints host variables (always `{}` here, hostvars live in `_meta`).
 */

import { Command, CommanderError } from 'commander';
import { getConfig, type Config } from '../config/index.js';
import { ConfigurationError, toError } from '../errors/index.js';
import { InventoryBuilder, InventoryCacheStore, InventoryOrchestrator, type InventoryDocument } from '../inventory/index.js';
import { getLogger, type Logger } from '../logger/index.js';
import { XenApiClient } from '../xen/client.js';
import { withSession } from '../xen/session.js';
import type { XenSessionClient } from '../xen/types.js';
import { promptPassword } from './prompt.js';

export const VERSION = '0.1.0';

export type CliOptions = {
  hostname?: string;
  username?: string;
  password?: string;
  guest?: string;
  host?: string;
  reloadCache?: boolean;
  list?: boolean;
};

export interface CliDependencies {
  loadConfig: () => Config;
  createClient: (host: string) => XenSessionClient;
  createLogger: (config: Config['logging']) => Logger;
  promptPassword: () => Promise<string>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const defaultDependencies: CliDependencies = {
  loadConfig: () => getConfig(),
  createClient: (host) => new XenApiClient(host),
  createLogger: (config) => getLogger(config),
  promptPassword: () => promptPassword(),
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

export function buildProgram(deps: Pick<CliDependencies, 'stdout' | 'stderr'>): Command {
  return new Command()
    .name('xen-inventory')
    .description('Ansible XEN inventory.')
    .version(VERSION)
    .option('-s, --hostname <hostname>', 'Xen Server FQDN')
    .option('-u, --username <username>', 'Xen Server username')
    .option('-p, --password <password>', 'Xen Server password')
    .option('-g, --guest <name>', 'Print a single guest')
    .option('-x, --host <name>', 'Print a single host')
    .option('-r, --reload-cache', 'Reload cache')
    .option('-l, --list', 'List all VMs')
    .addHelpText(
      'after',
      '\nExample:\n  xen-inventory -l\n  xen-inventory -s <xen.server.hostname> -u <xen_username> -p <xen_password> -l\n'
    )
    .exitOverride()
    .configureOutput({
      writeOut: deps.stdout,
      writeErr: deps.stderr,
    });
}

/**
 * Run the CLI and resolve with the process exit code
 */
export async function runCli(argv: string[], overrides: Partial<CliDependencies> = {}): Promise<number> {
  const deps: CliDependencies = { ...defaultDependencies, ...overrides };
  const program = buildProgram(deps);

  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const options = program.opts<CliOptions>();

  // Single host/guest lookup is part of the inventory contract but hostvars are served via _meta
  if (options.host || options.guest) {
    deps.stdout('{}\n');
    return 0;
  }

  if (!options.list && !options.reloadCache) {
    deps.stderr(program.helpInformation());
    return 0;
  }

  try {
    const document = await listInventory(options, deps);
    deps.stdout(`${JSON.stringify(document)}\n`);
    return 0;
  } catch (error) {
    deps.stderr(`${describeError(error)}\n`);
    return 1;
  }
}

async function listInventory(options: CliOptions, deps: CliDependencies): Promise<InventoryDocument> {
  const config = deps.loadConfig();
  const logger = deps.createLogger(config.logging);

  const hostname = options.hostname || config.xen.host;
  const username = options.username || config.xen.username;
  const configuredPassword = options.password || config.xen.password;

  const source = async (): Promise<InventoryDocument> => {
    if (!hostname) {
      throw new ConfigurationError('XenServer hostname is not configured (xen_host or --hostname)');
    }
    const password = configuredPassword || (await deps.promptPassword());
    const client = deps.createClient(hostname);
    const builder = new InventoryBuilder(client, logger.child({ component: 'builder' }));

    return withSession(client, { username, password }, (session) => builder.build(session), logger);
  };

  const orchestrator = new InventoryOrchestrator(
    { cachePath: config.cache.path, cacheTTL: config.cache.ttl },
    source,
    new InventoryCacheStore(),
    logger.child({ component: 'orchestrator' })
  );

  return orchestrator.getInventory({ refresh: options.reloadCache === true });
}

/**
 * One-line diagnostic for stderr
 */
export function describeError(error: unknown): string {
  if (error instanceof ConfigurationError) {
    return `Configuration error: ${error.message}`;
  }
  return `[Error] : ${toError(error).message}`;
}
