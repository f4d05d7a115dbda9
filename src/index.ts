#!/usr/bin/env node

/**
 * xen-inventory - Entry Point
 * Ansible dynamic inventory for XenServer hosts
 */

import { runCli } from './cli/index.js';

async function main(): Promise<void> {
  try {
    process.exitCode = await runCli(process.argv.slice(2));
  } catch (error) {
    console.error('Fatal error:', error);
    process.exit(1);
  }
}

void main();
