#!/usr/bin/env tsx

/**
 * Hydra CLI - Main entry point
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { SERVICE_VERSION } from '@hydra/server';
import { initCommand } from './commands/init.js';
import { logsCommand } from './commands/logs.js';
import { serveCommand } from './commands/serve.js';

const program = new Command();

program
  .name('hydra')
  .description('Capture HTTP requests and browse them over the Hydra protocol')
  .version(SERVICE_VERSION);

// hydra init
program
  .command('init')
  .description('Create hydra.config.json in the current directory')
  .option('-f, --force', 'Overwrite an existing config file')
  .action(initCommand);

// hydra serve
program
  .command('serve')
  .description('Run the ingress server')
  .option('-p, --port <port>', 'Port to listen on')
  .option('-H, --host <host>', 'Interface to bind')
  .option('-d, --data-dir <dir>', 'Directory for stored records')
  .action(serveCommand);

// hydra logs
program
  .command('logs')
  .description('Show a page of captured ingress requests')
  .option('-u, --url <url>', 'WebSocket url of the server')
  .option('-n, --limit <n>', 'Logs per page (1-1000)')
  .option('--direction <direction>', 'ascending or descending (default: descending)')
  .option('--before <key>', 'Page before this event id')
  .option('--after <key>', 'Page after this event id')
  .option('--json', 'Print the raw response as JSON')
  .option('-t, --timeout <ms>', 'How long to wait for the connection')
  .action(logsCommand);

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error(chalk.red(`\n❌ Error: ${error instanceof Error ? error.message : String(error)}\n`));
    process.exit(1);
  }
}

void main();
