#!/usr/bin/env node

/**
 * apisift CLI entry point
 */

import { Command } from 'commander';
import { describeError } from './errors.js';
import { renderWelcomeBanner } from './ui/render.js';
import { runCommand, type RunCommandOptions } from './commands/run.js';
import { listCommand, type ListCommandOptions } from './commands/list.js';
import { initCommand, type InitCommandOptions } from './commands/init.js';
import { mcpCommand, type McpCommandOptions } from './commands/mcp.js';

const program = new Command();

program
  .name('apisift')
  .description('Capture proxy that stores API traffic once and skips static assets and duplicates')
  .version('1.0.0')
  .option('--config <path>', 'Path to config file');

function configPathOf(command: Command): string | undefined {
  const value: unknown = command.parent?.opts().config;
  return typeof value === 'string' ? value : undefined;
}

function fail(error: unknown): never {
  console.error('Error:', describeError(error));
  process.exit(1);
}

// Run command (start the capture proxy)
program
  .command('run')
  .description('Start the capture proxy')
  .option('--port <port>', 'Proxy listen port (default: 8080)')
  .option('--db <path>', 'SQLite database for captures (default: ./api_data.db)')
  .option('--caDir <dir>', 'Directory holding the interception CA (default: ./.apisift)')
  .option('--filter <expr>', 'Only capture exchanges matching this filter expression, e.g. "~d api.example.com & !~m OPTIONS"')
  .option('--no-dedup', 'Store every exchange, even exact repeats')
  .option('--no-similarity', 'Disable fuzzy (similar request) deduplication')
  .option('--threshold <value>', 'Similarity threshold between 0 and 1 (default: 0.8)')
  .option('--windowSeconds <seconds>', 'How far back fuzzy deduplication looks (default: 600)')
  .option('--maxConcurrent <count>', 'Exchanges processed at once (default: 8)')
  .option('--storeTimeoutMs <ms>', 'How long a write waits on a locked database (default: 5000)')
  .option('--quiet', 'Suppress non-essential output')
  .option('--verbose', 'Log every pipeline decision')
  .option('--debug', 'Show debug information')
  .option('--json', 'Output events as JSON (disables colors/spinners)')
  .action(async (options: RunCommandOptions, command: Command) => {
    try {
      await runCommand(options, configPathOf(command));
      process.exit(0);
    } catch (error) {
      fail(error);
    }
  });

// List command (read captures back)
program
  .command('list')
  .description('Show recent captures')
  .option('--db <path>', 'SQLite database to read')
  .option('--limit <count>', 'Number of captures to show', '20')
  .option('--after <id>', 'Only captures with an id greater than this, oldest first')
  .option('--id <id>', 'Show a single capture in full')
  .option('--json', 'Output as JSON', false)
  .action(async (options: ListCommandOptions, command: Command) => {
    try {
      await listCommand(options, configPathOf(command));
    } catch (error) {
      fail(error);
    }
  });

// Init command (create config)
program
  .command('init')
  .description('Create a configuration file')
  .option('--format <format>', 'Config file format: json or yaml', 'yaml')
  .option('--force', 'Overwrite existing files', false)
  .action(async (options: InitCommandOptions) => {
    try {
      await initCommand(options);
    } catch (error) {
      fail(error);
    }
  });

// MCP server command
program
  .command('mcp')
  .description('Start a stdio-based MCP server exposing captures to AI assistants')
  .option('--db <path>', 'SQLite database to serve')
  .action(async (options: McpCommandOptions, command: Command) => {
    try {
      await mcpCommand(options, configPathOf(command));
    } catch (error) {
      // stdout carries the MCP JSON-RPC stream
      process.stderr.write(`MCP server error: ${describeError(error)}\n`);
      process.exit(1);
    }
  });

// Show welcome banner if no command provided
if (process.argv.length === 2) {
  console.log(renderWelcomeBanner());
  process.exit(0);
}

await program.parseAsync();
