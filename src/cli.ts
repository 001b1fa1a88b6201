#!/usr/bin/env node
/**
 * CLI for the entity reconciliation service
 * Usage: entity-recon <command> [options]
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import * as path from 'path';
import { CLICommands, GlobalOptions, SuggestKind } from './cli-commands.js';
import { convert, loadConverterConfig } from './converter.js';
import { getErrorMessage } from './errors.js';
import { QueryProperty } from './types.js';

type OutputFormat = 'json' | 'pretty';

const program = new Command();

// Helper to format output
function formatOutput(data: unknown, format: string = 'pretty'): void {
  if (format === 'json') {
    console.log(JSON.stringify(data, null, 2));
  } else {
    console.log(chalk.cyan(JSON.stringify(data, null, 2)));
  }
}

// Helper to handle errors
function handleError(error: unknown): void {
  console.error(chalk.red('Error:'), getErrorMessage(error));
  process.exit(1);
}

function parseInteger(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError('Not an integer.');
  return n;
}

function parseFormat(value: string): OutputFormat {
  if (value !== 'json' && value !== 'pretty') throw new InvalidArgumentError("Expected 'json' or 'pretty'.");
  return value;
}

function parseKind(value: string): SuggestKind {
  if (value !== 'entity' && value !== 'type' && value !== 'property') {
    throw new InvalidArgumentError("Expected 'entity', 'type' or 'property'.");
  }
  return value;
}

// pid=value; repeatable
function collectProperty(value: string, previous: QueryProperty[] = []): QueryProperty[] {
  const at = value.indexOf('=');
  if (at <= 0) throw new InvalidArgumentError("Expected '<pid>=<value>'.");
  return [...previous, { pid: value.slice(0, at), v: value.slice(at + 1) }];
}

function globals(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

async function run<T>(fn: (cli: CLICommands) => Promise<T>, format: string): Promise<void> {
  const cli = new CLICommands();
  try {
    cli.configure(globals());
    formatOutput(await fn(cli), format);
    await cli.close();
  } catch (error) {
    handleError(error);
  }
}

program
  .name('entity-recon')
  .description('Entity reconciliation over flat-file or SQLite data sources')
  .version('1.0.0')
  .option('-d, --data <location>', 'Flat file (.tsv, .gz) or SQLite database; defaults to RECON_DATA')
  .option('--log-level <level>', 'debug|info|warn|error|silent');

program
  .command('serve')
  .description('Run the reconciliation HTTP API')
  .option('-p, --port <number>', 'Port to listen on', parseInteger)
  .option('-H, --host <host>', 'Interface to bind')
  .option('--public-url <url>', 'Base URL advertised in the manifest')
  .option('--prefix <path>', 'Route prefix of the API')
  .action(async (options: { port?: number; host?: string; publicUrl?: string; prefix?: string }) => {
    const cli = new CLICommands();
    try {
      cli.configure({ ...globals(), ...options });
      const server = await cli.serve();
      const shutdown = () => {
        server.close(() => {
          cli.close().then(() => process.exit(0), handleError);
        });
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    } catch (error) {
      handleError(error);
    }
  });

program
  .command('mcp')
  .description('Run the MCP server on stdio')
  .action(async () => {
    const cli = new CLICommands();
    try {
      cli.configure(globals());
      await cli.mcp();
    } catch (error) {
      handleError(error);
    }
  });

program
  .command('query')
  .description('Reconcile a piece of text')
  .argument('<text>', 'Text to reconcile')
  .option('-t, --type <id>', 'Required type id')
  .option('-l, --limit <number>', 'Result limit', parseInteger)
  .option('-P, --property <pid=value>', 'Property constraint (repeatable)', collectProperty)
  .option('-f, --format <format>', 'Output format (json|pretty)', parseFormat, 'pretty')
  .action(async (text: string, options: { type?: string; limit?: number; property?: QueryProperty[]; format: OutputFormat }) => {
    await run((cli) => cli.query(text, { type: options.type, limit: options.limit, properties: options.property }), options.format);
  });

program
  .command('suggest')
  .description('Autocomplete entities, types or properties')
  .argument('<prefix>', 'Prefix typed so far')
  .option('-k, --kind <kind>', 'entity|type|property', parseKind, 'entity')
  .option('-l, --limit <number>', 'Result limit', parseInteger)
  .option('-f, --format <format>', 'Output format (json|pretty)', parseFormat, 'pretty')
  .action(async (prefix: string, options: { kind: SuggestKind; limit?: number; format: OutputFormat }) => {
    await run((cli) => cli.suggest(options.kind, prefix, options.limit), options.format);
  });

program
  .command('entity')
  .description('Show one entity with its property values')
  .argument('<id>', 'Composite entity id (type:key)')
  .option('-f, --format <format>', 'Output format (json|pretty)', parseFormat, 'pretty')
  .action(async (id: string, options: { format: OutputFormat }) => {
    await run((cli) => cli.entity(id), options.format);
  });

program
  .command('convert')
  .description('Convert CSV/TSV files into a flat file or SQLite database')
  .argument('<config>', 'JSON conversion config')
  .option('-o, --output <file>', "Output file (.txt, .gz or a name containing 'sqlite'); '-' for stdout", '-')
  .option('-n, --dry-run', 'Print the column mapping without writing anything')
  .action(async (configFile: string, options: { output: string; dryRun?: boolean }) => {
    try {
      new CLICommands().configure(globals());
      const config = await loadConverterConfig(configFile);
      const summary = await convert(config, {
        output: options.output,
        dryRun: options.dryRun,
        baseDir: path.dirname(path.resolve(configFile)),
      });
      // stdout carries the data itself when writing there
      if (options.output !== '-' || options.dryRun) formatOutput(summary, 'pretty');
    } catch (error) {
      handleError(error);
    }
  });

program.parseAsync().catch(handleError);
