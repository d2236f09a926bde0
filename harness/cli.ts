#!/usr/bin/env node
/**
 * Table Carpenter CLI
 *
 * Usage:
 *   table-carpenter render <name> --tables <file> [options]
 *
 * Options:
 *   --tables, -t <file>     Module registering tables (default: tables.js)
 *   --format, -f <format>   html | csv | xlsx (default: html)
 *   --out, -o <file>        Write to a file instead of stdout (required for xlsx)
 *   --template <name>       HTML template name
 *   --query, -q key=value   Request query parameter (repeatable), e.g. sort=name
 *   --verbose, -v           Log table builds
 *   --help, -h              Show help message
 */

import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { Carpenter } from '../core/carpenter/Carpenter.js';
import { createConsoleLogger } from '../core/logging/Logger.js';
import { withQuery } from '../core/support/url.js';
import { parseArgs } from './args.js';
import type { CLIArgs } from './args.js';

const HELP_TEXT = `
Table Carpenter

Usage:
  table-carpenter render <name> --tables <file> [options]

Options:
  --tables, -t <file>     Module registering tables (default: tables.js)
  --format, -f <format>   html | csv | xlsx (default: html)
  --out, -o <file>        Write to a file instead of stdout (required for xlsx)
  --template <name>       HTML template name
  --query, -q key=value   Request query parameter (repeatable)
  --verbose, -v           Log table builds
  --help, -h              Show this help
`;

export interface CLIOutput {
  stdout(text: string): void;
  stderr(text: string): void;
}

const processOutput: CLIOutput = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

async function render(args: CLIArgs, output: CLIOutput): Promise<void> {
  const logger = createConsoleLogger({ verbose: args.verbose });
  const carpenter = new Carpenter(
    {
      tables: args.tables !== undefined ? { location: args.tables } : undefined,
      view: args.format === 'csv' ? { driver: 'csv' } : undefined,
    },
    { logger }
  );

  await carpenter.loadTables();

  const table = carpenter.get(args.tableName ?? '');
  table.setRequest({ url: withQuery('/', args.query), query: args.query });

  if (args.format === 'xlsx') {
    const workbook = await table.toSpreadsheet();
    await writeFile(resolve(args.out ?? 'table.xlsx'), workbook);
    logger.info(`Wrote ${args.out}`);
    return;
  }

  const rendered = table.render(args.template);
  if (args.out !== undefined) {
    await writeFile(resolve(args.out), rendered, 'utf8');
    logger.info(`Wrote ${args.out}`);
  } else {
    output.stdout(rendered.endsWith('\n') ? rendered : `${rendered}\n`);
  }
}

/**
 * Run the CLI and return the exit code
 */
export async function main(argv: string[], output: CLIOutput = processOutput): Promise<number> {
  const args = parseArgs(argv);

  if (args.help) {
    output.stdout(HELP_TEXT);
    return 0;
  }
  if (args.errors.length > 0) {
    for (const error of args.errors) {
      output.stderr(`${error}\n`);
    }
    output.stderr('Run with --help for usage.\n');
    return 1;
  }

  try {
    await render(args, output);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    output.stderr(`${message}\n`);
    return 1;
  }
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}
