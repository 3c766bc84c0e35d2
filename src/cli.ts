#!/usr/bin/env node

import { parseArgs } from 'node:util';
import type { ParseArgsConfig } from 'node:util';
import { resolve } from 'node:path';
import { existsSync, writeFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { runAdvisor } from './index.js';
import { ConnectionError, errorMessage } from './core/errors.js';
import { connectPostgres } from './core/catalog/pgConnection.js';
import { loadAdvisorConfig, resolveThresholds } from './core/config/parse.js';
import { DEFAULT_SCHEMAS, categoriesSchema } from './core/config/schema.js';
import { toJson } from './core/report/toJson.js';
import { toText } from './core/report/toText.js';
import { toSqlScript } from './core/report/toSql.js';
import type { PgConnectionOptions } from './core/catalog/pgConnection.js';
import type { AdvisorConnection } from './core/catalog/types.js';
import type { AdvisorConfig, ThresholdOverrides } from './core/config/schema.js';
import type { AdvisorReport, FindingCategory, OutputFormat, Thresholds } from './core/report/reportTypes.js';

/** Exit codes. */
const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_CLI_ERROR = 2;
const EXIT_CONNECTION_ERROR = 3;
const EXIT_PERMISSION_ERROR = 4;

const CLI_OPTIONS = {
  'database-url': { type: 'string' },
  schemas: { type: 'string' },
  config: { type: 'string' },
  'dry-run': { type: 'boolean', default: false },
  apply: { type: 'boolean', default: false },
  category: { type: 'string', multiple: true },
  'min-unused-size': { type: 'string' },
  'large-size': { type: 'string' },
  'rarely-used-max-scans': { type: 'string' },
  format: { type: 'string', default: 'text' },
  out: { type: 'string' },
  'no-timestamp': { type: 'boolean', default: false },
  pretty: { type: 'boolean', default: false },
  verbose: { type: 'boolean', default: false },
  help: { type: 'boolean', default: false },
} as const satisfies ParseArgsConfig['options'];

/** Opens the connection for a run; swapped out in tests. */
export type Connector = (options: PgConnectionOptions) => Promise<AdvisorConnection>;

function printUsage(): void {
  process.stdout.write(
    `Usage: pg-index-advisor [options]

Options:
  --database-url <url>          PostgreSQL connection string (default: $DATABASE_URL)
  --schemas <a,b>               Comma-separated schemas to analyze (default: public)
  --config <path>               Path to advisor config file (JSON)
  --dry-run                     Report only, execute nothing (default)
  --apply                       Execute corrective statements, each in its own transaction
  --category <name>             With --apply, only apply this category (repeatable):
                                unused_index | missing_fk_index | redundant_index | large_rarely_used
  --min-unused-size <bytes>     Smallest never-scanned index to flag (default: 1048576)
  --large-size <bytes>          Smallest rarely-used index to flag (default: 10485760)
  --rarely-used-max-scans <n>   Scan count below which an index is rarely used (default: 100)
  --format <fmt>                Output format: text | json | sql (default: text)
  --out <path>                  Write output to file instead of stdout
  --no-timestamp                Omit timestamp from output
  --pretty                      Pretty-print JSON output
  --verbose                     Log run phases to stderr
  --help                        Show this help message
`,
  );
}

function parseCliArgs(argv: string[] | undefined) {
  return parseArgs({ args: argv, options: CLI_OPTIONS, strict: true });
}

export async function main(argv?: string[], connect: Connector = connectPostgres): Promise<number> {
  let args: ReturnType<typeof parseCliArgs>;

  try {
    args = parseCliArgs(argv);
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : 'Invalid arguments';
    process.stderr.write(`Error: ${detail}. Use --help for usage.\n`);
    return EXIT_CLI_ERROR;
  }

  if (args.values.help) {
    printUsage();
    return EXIT_OK;
  }

  if (args.values.apply && args.values['dry-run']) {
    process.stderr.write('Error: --dry-run and --apply cannot be used together.\n');
    return EXIT_CLI_ERROR;
  }
  const dryRun = !args.values.apply;

  let categories: readonly FindingCategory[] | undefined;
  const categoryArg = args.values.category;
  if (categoryArg !== undefined) {
    if (dryRun) {
      process.stderr.write('Error: --category only applies together with --apply.\n');
      return EXIT_CLI_ERROR;
    }
    const parsed = categoriesSchema.safeParse(categoryArg);
    if (!parsed.success) {
      process.stderr.write(
        `Error: Invalid --category "${categoryArg.join(', ')}". Must be one of unused_index, missing_fk_index, redundant_index, large_rarely_used.\n`,
      );
      return EXIT_CLI_ERROR;
    }
    categories = parsed.data;
  }

  // Validate format
  const format = args.values.format;
  if (format !== 'json' && format !== 'text' && format !== 'sql') {
    process.stderr.write(
      `Error: Invalid format "${format}". Must be "text", "json" or "sql".\n`,
    );
    return EXIT_CLI_ERROR;
  }
  const outputFormat: OutputFormat = format;

  // Load config file if provided
  let config: AdvisorConfig = {};
  const configArg = args.values.config;
  if (configArg !== undefined) {
    const configPath = resolve(configArg);
    if (!existsSync(configPath)) {
      process.stderr.write(`Error: Config file not found: ${configPath}\n`);
      return EXIT_CLI_ERROR;
    }
    try {
      config = loadAdvisorConfig(configPath);
    } catch (error: unknown) {
      process.stderr.write(`Error: Invalid config file ${configPath}. ${errorMessage(error)}\n`);
      return EXIT_CLI_ERROR;
    }
  }

  const connectionString = args.values['database-url'] ?? process.env['DATABASE_URL'];
  if (connectionString === undefined || connectionString === '') {
    process.stderr.write('Error: No database given. Pass --database-url or set DATABASE_URL.\n');
    return EXIT_CLI_ERROR;
  }

  const schemaArg = args.values.schemas;
  const schemas = schemaArg !== undefined
    ? schemaArg.split(',').map((s) => s.trim()).filter((s) => s !== '')
    : (config.schemas ?? DEFAULT_SCHEMAS);
  if (schemas.length === 0) {
    process.stderr.write('Error: --schemas must name at least one schema.\n');
    return EXIT_CLI_ERROR;
  }

  let thresholds: Thresholds;
  try {
    thresholds = resolveThresholds(config.thresholds, thresholdFlags(args.values));
  } catch (error: unknown) {
    process.stderr.write(`Error: Invalid threshold. ${errorMessage(error)}\n`);
    return EXIT_CLI_ERROR;
  }

  const verbose = args.values.verbose;
  let report: AdvisorReport;
  try {
    report = await runAdvisor(
      () => connect({ connectionString, readOnly: dryRun }),
      {
        schemas,
        dryRun,
        thresholds,
        suppress: config.suppress,
        categories,
        noTimestamp: args.values['no-timestamp'],
        onPhase: verbose ? (phase) => process.stderr.write(`[advisor] ${phase}\n`) : undefined,
      },
    );
  } catch (error: unknown) {
    if (error instanceof ConnectionError) {
      process.stderr.write(`Error: ${error.message}\n`);
      if (error.hint !== undefined) {
        process.stderr.write(`Hint: ${error.hint}\n`);
      }
      return EXIT_CONNECTION_ERROR;
    }
    process.stderr.write(`Error: Advisor run failed. ${errorMessage(error)}\n`);
    return EXIT_FAILURE;
  }

  // Format output
  const output =
    outputFormat === 'json'
      ? toJson(report, args.values.pretty)
      : outputFormat === 'sql'
        ? toSqlScript(report)
        : toText(report);

  // Write output
  const outPath = args.values.out;
  if (outPath !== undefined) {
    writeFileSync(resolve(outPath), output, 'utf-8');
  } else {
    process.stdout.write(output);
    process.stdout.write('\n');
  }

  if (report.deniedSchemas.length > 0) {
    for (const denied of report.deniedSchemas) {
      process.stderr.write(`Error: ${denied.message}\n`);
      process.stderr.write(`Hint: ${denied.hint}\n`);
    }
    return EXIT_PERMISSION_ERROR;
  }

  return EXIT_OK;
}

const WHOLE_NUMBER = /^\d+$/;

/** Threshold flags as overrides. Only plain decimal digits are accepted. */
function thresholdFlags(values: ReturnType<typeof parseCliArgs>['values']): ThresholdOverrides {
  const overrides: { -readonly [K in keyof ThresholdOverrides]: ThresholdOverrides[K] } = {};
  const minUnused = values['min-unused-size'];
  if (minUnused !== undefined) {
    overrides.minUnusedSizeBytes = wholeNumber('--min-unused-size', minUnused);
  }
  const large = values['large-size'];
  if (large !== undefined) {
    overrides.largeSizeBytes = wholeNumber('--large-size', large);
  }
  const maxScans = values['rarely-used-max-scans'];
  if (maxScans !== undefined) {
    overrides.rarelyUsedMaxScans = wholeNumber('--rarely-used-max-scans', maxScans);
  }
  return overrides;
}

function wholeNumber(flag: string, value: string): number {
  if (!WHOLE_NUMBER.test(value)) {
    throw new Error(`${flag} must be a whole number, got "${value}".`);
  }
  return Number(value);
}

if (process.argv[1] !== undefined && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      process.stderr.write(`Error: ${errorMessage(error)}\n`);
      process.exitCode = EXIT_FAILURE;
    });
}
