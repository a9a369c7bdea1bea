#!/usr/bin/env node
/**
 * CLI command to build the substance dataset from local files.
 *
 * Steps:
 * - Read raw rows (a JSON array, or a settings JSON holding the array)
 * - Load records (construction, dedupe, slug checks)
 * - Enrich with UNII info from a local records file (optional)
 * - Sort, write the JSON export
 * - Diff against a previous export (optional)
 *
 * Usage:
 *   npx tsx src/cli/build-dataset.ts --input data/settings.json [options]
 *   npm run build-dataset -- --input data/settings.json
 *
 * Options:
 *   --input <path>          Raw rows JSON or settings JSON (required)
 *   --settings-path <path>  Dotted path of the rows inside a settings JSON (default: dodProhibited)
 *   --config <path>         Normalization config JSON (default: built-in defaults)
 *   --previous <path>       Previous export to diff against
 *   --unii <path>           Tab-separated UNII records file
 *   --output <path>         Export file (default: $OUTPUT_DIR/substances.json)
 *   --sort <key>            name | added | updated (default: name)
 *   --strict                Fail on skipped rows and slug collisions
 *   --json                  Output the report as JSON (for CI parsing)
 *   -h, --help              Show help
 *
 * Exit codes:
 *   0 - Export written
 *   1 - Load failed or input could not be read
 */

import { existsSync, readFileSync } from "node:fs";
import { basename, dirname, join, resolve } from "node:path";
import { parseArgs } from "node:util";

import {
  config,
  validateConfig,
  loadNormalizationConfig,
  NormalizationConfigError,
  type NormalizationConfig,
} from "../config/index.js";
import { createLogger, initRunId, isLogLevel, type Logger } from "../logging/index.js";
import {
  diffCollections,
  formatDiffSummary,
  formatLoadReport,
  isSortKey,
  loadSubstances,
  sortRecords,
  SubstanceCollection,
  type CollectionDiff,
  type SortKey,
  type SubstanceLoadResult,
} from "../substances/index.js";
import {
  createUniiTableLookup,
  enrichCollection,
  findSharedUniiCodes,
  memoizeLookup,
  parseUniiRecords,
  type EnrichmentSummary,
  type SharedUniiCode,
} from "../enrichment/index.js";
import { extractRowsFromSettings, DEFAULT_SETTINGS_PATH } from "../sources/index.js";
import {
  loadExport,
  recordsFromExport,
  saveExport,
  DEFAULT_EXPORT_FILENAME,
} from "../export/index.js";

// ============================================================
// Types
// ============================================================

export interface BuildOptions {
  input: string;
  settingsPath: string;
  output: string;
  sort: SortKey;
  strict: boolean;
  configPath?: string;
  previous?: string;
  unii?: string;
}

export interface BuildResult {
  success: boolean;
  outputPath?: string;
  load: SubstanceLoadResult;
  enrichment?: EnrichmentSummary;
  sharedUniiCodes: SharedUniiCode[];
  diff?: CollectionDiff;
}

/**
 * Input file missing or unreadable.
 */
export class BuildInputError extends Error {
  public readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = "BuildInputError";
    this.path = path;
  }
}

// ============================================================
// Argument parsing
// ============================================================

const HELP = `
Usage: build-dataset --input <path> [options]

Options:
  --input <path>          Raw rows JSON or settings JSON (required)
  --settings-path <path>  Dotted path of the rows inside a settings JSON (default: ${DEFAULT_SETTINGS_PATH})
  --config <path>         Normalization config JSON (default: built-in defaults)
  --previous <path>       Previous export to diff against
  --unii <path>           Tab-separated UNII records file
  --output <path>         Export file (default: $OUTPUT_DIR/${DEFAULT_EXPORT_FILENAME})
  --sort <key>            name | added | updated (default: name)
  --strict                Fail on skipped rows and slug collisions
  --json                  Output the report as JSON (for CI parsing)
  -h, --help              Show this help message
`;

export interface CliArgs {
  options?: BuildOptions;
  json: boolean;
  help: boolean;
  error?: string;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      input: { type: "string" },
      "settings-path": { type: "string", default: DEFAULT_SETTINGS_PATH },
      config: { type: "string" },
      previous: { type: "string" },
      unii: { type: "string" },
      output: { type: "string", default: join(config.outputDir, DEFAULT_EXPORT_FILENAME) },
      sort: { type: "string", default: "name" },
      strict: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const json = values.json ?? false;
  const help = values.help ?? false;
  if (help) {
    return { json, help };
  }

  if (values.input === undefined) {
    return { json, help, error: "--input is required" };
  }

  const sort = values.sort ?? "name";
  if (!isSortKey(sort)) {
    return { json, help, error: `--sort must be name, added or updated (got "${sort}")` };
  }

  return {
    json,
    help,
    options: {
      input: values.input,
      settingsPath: values["settings-path"] ?? DEFAULT_SETTINGS_PATH,
      output: values.output ?? join(config.outputDir, DEFAULT_EXPORT_FILENAME),
      sort,
      strict: values.strict ?? false,
      configPath: values.config,
      previous: values.previous,
      unii: values.unii,
    },
  };
}

// ============================================================
// Build
// ============================================================

function readText(filePath: string): string {
  const absolute = resolve(filePath);
  if (!existsSync(absolute)) {
    throw new BuildInputError(`File not found: ${absolute}`, absolute);
  }
  return readFileSync(absolute, "utf-8");
}

function readJson(filePath: string): unknown {
  const text = readText(filePath);
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new BuildInputError(
      `Invalid JSON in ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      filePath
    );
  }
}

/**
 * Raw rows from an input file: the file is either the row array itself or
 * a settings object holding it at `settingsPath`.
 */
export function readRows(filePath: string, settingsPath: string): unknown[] {
  const data = readJson(filePath);
  return Array.isArray(data) ? data : extractRowsFromSettings(data, settingsPath);
}

/**
 * Run the whole build. Writes the export only when the load succeeds.
 *
 * @throws BuildInputError when an input file is missing or malformed
 * @throws NormalizationConfigError when --config is invalid
 */
export function runBuild(options: BuildOptions, logger: Logger): BuildResult {
  const normalization: Readonly<NormalizationConfig> = loadNormalizationConfig(
    options.configPath === undefined ? {} : readJson(options.configPath)
  );

  const rows = readRows(options.input, options.settingsPath);
  logger.info("Read raw rows", { input: options.input, rows: rows.length });

  const load = loadSubstances(rows, normalization, {
    collisionMode: options.strict ? "strict" : normalization.collisionMode,
    logger: logger.child({ stage: "load" }),
  });
  if (!load.success) {
    logger.error("Load failed", { errors: load.errors.length });
    return { success: false, load, sharedUniiCodes: [] };
  }

  let enrichment: EnrichmentSummary | undefined;
  if (options.unii !== undefined) {
    const lookup = memoizeLookup(createUniiTableLookup(parseUniiRecords(readText(options.unii))));
    enrichment = enrichCollection(load.records, lookup, {
      logger: logger.child({ stage: "enrich" }),
    });
  }
  const sharedUniiCodes = findSharedUniiCodes(load.records);
  for (const shared of sharedUniiCodes) {
    logger.warn("UNII code shared by several substances", { ...shared });
  }

  const collection = SubstanceCollection.create(sortRecords(load.records, options.sort));

  let diff: CollectionDiff | undefined;
  if (options.previous !== undefined) {
    const previous = recordsFromExport(loadExport(options.previous), normalization);
    diff = diffCollections(previous, collection, { ignoreFields: normalization.diffIgnoreFields });
    logger.info("Diffed against previous export", {
      added: diff.added.length,
      removed: diff.removed.length,
      changed: diff.changed.length,
    });
  }

  const outputPath = saveExport(collection, dirname(options.output), basename(options.output));
  logger.info("Export written", { outputPath, substances: collection.size });

  return { success: true, outputPath, load, enrichment, sharedUniiCodes, diff };
}

/**
 * JSON report for CI: counts and slugs, not full records.
 */
export function summarizeBuild(result: BuildResult): Record<string, unknown> {
  return {
    success: result.success,
    outputPath: result.outputPath ?? null,
    stats: result.load.stats,
    errors: result.load.errors,
    warnings: result.load.warnings,
    enrichment:
      result.enrichment === undefined
        ? null
        : {
            matched: result.enrichment.matched,
            noCandidates: result.enrichment.noCandidates,
            failed: result.enrichment.failed,
          },
    sharedUniiCodes: result.sharedUniiCodes,
    diff:
      result.diff === undefined
        ? null
        : {
            added: result.diff.added.map((record) => record.slug),
            removed: result.diff.removed.map((record) => record.slug),
            changed: result.diff.changed.map(({ slug, fields }) => ({ slug, fields })),
          },
  };
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.help) {
    console.log(HELP);
    process.exit(0);
  }
  if (args.options === undefined) {
    console.error(`Error: ${args.error ?? "invalid arguments"}`);
    console.error(HELP);
    process.exit(1);
  }

  validateConfig();
  const runId = initRunId();
  const logger = createLogger({
    level: config.debug ? "debug" : isLogLevel(config.logLevel) ? config.logLevel : "info",
    logDir: config.logDir,
    logFile: `${config.appName}.log`,
    console: !args.json,
  });
  logger.info("Build starting", { runId, input: args.options.input });

  let result: BuildResult;
  try {
    result = runBuild(args.options, logger);
  } catch (err) {
    if (err instanceof NormalizationConfigError) {
      console.error(err.format());
      process.exit(1);
    }
    throw err;
  }

  if (args.json) {
    console.log(JSON.stringify(summarizeBuild(result), null, 2));
  } else {
    console.log(formatLoadReport(result.load));
    if (result.diff !== undefined) {
      console.log("");
      console.log(formatDiffSummary(result.diff));
    }
    if (result.outputPath !== undefined) {
      console.log(`\nExport written to ${result.outputPath}`);
    }
  }

  process.exit(result.success ? 0 : 1);
}

// Only run when executed directly (not imported by tests)
const isDirectExecution =
  process.argv[1] !== undefined &&
  (process.argv[1].endsWith("build-dataset.ts") || process.argv[1].endsWith("build-dataset.js"));

if (isDirectExecution) {
  main().catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    process.exit(1);
  });
}
