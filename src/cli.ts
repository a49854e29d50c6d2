#!/usr/bin/env node
import process from "node:process";
import { pathToFileURL } from "node:url";

import { loadPipelineConfig, type PipelineConfig } from "./config/pipeline.js";
import { PARTITIONS, type Partition } from "./datasets/catalog.js";
import type { BulkReport, Selection } from "./datasets/collection.js";
import type { DatasetStatus } from "./datasets/dataset.js";
import { describeError, isFatalConfigurationError } from "./errors.js";
import { StructuredLogger } from "./logger.js";
import { createPipeline, type Pipeline } from "./runtime.js";

export const CLI_COMMANDS = ["status", "prepare", "search"] as const;
export type CliCommand = (typeof CLI_COMMANDS)[number];

/** Exit statuses of {@link runCli}. */
export const EXIT_CODES = { ok: 0, datasetFailures: 1, usage: 2 } as const;

export interface CliOptions {
  command?: CliCommand;
  partition: Partition | "all";
  datasetId?: string;
  engine: string;
  version?: string;
  json: boolean;
  helpRequested: boolean;
  errors: string[];
}

const USAGE = `Usage: xlink-trainer <status|prepare|search> [options]

Options:
  --partition <training|validation|test|all>  Datasets to process (default: all)
  --dataset <id>                               Restrict to one dataset
  --engine <name>                              Search engine (default: kojak)
  --version <v>                                Engine build (default: preferred build)
  --json                                       Print the report as JSON
  -h, --help                                   Show this message`;

function isCommand(value: string): value is CliCommand {
  return CLI_COMMANDS.some((command) => command === value);
}

function isPartitionOption(value: string): value is Partition | "all" {
  return value === "all" || PARTITIONS.some((partition) => partition === value);
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { partition: "all", engine: "kojak", json: false, helpRequested: false, errors: [] };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (token === "--help" || token === "-h") {
      options.helpRequested = true;
      continue;
    }

    const consumeValue = (): string | undefined => {
      index += 1;
      const value = argv[index];
      if (value === undefined || value.startsWith("--")) {
        options.errors.push(`Missing value for ${token}`);
        return undefined;
      }
      return value;
    };

    switch (token) {
      case "--partition": {
        const value = consumeValue();
        if (value === undefined) {
          break;
        }
        if (isPartitionOption(value)) {
          options.partition = value;
        } else {
          options.errors.push(`Unknown partition "${value}"`);
        }
        break;
      }
      case "--dataset": {
        const value = consumeValue();
        if (value) {
          options.datasetId = value;
        }
        break;
      }
      case "--engine": {
        const value = consumeValue();
        if (value) {
          options.engine = value;
        }
        break;
      }
      case "--version": {
        const value = consumeValue();
        if (value) {
          options.version = value;
        }
        break;
      }
      case "--json":
        options.json = true;
        break;
      default:
        if (token.startsWith("-")) {
          options.errors.push(`Unknown option ${token}`);
        } else if (options.command !== undefined) {
          options.errors.push(`Unexpected argument "${token}"`);
        } else if (isCommand(token)) {
          options.command = token;
        } else {
          options.errors.push(`Unknown command "${token}"`);
        }
    }
  }

  if (!options.helpRequested && options.command === undefined && options.errors.length === 0) {
    options.errors.push("Missing command");
  }
  return options;
}

export interface CliIo {
  readonly stdout: (line: string) => void;
  readonly stderr: (line: string) => void;
}

export interface CliDependencies {
  readonly loadConfig?: () => PipelineConfig;
  readonly createLogger?: (config: PipelineConfig) => StructuredLogger;
  readonly createPipeline?: (config: PipelineConfig, logger: StructuredLogger) => Promise<Pipeline>;
}

/** Runs one command and resolves with the process exit status. */
export async function runCli(argv: readonly string[], io: CliIo, deps: CliDependencies = {}): Promise<number> {
  const options = parseCliArgs(argv);
  if (options.helpRequested) {
    io.stdout(USAGE);
    return EXIT_CODES.ok;
  }
  const command = options.command;
  if (options.errors.length > 0 || command === undefined) {
    for (const error of options.errors) {
      io.stderr(error);
    }
    io.stderr("Use --help to display the supported options.");
    return EXIT_CODES.usage;
  }

  let logger: StructuredLogger | undefined;
  try {
    const config = deps.loadConfig ? deps.loadConfig() : loadPipelineConfig();
    logger = deps.createLogger ? deps.createLogger(config) : new StructuredLogger({ logFile: config.logFile });
    const pipeline = deps.createPipeline
      ? await deps.createPipeline(config, logger)
      : await createPipeline({ config, logger });

    const selection: Selection = {
      partition: options.partition,
      ...(options.datasetId !== undefined ? { datasetId: options.datasetId } : {}),
    };
    switch (command) {
      case "status": {
        const statuses = await pipeline.collection.statusAll(selection);
        printLines(io, options.json ? [JSON.stringify(statuses, null, 2)] : statuses.map(formatStatus));
        return EXIT_CODES.ok;
      }
      case "prepare": {
        const report = await pipeline.collection.prepareAll(selection);
        printReport(io, report, options.json);
        return report.unsuccessful > 0 ? EXIT_CODES.datasetFailures : EXIT_CODES.ok;
      }
      case "search": {
        const report = await pipeline.collection.searchAll(
          options.engine,
          options.version !== undefined ? { version: options.version } : {},
          selection,
        );
        printReport(io, report, options.json);
        return report.unsuccessful > 0 ? EXIT_CODES.datasetFailures : EXIT_CODES.ok;
      }
    }
  } catch (error) {
    if (isFatalConfigurationError(error)) {
      logger?.error("run_aborted", { error: error.toJSON() });
      io.stderr(`Configuration error: ${describeError(error)}`);
      return EXIT_CODES.usage;
    }
    throw error;
  } finally {
    await logger?.flush();
  }
}

function printLines(io: CliIo, lines: readonly string[]): void {
  for (const line of lines) {
    io.stdout(line);
  }
}

function printReport(io: CliIo, report: BulkReport, json: boolean): void {
  if (json) {
    io.stdout(JSON.stringify(report, null, 2));
    return;
  }
  for (const outcome of report.outcomes) {
    const columns = [outcome.id, outcome.partition, outcome.status, outcome.stage];
    if (outcome.result) {
      columns.push(outcome.result.analysisPath, outcome.result.scoringInputPath);
    } else if (outcome.error) {
      columns.push(`${outcome.error.code}: ${outcome.error.message}`);
    } else if (outcome.missingRawFiles) {
      columns.push(`missing: ${outcome.missingRawFiles.join(", ")}`);
    }
    io.stdout(columns.join("\t"));
  }
  io.stdout(`${report.outcomes.length} dataset(s), ${report.unsuccessful} unsuccessful`);
}

export function formatStatus(status: DatasetStatus): string {
  const columns: string[] = [status.id, status.partition, status.stage];
  if (status.precursorTolerance !== null && status.fragmentBinWidth !== null) {
    columns.push(`pretol=${status.precursorTolerance}ppm`, `fragbin=${status.fragmentBinWidth}`);
  }
  for (const result of status.results) {
    columns.push(`${result.engine}-${result.version}`);
  }
  return columns.join("\t");
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? "").href) {
  runCli(process.argv.slice(2), {
    stdout: (line) => process.stdout.write(`${line}\n`),
    stderr: (line) => process.stderr.write(`${line}\n`),
  })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.stack ?? error.message : error);
      process.exitCode = EXIT_CODES.datasetFailures;
    });
}
