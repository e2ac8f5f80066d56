/**
 * vCon command line commands
 */

import { parseArgs } from "node:util";
import {
  lintDirectory,
  migrateDirectory,
  type DirectoryReport,
  type FileResult,
} from "../services/file-scanner.js";
import { VconError, errorMessage } from "../errors.js";
import { config } from "../config.js";

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

export const USAGE = `Usage:
  vcon lint <directory> [--threads N] [--expected-version V] [--schema] [--json]
  vcon migrate <directory> [--threads N] [--json]

Options:
  -t, --threads N           Files processed at once (default: ${config.scanConcurrency})
      --expected-version V  vCon version every file must carry (default: ${config.vconVersion})
      --schema              Also check the container schema and index references
      --json                Print the report as JSON
  -h, --help                Show this help`;

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function parseThreads(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const threads = Number(value);
  if (!Number.isInteger(threads) || threads < 1) {
    throw new UsageError(`--threads must be a positive integer, got '${value}'`);
  }
  return threads;
}

function printSummary(report: DirectoryReport, io: CliIo): void {
  io.out("");
  io.out("Summary:");
  io.out(`Total files: ${report.summary.total}`);
  io.out(`Valid: ${report.summary.valid}`);
  io.out(`Invalid: ${report.summary.invalid}`);
  io.out(`Time taken: ${(report.summary.durationMs / 1000).toFixed(2)} seconds`);
}

function printFile(file: FileResult, io: CliIo): void {
  io.out(`${file.errors.length > 0 ? "INVALID" : "VALID  "} ${file.relativePath}`);
  for (const error of file.errors) {
    io.out(`        - ${error}`);
  }
}

async function runLint(
  directory: string,
  options: { threads?: number; expectedVersion?: string; schema: boolean; json: boolean },
  io: CliIo
): Promise<number> {
  const report = await lintDirectory(directory, {
    concurrency: options.threads,
    expectedVersion: options.expectedVersion,
    schema: options.schema,
  });

  if (options.json) {
    io.out(JSON.stringify(report, null, 2));
  } else if (report.summary.total === 0) {
    io.out("No vCon files found");
  } else {
    io.out(`Found ${report.summary.total} potential vCon files`);
    io.out("");
    io.out("Validation Results:");
    report.files.forEach((file) => printFile(file, io));
    printSummary(report, io);
  }

  return report.summary.invalid > 0 ? 1 : 0;
}

async function runMigrate(
  directory: string,
  options: { threads?: number; json: boolean },
  io: CliIo
): Promise<number> {
  const report = await migrateDirectory(directory, { concurrency: options.threads });

  if (options.json) {
    io.out(JSON.stringify(report, null, 2));
  } else if (report.summary.total === 0) {
    io.out("No vCon files found");
  } else {
    io.out(`Found ${report.summary.total} potential vCon files`);
    for (const file of report.files) {
      const status = file.errors.length > 0 ? "FAILED " : file.updated ? "UPDATED" : "OK     ";
      io.out(`${status} ${file.relativePath}`);
      for (const change of file.changes) io.out(`        * ${change}`);
      for (const error of file.errors) io.out(`        - ${error}`);
    }
    io.out("");
    io.out(
      `Done. Updated ${report.files.filter((f) => f.updated).length} of ${report.summary.total} files in ${(report.summary.durationMs / 1000).toFixed(2)} seconds`
    );
  }

  return report.summary.invalid > 0 ? 1 : 0;
}

/**
 * Run the CLI with the given arguments (without the node and script paths).
 * Returns the process exit code.
 */
export async function runCli(args: string[], io: CliIo): Promise<number> {
  try {
    const { values, positionals } = parseArgs({
      args,
      allowPositionals: true,
      options: {
        threads: { type: "string", short: "t" },
        "expected-version": { type: "string" },
        schema: { type: "boolean", default: false },
        json: { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });

    if (values.help) {
      io.out(USAGE);
      return 0;
    }

    const [command, directory, ...rest] = positionals;
    if (!command || !directory || rest.length > 0) {
      throw new UsageError("Expected a command and a directory");
    }

    const threads = parseThreads(values.threads);
    const json = values.json ?? false;

    if (!json) io.out(`Scanning directory: ${directory}`);

    switch (command) {
      case "lint":
        return await runLint(
          directory,
          {
            threads,
            expectedVersion: values["expected-version"],
            schema: values.schema ?? false,
            json,
          },
          io
        );
      case "migrate":
        return await runMigrate(directory, { threads, json }, io);
      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  } catch (error) {
    if (error instanceof UsageError || (error instanceof TypeError && "code" in error)) {
      io.err(error.message);
      io.err(USAGE);
      return 2;
    }
    if (error instanceof VconError && error.code === "DIRECTORY_NOT_FOUND") {
      io.err(error.message);
      return 1;
    }
    io.err(`Unexpected error: ${errorMessage(error)}`);
    return 1;
  }
}
