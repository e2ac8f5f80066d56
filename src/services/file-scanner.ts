/**
 * File Scanner Service
 * Finds vCon files below a directory and lints or migrates them in bulk
 */

import { readdir, readFile, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { lintVcon, validateVcon, type LintOptions } from "./vcon-validator.js";
import { migrateValue } from "./vcon-migrator.js";
import { VconError, errorMessage } from "../errors.js";
import { mapWithConcurrency } from "../utils/concurrency.js";
import { isRecord } from "../utils/json.js";
import { logger } from "../utils/logger.js";
import { config } from "../config.js";

export interface ScanOptions extends LintOptions {
  /** Files processed at once */
  concurrency?: number;
  /** Also apply the container schema, not only the lint rules */
  schema?: boolean;
}

export interface FileResult {
  path: string;
  relativePath: string;
  errors: string[];
}

export interface MigrateFileResult extends FileResult {
  changes: string[];
  updated: boolean;
}

export interface ScanSummary {
  total: number;
  valid: number;
  invalid: number;
  durationMs: number;
}

export interface DirectoryReport<T extends FileResult = FileResult> {
  directory: string;
  files: T[];
  summary: ScanSummary;
}

async function assertDirectory(directory: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(directory)).isDirectory();
  } catch (error) {
    throw new VconError(
      "DIRECTORY_NOT_FOUND",
      `Directory not found: ${directory}`,
      error instanceof Error ? { cause: error } : undefined
    );
  }
  if (!isDirectory) {
    throw new VconError("DIRECTORY_NOT_FOUND", `Not a directory: ${directory}`);
  }
}

async function listJsonFiles(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listJsonFiles(fullPath)));
    } else if (entry.isFile() && path.extname(entry.name).toLowerCase() === ".json") {
      files.push(fullPath);
    }
  }

  return files;
}

async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await readFile(filePath, "utf8"));
}

function describeReadError(error: unknown): string {
  return error instanceof SyntaxError
    ? `Invalid JSON: ${error.message}`
    : `Unexpected error: ${errorMessage(error)}`;
}

/**
 * Check if a file might be a vCon based on its content: a .json file
 * holding an object with a `vcon` field
 */
export async function isPotentialVconFile(filePath: string): Promise<boolean> {
  if (path.extname(filePath).toLowerCase() !== ".json") return false;

  try {
    const data = await readJson(filePath);
    return isRecord(data) && "vcon" in data;
  } catch (error) {
    logger.debug({ file: filePath, error: errorMessage(error) }, "Skipping unreadable file");
    return false;
  }
}

/**
 * Find every potential vCon file below a directory, in path order
 */
export async function findVconFiles(
  directory: string,
  options: Pick<ScanOptions, "concurrency"> = {}
): Promise<string[]> {
  await assertDirectory(directory);

  const candidates = (await listJsonFiles(directory)).sort();
  const matches = await mapWithConcurrency(
    candidates,
    options.concurrency ?? config.scanConcurrency,
    (file) => isPotentialVconFile(file)
  );

  return candidates.filter((_, i) => matches[i]);
}

/**
 * Lint a single file. Read and parse failures are reported as errors.
 */
export async function lintFile(
  filePath: string,
  options: ScanOptions = {}
): Promise<string[]> {
  let data: unknown;
  try {
    data = await readJson(filePath);
  } catch (error) {
    return [describeReadError(error)];
  }

  if (!options.schema) {
    return lintVcon(data, options);
  }

  return validateVcon(data, options).errors.map((e) =>
    e.path ? `${e.path}: ${e.message}` : e.message
  );
}

/**
 * Migrate a single file in place. The file is only rewritten when
 * something changed.
 */
export async function migrateFile(
  filePath: string
): Promise<Omit<MigrateFileResult, "path" | "relativePath">> {
  let data: unknown;
  try {
    data = await readJson(filePath);
  } catch (error) {
    return { errors: [describeReadError(error)], changes: [], updated: false };
  }

  const result = migrateValue(data);
  if (!result) {
    return { errors: ["vCon must be a JSON object"], changes: [], updated: false };
  }

  if (result.updated) {
    try {
      await writeFile(filePath, `${JSON.stringify(result.vcon, null, 2)}\n`, "utf8");
    } catch (error) {
      return {
        errors: [`Unexpected error: ${errorMessage(error)}`],
        changes: result.changes,
        updated: false,
      };
    }
  }

  return { errors: [], changes: result.changes, updated: result.updated };
}

function summarize(files: FileResult[], startTime: number): ScanSummary {
  const invalid = files.filter((f) => f.errors.length > 0).length;
  return {
    total: files.length,
    valid: files.length - invalid,
    invalid,
    durationMs: Date.now() - startTime,
  };
}

/**
 * Lint every vCon file below a directory
 */
export async function lintDirectory(
  directory: string,
  options: ScanOptions = {}
): Promise<DirectoryReport> {
  const startTime = Date.now();
  const concurrency = options.concurrency ?? config.scanConcurrency;
  const paths = await findVconFiles(directory, { concurrency });

  logger.debug({ directory, files: paths.length, concurrency }, "Linting vCon files");

  const files = await mapWithConcurrency(paths, concurrency, async (file) => ({
    path: file,
    relativePath: path.relative(directory, file),
    errors: await lintFile(file, options),
  }));

  const summary = summarize(files, startTime);
  logger.debug({ directory, ...summary }, "Lint completed");

  return { directory, files, summary };
}

/**
 * Migrate every vCon file below a directory
 */
export async function migrateDirectory(
  directory: string,
  options: Pick<ScanOptions, "concurrency"> = {}
): Promise<DirectoryReport<MigrateFileResult>> {
  const startTime = Date.now();
  const concurrency = options.concurrency ?? config.scanConcurrency;
  const paths = await findVconFiles(directory, { concurrency });

  logger.debug({ directory, files: paths.length, concurrency }, "Migrating vCon files");

  const files = await mapWithConcurrency(paths, concurrency, async (file) => ({
    path: file,
    relativePath: path.relative(directory, file),
    ...(await migrateFile(file)),
  }));

  const summary = summarize(files, startTime);
  logger.debug(
    { directory, ...summary, updated: files.filter((f) => f.updated).length },
    "Migration completed"
  );

  return { directory, files, summary };
}
