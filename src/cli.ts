#!/usr/bin/env node
/**
 * vCon command line tool
 * Entry point
 */

import "dotenv/config";
import { runCli } from "./cli/commands.js";

const exitCode = await runCli(process.argv.slice(2), {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
});

process.exitCode = exitCode;
