#!/usr/bin/env node

/**
 * tfq CLI
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { QUERY_COMMANDS, createQueryCommand } from "./commands/query.js";
import type { QueryIo } from "./commands/query.js";
import { loadConfig } from "./utils/config.js";
import { exitCodeFor, formatCliError, isVerbose } from "./utils/errors.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, "../../package.json"), "utf-8"));
  if (typeof packageJson === "object" && packageJson !== null && "version" in packageJson) {
    return String(packageJson.version);
  }
  return "0.0.0";
}

const io = (): QueryIo => ({
  stdout: process.stdout,
  config: loadConfig(),
  env: process.env,
  stdin: process.stdin,
});

const program = new Command();

program
  .name("tfq")
  .description("Query state files and workspace metadata with filters, attributes and sorting")
  .version(readVersion());

for (const spec of QUERY_COMMANDS) {
  program.addCommand(createQueryCommand(spec, io));
}

program.parseAsync().catch((error: unknown) => {
  process.stderr.write(`Error: ${formatCliError(error, isVerbose())}\n`);
  process.exitCode = exitCodeFor(error);
});
