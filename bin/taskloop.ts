#!/usr/bin/env npx tsx
// bin/taskloop.ts
// taskloop CLI entry point
//
// Run:  npx tsx bin/taskloop.ts [options]

import * as fs from "fs";
import * as path from "path";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  buildOverrides,
  exitCodeFor,
  EXIT_USAGE,
} from "./taskloop-cli-lib";
import { ConfigError, loadConfig, type TaskloopConfig } from "../src/core/config";
import { runTaskloop } from "../src/runtime";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<number> {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(getHelpText());
    return 0;
  }

  if (cliArgs.version) {
    console.log(getVersion());
    return 0;
  }

  loadEnvFile();

  let config: TaskloopConfig;
  try {
    const overrides = buildOverrides(cliArgs);
    if (cliArgs.problems.length > 0) {
      for (const problem of cliArgs.problems) {
        console.error(`Error: ${problem}`);
      }
      console.error("Run with --help for usage.");
      return EXIT_USAGE;
    }
    config = loadConfig({ configFile: cliArgs.config, overrides });
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  const { outcome } = await runTaskloop(config, {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
  });

  if (outcome.tag === "Fail") {
    console.error(`Error: ${outcome.failure.message}`);
  }
  return exitCodeFor(outcome);
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT SETUP
// ═══════════════════════════════════════════════════════════════════════════════

function loadEnvFile(): void {
  const envPath = path.join(process.cwd(), ".env");
  if (fs.existsSync(envPath)) {
    const envContent = fs.readFileSync(envPath, "utf8");
    for (const line of envContent.split("\n")) {
      const match = line.match(/^([^=#]+)=(.*)$/);
      const key = match?.[1]?.trim();
      const value = match?.[2];
      if (key && value !== undefined && !process.env[key]) {
        process.env[key] = value.trim();
      }
    }
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("Fatal error:", error);
    process.exitCode = 1;
  }
);
