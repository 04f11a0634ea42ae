#!/usr/bin/env node
// bin/forthic.ts
// Forthic CLI - run files, evaluate code, interactive sessions, and the
// remote runtime server
//
// Run:  node dist/bin/forthic.js [options] [file]

import * as readline from "readline";
import * as fs from "fs";
import { parseCliArgs, getHelpText, getVersion, buildConfig, type CliConfig } from "./forthic-cli-lib";
import { loadConfig, validateConfig, type ForthicConfig } from "../src/core/config";
import { StandardInterpreter } from "../src/core/eval/standard";
import { formatValue, type Val } from "../src/core/eval/values";
import { setLogLevel } from "../src/core/log";
import { loadModules } from "../src/core/modules/loader";
import { evalWith, type EvalResult } from "../src/runtime";
import { defaultModuleFactories, startRuntimeServer } from "../src/server";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main() {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(getHelpText());
    process.exit(0);
  }

  if (cliArgs.version) {
    console.log(getVersion());
    process.exit(0);
  }

  if (cliArgs.errors.length > 0) {
    for (const error of cliArgs.errors) console.error(`Error: ${error}`);
    console.error("Run with --help for usage.");
    process.exit(2);
  }

  const cli = buildConfig(cliArgs);
  const config = loadConfig({ configFile: cli.configFile, overrides: cli.overrides });
  const validation = validateConfig(config);
  for (const warning of validation.warnings) console.warn(`Warning: ${warning}`);
  if (!validation.valid) {
    for (const error of validation.errors) console.error(`Config error: ${error}`);
    process.exit(2);
  }
  setLogLevel(config.logLevel);

  switch (cli.mode) {
    case "serve":
      return serveMode(config);
    case "exec":
      return executeMode(cli, config);
    case "repl":
      return replMode(cli, config);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// INTERPRETER SETUP
// ═══════════════════════════════════════════════════════════════════════════════

async function createInterpreter(config: ForthicConfig): Promise<StandardInterpreter> {
  const modules = await loadModules(config.modules, defaultModuleFactories());
  return new StandardInterpreter({
    modules,
    timezone: config.interpreter.timezone,
    maxAttempts: config.interpreter.maxAttempts,
  });
}

function printStack(stack: Val[]): void {
  for (const value of stack) {
    console.log(formatValue(value));
  }
}

function printFailure(result: EvalResult, verbose: boolean): void {
  console.error(`${result.errorType}: ${result.error}`);
  if (verbose && result.stackTrace) {
    console.error(result.stackTrace);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTE MODE (file or --eval)
// ═══════════════════════════════════════════════════════════════════════════════

async function executeMode(cli: CliConfig, config: ForthicConfig): Promise<void> {
  let code: string;
  if (cli.file) {
    code = fs.readFileSync(cli.file, "utf8");
  } else if (cli.code !== undefined) {
    code = cli.code;
  } else {
    console.error("Error: No code or file specified");
    process.exit(1);
  }

  if (cli.verbose) {
    console.log("Executing...");
  }

  const interp = await createInterpreter(config);
  const result = await evalWith(interp, code);
  printStack(result.stack);
  if (!result.ok) {
    printFailure(result, cli.verbose);
    process.exit(1);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// REPL MODE
// ═══════════════════════════════════════════════════════════════════════════════

async function replMode(cli: CliConfig, config: ForthicConfig): Promise<void> {
  let interp = await createInterpreter(config);
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: "forthic> " });

  console.log(`${getVersion()} - type .quit to exit`);
  rl.prompt();

  for await (const line of rl) {
    const input = line.trim();
    if (input === ".quit" || input === ".exit") break;

    if (input === ".stack") {
      printStack(interp.getStack());
    } else if (input === ".clear") {
      interp.setStack([]);
    } else if (input === ".reset") {
      interp = await createInterpreter(config);
    } else if (input !== "") {
      const result = await evalWith(interp, input);
      if (!result.ok) printFailure(result, cli.verbose);
      printStack(result.stack);
    }
    rl.prompt();
  }

  rl.close();
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVE MODE
// ═══════════════════════════════════════════════════════════════════════════════

async function serveMode(config: ForthicConfig): Promise<void> {
  const { server } = await startRuntimeServer({ config });

  const shutdown = () => {
    console.log("\nShutting down...");
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("Shutdown failed:", err instanceof Error ? err.message : String(err));
        process.exit(1);
      }
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

main().catch((error: unknown) => {
  console.error("Fatal error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
