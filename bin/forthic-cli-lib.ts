// bin/forthic-cli-lib.ts
// Argument parsing and help for the forthic command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import type { ConfigLayer, InterpreterConfig, ServerConfig } from "../src/core/config";
import { isLogLevel, type LogLevel } from "../src/core/log";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliMode = "repl" | "exec" | "serve";

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  eval?: string;
  file?: string;
  verbose?: boolean;
  mode?: CliMode;
  port?: number;
  host?: string;
  config?: string;
  modulesConfig?: string;
  logLevel?: LogLevel;
  timezone?: string;
  /** Problems found while parsing; the command refuses to run when non-empty */
  errors: string[];
};

export type CliConfig = {
  mode: CliMode;
  verbose: boolean;
  code?: string;
  file?: string;
  configFile?: string;
  /** Highest-priority configuration layer */
  overrides: ConfigLayer;
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { errors: [] };

  const valueOf = (flag: string, i: number): string | undefined => {
    const value = args[i];
    if (value === undefined) result.errors.push(`${flag} requires a value`);
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg === "--eval" || arg === "-e") {
      result.eval = valueOf(arg, ++i) ?? "";
      result.mode = "exec";
    } else if (arg === "--port" || arg === "-p") {
      const raw = valueOf(arg, ++i);
      if (raw !== undefined) {
        const port = Number(raw);
        if (Number.isInteger(port) && port >= 0 && port <= 65535) {
          result.port = port;
        } else {
          result.errors.push(`Invalid port: ${raw}`);
        }
      }
    } else if (arg === "--host") {
      result.host = valueOf(arg, ++i);
    } else if (arg === "--config" || arg === "-c") {
      result.config = valueOf(arg, ++i);
    } else if (arg === "--modules-config") {
      result.modulesConfig = valueOf(arg, ++i);
    } else if (arg === "--timezone") {
      result.timezone = valueOf(arg, ++i);
    } else if (arg === "--log-level") {
      const raw = valueOf(arg, ++i);
      if (raw !== undefined) {
        if (isLogLevel(raw)) {
          result.logLevel = raw;
        } else {
          result.errors.push(`Invalid log level: ${raw}`);
        }
      }
    } else if (arg === "serve" && result.mode === undefined && result.file === undefined) {
      result.mode = "serve";
    } else if (!arg.startsWith("-")) {
      // First non-flag argument is the file
      if (!result.file) {
        result.file = arg;
        if (result.mode !== "serve") result.mode = "exec";
      }
    } else {
      result.errors.push(`Unknown option: ${arg}`);
    }
  }

  // Default mode is REPL if no other mode was set
  if (!result.mode) {
    result.mode = "repl";
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
forthic - Forthic interpreter and remote runtime server

USAGE:
  forthic [options]                   Start an interactive session
  forthic [options] <file>            Run a Forthic file
  forthic --eval <code>               Run Forthic code directly
  forthic serve [options]             Serve this runtime's modules to other runtimes

OPTIONS:
  -h, --help                          Show this help message
  -v, --version                       Show version information
  -e, --eval <code>                   Run code, print the stack and exit
  -c, --config <file>                 Configuration file (JSON or YAML)
  --modules-config <file>             Modules file (JSON or YAML, "modules:" list)
  --timezone <zone>                   IANA zone for zoneless datetime literals
  --log-level <level>                 silent | error | warn | info | debug
  --verbose                           Print stack traces on failure

SERVE OPTIONS:
  -p, --port <port>                   Port to listen on (default: 50051, 0 = any)
  --host <host>                       Interface to bind (default: 0.0.0.0)

ENVIRONMENT:
  FORTHIC_PORT, FORTHIC_HOST, FORTHIC_REQUEST_TIMEOUT_MS, FORTHIC_CORS_ORIGIN,
  FORTHIC_TIMEZONE, FORTHIC_MAX_ATTEMPTS, FORTHIC_LOG_LEVEL, FORTHIC_MODULES_CONFIG

SESSION COMMANDS:
  .stack                              Show the stack
  .clear                              Clear the stack
  .reset                              Reset the interpreter
  .quit                               Exit

EXAMPLES:
  forthic --eval "[1 2 3] DUP"
  forthic serve --port 50051 --modules-config modules.yaml
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  try {
    const pkgPath = path.join(__dirname, "..", "package.json");
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    const version = typeof pkg === "object" && pkg !== null && "version" in pkg ? pkg.version : undefined;
    return `forthic-runtime v${typeof version === "string" ? version : "0.1.0"}`;
  } catch {
    return "forthic-runtime v0.1.0";
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

/** Flags that override file and environment configuration. */
export function buildOverrides(args: Partial<CliArgs>): ConfigLayer {
  const layer: ConfigLayer = {};

  const server: Partial<ServerConfig> = {};
  if (args.port !== undefined) server.port = args.port;
  if (args.host !== undefined) server.host = args.host;
  if (Object.keys(server).length > 0) layer.server = server;

  const interpreter: Partial<InterpreterConfig> = {};
  if (args.timezone !== undefined) interpreter.timezone = args.timezone;
  if (Object.keys(interpreter).length > 0) layer.interpreter = interpreter;

  if (args.logLevel) layer.logLevel = args.logLevel;
  if (args.modulesConfig) layer.modulesConfig = args.modulesConfig;
  return layer;
}

export function buildConfig(args: Partial<CliArgs>): CliConfig {
  const config: CliConfig = {
    mode: args.mode ?? (args.eval !== undefined || args.file ? "exec" : "repl"),
    verbose: args.verbose || false,
    overrides: buildOverrides(args),
  };

  if (args.eval !== undefined) {
    config.code = args.eval;
  }

  if (args.file) {
    config.file = args.file;
  }

  if (args.config) {
    config.configFile = args.config;
  }

  return config;
}
