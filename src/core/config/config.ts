// src/core/config/config.ts
// Configuration for the Forthic runtime and its remote bridge

import * as fs from "fs";
import * as path from "path";
import { isLogLevel, type LogLevel } from "../log";
import { isValidTimezone } from "../reader/literals";

// =========================================================================
// Configuration Types
// =========================================================================

export type ServerConfig = {
  /** Interface to bind */
  host: string;
  /** TCP port; 0 picks a free one */
  port: number;
  /** Per-request execution limit in milliseconds */
  requestTimeoutMs: number;
  /** Value of Access-Control-Allow-Origin */
  corsOrigin: string;
};

export type InterpreterConfig = {
  /** IANA zone for zoneless datetime literals */
  timezone: string;
  /** Attempts allowed when a run-level error handler is installed */
  maxAttempts: number;
};

/**
 * One configured module. `importPath` names a factory in the module
 * factory registry.
 */
export type ModuleEntry = {
  name: string;
  importPath: string;
  optional: boolean;
  description: string;
  /** Overrides the module's own runtime-specific flag when set */
  runtimeSpecific?: boolean;
};

export type ForthicConfig = {
  server: ServerConfig;
  interpreter: InterpreterConfig;
  logLevel: LogLevel;
  modules: ModuleEntry[];
  /** Path of a separate modules file (JSON or YAML with a `modules:` list) */
  modulesConfig?: string;
};

/** Partial configuration from one source (env, file, overrides). */
export type ConfigLayer = {
  server?: Partial<ServerConfig>;
  interpreter?: Partial<InterpreterConfig>;
  logLevel?: LogLevel;
  modules?: ModuleEntry[];
  modulesConfig?: string;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  host: "0.0.0.0",
  port: 50051,
  requestTimeoutMs: 30_000,
  corsOrigin: "*",
};

export const DEFAULT_INTERPRETER_CONFIG: InterpreterConfig = {
  timezone: "UTC",
  maxAttempts: 3,
};

export const DEFAULT_CONFIG: ForthicConfig = {
  server: DEFAULT_SERVER_CONFIG,
  interpreter: DEFAULT_INTERPRETER_CONFIG,
  logLevel: "info",
  modules: [],
};

export const DEFAULT_CONFIG_FILES = ["forthic.config.json", "forthic.config.yaml", "forthic.config.yml"];

// =========================================================================
// Reading untyped data
// =========================================================================

type Dict = Record<string, unknown>;

function asDict(value: unknown): Dict | undefined {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return undefined;
  const result: Dict = {};
  for (const [k, v] of Object.entries(value)) result[k] = v;
  return result;
}

/** First of `keys` present in `data` (camelCase and snake_case spellings). */
function pick(data: Dict, ...keys: string[]): unknown {
  for (const key of keys) {
    if (data[key] !== undefined) return data[key];
  }
  return undefined;
}

function readString(data: Dict, ...keys: string[]): string | undefined {
  const v = pick(data, ...keys);
  return typeof v === "string" ? v : undefined;
}

function readNumber(data: Dict, ...keys: string[]): number | undefined {
  const v = pick(data, ...keys);
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string" && v.trim() !== "" && Number.isFinite(Number(v))) return Number(v);
  return undefined;
}

function readBoolean(data: Dict, ...keys: string[]): boolean | undefined {
  const v = pick(data, ...keys);
  if (typeof v === "boolean") return v;
  if (v === "true") return true;
  if (v === "false") return false;
  return undefined;
}

function parseIntEnv(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const n = parseInt(raw, 10);
  return Number.isNaN(n) ? undefined : n;
}

/** Drop undefined fields so spreading a layer never clobbers a value. */
function defined<T extends object>(obj: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(obj)) {
    if (!isKeyOf(obj, key)) continue;
    if (obj[key] !== undefined) result[key] = obj[key];
  }
  return result;
}

function isKeyOf<T extends object>(obj: T, key: PropertyKey): key is keyof T {
  return key in obj;
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "FORTHIC", env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  const logLevel = env[`${prefix}_LOG_LEVEL`]?.toLowerCase();

  return {
    server: defined({
      host: env[`${prefix}_HOST`] || undefined,
      port: parseIntEnv(env[`${prefix}_PORT`]),
      requestTimeoutMs: parseIntEnv(env[`${prefix}_REQUEST_TIMEOUT_MS`]),
      corsOrigin: env[`${prefix}_CORS_ORIGIN`] || undefined,
    }),
    interpreter: defined({
      timezone: env[`${prefix}_TIMEZONE`] || undefined,
      maxAttempts: parseIntEnv(env[`${prefix}_MAX_ATTEMPTS`]),
    }),
    logLevel: logLevel && isLogLevel(logLevel) ? logLevel : undefined,
    modulesConfig: env[`${prefix}_MODULES_CONFIG`] || undefined,
  };
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): ConfigLayer {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;

  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    // Simple YAML parser for basic configs
    data = parseSimpleYaml(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const dict = asDict(data);
  if (!dict) {
    throw new Error(`Config file must contain an object: ${filePath}`);
  }
  const layer = configFromObject(dict);
  // a relative modules file is found next to the config that names it
  if (layer.modulesConfig && !path.isAbsolute(layer.modulesConfig)) {
    layer.modulesConfig = path.join(path.dirname(filePath), layer.modulesConfig);
  }
  return layer;
}

/**
 * Create configuration from a plain object (e.g., from parsed JSON/YAML).
 */
export function configFromObject(data: Dict): ConfigLayer {
  const serverData = asDict(data.server) ?? {};
  const interpData = asDict(data.interpreter) ?? {};
  const logLevel = readString(data, "logLevel", "log_level")?.toLowerCase();
  const modules = Array.isArray(data.modules) ? data.modules.map(moduleEntryFromObject) : undefined;

  return {
    server: defined({
      host: readString(serverData, "host"),
      port: readNumber(serverData, "port"),
      requestTimeoutMs: readNumber(serverData, "requestTimeoutMs", "request_timeout_ms"),
      corsOrigin: readString(serverData, "corsOrigin", "cors_origin"),
    }),
    interpreter: defined({
      timezone: readString(interpData, "timezone"),
      maxAttempts: readNumber(interpData, "maxAttempts", "max_attempts"),
    }),
    logLevel: logLevel && isLogLevel(logLevel) ? logLevel : undefined,
    modules,
    modulesConfig: readString(data, "modulesConfig", "modules_config"),
  };
}

function moduleEntryFromObject(raw: unknown): ModuleEntry {
  const data = asDict(raw) ?? {};
  return {
    name: readString(data, "name") ?? "",
    importPath: readString(data, "importPath", "import_path") ?? "",
    optional: readBoolean(data, "optional") ?? false,
    description: readString(data, "description") ?? "",
    runtimeSpecific: readBoolean(data, "runtimeSpecific", "runtime_specific"),
  };
}

/**
 * Read the `modules:` list of a modules file.
 */
export function loadModulesConfig(filePath: string): ModuleEntry[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Module config file not found: ${filePath}`);
  }
  return configFromFile(filePath).modules ?? [];
}

/**
 * Merge layers over the defaults, later ones overriding earlier ones.
 * Module lists are replaced, not concatenated.
 */
export function mergeConfigs(...layers: ConfigLayer[]): ForthicConfig {
  const result: ForthicConfig = {
    ...DEFAULT_CONFIG,
    server: { ...DEFAULT_CONFIG.server },
    interpreter: { ...DEFAULT_CONFIG.interpreter },
    modules: [...DEFAULT_CONFIG.modules],
  };

  for (const layer of layers) {
    if (layer.server) {
      result.server = { ...result.server, ...layer.server };
    }
    if (layer.interpreter) {
      result.interpreter = { ...result.interpreter, ...layer.interpreter };
    }
    if (layer.logLevel) {
      result.logLevel = layer.logLevel;
    }
    if (layer.modules) {
      result.modules = [...layer.modules];
    }
    if (layer.modulesConfig) {
      result.modulesConfig = layer.modulesConfig;
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults. Modules from
 * a modules file are appended to those listed in the config itself.
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: ConfigLayer;
  env?: NodeJS.ProcessEnv;
}): ForthicConfig {
  const layers: ConfigLayer[] = [configFromEnv("FORTHIC", options?.env)];

  // Load file config if specified
  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    // Try to find default config files
    for (const p of DEFAULT_CONFIG_FILES) {
      if (fs.existsSync(p)) {
        layers.push(configFromFile(p));
        break;
      }
    }
  }

  // Apply overrides
  if (options?.overrides) {
    layers.push(options.overrides);
  }

  const config = mergeConfigs(...layers);

  if (config.modulesConfig) {
    config.modules = [...config.modules, ...loadModulesConfig(config.modulesConfig)];
  }

  return config;
}

// =========================================================================
// Simple YAML Parser (maps, lists of scalars or maps, scalars)
// =========================================================================

type YamlFrame = { indent: number; value: Dict | unknown[] };

const KEY_PATTERN = /^([^\s:#-][^:]*):(?:\s+(.*))?$/;

function parseSimpleYaml(content: string): Dict {
  const root: Dict = {};
  const stack: YamlFrame[] = [{ indent: -1, value: root }];
  let pending: { parent: Dict; key: string; indent: number } | undefined;

  for (const rawLine of content.split("\n")) {
    // Skip empty lines and comments
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);
    const isItem = trimmed === "-" || trimmed.startsWith("- ");

    // A `key:` with nothing after it opens a map or a list, or is null
    if (pending) {
      if (indent > pending.indent || (isItem && indent === pending.indent)) {
        const container: Dict | unknown[] = isItem ? [] : {};
        pending.parent[pending.key] = container;
        stack.push({ indent, value: container });
      } else {
        pending.parent[pending.key] = null;
      }
      pending = undefined;
    }

    // Pop frames this line is no longer inside
    while (stack.length > 1) {
      const top = stack[stack.length - 1];
      const leavesList = Array.isArray(top.value) && !isItem && indent <= top.indent;
      if (indent < top.indent || leavesList) {
        stack.pop();
      } else {
        break;
      }
    }

    let line = trimmed;
    let lineIndent = indent;

    if (isItem) {
      const list = stack[stack.length - 1].value;
      if (!Array.isArray(list)) continue;
      const rest = trimmed.slice(1).trim();
      if (!KEY_PATTERN.test(rest)) {
        list.push(rest === "" ? null : parseScalar(rest));
        continue;
      }
      // `- key: value` starts a map item whose keys line up after the dash
      const item: Dict = {};
      list.push(item);
      lineIndent = indent + trimmed.indexOf(rest);
      stack.push({ indent: lineIndent, value: item });
      line = rest;
    }

    const target = stack[stack.length - 1].value;
    if (Array.isArray(target)) continue;

    // Parse key: value
    const match = KEY_PATTERN.exec(line);
    if (!match) continue;

    const key = match[1].trim();
    const value = (match[2] ?? "").trim();

    if (value === "") {
      pending = { parent: target, key, indent: lineIndent };
    } else {
      target[key] = parseScalar(value);
    }
  }

  if (pending) {
    pending.parent[pending.key] = null;
  }

  return root;
}

function parseScalar(value: string): unknown {
  if (value === "true") return true;
  if (value === "false") return false;
  if (value === "null" || value === "~") return null;
  if (value === "[]") return [];
  if (value === "{}") return {};
  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value);
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  return value;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: ForthicConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.server.port) || config.server.port < 0 || config.server.port > 65535) {
    errors.push(`port must be an integer between 0 and 65535 (got ${config.server.port})`);
  }
  if (config.server.requestTimeoutMs <= 0) {
    errors.push("requestTimeoutMs must be positive");
  } else if (config.server.requestTimeoutMs < 100) {
    warnings.push("requestTimeoutMs is very low, requests may time out before they run");
  }
  if (!isValidTimezone(config.interpreter.timezone)) {
    errors.push(`Unknown timezone: ${config.interpreter.timezone}`);
  }
  if (config.interpreter.maxAttempts < 1) {
    errors.push("maxAttempts must be at least 1");
  }

  const seen = new Set<string>();
  config.modules.forEach((entry, i) => {
    if (!entry.name) errors.push(`modules[${i}]: missing name`);
    if (!entry.importPath) errors.push(`modules[${i}]: missing import_path`);
    if (entry.name && seen.has(entry.name)) errors.push(`modules[${i}]: duplicate module ${entry.name}`);
    seen.add(entry.name);
  });

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
