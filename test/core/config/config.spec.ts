import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  DEFAULT_CONFIG,
  configFromEnv,
  configFromFile,
  loadConfig,
  mergeConfigs,
  validateConfig,
} from "../../../src/core/config";

describe("config", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "forthic-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  it("reads environment variables", () => {
    const layer = configFromEnv("FORTHIC", {
      FORTHIC_PORT: "6000",
      FORTHIC_HOST: "127.0.0.1",
      FORTHIC_LOG_LEVEL: "DEBUG",
      FORTHIC_TIMEZONE: "Europe/Paris",
      FORTHIC_MAX_ATTEMPTS: "nope",
    });
    expect(layer.server).toEqual({ host: "127.0.0.1", port: 6000 });
    expect(layer.interpreter).toEqual({ timezone: "Europe/Paris" });
    expect(layer.logLevel).toBe("debug");
    expect(layer.modulesConfig).toBeUndefined();
  });

  it("reads JSON files with snake_case keys", () => {
    const file = write(
      "forthic.json",
      JSON.stringify({ server: { port: 7000, request_timeout_ms: 500 }, log_level: "warn" })
    );
    const layer = configFromFile(file);
    expect(layer.server).toEqual({ port: 7000, requestTimeoutMs: 500 });
    expect(layer.logLevel).toBe("warn");
  });

  it("reads YAML files with module lists", () => {
    const file = write(
      "forthic.yaml",
      [
        "# runtime settings",
        "server:",
        "  port: 7000",
        '  cors_origin: "http://localhost"',
        "interpreter:",
        "  timezone: Asia/Tokyo",
        "  max_attempts: 5",
        "log_level: warn",
        "modules:",
        "  - name: remote_runtime",
        "    import_path: forthic.client:remote_runtime",
        "    optional: true",
        "  - name: extra",
        "    import_path: pkg:extra",
        "    description: Extra words",
      ].join("\n")
    );
    const config = mergeConfigs(configFromFile(file));

    expect(config.server).toEqual({ ...DEFAULT_CONFIG.server, port: 7000, corsOrigin: "http://localhost" });
    expect(config.interpreter).toEqual({ timezone: "Asia/Tokyo", maxAttempts: 5 });
    expect(config.logLevel).toBe("warn");
    expect(config.modules).toEqual([
      {
        name: "remote_runtime",
        importPath: "forthic.client:remote_runtime",
        optional: true,
        description: "",
        runtimeSpecific: undefined,
      },
      { name: "extra", importPath: "pkg:extra", optional: false, description: "Extra words", runtimeSpecific: undefined },
    ]);
  });

  it("rejects missing and unsupported files", () => {
    const missing = path.join(dir, "absent.json");
    expect(() => configFromFile(missing)).toThrow(`Config file not found: ${missing}`);
    expect(() => configFromFile(write("forthic.toml", "port = 1"))).toThrow("Unsupported config file format: .toml");
    expect(() => configFromFile(write("list.json", "[1]"))).toThrow("Config file must contain an object");
  });

  it("layers overrides over the file over the environment", () => {
    const file = write("forthic.json", JSON.stringify({ server: { port: 7000 } }));
    const env = { FORTHIC_PORT: "6000", FORTHIC_HOST: "127.0.0.1" };

    expect(loadConfig({ env }).server.port).toBe(6000);
    expect(loadConfig({ env, configFile: file }).server).toEqual({
      ...DEFAULT_CONFIG.server,
      host: "127.0.0.1",
      port: 7000,
    });
    expect(loadConfig({ env, configFile: file, overrides: { server: { port: 8000 } } }).server.port).toBe(8000);
  });

  it("appends modules from a modules file next to the config", () => {
    write("modules.yaml", ["modules:", "  - name: extra", "    import_path: pkg:extra"].join("\n"));
    const file = write(
      "forthic.json",
      JSON.stringify({ modules: [{ name: "first", import_path: "pkg:first" }], modules_config: "modules.yaml" })
    );
    const config = loadConfig({ env: {}, configFile: file });
    expect(config.modules.map(m => m.name)).toEqual(["first", "extra"]);
    expect(config.modulesConfig).toBe(path.join(dir, "modules.yaml"));
  });

  it("validates ranges, timezones and module entries", () => {
    const config = mergeConfigs({
      server: { port: 70000, requestTimeoutMs: 50 },
      interpreter: { timezone: "Mars/Base", maxAttempts: 0 },
      modules: [
        { name: "a", importPath: "x", optional: false, description: "" },
        { name: "a", importPath: "", optional: false, description: "" },
      ],
    });
    expect(validateConfig(config)).toEqual({
      valid: false,
      errors: [
        "port must be an integer between 0 and 65535 (got 70000)",
        "Unknown timezone: Mars/Base",
        "maxAttempts must be at least 1",
        "modules[1]: missing import_path",
        "modules[1]: duplicate module a",
      ],
      warnings: ["requestTimeoutMs is very low, requests may time out before they run"],
    });
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
  });
});
