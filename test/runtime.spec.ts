import { describe, it, expect } from "vitest";
import { evalForthic, evalWith } from "../src/runtime";
import { StandardInterpreter } from "../src/core/eval/standard";
import { formatValue } from "../src/core/eval/values";
import { DEFAULT_CONFIG, type ForthicConfig } from "../src/core/config/config";
import { ModuleLoadError } from "../src/core/errors";
import { defaultModuleFactories, REMOTE_RUNTIME_IMPORT_PATH, startRuntimeServer } from "../src/server";
import { createMathModule } from "./helpers/modules";

describe("evalForthic", () => {
  it("returns the final stack", async () => {
    const result = await evalForthic("1 2 SWAP");
    expect(result.ok).toBe(true);
    expect(result.stack.map(formatValue)).toEqual(["2", "1"]);
    expect(result.stackTrace).toBeUndefined();
  });

  it("describes failures with the offending source", async () => {
    const result = await evalForthic("1 FOO");
    expect(result.ok).toBe(false);
    expect(result.errorType).toBe("UnknownWordError");
    expect(result.error).toBe("Unknown word: FOO (searched: app) at line 1:\n```\n1 FOO\n  ^^^\n```");
    expect(result.stack.map(formatValue)).toEqual(["1"]);
    expect(result.stackTrace).toEqual(expect.stringContaining("Unknown word: FOO"));
  });

  it("keeps state between runs with evalWith", async () => {
    const interp = new StandardInterpreter({ modules: [createMathModule()] });
    await evalWith(interp, "20 DOUBLE");
    const result = await evalWith(interp, "2 ADD");
    expect(result.stack.map(formatValue)).toEqual(["42"]);
  });
});

describe("startRuntimeServer", () => {
  function testConfig(modules: ForthicConfig["modules"]): ForthicConfig {
    return {
      ...DEFAULT_CONFIG,
      server: { ...DEFAULT_CONFIG.server, host: "127.0.0.1", port: 0 },
      modules,
    };
  }

  it("knows the remote_runtime factory", () => {
    expect(defaultModuleFactories().has(REMOTE_RUNTIME_IMPORT_PATH)).toBe(true);
  });

  it("serves configured and extra modules", async () => {
    const { runtime, server, port } = await startRuntimeServer({
      config: testConfig([
        { name: "remote_runtime", importPath: REMOTE_RUNTIME_IMPORT_PATH, optional: false, description: "" },
        { name: "missing", importPath: "nowhere:missing", optional: true, description: "" },
      ]),
      modules: [createMathModule()],
    });
    try {
      expect(port).toBeGreaterThan(0);
      const { modules } = await runtime.listModules();
      expect(modules.map(m => m.name)).toEqual(["core", "remote_runtime", "math"]);
    } finally {
      await server.stop();
    }
  });

  it("refuses to start without a required module", async () => {
    await expect(
      startRuntimeServer({
        config: testConfig([{ name: "missing", importPath: "nowhere:missing", optional: false, description: "" }]),
      })
    ).rejects.toBeInstanceOf(ModuleLoadError);
  });
});
