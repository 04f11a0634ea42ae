import { describe, it, expect } from "vitest";
import { ModuleFactoryRegistry, loadModules } from "../../../src/core/modules/loader";
import { Module } from "../../../src/core/modules/module";
import { ModuleLoadError } from "../../../src/core/errors";
import type { ModuleEntry } from "../../../src/core/config";
import { createMathModule } from "../../helpers/modules";

function entry(fields: Partial<ModuleEntry> & { name: string; importPath: string }): ModuleEntry {
  return { optional: false, description: "", ...fields };
}

function factories(): ModuleFactoryRegistry {
  return new ModuleFactoryRegistry()
    .register("test:math", () => createMathModule())
    .register("test:async", async e => new Module(e.name))
    .register("test:broken", () => {
      throw new Error("missing dependency");
    });
}

describe("loadModules", () => {
  it("instantiates configured modules in order", async () => {
    const modules = await loadModules(
      [entry({ name: "math", importPath: "test:math" }), entry({ name: "later", importPath: "test:async" })],
      factories()
    );
    expect(modules.map(m => m.name)).toEqual(["math", "later"]);
  });

  it("applies description and runtime flags from the entry", async () => {
    const [module] = await loadModules(
      [entry({ name: "plain", importPath: "test:async", description: "From config", runtimeSpecific: false })],
      factories()
    );
    expect(module.description).toBe("From config");
    expect(module.runtimeSpecific).toBe(false);
  });

  it("keeps a module's own description", async () => {
    const [module] = await loadModules([entry({ name: "math", importPath: "test:math", description: "x" })], factories());
    expect(module.description).toBe("Integer helpers");
  });

  it("skips optional modules that fail", async () => {
    const modules = await loadModules(
      [entry({ name: "gone", importPath: "test:broken", optional: true }), entry({ name: "math", importPath: "test:math" })],
      factories()
    );
    expect(modules.map(m => m.name)).toEqual(["math"]);
  });

  it("fails on a required module that cannot load", async () => {
    await expect(loadModules([entry({ name: "gone", importPath: "test:broken" })], factories())).rejects.toThrow(
      "Failed to load module 'gone': missing dependency"
    );
    await expect(loadModules([entry({ name: "x", importPath: "nope" })], factories())).rejects.toThrow(
      "Failed to load module 'x': no module factory for import path 'nope'"
    );
  });

  it("rejects a factory that builds a differently named module", async () => {
    await expect(loadModules([entry({ name: "calc", importPath: "test:math" })], factories())).rejects.toThrow(
      ModuleLoadError
    );
  });

  it("refuses duplicate factory paths", () => {
    expect(() => factories().register("test:math", () => new Module("m"))).toThrow(
      "Module factory already registered: test:math"
    );
  });
});
