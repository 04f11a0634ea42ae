// src/core/modules/loader.ts
// Configuration-driven module loading through a compiled-in factory registry

import type { ModuleEntry } from "../config/config";
import { ModuleLoadError, errorMessage } from "../errors";
import { createLogger } from "../log";
import type { Module } from "./module";

const log = createLogger("module-loader");

export type ModuleFactory = (entry: ModuleEntry) => Module | Promise<Module>;

/**
 * Maps an entry's `import_path` to the code that builds the module.
 * Unknown paths are configuration errors.
 */
export class ModuleFactoryRegistry {
  private factories = new Map<string, ModuleFactory>();

  register(importPath: string, factory: ModuleFactory): this {
    if (this.factories.has(importPath)) {
      throw new Error(`Module factory already registered: ${importPath}`);
    }
    this.factories.set(importPath, factory);
    return this;
  }

  get(importPath: string): ModuleFactory | undefined {
    return this.factories.get(importPath);
  }

  has(importPath: string): boolean {
    return this.factories.has(importPath);
  }

  importPaths(): string[] {
    return Array.from(this.factories.keys());
  }
}

/**
 * Instantiate configured modules in order. A failing required module raises
 * ModuleLoadError; a failing optional one is logged and skipped.
 */
export async function loadModules(entries: ModuleEntry[], factories: ModuleFactoryRegistry): Promise<Module[]> {
  const loaded: Module[] = [];

  for (const entry of entries) {
    try {
      log.info(`Loading module '${entry.name}' from ${entry.importPath}`);
      const module = await instantiate(entry, factories);
      loaded.push(module);
      log.info(`Loaded '${entry.name}'${entry.description ? `: ${entry.description}` : ""}`);
    } catch (e) {
      if (entry.optional) {
        log.warn(`Optional module '${entry.name}' not available: ${errorMessage(e)}`);
        continue;
      }
      throw e instanceof ModuleLoadError ? e : new ModuleLoadError(entry.name, errorMessage(e), e);
    }
  }

  log.info(`Loaded ${loaded.length} module(s)`);
  return loaded;
}

async function instantiate(entry: ModuleEntry, factories: ModuleFactoryRegistry): Promise<Module> {
  const factory = factories.get(entry.importPath);
  if (!factory) {
    throw new ModuleLoadError(entry.name, `no module factory for import path '${entry.importPath}'`);
  }
  const module = await factory(entry);
  if (module.name !== entry.name) {
    throw new ModuleLoadError(entry.name, `factory '${entry.importPath}' built module '${module.name}'`);
  }
  if (entry.description && !module.description) {
    module.description = entry.description;
  }
  if (entry.runtimeSpecific !== undefined) {
    module.runtimeSpecific = entry.runtimeSpecific;
  }
  return module;
}
