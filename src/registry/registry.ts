import type { Module } from "../core/modules/module";
import type { ModuleDescription, ModuleSummary, WordDoc } from "./types";
import { validateModule, type ValidationResult } from "./validate";

/**
 * Registry of modules shared by every interpreter of a runtime.
 * Read-only once frozen; interpreters keep their own registrations on top.
 */
export class ModuleRegistry {
  private modules: Map<string, Module> = new Map();
  private frozen = false;

  /**
   * Register a module. Throws on duplicate names or after freeze().
   */
  register(module: Module): void {
    if (this.frozen) {
      throw new Error(`Module registry is frozen; cannot register ${module.name}`);
    }
    if (this.modules.has(module.name)) {
      throw new Error(`Module already registered: ${module.name}`);
    }
    this.modules.set(module.name, module);
  }

  get(name: string): Module | undefined {
    return this.modules.get(name);
  }

  has(name: string): boolean {
    return this.modules.has(name);
  }

  /**
   * List all modules in registration order.
   */
  list(): Module[] {
    return Array.from(this.modules.values());
  }

  names(): string[] {
    return Array.from(this.modules.keys());
  }

  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Simple text search (module name, description, exported word names).
   */
  search(query: string): Module[] {
    const q = query.toLowerCase();
    return this.list().filter(m =>
      m.name.toLowerCase().includes(q) ||
      m.description.toLowerCase().includes(q) ||
      m.exportedNames().some(w => w.toLowerCase().includes(q))
    );
  }

  summaries(): ModuleSummary[] {
    return this.list().map(summarizeModule);
  }

  describe(name: string): ModuleDescription | undefined {
    const module = this.modules.get(name);
    return module ? describeModule(module) : undefined;
  }

  /**
   * Check every initialized module's export list.
   */
  validate(): ValidationResult {
    const errors: string[] = [];
    for (const module of this.modules.values()) {
      if (!module.initialized) continue;
      errors.push(...validateModule(module).errors);
    }
    return { valid: errors.length === 0, errors };
  }
}

export function summarizeModule(module: Module): ModuleSummary {
  return {
    name: module.name,
    description: module.description,
    wordCount: module.exportableWords().length,
    runtimeSpecific: module.runtimeSpecific,
  };
}

export function describeModule(module: Module): ModuleDescription {
  const words: WordDoc[] = module.exportableWords().map(word => ({
    name: word.name,
    stackEffect: word.stackEffect ?? "",
    description: word.description ?? "",
  }));
  return { name: module.name, description: module.description, words };
}
