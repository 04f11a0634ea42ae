// src/core/modules/module.ts
// Modules: named bundles of words and variables with an export allow-list

import { VNull, type Val } from "../eval/values";
import { MemoBangAtWord, MemoBangWord, MemoWord, PushValueWord, type Word } from "./word";

export class Variable {
  constructor(public readonly name: string, public value: Val = VNull) {}

  dup(): Variable {
    return new Variable(this.name, this.value);
  }
}

/** A module made visible inside another, optionally under `prefix.` */
export type ModuleImport = { module: Module; prefix: string };

export type ModuleOptions = {
  description?: string;
  /** Forthic source run once, in the module's own scope, when first imported */
  forthic?: string;
  /** Reported by ListModules; false for the shared core vocabulary */
  runtimeSpecific?: boolean;
};

export class Module {
  readonly words: Word[] = [];
  readonly variables = new Map<string, Variable>();
  readonly imports: ModuleImport[] = [];
  /** Modules created by `{name ... }` blocks inside this one */
  readonly children = new Map<string, Module>();
  description: string;
  forthic: string;
  runtimeSpecific: boolean;
  /** Set once the module's Forthic source has run */
  initialized: boolean;
  private readonly exportable: string[] = [];

  constructor(public readonly name: string, options: ModuleOptions = {}) {
    this.description = options.description ?? "";
    this.forthic = options.forthic ?? "";
    this.runtimeSpecific = options.runtimeSpecific ?? true;
    this.initialized = this.forthic === "";
  }

  // ─────────────────────────────────────────────────────────────
  // Words
  // ─────────────────────────────────────────────────────────────

  addWord(word: Word): void {
    word.module = this;
    this.words.push(word);
  }

  addExportableWord(word: Word): void {
    this.addWord(word);
    this.addExportable([word.name]);
  }

  addExportable(names: string[]): void {
    for (const name of names) {
      if (!this.exportable.includes(name)) this.exportable.push(name);
    }
  }

  isExported(name: string): boolean {
    return this.exportable.includes(name);
  }

  exportedNames(): string[] {
    return this.exportable.slice();
  }

  /** Wrap `word` in a memo word and add it with its `!` and `!@` companions. */
  addMemoWords(word: Word): MemoWord {
    const memo = new MemoWord(word);
    this.addWord(memo);
    this.addWord(new MemoBangWord(memo));
    this.addWord(new MemoBangAtWord(memo));
    return memo;
  }

  /** Latest definition of `name` in this module's own dictionary. */
  findDictionaryWord(name: string): Word | undefined {
    for (let i = this.words.length - 1; i >= 0; i--) {
      if (this.words[i].name === name) return this.words[i];
    }
    return undefined;
  }

  /**
   * Exported words, latest definition per name, in export order. Words
   * re-exported from an import are included.
   */
  exportableWords(): Word[] {
    const result: Word[] = [];
    for (const name of this.exportable) {
      const word = this.findExportedWord(name);
      if (word) result.push(word);
    }
    return result;
  }

  // ─────────────────────────────────────────────────────────────
  // Variables
  // ─────────────────────────────────────────────────────────────

  addVariable(name: string, value: Val = VNull): Variable {
    const existing = this.variables.get(name);
    if (existing) return existing;
    const variable = new Variable(name, value);
    this.variables.set(name, variable);
    return variable;
  }

  findVariable(name: string): Variable | undefined {
    return this.variables.get(name);
  }

  // ─────────────────────────────────────────────────────────────
  // Imports & resolution
  // ─────────────────────────────────────────────────────────────

  importModule(module: Module, prefix = ""): void {
    this.imports.push({ module, prefix });
  }

  /**
   * Resolve `name` in this module: own words (latest first), then variables,
   * then imports (latest first, exported names only).
   */
  findWord(name: string): Word | undefined {
    const word = this.findDictionaryWord(name);
    if (word) return word;

    const variable = this.findVariable(name);
    if (variable) return new PushValueWord(name, { tag: "VariableRef", variable });

    return this.findImportedWord(name, new Set<Module>([this]));
  }

  /** Look `name` up as seen by an importer of this module. */
  findExportedWord(name: string, visited: Set<Module> = new Set<Module>()): Word | undefined {
    if (!this.isExported(name) || visited.has(this)) return undefined;
    visited.add(this);
    return this.findDictionaryWord(name) ?? this.findImportedWord(name, visited);
  }

  private findImportedWord(name: string, visited: Set<Module>): Word | undefined {
    for (let i = this.imports.length - 1; i >= 0; i--) {
      const { module, prefix } = this.imports[i];
      let target = name;
      if (prefix !== "") {
        if (!name.startsWith(`${prefix}.`)) continue;
        target = name.slice(prefix.length + 1);
      }
      const word = module.findExportedWord(target, new Set(visited));
      if (word) return word;
    }
    return undefined;
  }

  // ─────────────────────────────────────────────────────────────
  // Copying
  // ─────────────────────────────────────────────────────────────

  /** Copy with fresh variable cells; words, imports and children are shared. */
  copy(): Module {
    const result = new Module(this.name, {
      description: this.description,
      forthic: this.forthic,
      runtimeSpecific: this.runtimeSpecific,
    });
    result.initialized = this.initialized;
    result.words.push(...this.words);
    result.addExportable(this.exportable);
    for (const [name, variable] of this.variables) {
      result.variables.set(name, variable.dup());
    }
    result.imports.push(...this.imports);
    for (const [name, child] of this.children) {
      result.children.set(name, child);
    }
    return result;
  }
}
