// src/core/modules/word.ts
// Executable units of the vocabulary

import {
  ForthicError,
  IntentionalStopError,
  NativeWordError,
  StackUnderflowError,
  UnmatchedBracketError,
  WordExecutionError,
  errorMessage,
} from "../errors";
import { createLogger } from "../log";
import { WordOptions } from "../eval/options";
import { VArray, type Val } from "../eval/values";
import type { CodeLocation } from "../reader/tokenize";
import type { Interpreter } from "../eval/interpreter";
import type { Module } from "./module";

const log = createLogger("word");

/**
 * Called when a native or direct word fails. Completing normally marks the
 * error as handled; throwing passes it on to the next handler.
 */
export type WordErrorHandler = (error: unknown, word: Word, interp: Interpreter) => void | Promise<void>;

/** Result of a native implementation: a value to push, or nothing. */
export type NativeResult = Val | undefined | void;

export type NativeImpl = (args: Val[], options: WordOptions, interp: Interpreter) => NativeResult | Promise<NativeResult>;

export type DirectImpl = (interp: Interpreter) => void | Promise<void>;

export abstract class Word {
  /** Module that owns this word; set when the word is added to one. */
  module?: Module;
  stackEffect?: string;
  description?: string;
  location?: CodeLocation;
  private readonly errorHandlers: WordErrorHandler[] = [];

  constructor(public readonly name: string) {}

  abstract execute(interp: Interpreter): Promise<void>;

  /** Whether a dispatch of this word shows up in profiling counts. */
  get profiled(): boolean {
    return true;
  }

  /** `module.WORD`, or the bare name for the app module. */
  qualifiedName(): string {
    return this.module && this.module.name ? `${this.module.name}.${this.name}` : this.name;
  }

  addErrorHandler(handler: WordErrorHandler): void {
    this.errorHandlers.push(handler);
  }

  /** Try handlers in order; true once one completes. */
  async tryErrorHandlers(error: unknown, interp: Interpreter): Promise<boolean> {
    for (const handler of this.errorHandlers) {
      try {
        await handler(error, this, interp);
        return true;
      } catch (handlerError) {
        log.debug(`error handler for ${this.name} declined: ${errorMessage(handlerError)}`);
      }
    }
    return false;
  }

  /**
   * Shared failure path for words backed by host code: intentional stops
   * pass through, handlers get a chance, foreign errors are wrapped.
   */
  protected async handleFailure(error: unknown, interp: Interpreter): Promise<void> {
    if (error instanceof IntentionalStopError) throw error;
    if (await this.tryErrorHandlers(error, interp)) return;
    if (error instanceof ForthicError) throw error;
    throw new NativeWordError(this.name, this.module?.name ?? "", errorMessage(error), error, interp.getCallLocation());
  }
}

// ─────────────────────────────────────────────────────────────────
// Literal & user-defined words
// ─────────────────────────────────────────────────────────────────

export class PushValueWord extends Word {
  constructor(name: string, public readonly value: Val) {
    super(name);
  }

  get profiled(): boolean {
    return false;
  }

  async execute(interp: Interpreter): Promise<void> {
    interp.push(this.value);
  }
}

type CompiledEntry = { word: Word; location?: CodeLocation };

/** A word defined in Forthic with `: NAME ... ;` */
export class DefinitionWord extends Word {
  private readonly entries: CompiledEntry[] = [];

  constructor(name: string, location?: CodeLocation) {
    super(name);
    this.location = location;
  }

  addWord(word: Word, location?: CodeLocation): void {
    this.entries.push({ word, location });
  }

  get body(): Word[] {
    return this.entries.map(e => e.word);
  }

  async execute(interp: Interpreter): Promise<void> {
    const callLocation = interp.getCallLocation();
    for (const entry of this.entries) {
      try {
        await interp.dispatch(entry.word, entry.location);
      } catch (e) {
        if (e instanceof IntentionalStopError) throw e;
        throw new WordExecutionError(`Error executing ${this.name}`, e, callLocation, entry.location);
      }
    }
  }
}

// ─────────────────────────────────────────────────────────────────
// Host-backed words
// ─────────────────────────────────────────────────────────────────

/**
 * Native word: pops its declared inputs (deepest first), calls the host
 * implementation and pushes the result unless it is undefined.
 */
export class NativeWord extends Word {
  constructor(
    name: string,
    public readonly inputCount: number,
    public readonly hasOptions: boolean,
    private readonly impl: NativeImpl
  ) {
    super(name);
  }

  async execute(interp: Interpreter): Promise<void> {
    try {
      let options = new WordOptions();
      const top = interp.stack.peek();
      if (this.hasOptions && top !== undefined && top.tag === "Options") {
        interp.stack.pop();
        options = top.options;
      }
      const args = interp.popN(this.inputCount);
      const result = await this.impl(args, options, interp);
      if (isValResult(result)) interp.push(result);
    } catch (e) {
      await this.handleFailure(e, interp);
    }
  }
}

/** Direct word: gets the interpreter itself and manages the stack by hand. */
export class DirectWord extends Word {
  constructor(name: string, private readonly impl: DirectImpl) {
    super(name);
  }

  async execute(interp: Interpreter): Promise<void> {
    try {
      await this.impl(interp);
    } catch (e) {
      await this.handleFailure(e, interp);
    }
  }
}

function isValResult(result: NativeResult): result is Val {
  return result !== undefined;
}

// ─────────────────────────────────────────────────────────────────
// Memo words (`@: NAME ... ;`)
// ─────────────────────────────────────────────────────────────────

export class MemoWord extends Word {
  private cached: Val | undefined;
  // a refresh in progress; concurrent callers join it instead of re-running the body
  private pending: Promise<Val> | undefined;

  constructor(public readonly word: Word) {
    super(word.name);
    this.location = word.location;
  }

  /** Run the wrapped word and cache what it leaves on top. */
  async refresh(interp: Interpreter): Promise<Val> {
    if (this.pending) return this.pending;
    const pending = this.compute(interp);
    this.pending = pending;
    try {
      const value = await pending;
      this.cached = value;
      return value;
    } finally {
      if (this.pending === pending) this.pending = undefined;
    }
  }

  private async compute(interp: Interpreter): Promise<Val> {
    await this.word.execute(interp);
    return interp.pop();
  }

  async execute(interp: Interpreter): Promise<void> {
    const value = this.cached ?? (await this.refresh(interp));
    interp.push(value);
  }
}

/** `NAME!` refreshes the cache without pushing. */
export class MemoBangWord extends Word {
  constructor(private readonly memo: MemoWord) {
    super(`${memo.name}!`);
  }

  async execute(interp: Interpreter): Promise<void> {
    await this.memo.refresh(interp);
  }
}

/** `NAME!@` refreshes the cache and pushes the new value. */
export class MemoBangAtWord extends Word {
  constructor(private readonly memo: MemoWord) {
    super(`${memo.name}!@`);
  }

  async execute(interp: Interpreter): Promise<void> {
    interp.push(await this.memo.refresh(interp));
  }
}

// ─────────────────────────────────────────────────────────────────
// Structural words (compiled from `[ ] { }`)
// ─────────────────────────────────────────────────────────────────

abstract class StructuralWord extends Word {
  get profiled(): boolean {
    return false;
  }
}

export class StartArrayWord extends StructuralWord {
  constructor() {
    super("[");
  }

  async execute(interp: Interpreter): Promise<void> {
    interp.markArrayStart();
  }
}

export class EndArrayWord extends StructuralWord {
  constructor() {
    super("]");
  }

  async execute(interp: Interpreter): Promise<void> {
    const depth = interp.popArrayMark();
    if (depth === undefined) {
      throw new UnmatchedBracketError(interp.getTopInputString(), "]", interp.getCallLocation());
    }
    if (depth > interp.stack.length) {
      throw new StackUnderflowError(interp.getTopInputString(), interp.getCallLocation());
    }
    interp.push(VArray(interp.stack.popAbove(depth)));
  }
}

export class StartModuleWord extends StructuralWord {
  constructor(public readonly moduleName: string) {
    super(`{${moduleName}`);
  }

  async execute(interp: Interpreter): Promise<void> {
    interp.enterModuleBlock(this.moduleName);
  }
}

export class EndModuleWord extends StructuralWord {
  constructor() {
    super("}");
  }

  async execute(interp: Interpreter): Promise<void> {
    interp.exitModuleBlock();
  }
}
