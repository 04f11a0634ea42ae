// src/core/eval/interpreter.ts
// Interpreter engine: token loop, compilation, resolution and dispatch

import {
  ExtraSemicolonError,
  ForthicError,
  MissingSemicolonError,
  ModuleError,
  ModuleImportError,
  StackUnderflowError,
  TooManyAttemptsError,
  UnknownWordError,
  UnmatchedBracketError,
  getErrorDescription,
} from "../errors";
import { Module } from "../modules/module";
import {
  DefinitionWord,
  EndArrayWord,
  EndModuleWord,
  PushValueWord,
  StartArrayWord,
  StartModuleWord,
  type Word,
} from "../modules/word";
import { isValidTimezone, standardLiteralHandlers, type LiteralHandler } from "../reader/literals";
import { Tokenizer, type CodeLocation, type Token } from "../reader/tokenize";
import { ModuleRegistry } from "../../registry/registry";
import { Profiler } from "./profile";
import { Stack } from "./stack";
import { VStr, type Val } from "./values";

/**
 * Run-level recovery hook. After it completes, the run resumes with the
 * token after the one that failed.
 */
export type RunErrorHandler = (error: unknown, interp: Interpreter) => void | Promise<void>;

/** A module name, or `[name, prefix]` for a prefixed import. */
export type ModuleSpec = string | [string, string];

export type InterpreterOptions = {
  /** Shared modules; interpreters never register into it */
  registry?: ModuleRegistry;
  /** Modules registered on this instance and imported into the app module */
  modules?: Module[];
  /** IANA zone for zoneless datetime literals and date wildcards */
  timezone?: string;
  errorHandler?: RunErrorHandler;
  maxAttempts?: number;
};

export const DEFAULT_MAX_ATTEMPTS = 3;

type TransientState = {
  compiling: boolean;
  memoDefinition: boolean;
  curDefinition?: DefinitionWord;
  arrayMarks: number;
  moduleDepth: number;
};

export class Interpreter {
  stack = new Stack();
  readonly registry: ModuleRegistry;
  readonly profiler = new Profiler();
  timezone: string;
  maxAttempts: number;
  errorHandler?: RunErrorHandler;

  protected appModule: Module;
  private moduleStack: Module[];
  private localModules = new Map<string, Module>();
  private literalHandlers: LiteralHandler[];
  private tokenizers: Tokenizer[] = [];
  private previousToken?: Token;
  private callLocation?: CodeLocation;

  // compile state
  private compiling = false;
  private memoDefinition = false;
  private curDefinition?: DefinitionWord;

  // stack depths recorded by `[`
  private arrayMarks: number[] = [];

  // imported at construction; their Forthic source runs before the first run
  private pendingInit: Module[] = [];
  private initializing = new Set<Module>();

  constructor(options: InterpreterOptions = {}) {
    this.registry = options.registry ?? new ModuleRegistry();
    this.timezone = options.timezone ?? "UTC";
    if (!isValidTimezone(this.timezone)) {
      throw new ForthicError("", `Unknown timezone: ${this.timezone}`);
    }
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.errorHandler = options.errorHandler;
    this.appModule = new Module("");
    this.moduleStack = [this.appModule];
    this.literalHandlers = standardLiteralHandlers(this.timezone);
    for (const module of options.modules ?? []) {
      this.registerModule(module);
      this.importOnConstruction(module);
    }
  }

  /** Import into the app module now; defer the module's Forthic source to the first run. */
  protected importOnConstruction(module: Module, prefix = ""): void {
    this.appModule.importModule(module, prefix);
    if (!module.initialized) this.pendingInit.push(module);
  }

  private async initializePending(): Promise<void> {
    while (this.pendingInit.length > 0) {
      const module = this.pendingInit.shift();
      if (!module) continue;
      try {
        await this.initializeModule(module);
      } catch (e) {
        // retried (and reported again) on the next run
        this.pendingInit.unshift(module);
        throw e;
      }
    }
  }

  // ─────────────────────────────────────────────────────────────
  // Accessors
  // ─────────────────────────────────────────────────────────────

  getAppModule(): Module {
    return this.appModule;
  }

  /** Source of the outermost run in progress ("" when idle). */
  getTopInputString(): string {
    return this.tokenizers.length > 0 ? this.tokenizers[0].getInput() : "";
  }

  /** Location of the word currently being dispatched. */
  getCallLocation(): CodeLocation | undefined {
    return this.callLocation;
  }

  get isCompiling(): boolean {
    return this.compiling;
  }

  /** Snapshot of the operand stack, bottom first. */
  getStack(): Val[] {
    return this.stack.toArray();
  }

  setStack(items: Val[]): void {
    this.stack.replace(items);
  }

  // ─────────────────────────────────────────────────────────────
  // Stack
  // ─────────────────────────────────────────────────────────────

  push(v: Val): void {
    this.stack.push(v);
  }

  pop(): Val {
    const v = this.stack.pop();
    if (v === undefined) {
      throw new StackUnderflowError(this.getTopInputString(), this.callLocation);
    }
    return v;
  }

  peek(): Val {
    const v = this.stack.peek();
    if (v === undefined) {
      throw new StackUnderflowError(this.getTopInputString(), this.callLocation);
    }
    return v;
  }

  /** Pop `n` values, deepest first. The stack is untouched on underflow. */
  popN(n: number): Val[] {
    const values = this.stack.popN(n);
    if (values === undefined) {
      throw new StackUnderflowError(this.getTopInputString(), this.callLocation);
    }
    return values;
  }

  // ─────────────────────────────────────────────────────────────
  // Literals
  // ─────────────────────────────────────────────────────────────

  registerLiteralHandler(handler: LiteralHandler): void {
    this.literalHandlers.push(handler);
  }

  findLiteralWord(text: string): Word | undefined {
    for (const handler of this.literalHandlers) {
      const value = handler(text);
      if (value !== undefined) return new PushValueWord(text, value);
    }
    return undefined;
  }

  // ─────────────────────────────────────────────────────────────
  // Modules
  // ─────────────────────────────────────────────────────────────

  curModule(): Module {
    return this.moduleStack[this.moduleStack.length - 1];
  }

  moduleStackPush(module: Module): void {
    this.moduleStack.push(module);
  }

  moduleStackPop(): Module {
    if (this.moduleStack.length <= 1) {
      throw new UnmatchedBracketError(this.getTopInputString(), "}", this.callLocation);
    }
    const module = this.moduleStack.pop();
    return module ?? this.appModule;
  }

  /** Names of the active module stack, innermost first. */
  scopeChain(): string[] {
    return this.moduleStack.map(m => m.name || "app").reverse();
  }

  registerModule(module: Module): void {
    this.localModules.set(module.name, module);
  }

  /** Instance registrations shadow the shared registry. */
  findModule(name: string): Module {
    const module = this.localModules.get(name) ?? this.registry.get(name);
    if (!module) {
      throw new ModuleImportError(this.getTopInputString(), name, this.callLocation);
    }
    return module;
  }

  /** Every module visible to this instance, shared ones first. */
  listModules(): Module[] {
    const result = new Map<string, Module>();
    for (const module of this.registry.list()) result.set(module.name, module);
    for (const module of this.localModules.values()) result.set(module.name, module);
    return Array.from(result.values());
  }

  /** Attach registered modules to the current module's import chain. */
  async useModules(specs: ModuleSpec[]): Promise<void> {
    for (const spec of specs) {
      const [name, prefix] = typeof spec === "string" ? [spec, ""] : spec;
      const module = this.findModule(name);
      await this.initializeModule(module);
      this.curModule().importModule(module, prefix);
    }
  }

  /** Register `module` on this instance and import it. */
  async importModule(module: Module, prefix = ""): Promise<void> {
    this.registerModule(module);
    await this.useModules([[module.name, prefix]]);
  }

  /**
   * Run a module's Forthic source inside the module. The module counts as
   * initialized only once its source has run through.
   */
  async initializeModule(module: Module): Promise<void> {
    if (module.initialized || this.initializing.has(module)) return;
    this.initializing.add(module);
    this.moduleStackPush(module);
    try {
      await this.run(module.forthic, { source: module.name });
      module.initialized = true;
    } catch (e) {
      throw new ModuleError(module.name, e);
    } finally {
      this.moduleStack.pop();
      this.initializing.delete(module);
    }
  }

  /**
   * `{name`: find the child module of the current module, or create it.
   * Blocks opened at app level also register the module on this instance.
   */
  enterModuleBlock(name: string): void {
    if (name === "") {
      this.moduleStackPush(this.appModule);
      return;
    }
    const parent = this.curModule();
    let module = parent.children.get(name);
    if (!module) {
      module = new Module(name);
      parent.children.set(name, module);
      if (parent === this.appModule) this.registerModule(module);
    }
    this.moduleStackPush(module);
  }

  exitModuleBlock(): void {
    this.moduleStackPop();
  }

  // ─────────────────────────────────────────────────────────────
  // Resolution & dispatch
  // ─────────────────────────────────────────────────────────────

  /** Module stack top to bottom; UnknownWordError when nothing matches. */
  findWord(name: string, location?: CodeLocation): Word {
    for (let i = this.moduleStack.length - 1; i >= 0; i--) {
      const word = this.moduleStack[i].findWord(name);
      if (word) return word;
    }
    throw new UnknownWordError(this.getTopInputString(), name, this.scopeChain(), location ?? this.callLocation);
  }

  /** Literal first, then the module stack. */
  resolve(text: string, location?: CodeLocation): Word {
    return this.findLiteralWord(text) ?? this.findWord(text, location);
  }

  /** Execute one word, counting it while profiling. */
  async dispatch(word: Word, location?: CodeLocation): Promise<void> {
    if (word.profiled) this.profiler.count(word.qualifiedName());
    this.callLocation = location;
    await word.execute(this);
  }

  /** Resolve `name` and dispatch it once, without tokenizing. */
  async executeWord(name: string): Promise<void> {
    await this.initializePending();
    await this.dispatch(this.resolve(name));
  }

  markArrayStart(): void {
    this.arrayMarks.push(this.stack.length);
  }

  popArrayMark(): number | undefined {
    return this.arrayMarks.pop();
  }

  // ─────────────────────────────────────────────────────────────
  // Running source
  // ─────────────────────────────────────────────────────────────

  /**
   * Execute Forthic source. Nested calls (INTERPRET, module source) share
   * the stack and compile state of the outer run.
   */
  async run(source: string, reference?: Partial<CodeLocation>): Promise<void> {
    const topLevel = this.tokenizers.length === 0;
    if (topLevel) await this.initializePending();
    const tokenizer = new Tokenizer(source, reference);
    const saved = this.saveTransientState();
    this.tokenizers.push(tokenizer);
    try {
      if (this.errorHandler) {
        await this.runWithRecovery(tokenizer, this.errorHandler);
      } else {
        await this.runTokens(tokenizer);
      }
      if (topLevel && this.arrayMarks.length > 0) {
        throw new UnmatchedBracketError(this.getTopInputString(), "[", this.previousToken?.location);
      }
    } catch (e) {
      // a failed run leaves no open definition, bracket or module block behind
      this.restoreTransientState(saved);
      throw e;
    } finally {
      this.tokenizers.pop();
    }
  }

  private async runWithRecovery(tokenizer: Tokenizer, handler: RunErrorHandler): Promise<void> {
    // the handler sees each of the first maxAttempts failures
    for (let attempt = 1; ; attempt++) {
      if (attempt > this.maxAttempts) {
        throw new TooManyAttemptsError(this.getTopInputString(), attempt, this.maxAttempts);
      }
      try {
        await this.runTokens(tokenizer);
        return;
      } catch (e) {
        await handler(e, this);
      }
    }
  }

  private async runTokens(tokenizer: Tokenizer): Promise<void> {
    for (;;) {
      const token = tokenizer.nextToken();
      await this.handleToken(token);
      this.previousToken = token;
      if (token.tag === "EOS") return;
    }
  }

  private async handleToken(token: Token): Promise<void> {
    switch (token.tag) {
      case "Str":
      case "DotSymbol":
        return this.handleWord(new PushValueWord(token.tag === "Str" ? "<string>" : "<dot-symbol>", VStr(token.text)), token.location);
      case "Comment":
        return;
      case "StartArray":
        return this.handleWord(new StartArrayWord(), token.location);
      case "EndArray":
        return this.handleWord(new EndArrayWord(), token.location);
      case "StartModule":
        return this.handleImmediate(new StartModuleWord(token.text), token.location);
      case "EndModule":
        return this.handleImmediate(new EndModuleWord(), token.location);
      case "StartDef":
      case "StartMemo":
        return this.startDefinition(token);
      case "EndDef":
        return this.endDefinition(token);
      case "Word":
        return this.handleWord(this.resolve(token.text, token.location), token.location);
      case "EOS":
        if (this.compiling) {
          throw new MissingSemicolonError(this.getTopInputString(), this.previousToken?.location ?? token.location);
        }
        return;
    }
  }

  /** Compile while defining, otherwise execute. */
  private async handleWord(word: Word, location: CodeLocation): Promise<void> {
    if (this.compiling && this.curDefinition) {
      this.curDefinition.addWord(word, location);
      return;
    }
    await this.dispatch(word, location);
  }

  /** Module brackets run even while compiling (and are compiled as well). */
  private async handleImmediate(word: Word, location: CodeLocation): Promise<void> {
    if (this.compiling && this.curDefinition) {
      this.curDefinition.addWord(word, location);
    }
    await this.dispatch(word, location);
  }

  private startDefinition(token: Token): void {
    if (this.compiling) {
      throw new MissingSemicolonError(this.getTopInputString(), this.previousToken?.location ?? token.location);
    }
    this.curDefinition = new DefinitionWord(token.text, token.location);
    this.compiling = true;
    this.memoDefinition = token.tag === "StartMemo";
  }

  private endDefinition(token: Token): void {
    const definition = this.curDefinition;
    if (!this.compiling || !definition) {
      throw new ExtraSemicolonError(this.getTopInputString(), token.location);
    }
    if (this.memoDefinition) {
      this.curModule().addMemoWords(definition);
    } else {
      this.curModule().addWord(definition);
    }
    this.compiling = false;
    this.memoDefinition = false;
    this.curDefinition = undefined;
  }

  private saveTransientState(): TransientState {
    return {
      compiling: this.compiling,
      memoDefinition: this.memoDefinition,
      curDefinition: this.curDefinition,
      arrayMarks: this.arrayMarks.length,
      moduleDepth: this.moduleStack.length,
    };
  }

  private restoreTransientState(saved: TransientState): void {
    this.compiling = saved.compiling;
    this.memoDefinition = saved.memoDefinition;
    this.curDefinition = saved.curDefinition;
    this.arrayMarks.length = Math.min(this.arrayMarks.length, saved.arrayMarks);
    this.moduleStack.length = Math.min(this.moduleStack.length, saved.moduleDepth);
  }

  // ─────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────

  /** Clear the stack, app variables, module stack and compile state. */
  reset(): void {
    this.stack = new Stack();
    this.appModule.variables.clear();
    this.compiling = false;
    this.memoDefinition = false;
    this.curDefinition = undefined;
    this.arrayMarks = [];
    this.moduleStack = [this.appModule];
    this.previousToken = undefined;
    this.callLocation = undefined;
  }

  /**
   * Copy of this interpreter: app module (fresh variable cells) and stack are
   * copied; the registry and registered modules are shared.
   */
  duplicate(): Interpreter {
    const result = new Interpreter({
      registry: this.registry,
      timezone: this.timezone,
      maxAttempts: this.maxAttempts,
      errorHandler: this.errorHandler,
    });
    this.copyInto(result);
    return result;
  }

  protected copyInto(target: Interpreter): void {
    target.appModule = this.appModule.copy();
    target.moduleStack = [target.appModule];
    target.stack = this.stack.dup();
    target.localModules = new Map(this.localModules);
    target.literalHandlers = this.literalHandlers.slice();
    target.pendingInit = this.pendingInit.slice();
  }

  /** Error text with the offending source highlighted. */
  getErrorDescription(source: string, error: ForthicError): string {
    return getErrorDescription(source, error);
  }
}
