// src/index.ts
// Forthic Runtime - Public API
//
// Interpreter, vocabulary building blocks, configuration, and both sides of
// the remote bridge.

// ═══════════════════════════════════════════════════════════════════════════════
// EVALUATION
// ═══════════════════════════════════════════════════════════════════════════════

export { evalForthic, evalWith, type EvalResult } from "./runtime";
export {
  Interpreter,
  DEFAULT_MAX_ATTEMPTS,
  type InterpreterOptions,
  type ModuleSpec,
  type RunErrorHandler,
} from "./core/eval/interpreter";
export { StandardInterpreter } from "./core/eval/standard";
export { Stack } from "./core/eval/stack";
export { Profiler, type WordCount, type Timestamp } from "./core/eval/profile";

// ═══════════════════════════════════════════════════════════════════════════════
// READER
// ═══════════════════════════════════════════════════════════════════════════════

export {
  Tokenizer,
  tokenize,
  tokenizeAll,
  renderTokens,
  type Token,
  type TokenTag,
  type CodeLocation,
} from "./core/reader/tokenize";
export {
  toBool,
  toInt,
  toFloat,
  toZonedDateTime,
  toLiteralDate,
  standardLiteralHandlers,
  isValidTimezone,
  type LiteralHandler,
} from "./core/reader/literals";

// ═══════════════════════════════════════════════════════════════════════════════
// VALUES
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/eval/values";
export { WordOptions } from "./core/eval/options";

// ═══════════════════════════════════════════════════════════════════════════════
// WORDS & MODULES
// ═══════════════════════════════════════════════════════════════════════════════

export {
  Word,
  PushValueWord,
  DefinitionWord,
  NativeWord,
  DirectWord,
  MemoWord,
  type WordErrorHandler,
  type NativeImpl,
  type DirectImpl,
} from "./core/modules/word";
export { Module, Variable, type ModuleImport, type ModuleOptions } from "./core/modules/module";
export {
  defineModule,
  bindWord,
  bindDirectWord,
  parseStackEffect,
  type StackEffect,
  type WordBinding,
  type DirectBinding,
  type ModuleDefinition,
} from "./core/modules/binding";
export { createCoreModule, CORE_MODULE_NAME } from "./core/modules/core";
export { ModuleFactoryRegistry, loadModules, type ModuleFactory } from "./core/modules/loader";
export * from "./registry";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS, LOGGING & CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/errors";
export { createLogger, setLogLevel, getLogLevel, isLogLevel, type Logger, type LogLevel } from "./core/log";
export * from "./core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// REMOTE BRIDGE
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./server";
export * from "./client";
