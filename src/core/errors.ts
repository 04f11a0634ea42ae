// src/core/errors.ts
// Error taxonomy for the Forthic runtime

import type { CodeLocation } from "./reader/tokenize";

// ─────────────────────────────────────────────────────────────────
// Base
// ─────────────────────────────────────────────────────────────────

/**
 * Base class for every failure raised by the engine.
 *
 * `forthic` is the top-level source being run when the error surfaced (may be
 * empty), `note` the bare message without location decoration.
 */
export class ForthicError extends Error {
  constructor(
    public readonly forthic: string,
    public readonly note: string,
    public readonly location?: CodeLocation,
    public readonly cause?: unknown
  ) {
    super(note);
    this.name = "ForthicError";
  }
}

// ─────────────────────────────────────────────────────────────────
// Tokenizer
// ─────────────────────────────────────────────────────────────────

export class TokenizeError extends ForthicError {
  constructor(forthic: string, note: string, location?: CodeLocation) {
    super(forthic, note, location);
    this.name = "TokenizeError";
  }
}

export class UnterminatedStringError extends TokenizeError {
  constructor(forthic: string, location?: CodeLocation) {
    super(forthic, "Unterminated string", location);
    this.name = "UnterminatedStringError";
  }
}

export class InvalidWordNameError extends TokenizeError {
  constructor(forthic: string, location?: CodeLocation, note = "Invalid word name") {
    super(forthic, note, location);
    this.name = "InvalidWordNameError";
  }
}

export class UnmatchedBracketError extends TokenizeError {
  constructor(forthic: string, public readonly bracket: string, location?: CodeLocation) {
    super(forthic, `Unmatched '${bracket}'`, location);
    this.name = "UnmatchedBracketError";
  }
}

// ─────────────────────────────────────────────────────────────────
// Resolution & dispatch
// ─────────────────────────────────────────────────────────────────

export class UnknownWordError extends ForthicError {
  constructor(
    forthic: string,
    public readonly word: string,
    public readonly scopeChain: string[] = [],
    location?: CodeLocation
  ) {
    super(
      forthic,
      `Unknown word: ${word}${scopeChain.length > 0 ? ` (searched: ${scopeChain.join(" > ")})` : ""}`,
      location
    );
    this.name = "UnknownWordError";
  }
}

export class NativeWordError extends ForthicError {
  constructor(
    public readonly word: string,
    public readonly moduleName: string,
    public readonly underlying: string,
    cause?: unknown,
    location?: CodeLocation
  ) {
    super("", `Error in ${moduleName ? `${moduleName}.` : ""}${word}: ${underlying}`, location, cause);
    this.name = "NativeWordError";
  }
}

export class WordExecutionError extends ForthicError {
  constructor(
    note: string,
    public readonly inner: unknown,
    callLocation?: CodeLocation,
    public readonly definitionLocation?: CodeLocation
  ) {
    super("", note, callLocation, inner);
    this.name = "WordExecutionError";
  }
}

export class StackUnderflowError extends ForthicError {
  constructor(forthic: string, location?: CodeLocation) {
    super(forthic, "Stack underflow", location);
    this.name = "StackUnderflowError";
  }
}

export class OptionsError extends ForthicError {
  constructor(note: string) {
    super("", note);
    this.name = "OptionsError";
  }
}

export class StackEffectError extends ForthicError {
  constructor(public readonly stackEffect: string, note: string) {
    super("", `${note}: ${stackEffect}`);
    this.name = "StackEffectError";
  }
}

export class InvalidVariableNameError extends ForthicError {
  constructor(forthic: string, public readonly varname: string, location?: CodeLocation) {
    super(forthic, `Invalid variable name: ${varname}`, location);
    this.name = "InvalidVariableNameError";
  }
}

// ─────────────────────────────────────────────────────────────────
// Compilation
// ─────────────────────────────────────────────────────────────────

export class MissingSemicolonError extends ForthicError {
  constructor(forthic: string, location?: CodeLocation) {
    super(forthic, "Missing semicolon", location);
    this.name = "MissingSemicolonError";
  }
}

export class ExtraSemicolonError extends ForthicError {
  constructor(forthic: string, location?: CodeLocation) {
    super(forthic, "Extra semicolon", location);
    this.name = "ExtraSemicolonError";
  }
}

// ─────────────────────────────────────────────────────────────────
// Modules
// ─────────────────────────────────────────────────────────────────

/** An unregistered module was requested. */
export class ModuleImportError extends ForthicError {
  constructor(forthic: string, public readonly moduleName: string, location?: CodeLocation) {
    super(forthic, `Unknown module: ${moduleName}`, location);
    this.name = "ModuleImportError";
  }
}

/** A module's own Forthic source failed while being run. */
export class ModuleError extends ForthicError {
  constructor(public readonly moduleName: string, error: unknown) {
    super("", `Error in module ${moduleName}: ${errorMessage(error)}`, undefined, error);
    this.name = "ModuleError";
  }
}

/** A configured module could not be instantiated at startup. */
export class ModuleLoadError extends ForthicError {
  constructor(public readonly moduleName: string, reason: string, cause?: unknown) {
    super("", `Failed to load module '${moduleName}': ${reason}`, undefined, cause);
    this.name = "ModuleLoadError";
  }
}

// ─────────────────────────────────────────────────────────────────
// Control
// ─────────────────────────────────────────────────────────────────

export class TooManyAttemptsError extends ForthicError {
  constructor(
    forthic: string,
    public readonly numAttempts: number,
    public readonly maxAttempts: number
  ) {
    super(forthic, `Too many recovery attempts: ${numAttempts} of ${maxAttempts}`);
    this.name = "TooManyAttemptsError";
  }
}

/** Raised by debug words to stop a run on purpose. Never intercepted by word error handlers. */
export class IntentionalStopError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IntentionalStopError";
  }
}

// ─────────────────────────────────────────────────────────────────
// Wire
// ─────────────────────────────────────────────────────────────────

export class WireFormatError extends ForthicError {
  constructor(note: string) {
    super("", note);
    this.name = "WireFormatError";
  }
}

/** A remote call ran past its deadline; its partial stack is discarded. */
export class RequestTimeoutError extends ForthicError {
  constructor(public readonly method: string, public readonly timeoutMs: number) {
    super("", `${method} timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

// ─────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Follow `cause` links to the innermost error. */
export function rootCause(error: unknown): unknown {
  let current = error;
  const seen = new Set<unknown>();
  while (current instanceof ForthicError && current.cause !== undefined && !seen.has(current)) {
    seen.add(current);
    current = current.cause;
  }
  return current;
}

/**
 * Format an error with the offending source line(s) and a caret marker.
 * Falls back to the bare note when there is no source or location.
 */
export function getErrorDescription(forthic: string, error: ForthicError): string {
  const location = error.location;
  if (!forthic || !location) {
    return error.note;
  }

  if (error instanceof WordExecutionError && error.definitionLocation) {
    const def = error.definitionLocation;
    return (
      `${error.note} ${describeLocation("at line", def)}:\n` +
      `\`\`\`\n${highlight(forthic, def)}\n\`\`\`\n` +
      `Called from ${describeLocation("line", location)}:\n` +
      `\`\`\`\n${highlight(forthic, location)}\n\`\`\``
    );
  }

  return `${error.note} ${describeLocation("at line", location)}:\n\`\`\`\n${highlight(forthic, location)}\n\`\`\``;
}

function describeLocation(prefix: string, location: CodeLocation): string {
  return `${prefix} ${location.line}${location.source ? ` in ${location.source}` : ""}`;
}

function highlight(forthic: string, location: CodeLocation): string {
  const lines = forthic.split("\n").slice(0, location.line);
  const width = Math.max(1, location.endPos - location.startPos);
  const marker = " ".repeat(Math.max(0, location.column - 1)) + "^".repeat(width);
  return `${lines.join("\n")}\n${marker}`;
}
