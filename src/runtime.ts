// src/runtime.ts
// Promise-based evaluation helpers for embedding the interpreter
//
// Usage:
//   import { evalForthic } from "forthic-runtime";
//
//   const result = await evalForthic("[1 2 3] DUP");
//   console.log(result.stack.map(formatValue)); // ["[1 2 3]", "[1 2 3]"]

import { StandardInterpreter } from "./core/eval/standard";
import type { InterpreterOptions } from "./core/eval/interpreter";
import type { Val } from "./core/eval/values";
import { ForthicError, errorMessage } from "./core/errors";

/**
 * Result of an eval operation
 */
export type EvalResult = {
  /** Whether evaluation succeeded */
  ok: boolean;

  /** Operand stack after the run, bottom first; partial when !ok */
  stack: Val[];

  /** Error message (if not ok), with the offending source highlighted */
  error?: string;

  /** Error class name (if not ok) */
  errorType?: string;

  /** Host stack trace of the error (if not ok) */
  stackTrace?: string;
};

/**
 * Run `source` on `interp` and capture the outcome instead of throwing.
 */
export async function evalWith(interp: StandardInterpreter, source: string): Promise<EvalResult> {
  try {
    await interp.run(source);
    return { ok: true, stack: interp.getStack() };
  } catch (e) {
    return {
      ok: false,
      stack: interp.getStack(),
      error: e instanceof ForthicError ? interp.getErrorDescription(source, e) : errorMessage(e),
      errorType: e instanceof Error ? e.name : "Error",
      stackTrace: e instanceof Error ? e.stack : undefined,
    };
  }
}

/**
 * Quick eval helper - creates a standard interpreter and runs source
 *
 * @example
 * const result = await evalForthic("1 2 SWAP");
 * if (result.ok) console.log(result.stack);
 */
export async function evalForthic(source: string, options: InterpreterOptions = {}): Promise<EvalResult> {
  return evalWith(new StandardInterpreter(options), source);
}
