// src/core/modules/binding.ts
// Word-binding builder: declare host words as data, build modules from them

import { ForthicError, StackEffectError } from "../errors";
import { Module } from "./module";
import { DirectWord, NativeWord, type DirectImpl, type NativeImpl, type WordErrorHandler } from "./word";

export type StackEffect = {
  /** Positional inputs, excluding the options slot */
  inputCount: number;
  hasOptions: boolean;
  inputs: string[];
  outputs: string[];
};

export type WordBinding = {
  name: string;
  /** "( a b -- c )"; a trailing `[options:WordOptions]` input marks options */
  stackEffect: string;
  description?: string;
  impl: NativeImpl;
  errorHandlers?: WordErrorHandler[];
};

export type DirectBinding = {
  name: string;
  stackEffect?: string;
  description?: string;
  impl: DirectImpl;
};

export type ModuleDefinition = {
  name: string;
  description?: string;
  words?: WordBinding[];
  directWords?: DirectBinding[];
  /** Defaults to every bound word */
  exports?: string[];
  runtimeSpecific?: boolean;
  forthic?: string;
};

const EFFECT_PATTERN = /^\(\s*(.*?)\s*--\s*(.*?)\s*\)$/s;
const OPTIONS_INPUT = /^\[\s*\w+\s*:\s*WordOptions\s*\]$/;

/**
 * Parse "( a:number b:number -- sum:number )". Throws StackEffectError on
 * anything else.
 */
export function parseStackEffect(text: string): StackEffect {
  const match = EFFECT_PATTERN.exec(text.trim());
  if (!match) {
    throw new StackEffectError(text, "Stack effect must look like ( inputs -- outputs )");
  }
  const inputs = splitItems(match[1]);
  const outputs = splitItems(match[2]);

  const optionsAt = inputs.findIndex(item => item.startsWith("["));
  let hasOptions = false;
  if (optionsAt >= 0) {
    if (!OPTIONS_INPUT.test(inputs[optionsAt])) {
      throw new StackEffectError(text, `Invalid options input ${inputs[optionsAt]}`);
    }
    if (optionsAt !== inputs.length - 1) {
      throw new StackEffectError(text, "Options must be the last input");
    }
    hasOptions = true;
  }

  const positional = hasOptions ? inputs.slice(0, -1) : inputs;
  for (const item of [...positional, ...outputs]) {
    if (item.startsWith(":") || item.endsWith(":") || item.includes("--")) {
      throw new StackEffectError(text, `Invalid stack item ${item}`);
    }
  }

  return { inputCount: positional.length, hasOptions, inputs: positional, outputs };
}

function splitItems(text: string): string[] {
  return text === "" ? [] : text.split(/\s+/);
}

/** Build a native word from a binding. */
export function bindWord(binding: WordBinding): NativeWord {
  const effect = parseStackEffect(binding.stackEffect);
  const word = new NativeWord(binding.name, effect.inputCount, effect.hasOptions, binding.impl);
  word.stackEffect = binding.stackEffect;
  word.description = binding.description;
  for (const handler of binding.errorHandlers ?? []) word.addErrorHandler(handler);
  return word;
}

export function bindDirectWord(binding: DirectBinding): DirectWord {
  if (binding.stackEffect !== undefined) parseStackEffect(binding.stackEffect);
  const word = new DirectWord(binding.name, binding.impl);
  word.stackEffect = binding.stackEffect;
  word.description = binding.description;
  return word;
}

/**
 * Build a module from declarative bindings. Stack effects are parsed here,
 * so a malformed one fails at definition time.
 */
export function defineModule(definition: ModuleDefinition): Module {
  const module = new Module(definition.name, {
    description: definition.description,
    forthic: definition.forthic,
    runtimeSpecific: definition.runtimeSpecific,
  });

  const seen = new Set<string>();
  const words = [...(definition.words ?? []).map(bindWord), ...(definition.directWords ?? []).map(bindDirectWord)];
  for (const word of words) {
    if (seen.has(word.name)) {
      throw new ForthicError("", `Duplicate word ${word.name} in module ${definition.name}`);
    }
    seen.add(word.name);
    module.addWord(word);
  }

  module.addExportable(definition.exports ?? Array.from(seen));
  return module;
}
