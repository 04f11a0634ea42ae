// src/core/modules/core.ts
// The `core` vocabulary: stack, variables, modules, options, profiling, recovery

import { IntentionalStopError, InvalidVariableNameError, errorMessage } from "../errors";
import type { Interpreter, ModuleSpec } from "../eval/interpreter";
import { WordOptions } from "../eval/options";
import { VBool, VNull, VRecord, VStr, formatValue, type Val } from "../eval/values";
import { defineModule, type DirectBinding, type WordBinding } from "./binding";
import type { Module, Variable } from "./module";

export const CORE_MODULE_NAME = "core";

function expectString(value: Val, what: string): string {
  if (value.tag !== "Str") {
    throw new TypeError(`${what} must be a string (got ${value.tag})`);
  }
  return value.s;
}

function expectArray(value: Val, what: string): Val[] {
  if (value.tag === "Null") return [];
  if (value.tag !== "Array") {
    throw new TypeError(`${what} must be an array (got ${value.tag})`);
  }
  return value.items;
}

function checkVariableName(interp: Interpreter, name: string): void {
  if (name.startsWith("__")) {
    throw new InvalidVariableNameError(interp.getTopInputString(), name, interp.getCallLocation());
  }
}

/** A variable reference, or a name created in the current module on first use. */
function toVariable(interp: Interpreter, value: Val): Variable {
  if (value.tag === "VariableRef") return value.variable;
  const name = expectString(value, "Variable");
  checkVariableName(interp, name);
  return interp.curModule().addVariable(name);
}

function isBlank(value: Val): boolean {
  return value.tag === "Null" || (value.tag === "Str" && value.s === "");
}

function toModuleSpecs(items: Val[]): ModuleSpec[] {
  return items.map(item => {
    if (item.tag === "Str") return item.s;
    if (item.tag === "Array" && item.items.length === 2) {
      return [expectString(item.items[0], "Module name"), expectString(item.items[1], "Module prefix")];
    }
    throw new TypeError(`USE-MODULES expects names or [name prefix] pairs (got ${formatValue(item)})`);
  });
}

const words: WordBinding[] = [
  // stack
  {
    name: "POP",
    stackEffect: "( item:any -- )",
    description: "Removes the top item",
    impl: () => undefined,
  },
  {
    name: "DUP",
    stackEffect: "( a:any -- a:any a:any )",
    description: "Duplicates the top item",
    impl: ([a], _options, interp) => {
      interp.push(a);
      return a;
    },
  },
  {
    name: "SWAP",
    stackEffect: "( a:any b:any -- b:any a:any )",
    description: "Swaps the top two items",
    impl: ([a, b], _options, interp) => {
      interp.push(b);
      return a;
    },
  },

  // variables
  {
    name: "VARIABLES",
    stackEffect: "( varnames:string[] -- )",
    description: "Creates variables in the current module",
    impl: ([names], _options, interp) => {
      for (const item of expectArray(names, "Variable names")) {
        const name = expectString(item, "Variable name");
        checkVariableName(interp, name);
        interp.curModule().addVariable(name);
      }
    },
  },
  {
    name: "!",
    stackEffect: "( value:any variable:any -- )",
    description: "Stores a value in a variable",
    impl: ([value, variable], _options, interp) => {
      toVariable(interp, variable).value = value;
    },
  },
  {
    name: "@",
    stackEffect: "( variable:any -- value:any )",
    description: "Fetches a variable's value",
    impl: ([variable], _options, interp) => toVariable(interp, variable).value,
  },
  {
    name: "!@",
    stackEffect: "( value:any variable:any -- value:any )",
    description: "Stores a value and pushes it back",
    impl: ([value, variable], _options, interp) => {
      toVariable(interp, variable).value = value;
      return value;
    },
  },

  // modules
  {
    name: "EXPORT",
    stackEffect: "( names:string[] -- )",
    description: "Adds names to the current module's export list",
    impl: ([names], _options, interp) => {
      interp.curModule().addExportable(expectArray(names, "Export names").map(n => expectString(n, "Export name")));
    },
  },
  {
    name: "USE-MODULES",
    stackEffect: "( names:any[] -- )",
    description: "Imports registered modules into the current module; [name prefix] imports with a prefix",
    impl: async ([names], _options, interp) => {
      await interp.useModules(toModuleSpecs(expectArray(names, "Module names")));
    },
  },

  // misc
  {
    name: "IDENTITY",
    stackEffect: "( -- )",
    description: "Does nothing",
    impl: () => undefined,
  },
  {
    name: "NOP",
    stackEffect: "( -- )",
    description: "Does nothing",
    impl: () => undefined,
  },
  {
    name: "NULL",
    stackEffect: "( -- null:null )",
    description: "Pushes null",
    impl: () => VNull,
  },
  {
    name: "ARRAY?",
    stackEffect: "( value:any -- is_array:boolean )",
    description: "TRUE if the value is an array",
    impl: ([value]) => VBool(value.tag === "Array"),
  },
  {
    name: "DEFAULT",
    stackEffect: "( value:any default_value:any -- result:any )",
    description: "Replaces null or empty string with a default",
    impl: ([value, fallback]) => (isBlank(value) ? fallback : value),
  },
  {
    name: "*DEFAULT",
    stackEffect: "( value:any default_forthic:string -- result:any )",
    description: "Replaces null or empty string with the result of running Forthic",
    impl: async ([value, forthic], _options, interp) => {
      if (!isBlank(value)) return value;
      await interp.run(expectString(forthic, "Default Forthic"));
      return interp.pop();
    },
  },
  {
    name: "~>",
    stackEffect: "( items:any[] -- options:WordOptions )",
    description: "Builds options from a flat [.key value ...] array",
    impl: ([items]) => ({ tag: "Options", options: WordOptions.fromFlatArray(expectArray(items, "Options")) }),
  },

  // profiling
  {
    name: "PROFILE-START",
    stackEffect: "( -- )",
    description: "Clears profiling data and starts counting word dispatches",
    impl: (_args, _options, interp) => {
      interp.profiler.start();
    },
  },
  {
    name: "PROFILE-END",
    stackEffect: "( -- )",
    description: "Stops counting word dispatches",
    impl: (_args, _options, interp) => {
      interp.profiler.stop();
    },
  },
  {
    name: "PROFILE-TIMESTAMP",
    stackEffect: "( label:string -- )",
    description: "Records a labelled timestamp",
    impl: ([label], _options, interp) => {
      interp.profiler.timestamp(expectString(label, "Timestamp label"));
    },
  },
  {
    name: "PROFILE-DATA",
    stackEffect: "( -- data:record )",
    description: "Pushes {word_counts, timestamps}",
    impl: (_args, _options, interp) => interp.profiler.toRecord(),
  },
];

const directWords: DirectBinding[] = [
  {
    name: "INTERPRET",
    stackEffect: "( forthic:string -- )",
    description: "Runs a string of Forthic in the current scope",
    impl: async interp => {
      const forthic = interp.pop();
      if (forthic.tag === "Null") return;
      await interp.run(expectString(forthic, "INTERPRET source"));
    },
  },
  {
    name: "TRY",
    stackEffect: "( forthic:string -- error:record|null )",
    description: "Runs Forthic; on failure restores the stack and pushes {message, error_type}",
    impl: async interp => {
      const forthic = expectString(interp.pop(), "TRY source");
      const saved = interp.getStack();
      try {
        await interp.run(forthic);
      } catch (e) {
        if (e instanceof IntentionalStopError) throw e;
        interp.setStack(saved);
        interp.push(
          VRecord([
            ["message", VStr(errorMessage(e))],
            ["error_type", VStr(e instanceof Error ? e.name : "Error")],
          ])
        );
        return;
      }
      interp.push(VNull);
    },
  },
  {
    name: "PEEK!",
    stackEffect: "( -- )",
    description: "Prints the top of the stack and stops",
    impl: interp => {
      const top = interp.stack.peek();
      console.log(top === undefined ? "<STACK EMPTY>" : formatValue(top));
      throw new IntentionalStopError("PEEK!");
    },
  },
  {
    name: "STACK!",
    stackEffect: "( -- )",
    description: "Prints the whole stack, top first, and stops",
    impl: interp => {
      const items = interp.getStack().reverse();
      console.log(items.length === 0 ? "<STACK EMPTY>" : items.map(formatValue).join("\n"));
      throw new IntentionalStopError("STACK!");
    },
  },
];

/**
 * Fresh `core` module. It carries no state of its own, so one instance can
 * be shared by every interpreter of a runtime.
 */
export function createCoreModule(): Module {
  return defineModule({
    name: CORE_MODULE_NAME,
    description: "Stack, variable, module, options, profiling and recovery words",
    words,
    directWords,
    runtimeSpecific: false,
  });
}
