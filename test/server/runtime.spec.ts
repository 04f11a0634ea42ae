import { describe, it, expect, beforeAll } from "vitest";
import { ForthicRuntime } from "../../src/server/runtime";
import { buildErrorInfo, formatLocation } from "../../src/server/errorInfo";
import { defineModule } from "../../src/core/modules/binding";
import { ModuleImportError, UnknownWordError } from "../../src/core/errors";
import { createRemoteRuntimeModule } from "../../src/client/remoteRuntimeModule";
import { VInt } from "../../src/core/eval/values";
import { createFailingModule, createMathModule } from "../helpers/modules";

describe("ForthicRuntime", () => {
  let runtime: ForthicRuntime;

  beforeAll(async () => {
    const greet = defineModule({ name: "greet", forthic: `: HELLO "hi" ; ["HELLO"] EXPORT` });
    runtime = await ForthicRuntime.create([createMathModule(), createFailingModule(), greet]);
  });

  describe("executeWord", () => {
    it("runs one word against the request stack", async () => {
      const response = await runtime.executeWord({
        word_name: "ADD",
        stack: [{ int_value: "2" }, { int_value: "3" }],
      });
      expect(response).toEqual({ result_stack: [{ int_value: "5" }] });
    });

    it("keeps integer precision", async () => {
      const response = await runtime.executeWord({ word_name: "DOUBLE", stack: [{ int_value: "9007199254740993" }] });
      expect(response.result_stack).toEqual([{ int_value: "18014398509481986" }]);
    });

    it("reports an unknown word in the response", async () => {
      const response = await runtime.executeWord({ word_name: "NOPE", stack: [{ int_value: "1" }] });
      expect(response.result_stack).toEqual([]);
      expect(response.error).toMatchObject({
        message: "Unknown word: NOPE (searched: app)",
        runtime: "typescript",
        error_type: "UnknownWordError",
        context: { word_name: "NOPE" },
      });
    });

    it("reports host failures with their module and root cause", async () => {
      const response = await runtime.executeWord({ word_name: "FAIL", stack: [] });
      expect(response.error).toMatchObject({
        message: "Error in boom.FAIL: kaput",
        error_type: "NativeWordError",
        module_name: "boom",
        context: { root_error_type: "Error", root_message: "kaput", word_name: "FAIL" },
      });
    });

    it("reports bad arguments to core words as native word failures", async () => {
      const response = await runtime.executeWord({ word_name: "@", stack: [{ int_value: "5" }] });
      expect(response.error).toMatchObject({
        message: "Error in core.@: Variable must be a string (got Int)",
        error_type: "NativeWordError",
        module_name: "core",
        context: { root_error_type: "TypeError", word_name: "@" },
      });
    });

    it("reports bad arguments to module words as native word failures", async () => {
      const response = await runtime.executeWord({ word_name: "DOUBLE", stack: [{ string_value: "x" }] });
      expect(response.error?.error_type).toBe("NativeWordError");
      expect(response.error?.module_name).toBe("math");
      expect(response.error?.message).toBe("Error in math.DOUBLE: expected an Int (got Str)");
    });

    it("reports results that cannot cross the wire", async () => {
      const response = await runtime.executeWord({ word_name: "~>", stack: [{ array_value: { items: [] } }] });
      expect(response.result_stack).toEqual([]);
      expect(response.error?.error_type).toBe("WireFormatError");
      expect(response.error?.message).toBe("Cannot serialize Options value");
    });

    it("uses words defined by a module's Forthic source", async () => {
      const response = await runtime.executeWord({ word_name: "HELLO", stack: [] });
      expect(response).toEqual({ result_stack: [{ string_value: "hi" }] });
    });
  });

  describe("executeSequence", () => {
    it("threads one stack through the words", async () => {
      const response = await runtime.executeSequence({ word_names: ["DUP", "SWAP"], stack: [{ int_value: "5" }] });
      expect(response).toEqual({ result_stack: [{ int_value: "5" }, { int_value: "5" }] });
    });

    it("starts every call from its own stack", async () => {
      const first = await runtime.executeSequence({ word_names: ["DUP"], stack: [{ int_value: "1" }] });
      const second = await runtime.executeSequence({ word_names: ["DUP"], stack: [{ int_value: "1" }] });
      expect(second).toEqual(first);
      expect(second.result_stack).toHaveLength(2);
    });

    it("stops at the first failing word", async () => {
      const response = await runtime.executeSequence({
        word_names: ["DUP", "NOPE", "DUP"],
        stack: [{ int_value: "1" }],
      });
      expect(response.result_stack).toEqual([]);
      expect(response.error?.error_type).toBe("UnknownWordError");
      expect(response.error?.context).toEqual({
        word_sequence: "DUP NOPE DUP",
        failed_word: "NOPE",
        failed_index: "1",
      });
    });

    it("accepts an empty sequence", async () => {
      const response = await runtime.executeSequence({ word_names: [], stack: [{ bool_value: true }] });
      expect(response).toEqual({ result_stack: [{ bool_value: true }] });
    });
  });

  describe("introspection", () => {
    it("lists registered modules with exported word counts", async () => {
      const { modules } = await runtime.listModules();
      expect(modules.map(m => m.name)).toEqual(["core", "math", "boom", "greet"]);
      expect(modules.find(m => m.name === "math")).toEqual({
        name: "math",
        description: "Integer helpers",
        word_count: 30,
        runtime_specific: true,
      });
      expect(modules.find(m => m.name === "core")?.runtime_specific).toBe(false);
      expect(modules.find(m => m.name === "greet")?.word_count).toBe(1);
    });

    it("describes a module's words", async () => {
      const info = await runtime.getModuleInfo({ module_name: "math" });
      expect(info.name).toBe("math");
      expect(info.words).toHaveLength(30);
      expect(info.words[1]).toEqual({
        name: "ADD",
        stack_effect: "( a:int b:int -- sum:int )",
        description: "Adds two integers",
      });
    });

    it("rejects an unknown module", async () => {
      await expect(runtime.getModuleInfo({ module_name: "nope" })).rejects.toThrow(ModuleImportError);
    });
  });

  it("freezes its registry", () => {
    expect(runtime.registry.isFrozen).toBe(true);
  });
});

describe("buildErrorInfo", () => {
  it("formats the word location", () => {
    const error = new UnknownWordError("1\n    FOO", "FOO", ["app"], {
      source: "lib",
      line: 2,
      column: 5,
      startPos: 6,
      endPos: 9,
    });
    const info = buildErrorInfo(error, { method: "ExecuteWord" });
    expect(info.word_location).toBe("lib:2:5");
    expect(info.context).toEqual({ method: "ExecuteWord" });
    expect(info.stack_trace.length).toBeGreaterThan(0);
  });

  it("handles values that are not errors", () => {
    expect(buildErrorInfo("plain failure")).toEqual({
      message: "plain failure",
      runtime: "typescript",
      stack_trace: [],
      error_type: "Error",
      context: {},
    });
  });

  it("uses <input> for locations without a source", () => {
    expect(formatLocation({ line: 1, column: 2, startPos: 1, endPos: 3 })).toBe("<input>:1:2");
  });
});

describe("ForthicRuntime request isolation", () => {
  it("keeps runtime connections to the request that made them", async () => {
    const runtime = await ForthicRuntime.create([createRemoteRuntimeModule()]);
    const connect = await runtime.executeWord({
      word_name: "CONNECT-RUNTIME",
      stack: [{ string_value: "other" }, { string_value: "localhost:1" }],
    });
    expect(connect).toEqual({ result_stack: [] });

    const sequence = await runtime.executeSequence({
      word_names: ["CONNECT-RUNTIME", "LIST-RUNTIMES"],
      stack: [{ string_value: "mine" }, { string_value: "localhost:2" }],
    });
    expect(sequence.result_stack).toEqual([{ array_value: { items: [{ string_value: "mine" }] } }]);

    const listed = await runtime.executeWord({ word_name: "LIST-RUNTIMES", stack: [] });
    expect(listed).toEqual({ result_stack: [{ array_value: { items: [] } }] });
  });

  it("runs a memo body once for concurrent requests", async () => {
    let runs = 0;
    const config = defineModule({
      name: "config",
      words: [
        {
          name: "LOAD",
          stackEffect: "( -- n:int )",
          impl: async () => {
            await new Promise(resolve => setTimeout(resolve, 20));
            runs++;
            return VInt(runs);
          },
        },
      ],
      forthic: `@: SETTINGS LOAD ; ["SETTINGS"] EXPORT`,
    });
    const runtime = await ForthicRuntime.create([config]);

    const responses = await Promise.all([
      runtime.executeWord({ word_name: "SETTINGS", stack: [] }),
      runtime.executeWord({ word_name: "SETTINGS", stack: [] }),
    ]);
    const later = await runtime.executeWord({ word_name: "SETTINGS", stack: [] });

    expect(runs).toBe(1);
    expect(responses).toEqual([{ result_stack: [{ int_value: "1" }] }, { result_stack: [{ int_value: "1" }] }]);
    expect(later).toEqual({ result_stack: [{ int_value: "1" }] });
  });
});
