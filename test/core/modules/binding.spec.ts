import { describe, it, expect } from "vitest";
import { bindDirectWord, bindWord, defineModule, parseStackEffect } from "../../../src/core/modules/binding";
import { DirectWord, NativeWord } from "../../../src/core/modules/word";
import { StackEffectError } from "../../../src/core/errors";
import { VInt } from "../../../src/core/eval/values";

describe("parseStackEffect", () => {
  it("counts positional inputs", () => {
    expect(parseStackEffect("( a:number b:number -- sum:number )")).toEqual({
      inputCount: 2,
      hasOptions: false,
      inputs: ["a:number", "b:number"],
      outputs: ["sum:number"],
    });
  });

  it("recognizes a trailing options input", () => {
    expect(parseStackEffect("( x:any [options:WordOptions] -- y:any )")).toEqual({
      inputCount: 1,
      hasOptions: true,
      inputs: ["x:any"],
      outputs: ["y:any"],
    });
  });

  it("accepts an empty effect", () => {
    expect(parseStackEffect("( -- )")).toEqual({ inputCount: 0, hasOptions: false, inputs: [], outputs: [] });
  });

  it("rejects malformed effects", () => {
    expect(() => parseStackEffect("a -- b")).toThrow(StackEffectError);
    expect(() => parseStackEffect("a -- b")).toThrow("Stack effect must look like ( inputs -- outputs ): a -- b");
    expect(() => parseStackEffect("( [o:WordOptions] x -- )")).toThrow("Options must be the last input");
    expect(() => parseStackEffect("( [opts] -- )")).toThrow("Invalid options input [opts]");
    expect(() => parseStackEffect("( :a -- )")).toThrow("Invalid stack item :a");
  });
});

describe("bindings", () => {
  it("builds native words with their documentation", () => {
    const word = bindWord({
      name: "ONE",
      stackEffect: "( -- one:int )",
      description: "Pushes 1",
      impl: () => VInt(1),
    });
    expect(word).toBeInstanceOf(NativeWord);
    expect(word.inputCount).toBe(0);
    expect(word.stackEffect).toBe("( -- one:int )");
    expect(word.description).toBe("Pushes 1");
  });

  it("builds direct words", () => {
    const word = bindDirectWord({ name: "RAW", impl: () => undefined });
    expect(word).toBeInstanceOf(DirectWord);
    expect(word.stackEffect).toBeUndefined();
  });

  it("exports every bound word by default", () => {
    const module = defineModule({
      name: "m",
      words: [{ name: "A", stackEffect: "( -- )", impl: () => undefined }],
      directWords: [{ name: "B", impl: () => undefined }],
    });
    expect(module.exportedNames()).toEqual(["A", "B"]);
    expect(module.findDictionaryWord("A")?.module).toBe(module);
  });

  it("fails at definition time on duplicates and bad effects", () => {
    expect(() =>
      defineModule({
        name: "m",
        words: [
          { name: "A", stackEffect: "( -- )", impl: () => undefined },
          { name: "A", stackEffect: "( -- )", impl: () => undefined },
        ],
      })
    ).toThrow("Duplicate word A in module m");
    expect(() =>
      defineModule({ name: "m", words: [{ name: "A", stackEffect: "nope", impl: () => undefined }] })
    ).toThrow(StackEffectError);
  });
});
