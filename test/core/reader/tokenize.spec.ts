import { describe, it, expect } from "vitest";
import { Tokenizer, renderTokens, tokenizeAll, type Token } from "../../../src/core/reader/tokenize";
import { InvalidWordNameError, UnterminatedStringError } from "../../../src/core/errors";

const shape = (tokens: Token[]) => tokens.map(t => [t.tag, t.text]);

describe("tokenizer", () => {
  it("splits an array literal into bracket and word tokens", () => {
    expect(shape(tokenizeAll("[1 2 3]"))).toEqual([
      ["StartArray", "["],
      ["Word", "1"],
      ["Word", "2"],
      ["Word", "3"],
      ["EndArray", "]"],
    ]);
  });

  it("ends with an EOS token", () => {
    const tokenizer = new Tokenizer("DUP");
    expect(tokenizer.nextToken().tag).toBe("Word");
    expect(tokenizer.nextToken().tag).toBe("EOS");
  });

  it("treats parentheses and commas as whitespace", () => {
    expect(shape(tokenizeAll("(A,B)"))).toEqual([
      ["Word", "A"],
      ["Word", "B"],
    ]);
  });

  it("reads definitions, memos and module blocks", () => {
    expect(shape(tokenizeAll(": SQUARE DUP * ; @: CACHED 1 ; {util }"))).toEqual([
      ["StartDef", "SQUARE"],
      ["Word", "DUP"],
      ["Word", "*"],
      ["EndDef", ";"],
      ["StartMemo", "CACHED"],
      ["Word", "1"],
      ["EndDef", ";"],
      ["StartModule", "util"],
      ["EndModule", "}"],
    ]);
  });

  it("reads an empty module name for {}", () => {
    expect(shape(tokenizeAll("{}"))).toEqual([
      ["StartModule", ""],
      ["EndModule", "}"],
    ]);
  });

  it("reads strings with each quote character", () => {
    expect(shape(tokenizeAll(`"a b" 'c' ^d^`))).toEqual([
      ["Str", "a b"],
      ["Str", "c"],
      ["Str", "d"],
    ]);
  });

  it("keeps embedded quotes inside triple-quoted strings", () => {
    expect(shape(tokenizeAll(`"""say "hi" now"""`))).toEqual([["Str", `say "hi" now`]]);
  });

  it("gives extra closing quotes of a triple-quoted string to its contents", () => {
    expect(shape(tokenizeAll(`""""x""""`))).toEqual([["Str", `"x"`]]);
  });

  it("reads dot symbols, and a lone dot as a word", () => {
    expect(shape(tokenizeAll(".depth ."))).toEqual([
      ["DotSymbol", "depth"],
      ["Word", "."],
    ]);
  });

  it("reads comments to the end of the line", () => {
    expect(shape(tokenizeAll("# a note\n1"))).toEqual([
      ["Comment", " a note"],
      ["Word", "1"],
    ]);
  });

  it("stops words at brackets and semicolons", () => {
    expect(shape(tokenizeAll("A[B]C;"))).toEqual([
      ["Word", "A"],
      ["StartArray", "["],
      ["Word", "B"],
      ["EndArray", "]"],
      ["Word", "C"],
      ["EndDef", ";"],
    ]);
  });

  it("unescapes &lt; and &gt;", () => {
    expect(shape(tokenizeAll("&lt; &gt;="))).toEqual([
      ["Word", "<"],
      ["Word", ">="],
    ]);
  });

  it("records line, column and positions", () => {
    const [a, b] = tokenizeAll("A\n  BC");
    expect(a.location).toEqual({ source: undefined, line: 1, column: 1, startPos: 0, endPos: 1 });
    expect(b.location).toEqual({ source: undefined, line: 2, column: 3, startPos: 4, endPos: 6 });
  });

  it("locates a definition name after the colon", () => {
    const [def] = tokenizeAll(": SQUARE DUP ;");
    expect(def.location.column).toBe(3);
    expect(def.location.startPos).toBe(2);
    expect(def.location.endPos).toBe(8);
  });

  it("offsets locations by a reference location", () => {
    const [tok] = tokenizeAll("X", { source: "lib", line: 10, column: 5, startPos: 100 });
    expect(tok.location).toEqual({ source: "lib", line: 10, column: 5, startPos: 100, endPos: 101 });
  });

  it("rejects an unterminated string", () => {
    expect(() => tokenizeAll(`"abc`)).toThrow(UnterminatedStringError);
    expect(() => tokenizeAll(`"""abc""`)).toThrow(UnterminatedStringError);
  });

  it("rejects bad definition names", () => {
    expect(() => tokenizeAll(`: "bad" ;`)).toThrow(InvalidWordNameError);
    expect(() => tokenizeAll(": A[ ;")).toThrow("Definition names can't have '[' in them");
    expect(() => tokenizeAll(":")).toThrow("Got EOS in definition name");
  });

  it("renders tokens back to source that tokenizes the same way", () => {
    const source = `: GREET "hi" .name [1 2] {m } ; @: M 1 ;`;
    const tokens = tokenizeAll(source);
    const rendered = renderTokens(tokens);
    expect(rendered).toBe(`: GREET "hi" .name [ 1 2 ] {m } ; @: M 1 ;`);
    expect(shape(tokenizeAll(rendered))).toEqual(shape(tokens));
  });

  it("picks a quote character the string does not contain", () => {
    const tokens = tokenizeAll(`'say "hi"'`);
    expect(renderTokens(tokens)).toBe(`'say "hi"'`);
  });
});
