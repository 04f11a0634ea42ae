// src/core/reader/tokenize.ts
// Forthic lexer: source text -> token stream

import { InvalidWordNameError, UnterminatedStringError } from "../errors";

export type CodeLocation = {
  /** Where the text came from (module name, file path) */
  source?: string;
  line: number;
  column: number;
  startPos: number;
  endPos: number;
};

export type TokenTag =
  | "Word"
  | "Str"
  | "Comment"
  | "StartArray"
  | "EndArray"
  | "StartModule"
  | "EndModule"
  | "StartDef"
  | "StartMemo"
  | "EndDef"
  | "DotSymbol"
  | "EOS";

export type Token = {
  tag: TokenTag;
  /** Word name, string contents, module/definition name, or symbol without its dot */
  text: string;
  location: CodeLocation;
};

const WHITESPACE = new Set([" ", "\t", "\n", "\r", "(", ")", ","]);
const QUOTES = new Set(['"', "'", "^"]);
const WORD_TERMINATORS = new Set([";", "[", "]", "{", "}", "#"]);
const NAME_BRACKETS = new Set(["[", "]", "{", "}"]);

/**
 * Stateful tokenizer. One instance per source string; not restartable.
 */
export class Tokenizer {
  private readonly input: string;
  private readonly reference: CodeLocation;
  private pos = 0;
  private line: number;
  private column: number;

  // start of the token being gathered
  private tokenLine = 1;
  private tokenColumn = 1;
  private tokenStart = 0;

  constructor(source: string, reference?: Partial<CodeLocation>) {
    this.input = source.replace(/&lt;/g, "<").replace(/&gt;/g, ">");
    this.reference = {
      source: reference?.source,
      line: reference?.line ?? 1,
      column: reference?.column ?? 1,
      startPos: reference?.startPos ?? 0,
      endPos: reference?.endPos ?? 0,
    };
    this.line = this.reference.line;
    this.column = this.reference.column;
  }

  getInput(): string {
    return this.input;
  }

  /** Location of the current read position. */
  currentLocation(): CodeLocation {
    const startPos = this.pos + this.reference.startPos;
    return {
      source: this.reference.source,
      line: this.line,
      column: this.column,
      startPos,
      endPos: startPos,
    };
  }

  nextToken(): Token {
    while (this.pos < this.input.length) {
      const c = this.input[this.pos];
      if (WHITESPACE.has(c)) {
        this.advance(1);
        continue;
      }

      this.noteStart();

      if (c === "#") {
        this.advance(1);
        return this.gatherComment();
      }
      if (c === ":") {
        this.advance(1);
        return this.gatherDefinitionName("StartDef");
      }
      if (c === "@" && this.input[this.pos + 1] === ":") {
        this.advance(2);
        return this.gatherDefinitionName("StartMemo");
      }
      if (c === ";") {
        this.advance(1);
        return this.token("EndDef", c);
      }
      if (c === "[") {
        this.advance(1);
        return this.token("StartArray", c);
      }
      if (c === "]") {
        this.advance(1);
        return this.token("EndArray", c);
      }
      if (c === "}") {
        this.advance(1);
        return this.token("EndModule", c);
      }
      if (c === "{") {
        this.advance(1);
        return this.gatherModuleName();
      }
      if (this.isTripleQuote(this.pos)) {
        this.advance(3);
        return this.gatherTripleQuoteString(c);
      }
      if (QUOTES.has(c)) {
        this.advance(1);
        return this.gatherString(c);
      }
      if (c === ".") {
        return this.gatherDotSymbol();
      }
      return this.gatherWord();
    }

    this.noteStart();
    return this.token("EOS", "");
  }

  // ─────────────────────────────────────────────────────────────
  // Gatherers
  // ─────────────────────────────────────────────────────────────

  private gatherComment(): Token {
    let text = "";
    while (this.pos < this.input.length && this.input[this.pos] !== "\n") {
      text += this.input[this.pos];
      this.advance(1);
    }
    return this.token("Comment", text);
  }

  private gatherDefinitionName(tag: "StartDef" | "StartMemo"): Token {
    const kind = tag === "StartDef" ? "Definition" : "Memo";
    while (this.pos < this.input.length && WHITESPACE.has(this.input[this.pos])) {
      this.advance(1);
    }
    if (this.pos >= this.input.length) {
      throw new InvalidWordNameError(this.input, this.currentLocation(), `Got EOS in ${kind.toLowerCase()} name`);
    }

    this.noteStart();
    let name = "";
    while (this.pos < this.input.length) {
      const c = this.input[this.pos];
      if (WHITESPACE.has(c)) break;
      if (QUOTES.has(c)) {
        throw new InvalidWordNameError(this.input, this.currentLocation(), `${kind} names can't have quotes in them`);
      }
      if (NAME_BRACKETS.has(c)) {
        throw new InvalidWordNameError(this.input, this.currentLocation(), `${kind} names can't have '${c}' in them`);
      }
      name += c;
      this.advance(1);
    }
    return this.token(tag, name);
  }

  private gatherModuleName(): Token {
    let name = "";
    while (this.pos < this.input.length) {
      const c = this.input[this.pos];
      if (WHITESPACE.has(c)) {
        this.advance(1);
        break;
      }
      if (c === "}") break;
      name += c;
      this.advance(1);
    }
    return this.token("StartModule", name);
  }

  private gatherTripleQuoteString(delim: string): Token {
    let text = "";
    while (this.pos < this.input.length) {
      const c = this.input[this.pos];
      if (c === delim && this.isTripleQuote(this.pos)) {
        // four or more quotes: the extras belong to the string
        if (this.input[this.pos + 3] === delim) {
          text += delim;
          this.advance(1);
          continue;
        }
        this.advance(3);
        return this.token("Str", text);
      }
      text += c;
      this.advance(1);
    }
    throw new UnterminatedStringError(this.input, this.tokenLocation(text));
  }

  private gatherString(delim: string): Token {
    let text = "";
    while (this.pos < this.input.length) {
      const c = this.input[this.pos];
      this.advance(1);
      if (c === delim) {
        return this.token("Str", text);
      }
      text += c;
    }
    throw new UnterminatedStringError(this.input, this.tokenLocation(text));
  }

  private gatherWord(): Token {
    return this.token("Word", this.gatherBareText());
  }

  private gatherDotSymbol(): Token {
    const text = this.gatherBareText();
    if (text.length < 2) {
      return this.token("Word", text);
    }
    return this.token("DotSymbol", text.slice(1));
  }

  private gatherBareText(): string {
    let text = "";
    while (this.pos < this.input.length) {
      const c = this.input[this.pos];
      if (WHITESPACE.has(c)) {
        this.advance(1);
        break;
      }
      if (WORD_TERMINATORS.has(c)) break;
      text += c;
      this.advance(1);
    }
    return text;
  }

  // ─────────────────────────────────────────────────────────────
  // Position bookkeeping
  // ─────────────────────────────────────────────────────────────

  private isTripleQuote(index: number): boolean {
    const c = this.input[index];
    if (!QUOTES.has(c)) return false;
    if (index + 2 >= this.input.length) return false;
    return this.input[index + 1] === c && this.input[index + 2] === c;
  }

  private advance(n: number): void {
    for (let i = 0; i < n && this.pos < this.input.length; i++) {
      if (this.input[this.pos] === "\n") {
        this.line++;
        this.column = 1;
      } else {
        this.column++;
      }
      this.pos++;
    }
  }

  private noteStart(): void {
    this.tokenLine = this.line;
    this.tokenColumn = this.column;
    this.tokenStart = this.pos + this.reference.startPos;
  }

  private tokenLocation(text: string): CodeLocation {
    return {
      source: this.reference.source,
      line: this.tokenLine,
      column: this.tokenColumn,
      startPos: this.tokenStart,
      endPos: this.tokenStart + text.length,
    };
  }

  private token(tag: TokenTag, text: string): Token {
    return { tag, text, location: this.tokenLocation(text) };
  }
}

/**
 * Lazily yield the tokens of `source`, stopping before end-of-source.
 */
export function* tokenize(source: string, reference?: Partial<CodeLocation>): Generator<Token, void, undefined> {
  const tokenizer = new Tokenizer(source, reference);
  for (;;) {
    const tok = tokenizer.nextToken();
    if (tok.tag === "EOS") return;
    yield tok;
  }
}

export function tokenizeAll(source: string, reference?: Partial<CodeLocation>): Token[] {
  return Array.from(tokenize(source, reference));
}

/**
 * Render tokens back to source text. Re-tokenizing the result yields the
 * same tags and texts.
 */
export function renderTokens(tokens: Iterable<Token>): string {
  const parts: string[] = [];
  for (const tok of tokens) {
    switch (tok.tag) {
      case "Word":
        parts.push(tok.text);
        break;
      case "Str":
        parts.push(quoteString(tok.text));
        break;
      case "DotSymbol":
        parts.push(`.${tok.text}`);
        break;
      case "Comment":
        parts.push(`#${tok.text}\n`);
        break;
      case "StartArray":
        parts.push("[");
        break;
      case "EndArray":
        parts.push("]");
        break;
      case "StartModule":
        parts.push(`{${tok.text}`);
        break;
      case "EndModule":
        parts.push("}");
        break;
      case "StartDef":
        parts.push(`: ${tok.text}`);
        break;
      case "StartMemo":
        parts.push(`@: ${tok.text}`);
        break;
      case "EndDef":
        parts.push(";");
        break;
      case "EOS":
        break;
    }
  }
  return parts.join(" ");
}

function quoteString(text: string): string {
  const multiline = text.includes("\n");
  for (const q of QUOTES) {
    if (!text.includes(q)) {
      return multiline ? `${q}${q}${q}${text}${q}${q}${q}` : `${q}${text}${q}`;
    }
  }
  // every quote character occurs; a triple quote still works unless it occurs tripled
  for (const q of QUOTES) {
    if (!text.includes(q + q + q) && !text.endsWith(q)) {
      return `${q}${q}${q}${text}${q}${q}${q}`;
    }
  }
  return `"""${text}"""`;
}
