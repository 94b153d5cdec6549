export type TokenType = "word" | "quoted" | "string" | "number" | "operator" | "punct" | "param";

export interface Token {
  type: TokenType;
  /** Lower-cased for words, unescaped for quoted identifiers, verbatim otherwise. */
  value: string;
  /** Source text of the token. */
  raw: string;
  start: number;
  end: number;
}

export class SqlSyntaxError extends Error {
  readonly position: number;

  constructor(message: string, position: number) {
    super(message);
    this.name = "SqlSyntaxError";
    this.position = position;
  }
}

const OPERATOR_CHARS = new Set(["+", "-", "*", "/", "<", ">", "=", "~", "!", "@", "#", "%", "^", "&", "|", "?"]);
const PUNCT_CHARS = new Set(["(", ")", ",", ";", ".", "[", "]"]);
const STRING_PREFIXES = new Set(["e", "b", "x", "n"]);

function isWordStart(char: string): boolean {
  return /[A-Za-z_\u0080-\uffff]/.test(char);
}

function isWordPart(char: string): boolean {
  return /[A-Za-z0-9_$\u0080-\uffff]/.test(char);
}

function isDigit(char: string | undefined): boolean {
  return char !== undefined && char >= "0" && char <= "9";
}

/**
 * Splits PostgreSQL text into tokens. Whitespace and comments are dropped;
 * anything the lexer cannot account for raises SqlSyntaxError.
 */
export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  const push = (type: TokenType, value: string, start: number, end: number) => {
    tokens.push({ type, value, raw: text.slice(start, end), start, end });
  };

  while (pos < text.length) {
    const char = text[pos];
    const next = text[pos + 1];

    if (/\s/.test(char)) {
      pos += 1;
      continue;
    }

    if (char === "-" && next === "-") {
      const newline = text.indexOf("\n", pos);
      pos = newline === -1 ? text.length : newline + 1;
      continue;
    }

    if (char === "/" && next === "*") {
      pos = skipBlockComment(text, pos);
      continue;
    }

    if (char === "'") {
      const end = readQuoted(text, pos, "'", false);
      push("string", text.slice(pos, end), pos, end);
      pos = end;
      continue;
    }

    if (char === '"') {
      const end = readQuoted(text, pos, '"', false);
      const inner = text.slice(pos + 1, end - 1).replace(/""/g, '"');
      if (inner.length === 0) {
        throw new SqlSyntaxError("Zero-length quoted identifier", pos);
      }
      push("quoted", inner, pos, end);
      pos = end;
      continue;
    }

    if (char === "$") {
      if (isDigit(next)) {
        let end = pos + 1;
        while (isDigit(text[end])) end += 1;
        push("param", text.slice(pos, end), pos, end);
        pos = end;
        continue;
      }
      const tagMatch = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/.exec(text.slice(pos));
      if (!tagMatch) {
        throw new SqlSyntaxError("Unexpected '$'", pos);
      }
      const tag = tagMatch[0];
      const close = text.indexOf(tag, pos + tag.length);
      if (close === -1) {
        throw new SqlSyntaxError("Unterminated dollar-quoted string", pos);
      }
      const end = close + tag.length;
      push("string", text.slice(pos, end), pos, end);
      pos = end;
      continue;
    }

    if (isDigit(char) || (char === "." && isDigit(next))) {
      const match = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/.exec(text.slice(pos));
      const end = pos + (match ? match[0].length : 1);
      push("number", text.slice(pos, end), pos, end);
      pos = end;
      continue;
    }

    if (isWordStart(char)) {
      let end = pos + 1;
      while (end < text.length && isWordPart(text[end])) end += 1;
      const word = text.slice(pos, end);
      if (text[end] === "'" && STRING_PREFIXES.has(word.toLowerCase())) {
        const stringEnd = readQuoted(text, end, "'", word.toLowerCase() === "e");
        push("string", text.slice(pos, stringEnd), pos, stringEnd);
        pos = stringEnd;
        continue;
      }
      push("word", word.toLowerCase(), pos, end);
      pos = end;
      continue;
    }

    if (char === ":") {
      if (next === ":") {
        push("operator", "::", pos, pos + 2);
        pos += 2;
      } else {
        push("punct", ":", pos, pos + 1);
        pos += 1;
      }
      continue;
    }

    if (PUNCT_CHARS.has(char)) {
      push("punct", char, pos, pos + 1);
      pos += 1;
      continue;
    }

    if (OPERATOR_CHARS.has(char)) {
      let end = pos + 1;
      while (
        end < text.length &&
        OPERATOR_CHARS.has(text[end]) &&
        !(text[end] === "-" && text[end + 1] === "-") &&
        !(text[end] === "/" && text[end + 1] === "*")
      ) {
        end += 1;
      }
      // a multi-character operator only ends in + or - when it also contains one of ~!@#%^&|?
      while (end - pos > 1 && /[+-]$/.test(text.slice(pos, end)) && !/[~!@#%^&|?]/.test(text.slice(pos, end))) {
        end -= 1;
      }
      const operator = text.slice(pos, end);
      push(operator === "?" ? "param" : "operator", operator, pos, end);
      pos = end;
      continue;
    }

    throw new SqlSyntaxError(`Unexpected character '${char}'`, pos);
  }

  return tokens;
}

function readQuoted(text: string, start: number, quote: string, backslashEscapes: boolean): number {
  let pos = start + 1;
  while (pos < text.length) {
    const char = text[pos];
    if (backslashEscapes && char === "\\") {
      pos += 2;
      continue;
    }
    if (char === quote) {
      if (text[pos + 1] === quote) {
        pos += 2;
        continue;
      }
      return pos + 1;
    }
    pos += 1;
  }
  throw new SqlSyntaxError(quote === "'" ? "Unterminated string literal" : "Unterminated quoted identifier", start);
}

function skipBlockComment(text: string, start: number): number {
  let depth = 0;
  let pos = start;
  while (pos < text.length) {
    if (text[pos] === "/" && text[pos + 1] === "*") {
      depth += 1;
      pos += 2;
      continue;
    }
    if (text[pos] === "*" && text[pos + 1] === "/") {
      depth -= 1;
      pos += 2;
      if (depth === 0) {
        return pos;
      }
      continue;
    }
    pos += 1;
  }
  throw new SqlSyntaxError("Unterminated block comment", start);
}
