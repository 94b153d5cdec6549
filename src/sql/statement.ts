import { SqlSyntaxError, tokenize, type Token } from "./lexer";
import {
  CLAUSE_WORDS,
  DANGLING_WORDS,
  DATE_PARTS,
  RESERVED_WORDS,
  STATEMENT_KEYWORDS,
  TYPED_LITERAL_WORDS,
  type StatementCategory
} from "./keywords";

export interface TableReference {
  /** Everything before the last dot, e.g. "public" or "otherdb.public". */
  schema: string | null;
  name: string;
  alias: string | null;
  /** Token index of the name, used to resolve WITH scoping. */
  position: number;
}

export interface FunctionCall {
  schema: string | null;
  name: string;
}

export interface CteDefinition {
  name: string;
  /** Token indexes of the parentheses around the body. */
  bodyStart: number;
  bodyEnd: number;
}

export interface ColumnReference {
  qualifier: string | null;
  /** "*" for `alias.*`. */
  name: string;
}

export type LimitClause =
  | { kind: "literal"; value: number; tokenIndex: number | null }
  | { kind: "all"; tokenIndex: number }
  | { kind: "expression" };

export interface ParsedStatement {
  /** Leading keyword of the main statement, after any WITH clause. */
  kind: string;
  category: StatementCategory;
  tokens: Token[];
  /** Every unquoted word in the statement. */
  words: Set<string>;
  tables: TableReference[];
  columns: ColumnReference[];
  functions: FunctionCall[];
  cteNames: Set<string>;
  ctes: CteDefinition[];
  recursive: boolean;
  /** Output aliases, CTE column lists and window names. */
  definedNames: Set<string>;
  /** Aliases of derived tables and table functions. */
  derivedNames: Set<string>;
  /** Row bound on the outermost query, when one is written. */
  limit: LimitClause | null;
  lockingClause: boolean;
}

interface Frame {
  isQuery: boolean;
  derived: boolean;
}

const QUERY_STARTERS = new Set(["select", "with", "values"]);
const LOCKING_STRENGTHS = new Set(["update", "share", "no", "key"]);

export function isWord(token: Token | undefined, value: string): boolean {
  return token !== undefined && token.type === "word" && token.value === value;
}

export function isPunct(token: Token | undefined, value: string): boolean {
  return token !== undefined && token.type === "punct" && token.value === value;
}

function isOperator(token: Token | undefined, value: string): boolean {
  return token !== undefined && token.type === "operator" && token.value === value;
}

/** A name the statement could be referring to: a quoted identifier or a non-reserved word. */
export function isIdentifier(token: Token | undefined): boolean {
  if (!token) return false;
  return token.type === "quoted" || (token.type === "word" && !RESERVED_WORDS.has(token.value));
}

function openerOf(tokens: Token[], close: number): number {
  let depth = 0;
  for (let index = close; index >= 0; index -= 1) {
    if (isPunct(tokens[index], ")")) depth += 1;
    if (isPunct(tokens[index], "(")) {
      depth -= 1;
      if (depth === 0) return index;
    }
  }
  return 0;
}

/** Whether the token at `index` closes an expression that an output alias may follow. */
function endsOperand(tokens: Token[], index: number): boolean {
  const token = tokens[index];
  if (token.type === "quoted" || token.type === "string" || token.type === "number") return true;
  if (token.type === "word") return !RESERVED_WORDS.has(token.value) || token.value === "end";
  if (!isPunct(token, ")")) return false;
  // DISTINCT ON (...) is followed by the first output column, not an alias
  return !isWord(tokens[openerOf(tokens, index) - 1], "on");
}

/**
 * Tokenizes `text`, splits it on semicolons and analyzes each statement.
 * Throws SqlSyntaxError when the text is not a well-formed script.
 */
export function parseStatements(text: string): ParsedStatement[] {
  const tokens = tokenize(text);
  const segments: Token[][] = [[]];
  for (const token of tokens) {
    if (isPunct(token, ";")) {
      segments.push([]);
    } else {
      segments[segments.length - 1].push(token);
    }
  }
  const statements = segments.filter((segment) => segment.length > 0).map(parseStatement);
  if (statements.length === 0) {
    throw new SqlSyntaxError("Empty statement", 0);
  }
  return statements;
}

function parseStatement(tokens: Token[]): ParsedStatement {
  checkBalance(tokens);
  const param = tokens.find((token) => token.type === "param");
  if (param) {
    throw new SqlSyntaxError(`Query parameters are not supported: ${param.raw}`, param.start);
  }

  const ctes: CteDefinition[] = [];
  const definedNames = new Set<string>();
  const consumed = new Set<number>();

  let index = skipOpenParens(tokens, 0);
  const first = tokens[index];
  if (!first || first.type !== "word") {
    throw new SqlSyntaxError("Statement must begin with a keyword", first ? first.start : 0);
  }
  const recursive = first.value === "with" && isWord(tokens[index + 1], "recursive");
  if (first.value === "with") {
    index = parseWithClause(tokens, index, ctes, definedNames, consumed);
  }
  const kindToken = tokens[index];
  const category = STATEMENT_KEYWORDS.get(kindToken.value);
  if (kindToken.type !== "word" || category === undefined) {
    throw new SqlSyntaxError(`Unrecognized statement "${kindToken.raw}"`, kindToken.start);
  }

  const statement: ParsedStatement = {
    kind: kindToken.value,
    category,
    tokens,
    words: new Set(tokens.filter((token) => token.type === "word").map((token) => token.value)),
    tables: [],
    columns: [],
    functions: [],
    cteNames: new Set(ctes.map((cte) => cte.name)),
    ctes,
    recursive,
    definedNames,
    derivedNames: new Set<string>(),
    limit: null,
    lockingClause: false
  };

  if (statement.kind === "select") {
    checkCompleteness(tokens);
    analyzeSelect(statement, consumed);
  }
  return statement;
}

function skipOpenParens(tokens: Token[], start: number): number {
  let index = start;
  while (isPunct(tokens[index], "(")) index += 1;
  return index;
}

function checkBalance(tokens: Token[]): void {
  let depth = 0;
  for (const token of tokens) {
    if (isPunct(token, "(")) depth += 1;
    if (isPunct(token, ")")) {
      depth -= 1;
      if (depth < 0) {
        throw new SqlSyntaxError("Unbalanced parentheses", token.start);
      }
    }
  }
  if (depth !== 0) {
    throw new SqlSyntaxError("Unbalanced parentheses", tokens[tokens.length - 1].end);
  }
}

function matchParen(tokens: Token[], open: number): number {
  let depth = 0;
  for (let index = open; index < tokens.length; index += 1) {
    if (isPunct(tokens[index], "(")) depth += 1;
    if (isPunct(tokens[index], ")")) {
      depth -= 1;
      if (depth === 0) return index;
    }
  }
  throw new SqlSyntaxError("Unbalanced parentheses", tokens[open].start);
}

function parseWithClause(
  tokens: Token[],
  start: number,
  ctes: CteDefinition[],
  definedNames: Set<string>,
  consumed: Set<number>
): number {
  let index = start + 1;
  if (isWord(tokens[index], "recursive")) index += 1;

  while (true) {
    const nameToken = tokens[index];
    if (!isIdentifier(nameToken)) {
      throw new SqlSyntaxError("Malformed WITH clause", nameToken ? nameToken.start : tokens[start].end);
    }
    consumed.add(index);
    index += 1;

    if (isPunct(tokens[index], "(")) {
      const close = matchParen(tokens, index);
      for (let column = index + 1; column < close; column += 1) {
        if (isIdentifier(tokens[column])) {
          definedNames.add(tokens[column].value);
          consumed.add(column);
        }
      }
      index = close + 1;
    }

    if (!isWord(tokens[index], "as")) {
      throw new SqlSyntaxError("Expected AS in WITH clause", tokens[index] ? tokens[index].start : nameToken.end);
    }
    index += 1;
    if (isWord(tokens[index], "not")) index += 1;
    if (isWord(tokens[index], "materialized")) index += 1;
    if (!isPunct(tokens[index], "(")) {
      throw new SqlSyntaxError("Expected a parenthesized query in WITH clause", tokens[index] ? tokens[index].start : 0);
    }
    const close = matchParen(tokens, index);
    if (close === index + 1) {
      throw new SqlSyntaxError("Empty query in WITH clause", tokens[index].start);
    }
    ctes.push({ name: nameToken.value, bodyStart: index, bodyEnd: close });
    index = close + 1;

    if (isPunct(tokens[index], ",")) {
      index += 1;
      continue;
    }
    break;
  }

  index = skipOpenParens(tokens, index);
  if (!tokens[index]) {
    throw new SqlSyntaxError("WITH clause is not followed by a statement", tokens[tokens.length - 1].end);
  }
  return index;
}

function checkCompleteness(tokens: Token[]): void {
  const last = tokens[tokens.length - 1];
  const dangling =
    (last.type === "punct" && last.value !== ")" && last.value !== "]") ||
    (last.type === "operator" && last.value !== "*") ||
    (last.type === "word" && DANGLING_WORDS.has(last.value));
  if (dangling) {
    throw new SqlSyntaxError(`Statement is incomplete after "${last.raw}"`, last.end);
  }

  tokens.forEach((token, index) => {
    const next = tokens[index + 1];
    if (!next) return;
    const misplacedComma =
      (isPunct(token, ",") && (isPunct(next, ",") || isPunct(next, ")") || isWord(next, "from"))) ||
      (isPunct(token, "(") && isPunct(next, ","));
    if (misplacedComma) {
      throw new SqlSyntaxError("Misplaced comma", next.start);
    }
    if (isPunct(token, ".") && next.type !== "word" && next.type !== "quoted" && !isOperator(next, "*")) {
      throw new SqlSyntaxError("Expected a name after '.'", next.start);
    }
  });
}

/**
 * Walks a SELECT statement collecting table references, column references,
 * function calls and the outermost row bound.
 */
function analyzeSelect(statement: ParsedStatement, consumed: Set<number>): void {
  const { tokens } = statement;
  const stack: Frame[] = [{ isQuery: true, derived: false }];
  const clauses: Array<string | null> = [null];
  const derivedOpeners = new Set<number>();

  const readAlias = (start: number, target?: Set<string>): string | null => {
    let index = start;
    if (isWord(tokens[index], "as")) index += 1;
    const aliasToken = tokens[index];
    if (!isIdentifier(aliasToken)) return null;
    consumed.add(index);
    target?.add(aliasToken.value);
    if (isPunct(tokens[index + 1], "(")) {
      const close = matchParen(tokens, index + 1);
      for (let column = index + 2; column < close; column += 1) {
        if (isIdentifier(tokens[column])) {
          statement.definedNames.add(tokens[column].value);
          consumed.add(column);
        }
      }
    }
    return aliasToken.value;
  };

  const parseFromItem = (start: number): void => {
    let index = start;
    while (isWord(tokens[index], "lateral") || isWord(tokens[index], "only")) index += 1;
    const head = tokens[index];
    if (isPunct(head, "(")) {
      derivedOpeners.add(index);
      return;
    }
    if (!isIdentifier(head)) return;

    const position = index;
    const parts = [head.value];
    consumed.add(index);
    index += 1;
    while (isPunct(tokens[index], ".") && isIdentifier(tokens[index + 1])) {
      parts.push(tokens[index + 1].value);
      consumed.add(index + 1);
      index += 2;
    }
    const name = parts[parts.length - 1];
    const schema = parts.length > 1 ? parts.slice(0, -1).join(".") : null;
    if (isPunct(tokens[index], "(")) {
      statement.functions.push({ schema, name });
      derivedOpeners.add(index);
      return;
    }
    statement.tables.push({ schema, name, alias: readAlias(index), position });
  };

  for (let index = 0; index < tokens.length; index += 1) {
    const token = tokens[index];
    const frame = stack[stack.length - 1];
    const depth = stack.length - 1;

    if (isPunct(token, "(")) {
      const next = tokens[index + 1];
      stack.push({
        isQuery: next !== undefined && next.type === "word" && QUERY_STARTERS.has(next.value),
        derived: derivedOpeners.has(index)
      });
      clauses.push(null);
      continue;
    }

    if (isPunct(token, ")")) {
      const closed = stack.pop();
      clauses.pop();
      if (closed?.derived) {
        readAlias(index + 1, statement.derivedNames);
      }
      continue;
    }

    if (frame.isQuery && isPunct(token, ",") && clauses[depth] === "from") {
      parseFromItem(index + 1);
      continue;
    }

    if (token.type === "word" && RESERVED_WORDS.has(token.value)) {
      if (!frame.isQuery) continue;
      if (token.value === "from" || token.value === "join") {
        clauses[depth] = "from";
        parseFromItem(index + 1);
        continue;
      }
      if (CLAUSE_WORDS.has(token.value)) {
        clauses[depth] = token.value;
      }
      if (token.value === "for" && tokens[index + 1]?.type === "word" && LOCKING_STRENGTHS.has(tokens[index + 1].value)) {
        statement.lockingClause = true;
        index = endOfFrame(tokens, index);
        continue;
      }
      if (token.value === "into") {
        index = skipIntoTarget(tokens, index, consumed);
        continue;
      }
      if (depth === 0 && statement.limit === null) {
        if (token.value === "limit") statement.limit = readLimit(tokens, index);
        if (token.value === "fetch") statement.limit = readFetch(tokens, index);
      }
      continue;
    }

    if (consumed.has(index) || !isIdentifier(token)) continue;
    index = readName(statement, tokens, index, frame, consumed);
  }
}

/** Last index before the parenthesis that closes the frame containing `index`. */
function endOfFrame(tokens: Token[], index: number): number {
  let depth = 0;
  for (let cursor = index + 1; cursor < tokens.length; cursor += 1) {
    if (isPunct(tokens[cursor], "(")) depth += 1;
    if (isPunct(tokens[cursor], ")")) {
      if (depth === 0) return cursor - 1;
      depth -= 1;
    }
  }
  return tokens.length - 1;
}

const INTO_MODIFIERS = new Set(["temporary", "temp", "unlogged", "table"]);

/** Consumes the target of `SELECT ... INTO [TEMP] [TABLE] name`; returns the last index covered. */
function skipIntoTarget(tokens: Token[], index: number, consumed: Set<number>): number {
  let cursor = index + 1;
  while (tokens[cursor]?.type === "word" && INTO_MODIFIERS.has(tokens[cursor].value)) cursor += 1;
  if (!isIdentifier(tokens[cursor])) return index;
  consumed.add(cursor);
  while (isPunct(tokens[cursor + 1], ".") && isIdentifier(tokens[cursor + 2])) {
    cursor += 2;
    consumed.add(cursor);
  }
  return cursor;
}

/** Classifies the identifier at `index`; returns the last index it covered. */
function readName(statement: ParsedStatement, tokens: Token[], index: number, frame: Frame, consumed: Set<number>): number {
  const token = tokens[index];
  const prev = tokens[index - 1];
  const next = tokens[index + 1];

  if (token.type === "word") {
    if (TYPED_LITERAL_WORDS.has(token.value) && next?.type === "string") return index;
    if (token.value === "time" && isWord(next, "zone")) return index;
    if (DATE_PARTS.has(token.value) && !frame.isQuery && isWord(next, "from")) return index;
  }

  if (isPunct(next, "(")) {
    statement.functions.push({ schema: null, name: token.value });
    return index;
  }
  if (isWord(prev, "as") || isWord(prev, "window")) {
    statement.definedNames.add(token.value);
    return index;
  }
  if (isWord(next, "as") && isPunct(tokens[index + 2], "(")) {
    statement.definedNames.add(token.value);
    return index;
  }
  if (isOperator(prev, "::")) return index;

  if (isPunct(next, ".")) {
    const parts = [token.value];
    let cursor = index + 1;
    while (isPunct(tokens[cursor], ".") && tokens[cursor + 1] !== undefined) {
      const part = tokens[cursor + 1];
      parts.push(isOperator(part, "*") ? "*" : part.value);
      consumed.add(cursor + 1);
      cursor += 2;
    }
    const name = parts.pop() ?? token.value;
    if (isPunct(tokens[cursor], "(")) {
      statement.functions.push({ schema: parts.join("."), name });
    } else {
      statement.columns.push({ qualifier: parts.join("."), name });
    }
    return cursor - 1;
  }

  if (prev && endsOperand(tokens, index - 1)) {
    statement.definedNames.add(token.value);
    return index;
  }

  statement.columns.push({ qualifier: null, name: token.value });
  return index;
}

function readLimit(tokens: Token[], index: number): LimitClause {
  const next = tokens[index + 1];
  const after = tokens[index + 2];
  if (next?.type === "number" && (after === undefined || after.type === "word" || isPunct(after, ")"))) {
    return { kind: "literal", value: Number(next.value), tokenIndex: index + 1 };
  }
  if (isWord(next, "all")) {
    return { kind: "all", tokenIndex: index + 1 };
  }
  return { kind: "expression" };
}

function readFetch(tokens: Token[], index: number): LimitClause {
  let cursor = index + 1;
  if (!isWord(tokens[cursor], "first") && !isWord(tokens[cursor], "next")) {
    return { kind: "expression" };
  }
  cursor += 1;
  const count = tokens[cursor];
  if (count?.type === "number" && (isWord(tokens[cursor + 1], "row") || isWord(tokens[cursor + 1], "rows"))) {
    return { kind: "literal", value: Number(count.value), tokenIndex: cursor };
  }
  if (isWord(count, "row") || isWord(count, "rows")) {
    return { kind: "literal", value: 1, tokenIndex: null };
  }
  return { kind: "expression" };
}

const NO_SPACE_BEFORE = new Set([",", ")", ".", "]", ":"]);
const NO_SPACE_AFTER = new Set(["(", ".", "[", ":"]);

function isUnaryPosition(token: Token | undefined): boolean {
  if (!token) return true;
  if (token.type === "operator") return true;
  if (token.type === "punct") return token.value === "(" || token.value === "," || token.value === "[";
  return token.type === "word" && RESERVED_WORDS.has(token.value);
}

function needsSpace(prev: Token, token: Token, beforePrev: Token | undefined): boolean {
  // "--" and "/*" would open a comment
  if (prev.raw.endsWith("-") && token.raw.startsWith("-")) return true;
  if (prev.raw.endsWith("/") && token.raw.startsWith("*")) return true;
  if (token.type === "punct" && NO_SPACE_BEFORE.has(token.value)) return false;
  if (prev.type === "punct" && NO_SPACE_AFTER.has(prev.value)) return false;
  if (isOperator(token, "::") || isOperator(prev, "::")) return false;
  if (isPunct(token, "[")) return false;
  if (isPunct(token, "(") && (prev.type === "quoted" || (prev.type === "word" && !RESERVED_WORDS.has(prev.value)))) {
    return false;
  }
  if ((isOperator(prev, "-") || isOperator(prev, "+")) && token.type !== "operator" && isUnaryPosition(beforePrev)) return false;
  return true;
}

/** Reassembles tokens into single-line SQL with comments removed. */
export function renderTokens(tokens: readonly Token[]): string {
  return tokens.reduce((sql, token, index) => {
    if (index === 0) return token.raw;
    return sql + (needsSpace(tokens[index - 1], token, tokens[index - 2]) ? " " : "") + token.raw;
  }, "");
}
