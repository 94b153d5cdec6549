import type { PipelineConfig } from "../config/pipeline";
import { buildAllowList, type SchemaCatalog } from "../config/schema";
import type { CandidateQuery, ValidationVerdict, ViolationCode } from "../types";
import { ADMINISTRATIVE_FUNCTIONS, MUTATING_WORDS } from "./keywords";
import { SqlSyntaxError, type Token } from "./lexer";
import { parseStatements, renderTokens, type FunctionCall, type ParsedStatement, type TableReference } from "./statement";

export interface ValidatorOptions {
  schema: SchemaCatalog;
  defaultRowLimit: number;
  maxRows: number;
}

interface BoundedQuery {
  query: string;
  rowLimit: number;
  boundInjected: boolean;
  /** Tokens the query must read back as. */
  tokenCount: number;
}

const MAX_QUERY_LENGTH = 10_000;
const PERMITTED_SCHEMAS = new Set(["public"]);
const SYSTEM_SCHEMAS = new Set(["pg_catalog", "information_schema", "pg_toast"]);
const BOUNDED_ALIAS = "bounded_result";
// SELECT * FROM ( ... ) AS bounded_result LIMIT n
const WRAPPER_TOKENS = 9;

function reject(code: ViolationCode, message: string): ValidationVerdict {
  return { accepted: false, violations: [{ code, message }] };
}

function callName({ schema, name }: FunctionCall): string {
  return schema === null ? name : `${schema}.${name}`;
}

/**
 * Whether an unqualified table name refers to a WITH query. A CTE is in scope
 * after its own definition, and inside its own body only under RECURSIVE;
 * anywhere else the name reaches the real table.
 */
export function resolvesToCte(statement: ParsedStatement, table: TableReference): boolean {
  if (table.schema !== null) return false;
  return statement.ctes.some(
    (cte) =>
      cte.name === table.name &&
      (table.position > cte.bodyEnd || (statement.recursive && table.position > cte.bodyStart && table.position < cte.bodyEnd))
  );
}

function replaceToken(tokens: Token[], index: number, raw: string): Token[] {
  return tokens.map((token, position) => (position === index ? { ...token, value: raw, raw } : token));
}

/**
 * Decides whether a generated query may run. Checks run in a fixed order and
 * stop at the first violation: syntax, statement type, schema allow-list,
 * row bound (never a rejection), nested side effects, then a read-back of
 * the normalized query.
 */
export class QueryValidator {
  private readonly options: ValidatorOptions;

  private readonly allowList: Map<string, Set<string>>;

  constructor(options: ValidatorOptions) {
    this.options = options;
    this.allowList = buildAllowList(options.schema);
  }

  static fromConfig(config: Pick<PipelineConfig, "schema" | "validation">): QueryValidator {
    return new QueryValidator({ schema: config.schema, ...config.validation });
  }

  validate(candidate: CandidateQuery | string): ValidationVerdict {
    const text = typeof candidate === "string" ? candidate : candidate.text;
    if (text.length > MAX_QUERY_LENGTH) {
      return reject("SyntaxInvalid", `Query exceeds ${MAX_QUERY_LENGTH} characters`);
    }

    let statements: ParsedStatement[];
    try {
      statements = parseStatements(text);
    } catch (error) {
      if (error instanceof SqlSyntaxError) {
        return reject("SyntaxInvalid", `${error.message} (at position ${error.position})`);
      }
      throw error;
    }

    const operationViolation = this.checkOperation(statements);
    if (operationViolation) return reject("OperationForbidden", operationViolation);

    const [statement] = statements;
    const schemaViolation = this.checkSchema(statement);
    if (schemaViolation) return reject("SchemaViolation", schemaViolation);

    const bounded = this.applyBound(statement);

    const sideEffect = this.checkSideEffects(statement);
    if (sideEffect) return reject("OperationForbidden", sideEffect);

    const unbounded = this.confirmBound(bounded);
    if (unbounded) return reject("SyntaxInvalid", unbounded);

    return {
      accepted: true,
      normalizedQuery: bounded.query,
      rowLimit: bounded.rowLimit,
      boundInjected: bounded.boundInjected,
      violations: []
    };
  }

  private checkOperation(statements: ParsedStatement[]): string | null {
    if (statements.length > 1) {
      return `Only a single statement is allowed, found ${statements.length}`;
    }
    const [statement] = statements;
    if (statement.category !== "retrieval") {
      return `${statement.kind.toUpperCase()} statements are not allowed`;
    }
    if (statement.kind !== "select") {
      return `Only SELECT statements are allowed, found ${statement.kind.toUpperCase()}`;
    }
    const mutating = statement.tokens.find((token) => token.type === "word" && MUTATING_WORDS.has(token.value));
    if (mutating) {
      return `Data-modifying keyword ${mutating.value.toUpperCase()} is not allowed`;
    }
    return null;
  }

  private checkSchema(statement: ParsedStatement): string | null {
    const baseTables = new Map<string, string>();
    const visibleColumns = new Set<string>();

    const introduced = [...statement.cteNames, ...statement.derivedNames, ...statement.tables.map((table) => table.alias)];
    const shadowing = introduced.find((name) => name !== null && SYSTEM_SCHEMAS.has(name));
    if (shadowing) {
      return `Name ${shadowing} shadows a system schema`;
    }

    for (const table of statement.tables) {
      if (resolvesToCte(statement, table)) {
        continue;
      }
      const qualifiedName = table.schema === null ? table.name : `${table.schema}.${table.name}`;
      if (table.schema !== null && !PERMITTED_SCHEMAS.has(table.schema)) {
        return `Table ${qualifiedName} is not queryable`;
      }
      const columns = this.allowList.get(table.name);
      if (!columns) {
        return `Table ${qualifiedName} is not queryable`;
      }
      baseTables.set(table.alias ?? table.name, table.name);
      columns.forEach((column) => visibleColumns.add(column));
    }

    const cteAliases = statement.tables
      .filter((table) => resolvesToCte(statement, table))
      .map((table) => table.alias ?? table.name);
    const otherQualifiers = new Set([...statement.cteNames, ...statement.derivedNames, ...cteAliases]);

    for (const column of statement.columns) {
      if (column.qualifier === null) {
        if (!visibleColumns.has(column.name) && !statement.definedNames.has(column.name)) {
          return `Column ${column.name} is not queryable`;
        }
        continue;
      }

      const table = baseTables.get(column.qualifier) ?? this.resolveQualifiedTable(column.qualifier);
      if (table) {
        const allowed = this.allowList.get(table);
        if (column.name !== "*" && !allowed?.has(column.name)) {
          return `Column ${column.qualifier}.${column.name} is not queryable`;
        }
        continue;
      }
      if (!otherQualifiers.has(column.qualifier)) {
        return `Unknown table or alias ${column.qualifier}`;
      }
    }
    return null;
  }

  /** `public.argo_profiles` used as a column qualifier. */
  private resolveQualifiedTable(qualifier: string): string | null {
    const parts = qualifier.split(".");
    if (parts.length !== 2 || !PERMITTED_SCHEMAS.has(parts[0]) || !this.allowList.has(parts[1])) {
      return null;
    }
    return parts[1];
  }

  private applyBound(statement: ParsedStatement): BoundedQuery {
    const { defaultRowLimit, maxRows } = this.options;
    const { limit, tokens } = statement;
    const sql = renderTokens(tokens);

    if (limit === null) {
      return { query: `${sql} LIMIT ${defaultRowLimit}`, rowLimit: defaultRowLimit, boundInjected: true, tokenCount: tokens.length + 2 };
    }

    if (limit.kind === "literal") {
      if (limit.value <= maxRows) {
        return { query: sql, rowLimit: Math.ceil(limit.value), boundInjected: false, tokenCount: tokens.length };
      }
      if (limit.tokenIndex !== null) {
        return {
          query: renderTokens(replaceToken(tokens, limit.tokenIndex, String(maxRows))),
          rowLimit: maxRows,
          boundInjected: true,
          tokenCount: tokens.length
        };
      }
    }

    if (limit.kind === "all") {
      return {
        query: renderTokens(replaceToken(tokens, limit.tokenIndex, String(defaultRowLimit))),
        rowLimit: defaultRowLimit,
        boundInjected: true,
        tokenCount: tokens.length
      };
    }

    return {
      query: `SELECT * FROM (${sql}) AS ${BOUNDED_ALIAS} LIMIT ${defaultRowLimit}`,
      rowLimit: defaultRowLimit,
      boundInjected: true,
      tokenCount: tokens.length + WRAPPER_TOKENS
    };
  }

  /** Reads the normalized query back and checks nothing was lost and the outer bound holds. */
  private confirmBound(bounded: BoundedQuery): string | null {
    let statements: ParsedStatement[];
    try {
      statements = parseStatements(bounded.query);
    } catch (error) {
      if (error instanceof SqlSyntaxError) {
        return `Normalized query does not parse: ${error.message}`;
      }
      throw error;
    }
    const [statement] = statements;
    if (statements.length !== 1 || statement.tokens.length !== bounded.tokenCount) {
      return "Normalized query does not read back as the validated query";
    }
    const { limit } = statement;
    if (limit?.kind !== "literal" || limit.value > this.options.maxRows) {
      return "Normalized query has no row bound";
    }
    return null;
  }

  private checkSideEffects(statement: ParsedStatement): string | null {
    if (statement.words.has("into")) {
      return "SELECT ... INTO is not allowed";
    }
    if (statement.lockingClause) {
      return "Row locking clauses (FOR UPDATE, FOR SHARE) are not allowed";
    }
    const forbidden = statement.functions.find(
      (call) =>
        (call.schema !== null && !PERMITTED_SCHEMAS.has(call.schema)) ||
        ADMINISTRATIVE_FUNCTIONS.has(call.name) ||
        call.name.startsWith("pg_")
    );
    if (forbidden) {
      return `Function ${callName(forbidden)} is not allowed`;
    }
    return null;
  }
}
