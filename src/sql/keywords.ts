export type StatementCategory = "retrieval" | "mutation" | "definition" | "administrative";

/** Words that may begin a PostgreSQL statement, by what running them does. */
export const STATEMENT_KEYWORDS: ReadonlyMap<string, StatementCategory> = new Map<string, StatementCategory>([
  ["select", "retrieval"],
  ["with", "retrieval"],
  ["values", "retrieval"],
  ["table", "retrieval"],
  ["insert", "mutation"],
  ["update", "mutation"],
  ["delete", "mutation"],
  ["merge", "mutation"],
  ["upsert", "mutation"],
  ["replace", "mutation"],
  ["truncate", "mutation"],
  ["copy", "mutation"],
  ["create", "definition"],
  ["alter", "definition"],
  ["drop", "definition"],
  ["comment", "definition"],
  ["rename", "definition"],
  ["security", "definition"],
  ["import", "definition"],
  ["grant", "administrative"],
  ["revoke", "administrative"],
  ["vacuum", "administrative"],
  ["analyze", "administrative"],
  ["analyse", "administrative"],
  ["reindex", "administrative"],
  ["cluster", "administrative"],
  ["refresh", "administrative"],
  ["set", "administrative"],
  ["reset", "administrative"],
  ["show", "administrative"],
  ["begin", "administrative"],
  ["start", "administrative"],
  ["commit", "administrative"],
  ["end", "administrative"],
  ["rollback", "administrative"],
  ["abort", "administrative"],
  ["savepoint", "administrative"],
  ["release", "administrative"],
  ["prepare", "administrative"],
  ["execute", "administrative"],
  ["deallocate", "administrative"],
  ["declare", "administrative"],
  ["fetch", "administrative"],
  ["move", "administrative"],
  ["close", "administrative"],
  ["lock", "administrative"],
  ["listen", "administrative"],
  ["unlisten", "administrative"],
  ["notify", "administrative"],
  ["load", "administrative"],
  ["discard", "administrative"],
  ["checkpoint", "administrative"],
  ["do", "administrative"],
  ["call", "administrative"],
  ["explain", "administrative"],
  ["reassign", "administrative"]
]);

/** Words that modify data or schema wherever they appear in a statement. */
export const MUTATING_WORDS: ReadonlySet<string> = new Set([
  "insert",
  "update",
  "delete",
  "merge",
  "truncate",
  "drop",
  "create",
  "alter",
  "grant",
  "revoke",
  "copy",
  "vacuum",
  "reindex",
  "cluster",
  "refresh",
  "execute",
  "prepare",
  "call",
  "notify",
  "listen"
]);

/** Server functions with side effects outside the query (files, sessions, other servers, sleeping). */
export const ADMINISTRATIVE_FUNCTIONS: ReadonlySet<string> = new Set([
  "pg_sleep",
  "pg_sleep_for",
  "pg_sleep_until",
  "pg_read_file",
  "pg_read_binary_file",
  "pg_ls_dir",
  "pg_stat_file",
  "pg_terminate_backend",
  "pg_cancel_backend",
  "pg_reload_conf",
  "pg_rotate_logfile",
  "pg_promote",
  "pg_advisory_lock",
  "pg_advisory_xact_lock",
  "pg_notify",
  "set_config",
  "current_setting",
  "dblink",
  "dblink_exec",
  "dblink_connect",
  "lo_import",
  "lo_export",
  "lo_unlink",
  "query_to_xml",
  "query_to_xml_and_xmlschema",
  "table_to_xml",
  "database_to_xml",
  "nextval",
  "setval",
  "txid_current"
]);

/** Never column references when unquoted. */
export const RESERVED_WORDS: ReadonlySet<string> = new Set([
  "all",
  "and",
  "any",
  "array",
  "as",
  "asc",
  "at",
  "between",
  "both",
  "by",
  "case",
  "cast",
  "collate",
  "cross",
  "current",
  "current_date",
  "current_time",
  "current_timestamp",
  "desc",
  "distinct",
  "else",
  "end",
  "escape",
  "except",
  "exists",
  "false",
  "fetch",
  "filter",
  "first",
  "following",
  "for",
  "from",
  "full",
  "group",
  "groups",
  "having",
  "ilike",
  "in",
  "inner",
  "intersect",
  "into",
  "is",
  "isnull",
  "join",
  "last",
  "lateral",
  "leading",
  "left",
  "like",
  "limit",
  "localtime",
  "localtimestamp",
  "materialized",
  "natural",
  "next",
  "not",
  "notnull",
  "null",
  "nulls",
  "offset",
  "on",
  "only",
  "or",
  "order",
  "outer",
  "over",
  "partition",
  "preceding",
  "range",
  "recursive",
  "right",
  "row",
  "rows",
  "select",
  "similar",
  "some",
  "symmetric",
  "then",
  "ties",
  "to",
  "trailing",
  "true",
  "unbounded",
  "union",
  "unknown",
  "using",
  "values",
  "when",
  "where",
  "window",
  "with",
  "within",
  "zone"
]);

/** Field names accepted by EXTRACT(field FROM ...) and friends. */
export const DATE_PARTS: ReadonlySet<string> = new Set([
  "century",
  "day",
  "decade",
  "dow",
  "doy",
  "epoch",
  "hour",
  "isodow",
  "isoyear",
  "julian",
  "microseconds",
  "millennium",
  "milliseconds",
  "minute",
  "month",
  "quarter",
  "second",
  "timezone",
  "timezone_hour",
  "timezone_minute",
  "week",
  "year"
]);

/** Type names that introduce a typed literal, as in `TIMESTAMP '2020-01-01'`. */
export const TYPED_LITERAL_WORDS: ReadonlySet<string> = new Set(["date", "time", "timestamp", "timestamptz", "interval"]);

/** A statement must not end on one of these. */
export const DANGLING_WORDS: ReadonlySet<string> = new Set([
  "and",
  "as",
  "between",
  "by",
  "case",
  "distinct",
  "else",
  "except",
  "from",
  "having",
  "ilike",
  "in",
  "intersect",
  "is",
  "join",
  "like",
  "limit",
  "not",
  "offset",
  "on",
  "or",
  "select",
  "then",
  "union",
  "using",
  "when",
  "where",
  "with"
]);

/** Clause keywords that end a FROM list at the same nesting level. */
export const CLAUSE_WORDS: ReadonlySet<string> = new Set([
  "select",
  "where",
  "group",
  "having",
  "window",
  "order",
  "limit",
  "offset",
  "fetch",
  "for",
  "union",
  "intersect",
  "except",
  "into",
  "returning"
]);
