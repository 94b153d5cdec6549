import { abortable, errorCode, throwIfAborted } from "../utils";
import { QUERY_CANCELED, type DataStore, type DataStoreRunOptions, type RawResult } from "./executor";

export interface QueryableClient {
  query(text: string): Promise<{ rows: Array<Record<string, unknown>>; fields: Array<{ name: string; dataTypeID: number }> }>;
  release(destroy?: boolean | Error): void;
}

export interface QueryablePool {
  connect(): Promise<QueryableClient>;
}

/**
 * PostgreSQL-backed DataStore. Each run checks a client out of the pool,
 * runs the query inside a READ ONLY transaction with a server-side
 * statement_timeout and hands the client back. Clients that timed out or
 * were abandoned mid-query are destroyed instead of returned.
 */
export class PgDataStore implements DataStore {
  private readonly pool: QueryablePool;

  constructor(pool: QueryablePool) {
    this.pool = pool;
  }

  async run(query: string, { timeoutMs, signal }: DataStoreRunOptions): Promise<RawResult> {
    throwIfAborted(signal);
    const client = await this.pool.connect();
    let reusable = true;

    try {
      throwIfAborted(signal);
      await client.query("BEGIN READ ONLY");
      await client.query(`SET LOCAL statement_timeout = ${Math.max(1, Math.floor(timeoutMs))}`);
      const result = await abortable(client.query(query), signal);
      await client.query("COMMIT");
      return {
        rows: result.rows,
        fields: result.fields.map((field) => ({ name: field.name, dataTypeID: field.dataTypeID }))
      };
    } catch (error) {
      reusable = !signal?.aborted && errorCode(error) !== QUERY_CANCELED && (await rollback(client));
      throw error;
    } finally {
      client.release(reusable ? undefined : true);
    }
  }
}

async function rollback(client: QueryableClient): Promise<boolean> {
  try {
    await client.query("ROLLBACK");
    return true;
  } catch (error) {
    console.warn("Rollback failed, discarding connection", { code: errorCode(error) ?? null });
    return false;
  }
}
