import pg from "pg";

/** Rows come back untyped; callers validate them. */
export interface SqlResult {
  rows: unknown[];
}

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
}

export interface SqlPoolClient extends SqlClient {
  release(): void;
}

/** The slice of `pg.Pool` the stores use. */
export interface SqlPool extends SqlClient {
  connect(): Promise<SqlPoolClient>;
  end(): Promise<void>;
}

export function createPostgresPool(databaseUrl: string): SqlPool {
  const pool = new pg.Pool({ connectionString: databaseUrl, max: 5 });

  return {
    query: (text, values) => pool.query(text, values),
    connect: async () => {
      const client = await pool.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: () => client.release(),
      };
    },
    end: () => pool.end(),
  };
}
