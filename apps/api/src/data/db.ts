import { Pool, PoolClient, QueryResult, QueryResultRow } from "pg";

export type DbClient = Pool | PoolClient;

export function createPool(connectionString: string) {
  return new Pool({ connectionString });
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  client: DbClient,
  text: string,
  params: unknown[] = []
): Promise<QueryResult<T>> {
  return client.query<T>(text, params);
}
