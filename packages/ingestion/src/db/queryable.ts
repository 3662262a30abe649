export type SqlRow = Record<string, unknown>;

export interface QueryOutcome {
  rows: SqlRow[];
  rowCount: number | null;
}

export interface Queryable {
  query: (text: string, values?: unknown[]) => Promise<QueryOutcome>;
}

export interface ReleasableClient extends Queryable {
  release: () => void;
}

export interface ConnectionSource {
  connect: () => Promise<ReleasableClient>;
}

export function quoteIdentifier(name: string): string {
  if (name.length === 0) {
    throw new Error("Cannot quote an empty identifier");
  }

  return `"${name.replace(/"/g, '""')}"`;
}

export async function inTransaction<T>(
  client: Queryable,
  work: () => Promise<T>
): Promise<T> {
  await client.query("BEGIN");

  try {
    const result = await work();
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  }
}
