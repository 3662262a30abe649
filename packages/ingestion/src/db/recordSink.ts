import type { AssociationEdge, CrmRecord, ResourceType } from "../types";
import { ASSOCIATIONS_TABLE } from "../ingestion/resources";
import type { ConnectionSource, Queryable, ReleasableClient } from "./queryable";
import { inTransaction, quoteIdentifier } from "./queryable";

export const MAX_ROWS_PER_STATEMENT = 5000;

export interface SqlStatement {
  sql: string;
  values: unknown[];
}

export interface RecordSink {
  upsertRecords: (
    resourceType: ResourceType,
    properties: readonly string[],
    records: readonly CrmRecord[]
  ) => Promise<number>;
  insertAssociations: (edges: readonly AssociationEdge[]) => Promise<number>;
  listRecordIds: (resourceType: ResourceType) => Promise<string[]>;
  close?: () => Promise<void>;
}

// Postgres rejects an upsert that touches the same row twice, so the last
// occurrence of an id in a batch wins.
export function dedupeById(records: readonly CrmRecord[]): CrmRecord[] {
  const byId = new Map<string, CrmRecord>();

  for (const record of records) {
    byId.set(record.id, record);
  }

  return [...byId.values()];
}

export function buildUpsertStatement(
  resourceType: ResourceType,
  properties: readonly string[],
  records: readonly CrmRecord[]
): SqlStatement {
  if (records.length === 0) {
    throw new Error("Cannot build upsert statement for empty record batch");
  }

  const columns = ["id", ...properties];
  const columnList = columns.map(quoteIdentifier).join(", ");
  const unnestArgs = columns.map((_, index) => `$${index + 1}::text[]`).join(", ");
  const conflictAction =
    properties.length === 0
      ? "DO NOTHING"
      : `DO UPDATE SET ${properties
          .map(
            (property) =>
              `${quoteIdentifier(property)} = EXCLUDED.${quoteIdentifier(property)}`
          )
          .join(", ")}`;

  const values: string[][] = columns.map(() => []);

  for (const record of records) {
    values[0].push(record.id);
    properties.forEach((property, index) => {
      values[index + 1].push(record.properties[property] ?? "");
    });
  }

  return {
    sql: `INSERT INTO ${quoteIdentifier(resourceType)} (${columnList})
SELECT * FROM UNNEST(${unnestArgs})
ON CONFLICT (${quoteIdentifier("id")}) ${conflictAction};`,
    values
  };
}

const INSERT_ASSOCIATIONS_SQL = `
INSERT INTO ${ASSOCIATIONS_TABLE} (from_object_type, from_object_id, to_object_type, to_object_id)
SELECT * FROM UNNEST($1::text[], $2::text[], $3::text[], $4::text[])
ON CONFLICT DO NOTHING;
`;

export function buildAssociationInsertStatement(
  edges: readonly AssociationEdge[]
): SqlStatement {
  if (edges.length === 0) {
    throw new Error("Cannot build insert statement for empty association batch");
  }

  return {
    sql: INSERT_ASSOCIATIONS_SQL,
    values: [
      edges.map((edge) => edge.fromType),
      edges.map((edge) => edge.fromId),
      edges.map((edge) => edge.toType),
      edges.map((edge) => edge.toId)
    ]
  };
}

export async function upsertRecordsWithClient(
  client: Queryable,
  resourceType: ResourceType,
  properties: readonly string[],
  records: readonly CrmRecord[]
): Promise<number> {
  const unique = dedupeById(records);

  if (unique.length === 0) {
    return 0;
  }

  return inTransaction(client, async () => {
    let written = 0;

    for (let index = 0; index < unique.length; index += MAX_ROWS_PER_STATEMENT) {
      const chunk = unique.slice(index, index + MAX_ROWS_PER_STATEMENT);
      const statement = buildUpsertStatement(resourceType, properties, chunk);
      const result = await client.query(statement.sql, statement.values);
      written += result.rowCount ?? 0;
    }

    return written;
  });
}

export async function insertAssociationsWithClient(
  client: Queryable,
  edges: readonly AssociationEdge[]
): Promise<number> {
  if (edges.length === 0) {
    return 0;
  }

  return inTransaction(client, async () => {
    let inserted = 0;

    for (let index = 0; index < edges.length; index += MAX_ROWS_PER_STATEMENT) {
      const statement = buildAssociationInsertStatement(
        edges.slice(index, index + MAX_ROWS_PER_STATEMENT)
      );
      const result = await client.query(statement.sql, statement.values);
      inserted += result.rowCount ?? 0;
    }

    return inserted;
  });
}

// Association resume stores an index into this list, so the order must be
// stable across runs.
export async function listRecordIdsWithClient(
  client: Queryable,
  resourceType: ResourceType
): Promise<string[]> {
  const result = await client.query(
    `SELECT ${quoteIdentifier("id")} FROM ${quoteIdentifier(resourceType)} ORDER BY ${quoteIdentifier("id")} ASC;`
  );

  const ids: string[] = [];
  for (const row of result.rows) {
    if (typeof row.id === "string") {
      ids.push(row.id);
    }
  }

  return ids;
}

export function createRecordSink(pool: ConnectionSource): RecordSink {
  let cachedClient: ReleasableClient | null = null;
  let connectPromise: Promise<ReleasableClient> | null = null;

  const getClient = async (): Promise<ReleasableClient> => {
    if (cachedClient) {
      return cachedClient;
    }

    if (!connectPromise) {
      connectPromise = pool.connect().then((client) => {
        cachedClient = client;
        return client;
      });
    }

    try {
      return await connectPromise;
    } finally {
      connectPromise = null;
    }
  };

  const releaseCachedClient = (): void => {
    if (!cachedClient) {
      return;
    }

    cachedClient.release();
    cachedClient = null;
  };

  const withClient = async <T>(work: (client: Queryable) => Promise<T>): Promise<T> => {
    const client = await getClient();

    try {
      return await work(client);
    } catch (error) {
      releaseCachedClient();
      throw error;
    }
  };

  return {
    upsertRecords(resourceType, properties, records) {
      return withClient((client) =>
        upsertRecordsWithClient(client, resourceType, properties, records)
      );
    },
    insertAssociations(edges) {
      return withClient((client) => insertAssociationsWithClient(client, edges));
    },
    listRecordIds(resourceType) {
      return withClient((client) => listRecordIdsWithClient(client, resourceType));
    },
    async close(): Promise<void> {
      releaseCachedClient();
    }
  };
}
