import type { ResourceType } from "../types";
import type { Queryable } from "./queryable";
import { quoteIdentifier } from "./queryable";

export const MAX_IDENTIFIER_BYTES = 63;

/**
 * The name PostgreSQL keeps for an identifier: longer names are cut to
 * 63 bytes on a character boundary.
 */
export function storedIdentifier(name: string): string {
  if (Buffer.byteLength(name, "utf8") <= MAX_IDENTIFIER_BYTES) {
    return name;
  }

  let clipped = "";
  let bytes = 0;

  for (const char of name) {
    const size = Buffer.byteLength(char, "utf8");
    if (bytes + size > MAX_IDENTIFIER_BYTES) {
      break;
    }

    clipped += char;
    bytes += size;
  }

  return clipped;
}

export function buildCreateResourceTableSql(
  resourceType: ResourceType,
  properties: readonly string[]
): string {
  const columns = [
    `${quoteIdentifier("id")} TEXT PRIMARY KEY`,
    ...properties.map((property) => `${quoteIdentifier(property)} TEXT`)
  ];

  return `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(resourceType)} (${columns.join(", ")});`;
}

// Properties that appear on a later run are added to the existing table.
export function buildAddMissingColumnsSql(
  resourceType: ResourceType,
  properties: readonly string[]
): string | null {
  if (properties.length === 0) {
    return null;
  }

  const clauses = properties.map(
    (property) => `ADD COLUMN IF NOT EXISTS ${quoteIdentifier(property)} TEXT`
  );

  return `ALTER TABLE ${quoteIdentifier(resourceType)} ${clauses.join(", ")};`;
}

export async function ensureResourceTable(
  runner: Queryable,
  resourceType: ResourceType,
  properties: readonly string[]
): Promise<void> {
  await runner.query(buildCreateResourceTableSql(resourceType, properties));

  const alterSql = buildAddMissingColumnsSql(resourceType, properties);
  if (alterSql) {
    await runner.query(alterSql);
  }
}

const SELECT_COLUMNS_SQL = `
SELECT column_name
FROM information_schema.columns
WHERE table_schema = current_schema() AND table_name = $1
ORDER BY ordinal_position ASC;
`;

export async function listTableColumns(
  runner: Queryable,
  table: string
): Promise<string[]> {
  const result = await runner.query(SELECT_COLUMNS_SQL, [table]);
  const columns: string[] = [];

  for (const row of result.rows) {
    if (typeof row.column_name === "string") {
      columns.push(row.column_name);
    }
  }

  return columns;
}
