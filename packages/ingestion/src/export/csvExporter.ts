import { once } from "node:events";
import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import path from "node:path";
import { finished } from "node:stream/promises";

import { stringify } from "csv-stringify";

import type { Queryable, SqlRow } from "../db/queryable";
import { quoteIdentifier } from "../db/queryable";
import { listTableColumns } from "../db/schema";
import { ASSOCIATIONS_TABLE, RESOURCE_TYPES } from "../ingestion/resources";
import type { Logger } from "../logger";
import { silentLogger } from "../logger";

export const DEFAULT_EXPORT_BATCH_SIZE = 5000;

export interface TableExportSpec {
  table: string;
  keyColumns: readonly string[];
}

export interface TableExportResult {
  table: string;
  outputPath: string;
  rows: number;
}

export function snapshotTables(): TableExportSpec[] {
  return [
    ...RESOURCE_TYPES.map((table) => ({ table, keyColumns: ["id"] })),
    {
      table: ASSOCIATIONS_TABLE,
      keyColumns: ["from_object_type", "from_object_id", "to_object_type", "to_object_id"]
    }
  ];
}

export function buildPageQuery(
  spec: TableExportSpec,
  columns: readonly string[],
  afterKey: readonly string[] | null,
  batchSize: number
): { sql: string; values: unknown[] } {
  const keyList = spec.keyColumns.map(quoteIdentifier).join(", ");
  const selectList = columns.map(quoteIdentifier).join(", ");

  if (afterKey === null) {
    return {
      sql: `SELECT ${selectList} FROM ${quoteIdentifier(spec.table)} ORDER BY ${keyList} LIMIT $1;`,
      values: [batchSize]
    };
  }

  const placeholders = afterKey.map((_, index) => `$${index + 1}`).join(", ");

  return {
    sql: `SELECT ${selectList} FROM ${quoteIdentifier(spec.table)} WHERE (${keyList}) > (${placeholders}) ORDER BY ${keyList} LIMIT $${afterKey.length + 1};`,
    values: [...afterKey, batchSize]
  };
}

export function toCell(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }

  if (typeof value === "string") {
    return value;
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (typeof value === "object") {
    return JSON.stringify(value);
  }

  return String(value);
}

function keyOf(spec: TableExportSpec, row: SqlRow): string[] {
  return spec.keyColumns.map((column) => toCell(row[column]));
}

export async function exportTableToCsv(
  runner: Queryable,
  spec: TableExportSpec,
  outputPath: string,
  batchSize: number = DEFAULT_EXPORT_BATCH_SIZE
): Promise<TableExportResult> {
  const columns = await listTableColumns(runner, spec.table);

  if (columns.length === 0) {
    throw new Error(`Table ${spec.table} has no columns or does not exist`);
  }

  await mkdir(path.dirname(outputPath), { recursive: true });

  const output = createWriteStream(outputPath, { encoding: "utf8", flags: "w" });
  const stringifier = stringify();
  stringifier.pipe(output);

  const writeRow = async (cells: string[]): Promise<void> => {
    if (!stringifier.write(cells)) {
      await once(stringifier, "drain");
    }
  };

  let rows = 0;
  let afterKey: string[] | null = null;

  try {
    await writeRow([...columns]);

    while (true) {
      const query = buildPageQuery(spec, columns, afterKey, batchSize);
      const result = await runner.query(query.sql, query.values);

      if (result.rows.length === 0) {
        break;
      }

      for (const row of result.rows) {
        await writeRow(columns.map((column) => toCell(row[column])));
      }

      rows += result.rows.length;
      afterKey = keyOf(spec, result.rows[result.rows.length - 1]);

      if (result.rows.length < batchSize) {
        break;
      }
    }
  } catch (error) {
    stringifier.destroy();
    output.destroy();
    throw error;
  }

  stringifier.end();
  await finished(output);

  return { table: spec.table, outputPath, rows };
}

export async function exportSnapshot(
  runner: Queryable,
  exportDir: string,
  logger: Logger = silentLogger,
  batchSize: number = DEFAULT_EXPORT_BATCH_SIZE
): Promise<TableExportResult[]> {
  const results: TableExportResult[] = [];

  for (const spec of snapshotTables()) {
    const outputPath = path.join(exportDir, `${spec.table}.csv`);
    const result = await exportTableToCsv(runner, spec, outputPath, batchSize);
    logger.info("exported table", { table: spec.table, rows: result.rows, file: outputPath });
    results.push(result);
  }

  return results;
}
