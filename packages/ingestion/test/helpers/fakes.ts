import { vi } from "vitest";

import type { QueryOutcome, SqlRow } from "../../src/db/queryable";
import type { RecordSink } from "../../src/db/recordSink";
import type { PageFetcher, PageFetchers, PropertiesByType } from "../../src/ingestion/pageFetchers";
import type { LogFields, Logger } from "../../src/logger";
import type { CheckpointStore } from "../../src/state/checkpointStore";
import type {
  AssociationEdge,
  Checkpoint,
  CrmRecord,
  PhaseKey,
  ResourceType
} from "../../src/types";

function keyString(key: PhaseKey): string {
  return `${key.resourceType}/${key.phase}`;
}

export interface MemoryCheckpointStore extends CheckpointStore {
  checkpoints: Map<string, Checkpoint>;
  completed: Set<string>;
  saves: Array<{ key: string; checkpoint: Checkpoint }>;
}

export function createMemoryCheckpointStore(): MemoryCheckpointStore {
  const checkpoints = new Map<string, Checkpoint>();
  const completed = new Set<string>();
  const saves: Array<{ key: string; checkpoint: Checkpoint }> = [];

  return {
    checkpoints,
    completed,
    saves,
    async load(key) {
      return checkpoints.get(keyString(key)) ?? null;
    },
    async save(key, checkpoint) {
      checkpoints.set(keyString(key), checkpoint);
      saves.push({ key: keyString(key), checkpoint });
    },
    async clear(key) {
      checkpoints.delete(keyString(key));
    },
    async isPhaseComplete(key) {
      return completed.has(keyString(key));
    },
    async markComplete(key) {
      completed.add(keyString(key));
    },
    async reset() {
      const removed = checkpoints.size + completed.size;
      checkpoints.clear();
      completed.clear();
      return removed;
    }
  };
}

export interface MemorySink extends RecordSink {
  tables: Map<ResourceType, Map<string, CrmRecord>>;
  edges: AssociationEdge[];
  upsertCalls: number;
}

export function createMemorySink(): MemorySink {
  const tables = new Map<ResourceType, Map<string, CrmRecord>>();
  const edges: AssociationEdge[] = [];

  const sink: MemorySink = {
    tables,
    edges,
    upsertCalls: 0,
    async upsertRecords(resourceType, properties, records) {
      sink.upsertCalls += 1;
      const table = tables.get(resourceType) ?? new Map<string, CrmRecord>();
      tables.set(resourceType, table);

      for (const record of records) {
        const row: Record<string, string> = {};
        for (const property of properties) {
          row[property] = record.properties[property] ?? "";
        }
        table.set(record.id, { id: record.id, properties: row });
      }

      return records.length;
    },
    async insertAssociations(newEdges) {
      edges.push(...newEdges);
      return newEdges.length;
    },
    async listRecordIds(resourceType) {
      return [...(tables.get(resourceType)?.keys() ?? [])].sort();
    }
  };

  return sink;
}

export function makeRecords(prefix: string, start: number, count: number): CrmRecord[] {
  return Array.from({ length: count }, (_, offset) => ({
    id: `${prefix}-${String(start + offset).padStart(4, "0")}`,
    properties: { name: `${prefix} ${start + offset}` }
  }));
}

export function scriptedFetcher(pages: CrmRecord[][]): PageFetcher & { cursors: Array<string | null> } {
  const cursors: Array<string | null> = [];
  let index = 0;

  const fetcher = async (cursor: string | null): Promise<CrmRecord[]> => {
    cursors.push(cursor);
    const page = pages[index] ?? [];
    index += 1;
    return page;
  };

  return Object.assign(fetcher, { cursors });
}

export function fetchersWith(overrides: Partial<PageFetchers>): PageFetchers {
  const empty: PageFetcher = async () => [];

  return {
    companies: overrides.companies ?? empty,
    contacts: overrides.contacts ?? empty,
    notes: overrides.notes ?? empty,
    tasks: overrides.tasks ?? empty,
    calls: overrides.calls ?? empty
  };
}

export const NAME_PROPERTIES: PropertiesByType = {
  companies: ["name"],
  contacts: ["name"],
  notes: ["name"],
  tasks: ["name"],
  calls: ["name"]
};

export interface RecordingLogger extends Logger {
  lines: Array<{ level: string; message: string; fields?: LogFields }>;
}

export function createRecordingLogger(): RecordingLogger {
  const lines: Array<{ level: string; message: string; fields?: LogFields }> = [];

  return {
    lines,
    debug: (message, fields) => lines.push({ level: "debug", message, fields }),
    info: (message, fields) => lines.push({ level: "info", message, fields }),
    warn: (message, fields) => lines.push({ level: "warn", message, fields }),
    error: (message, fields) => lines.push({ level: "error", message, fields })
  };
}

export type QueryResponder = (text: string, values?: unknown[]) => SqlRow[] | QueryOutcome;

// Stand-in for a pg client: records every statement and answers with the
// rows the responder returns.
export function createFakeClient(respond: QueryResponder = () => []) {
  const query = vi.fn(async (text: string, values?: unknown[]): Promise<QueryOutcome> => {
    const answer = respond(text, values);

    if (Array.isArray(answer)) {
      return { rows: answer, rowCount: answer.length };
    }

    return answer;
  });

  return { query, release: vi.fn() };
}
