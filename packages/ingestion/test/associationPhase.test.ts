import { describe, expect, it, vi } from "vitest";

import {
  collectAssociationEdges,
  runAssociationPhase
} from "../src/ingestion/associationPhase";
import type { ResourceType } from "../src/types";
import {
  createMemoryCheckpointStore,
  createMemorySink,
  createRecordingLogger,
  makeRecords
} from "./helpers/fakes";

function associationClient() {
  return {
    fetchAssociations: vi.fn(
      async (resourceType: ResourceType, objectId: string, toType: ResourceType) => [
        `${toType}-of-${resourceType}-${objectId}`
      ]
    )
  };
}

async function seededSink(resourceType: ResourceType, count: number) {
  const sink = createMemorySink();
  await sink.upsertRecords(resourceType, ["name"], makeRecords("id", 0, count));
  return sink;
}

describe("collectAssociationEdges", () => {
  it("queries every partner type of the resource", async () => {
    const client = associationClient();

    const edges = await collectAssociationEdges(client, "notes", "n-1");

    expect(client.fetchAssociations).toHaveBeenNthCalledWith(1, "notes", "n-1", "companies");
    expect(client.fetchAssociations).toHaveBeenNthCalledWith(2, "notes", "n-1", "contacts");
    expect(edges).toEqual([
      { fromType: "notes", fromId: "n-1", toType: "companies", toId: "companies-of-notes-n-1" },
      { fromType: "notes", fromId: "n-1", toType: "contacts", toId: "contacts-of-notes-n-1" }
    ]);
  });
});

describe("runAssociationPhase", () => {
  it("walks stored ids in order and marks completion", async () => {
    const sink = await seededSink("companies", 3);
    const checkpoints = createMemoryCheckpointStore();
    const client = associationClient();

    const outcome = await runAssociationPhase(
      { client, sink, checkpoints },
      "companies"
    );

    expect(outcome).toEqual({
      resourceType: "companies",
      phase: "associations",
      status: "drained",
      completed: true,
      processed: 3,
      pages: 3,
      cursor: 3
    });
    expect(sink.edges.map((edge) => edge.fromId)).toEqual(["id-0000", "id-0001", "id-0002"]);
    expect(sink.edges.every((edge) => edge.toType === "contacts")).toBe(true);
    expect(checkpoints.saves.map((save) => save.checkpoint)).toEqual([
      { kind: "index", index: 1 },
      { kind: "index", index: 2 },
      { kind: "index", index: 3 }
    ]);
    expect(checkpoints.checkpoints.has("companies/associations")).toBe(false);
    expect(checkpoints.completed.has("companies/associations")).toBe(true);
  });

  it("resumes from the saved index", async () => {
    const sink = await seededSink("calls", 4);
    const checkpoints = createMemoryCheckpointStore();
    checkpoints.checkpoints.set("calls/associations", { kind: "index", index: 2 });
    const client = associationClient();

    const outcome = await runAssociationPhase({ client, sink, checkpoints }, "calls");

    expect(outcome.processed).toBe(2);
    expect(client.fetchAssociations.mock.calls.map((call) => call[1])).toEqual([
      "id-0002",
      "id-0002",
      "id-0003",
      "id-0003"
    ]);
  });

  it("stops at the index limit without marking completion", async () => {
    const sink = await seededSink("tasks", 10);
    const checkpoints = createMemoryCheckpointStore();
    const client = associationClient();

    const outcome = await runAssociationPhase(
      { client, sink, checkpoints },
      "tasks",
      { limit: 4 }
    );

    expect(outcome.status).toBe("limited");
    expect(outcome.cursor).toBe(4);
    expect(sink.edges).toHaveLength(8);
    expect(checkpoints.checkpoints.has("tasks/associations")).toBe(false);
    expect(checkpoints.completed.size).toBe(0);
  });

  it("skips resource types without association partners", async () => {
    const client = associationClient();

    const outcome = await runAssociationPhase(
      {
        client,
        sink: createMemorySink(),
        checkpoints: createMemoryCheckpointStore()
      },
      "contacts"
    );

    expect(outcome.status).toBe("skipped");
    expect(client.fetchAssociations).not.toHaveBeenCalled();
  });

  it("skips a completed phase", async () => {
    const checkpoints = createMemoryCheckpointStore();
    checkpoints.completed.add("notes/associations");
    const client = associationClient();

    const outcome = await runAssociationPhase(
      { client, sink: await seededSink("notes", 2), checkpoints },
      "notes"
    );

    expect(outcome.status).toBe("skipped");
    expect(client.fetchAssociations).not.toHaveBeenCalled();
  });

  it("discards an index past the stored ids and starts over", async () => {
    const checkpoints = createMemoryCheckpointStore();
    checkpoints.checkpoints.set("notes/associations", { kind: "index", index: 9 });
    const client = associationClient();
    const logger = createRecordingLogger();

    const outcome = await runAssociationPhase(
      { client, sink: await seededSink("notes", 2), checkpoints, logger },
      "notes"
    );

    expect(outcome.status).toBe("drained");
    expect(outcome.processed).toBe(2);
    expect(outcome.cursor).toBe(2);
    expect(client.fetchAssociations.mock.calls.map((call) => call[1])).toEqual([
      "id-0000",
      "id-0000",
      "id-0001",
      "id-0001"
    ]);
    expect(checkpoints.completed.has("notes/associations")).toBe(true);
    expect(logger.lines[0]).toEqual({
      level: "warn",
      message: "checkpoint index beyond stored ids, starting fresh",
      fields: { resource: "notes", index: 9, total: 2 }
    });
  });

  it("propagates fetch failures and keeps the last saved index", async () => {
    const sink = await seededSink("companies", 3);
    const checkpoints = createMemoryCheckpointStore();
    const client = {
      fetchAssociations: vi
        .fn<[ResourceType, string, ResourceType], Promise<string[]>>()
        .mockResolvedValueOnce(["c-1"])
        .mockRejectedValueOnce(new Error("request failed"))
    };

    await expect(
      runAssociationPhase({ client, sink, checkpoints }, "companies")
    ).rejects.toThrow("request failed");

    expect(checkpoints.checkpoints.get("companies/associations")).toEqual({
      kind: "index",
      index: 1
    });
    expect(sink.edges).toHaveLength(1);
  });
});
