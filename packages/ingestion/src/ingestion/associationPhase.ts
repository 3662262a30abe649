import type { CrmClient } from "../api/crmClient";
import type { RecordSink } from "../db/recordSink";
import type { Logger } from "../logger";
import { silentLogger } from "../logger";
import type { CheckpointStore } from "../state/checkpointStore";
import type { AssociationEdge, PhaseOutcome, ResourceType } from "../types";
import type { PhaseOptions } from "./phaseMachine";
import {
  buildOutcome,
  createPhaseTracker,
  normalizeLimit,
  phaseKey
} from "./phaseMachine";
import { ASSOCIATION_PARTNERS } from "./resources";

export interface AssociationPhaseDependencies {
  client: Pick<CrmClient, "fetchAssociations">;
  sink: Pick<RecordSink, "insertAssociations" | "listRecordIds">;
  checkpoints: CheckpointStore;
  logger?: Logger;
}

export async function collectAssociationEdges(
  client: Pick<CrmClient, "fetchAssociations">,
  resourceType: ResourceType,
  objectId: string
): Promise<AssociationEdge[]> {
  const edges: AssociationEdge[] = [];

  for (const toType of ASSOCIATION_PARTNERS[resourceType]) {
    const associatedIds = await client.fetchAssociations(resourceType, objectId, toType);

    for (const toId of associatedIds) {
      edges.push({ fromType: resourceType, fromId: objectId, toType, toId });
    }
  }

  return edges;
}

/**
 * Walks the locally stored ids of a resource type (sorted by id) and stores
 * the edges to each partner type. The checkpoint is the index of the next id
 * to visit.
 */
export async function runAssociationPhase(
  deps: AssociationPhaseDependencies,
  resourceType: ResourceType,
  options: PhaseOptions = {}
): Promise<PhaseOutcome> {
  const key = phaseKey(resourceType, "associations");
  const logger = deps.logger ?? silentLogger;
  const limit = normalizeLimit(options.limit);

  if (ASSOCIATION_PARTNERS[resourceType].length === 0) {
    const tracker = createPhaseTracker(key, "fresh", options.hooks);
    logger.debug("no association partners, skipping", { resource: resourceType });
    tracker.moveTo("skipped");
    return buildOutcome(key, "skipped", { completed: true });
  }

  if (await deps.checkpoints.isPhaseComplete(key)) {
    const tracker = createPhaseTracker(key, "resuming", options.hooks);
    logger.info("associations already fully fetched, skipping", { resource: resourceType });
    tracker.moveTo("skipped");
    return buildOutcome(key, "skipped", { completed: true });
  }

  const saved = await deps.checkpoints.load(key);
  let startIndex = 0;

  if (saved?.kind === "index") {
    startIndex = saved.index;
  } else if (saved) {
    logger.warn("checkpoint has unexpected kind, starting fresh", {
      resource: resourceType,
      phase: key.phase,
      kind: saved.kind
    });
  }

  const tracker = createPhaseTracker(
    key,
    saved?.kind === "index" ? "resuming" : "fresh",
    options.hooks
  );

  const objectIds = await deps.sink.listRecordIds(resourceType);

  // The stored ids changed since the index was saved; edges insert
  // idempotently, so walk them again from the start.
  if (startIndex > objectIds.length) {
    logger.warn("checkpoint index beyond stored ids, starting fresh", {
      resource: resourceType,
      index: startIndex,
      total: objectIds.length
    });
    startIndex = 0;
  }

  logger.info(startIndex === 0 ? "starting association fetch" : "resuming association fetch", {
    resource: resourceType,
    index: startIndex,
    total: objectIds.length,
    limit
  });

  let processed = 0;
  let nextIndex = startIndex;

  for (let index = startIndex; index < objectIds.length; index += 1) {
    const objectId = objectIds[index];

    tracker.moveTo("fetching");
    const edges = await collectAssociationEdges(deps.client, resourceType, objectId);

    tracker.moveTo("persisting");
    await deps.sink.insertAssociations(edges);

    processed += 1;
    nextIndex = index + 1;

    options.hooks?.onPage?.(key, {
      pageNumber: processed,
      size: edges.length,
      processed,
      cursor: nextIndex
    });

    if (limit !== null && nextIndex >= limit) {
      tracker.moveTo("limited");
      await deps.checkpoints.clear(key);
      logger.info("association limit reached", { resource: resourceType, limit, index: nextIndex });
      return buildOutcome(key, "limited", {
        completed: false,
        processed,
        pages: processed,
        cursor: nextIndex
      });
    }

    tracker.moveTo("checkpointing");
    await deps.checkpoints.save(key, { kind: "index", index: nextIndex });

    logger.debug("associations stored", {
      resource: resourceType,
      objectId,
      edges: edges.length,
      position: `${nextIndex}/${objectIds.length}`
    });
  }

  tracker.moveTo("drained");
  await deps.checkpoints.clear(key);

  const completed = limit === null;
  if (completed) {
    await deps.checkpoints.markComplete(key);
    tracker.moveTo("complete");
  }

  logger.info("association fetch drained", { resource: resourceType, processed, completed });
  return buildOutcome(key, "drained", {
    completed,
    processed,
    pages: processed,
    cursor: nextIndex
  });
}
