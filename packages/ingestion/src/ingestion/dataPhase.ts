import type { Logger } from "../logger";
import { silentLogger } from "../logger";
import type { RecordSink } from "../db/recordSink";
import type { CheckpointStore } from "../state/checkpointStore";
import type { PhaseOutcome, ResourceType } from "../types";
import type { PageFetchers, PropertiesByType } from "./pageFetchers";
import { nextCursorFromPage } from "./pageFetchers";
import type { PhaseOptions } from "./phaseMachine";
import {
  buildOutcome,
  createPhaseTracker,
  normalizeLimit,
  phaseKey
} from "./phaseMachine";

export const STUCK_CURSOR_THRESHOLD = 3;

export interface DataPhaseDependencies {
  fetchers: PageFetchers;
  propertiesByType: PropertiesByType;
  sink: Pick<RecordSink, "upsertRecords">;
  checkpoints: CheckpointStore;
  logger?: Logger;
}

export async function runDataPhase(
  deps: DataPhaseDependencies,
  resourceType: ResourceType,
  options: PhaseOptions = {}
): Promise<PhaseOutcome> {
  const key = phaseKey(resourceType, "data");
  const logger = deps.logger ?? silentLogger;
  const limit = normalizeLimit(options.limit);
  const fetchPage = deps.fetchers[resourceType];
  const properties = deps.propertiesByType[resourceType];

  if (await deps.checkpoints.isPhaseComplete(key)) {
    const tracker = createPhaseTracker(key, "resuming", options.hooks);
    logger.info("data already fully fetched, skipping", { resource: resourceType });
    tracker.moveTo("skipped");
    return buildOutcome(key, "skipped", { completed: true });
  }

  const saved = await deps.checkpoints.load(key);
  let cursor: string | null = null;

  if (saved?.kind === "cursor") {
    cursor = saved.cursor;
  } else if (saved) {
    logger.warn("checkpoint has unexpected kind, starting fresh", {
      resource: resourceType,
      phase: key.phase,
      kind: saved.kind
    });
  }

  const tracker = createPhaseTracker(
    key,
    cursor === null ? "fresh" : "resuming",
    options.hooks
  );

  logger.info(cursor === null ? "starting data fetch" : "resuming data fetch", {
    resource: resourceType,
    cursor,
    limit
  });

  let processed = 0;
  let pages = 0;
  let sameCursorCount = 0;

  while (true) {
    tracker.moveTo("fetching");
    const records = await fetchPage(cursor);

    if (records.length === 0) {
      tracker.moveTo("drained");
      await deps.checkpoints.clear(key);

      const completed = limit === null;
      if (completed) {
        await deps.checkpoints.markComplete(key);
        tracker.moveTo("complete");
      }

      logger.info("data fetch drained", {
        resource: resourceType,
        pages,
        processed,
        completed
      });
      return buildOutcome(key, "drained", { completed, processed, pages, cursor });
    }

    tracker.moveTo("persisting");
    await deps.sink.upsertRecords(resourceType, properties, records);

    pages += 1;
    processed += records.length;
    const nextCursor = nextCursorFromPage(records);

    options.hooks?.onPage?.(key, {
      pageNumber: pages,
      size: records.length,
      processed,
      cursor: nextCursor
    });

    if (nextCursor === cursor) {
      sameCursorCount += 1;

      if (sameCursorCount >= STUCK_CURSOR_THRESHOLD) {
        tracker.moveTo("stuck");
        logger.warn("cursor did not advance, abandoning phase", {
          resource: resourceType,
          cursor,
          iterations: sameCursorCount
        });
        return buildOutcome(key, "stuck", { completed: false, processed, pages, cursor });
      }
    } else {
      sameCursorCount = 0;
    }

    cursor = nextCursor;

    if (limit !== null && processed >= limit) {
      tracker.moveTo("limited");
      await deps.checkpoints.clear(key);
      logger.info("record limit reached", { resource: resourceType, limit, processed });
      return buildOutcome(key, "limited", { completed: false, processed, pages, cursor });
    }

    tracker.moveTo("checkpointing");
    if (cursor !== null) {
      await deps.checkpoints.save(key, { kind: "cursor", cursor });
    }

    logger.debug("data page stored", {
      resource: resourceType,
      page: pages,
      size: records.length,
      processed,
      cursor
    });
  }
}
