import type { CrmClient } from "../api/crmClient";
import type { RecordSink } from "../db/recordSink";
import type { Logger } from "../logger";
import { silentLogger } from "../logger";
import type { CheckpointStore } from "../state/checkpointStore";
import type { PhaseOutcome, ResourceType } from "../types";
import { runAssociationPhase } from "./associationPhase";
import { runDataPhase } from "./dataPhase";
import type { PageFetchers, PropertiesByType } from "./pageFetchers";
import type { PhaseHooks } from "./phaseMachine";
import { RESOURCE_TYPES, associationResourceTypes } from "./resources";

export interface ExportRunDependencies {
  fetchers: PageFetchers;
  propertiesByType: PropertiesByType;
  client: Pick<CrmClient, "fetchAssociations">;
  sink: Pick<RecordSink, "upsertRecords" | "insertAssociations" | "listRecordIds">;
  checkpoints: CheckpointStore;
  logger?: Logger;
}

export interface ExportRunOptions {
  limit?: number | null;
  restart?: boolean;
  hooks?: PhaseHooks;
  dataResourceTypes?: readonly ResourceType[];
  associationResourceTypes?: readonly ResourceType[];
}

export interface ExportRunResult {
  outcomes: PhaseOutcome[];
  complete: boolean;
  limited: boolean;
}

/**
 * Runs every data phase, then every association phase, one at a time.
 * Any thrown error aborts the run; stuck and limited phases do not.
 */
export async function runExport(
  deps: ExportRunDependencies,
  options: ExportRunOptions = {}
): Promise<ExportRunResult> {
  const logger = deps.logger ?? silentLogger;
  const limit = options.limit ?? null;

  if (options.restart) {
    const removed = await deps.checkpoints.reset();
    logger.info("checkpoint state reset", { filesRemoved: removed });
  }

  const outcomes: PhaseOutcome[] = [];

  for (const resourceType of options.dataResourceTypes ?? RESOURCE_TYPES) {
    logger.info("processing data", { resource: resourceType });
    outcomes.push(
      await runDataPhase(deps, resourceType, { limit, hooks: options.hooks })
    );
  }

  for (const resourceType of options.associationResourceTypes ?? associationResourceTypes()) {
    logger.info("processing associations", { resource: resourceType });
    outcomes.push(
      await runAssociationPhase(deps, resourceType, { limit, hooks: options.hooks })
    );
  }

  const complete = outcomes.every((outcome) => outcome.completed);

  for (const outcome of outcomes) {
    if (outcome.status === "stuck") {
      logger.warn("phase ended with a stuck cursor", {
        resource: outcome.resourceType,
        phase: outcome.phase,
        cursor: outcome.cursor
      });
    }
  }

  return { outcomes, complete, limited: limit !== null };
}

// After a clean unlimited run every marker is dropped so the next run
// re-exports from scratch.
export async function resetAfterCleanRun(
  checkpoints: Pick<CheckpointStore, "reset">,
  result: ExportRunResult,
  logger: Logger = silentLogger
): Promise<boolean> {
  if (!result.complete || result.limited) {
    logger.info("keeping checkpoint state for the next run", {
      complete: result.complete,
      limited: result.limited
    });
    return false;
  }

  const removed = await checkpoints.reset();
  logger.info("run complete, checkpoint state cleared", { filesRemoved: removed });
  return true;
}
