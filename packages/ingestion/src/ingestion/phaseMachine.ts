import type {
  Phase,
  PhaseKey,
  PhaseOutcome,
  PhaseState,
  PhaseStatus,
  ResourceType
} from "../types";

export interface PageDetails {
  pageNumber: number;
  size: number;
  processed: number;
  cursor: string | number | null;
}

export interface PhaseHooks {
  onTransition?: (key: PhaseKey, from: PhaseState, to: PhaseState) => void;
  onPage?: (key: PhaseKey, details: PageDetails) => void;
}

export interface PhaseOptions {
  /**
   * Data phase: stop once this many records were processed in the run.
   * Association phase: stop once the resume index reaches this value.
   * A limited phase is never marked complete.
   */
  limit?: number | null;
  hooks?: PhaseHooks;
}

const ALLOWED_TRANSITIONS: Record<PhaseState, readonly PhaseState[]> = {
  fresh: ["fetching", "drained", "skipped"],
  resuming: ["fetching", "drained", "skipped"],
  fetching: ["persisting", "drained"],
  persisting: ["checkpointing", "limited", "stuck"],
  checkpointing: ["fetching", "drained"],
  drained: ["complete"],
  complete: [],
  limited: [],
  stuck: [],
  skipped: []
};

export class InvalidTransitionError extends Error {
  constructor(key: PhaseKey, from: PhaseState, to: PhaseState) {
    super(
      `Invalid phase transition for ${key.resourceType}/${key.phase}: ${from} -> ${to}`
    );
    this.name = "InvalidTransitionError";
  }
}

export interface PhaseTracker {
  readonly key: PhaseKey;
  current: () => PhaseState;
  moveTo: (next: PhaseState) => void;
}

export function createPhaseTracker(
  key: PhaseKey,
  initial: "fresh" | "resuming",
  hooks: PhaseHooks = {}
): PhaseTracker {
  let state: PhaseState = initial;

  return {
    key,
    current: () => state,
    moveTo(next: PhaseState): void {
      if (!ALLOWED_TRANSITIONS[state].includes(next)) {
        throw new InvalidTransitionError(key, state, next);
      }

      const previous = state;
      state = next;
      hooks.onTransition?.(key, previous, next);
    }
  };
}

export function phaseKey(resourceType: ResourceType, phase: Phase): PhaseKey {
  return { resourceType, phase };
}

export function buildOutcome(
  key: PhaseKey,
  status: PhaseStatus,
  details: {
    completed: boolean;
    processed?: number;
    pages?: number;
    cursor?: string | number | null;
  }
): PhaseOutcome {
  return {
    resourceType: key.resourceType,
    phase: key.phase,
    status,
    completed: details.completed,
    processed: details.processed ?? 0,
    pages: details.pages ?? 0,
    cursor: details.cursor ?? null
  };
}

export function normalizeLimit(limit: number | null | undefined): number | null {
  if (limit === null || limit === undefined) {
    return null;
  }

  if (!Number.isFinite(limit) || limit <= 0) {
    throw new Error(`limit must be a positive number: ${limit}`);
  }

  return limit;
}
