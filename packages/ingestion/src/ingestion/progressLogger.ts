import type { PhaseKey } from "../types";
import type { PageDetails } from "./phaseMachine";

export interface ProgressLoggerOptions {
  intervalMs: number;
  now?: () => number;
  log?: (message: string) => void;
}

export interface ProgressLogger {
  onPage: (key: PhaseKey, details: PageDetails) => void;
  flush: () => void;
}

export function createProgressLogger(
  options: ProgressLoggerOptions
): ProgressLogger {
  const now = options.now ?? Date.now;
  const log = options.log ?? console.log;
  const intervalMs = Math.max(1, options.intervalMs);

  let phaseStartedAtMs = now();
  let lastLoggedAtMs = phaseStartedAtMs;
  let currentKey: PhaseKey | null = null;
  let pages = 0;
  let records = 0;
  let latestCursor: string | number | null = null;

  const maybeLog = (force: boolean): void => {
    if (!currentKey) {
      return;
    }

    const currentMs = now();
    if (!force && currentMs - lastLoggedAtMs < intervalMs) {
      return;
    }

    const elapsedSeconds = Math.max(0.001, (currentMs - phaseStartedAtMs) / 1000);
    const recordsPerSecond = records / elapsedSeconds;

    log(
      `export progress (resource=${currentKey.resourceType}, phase=${currentKey.phase}, pages=${pages}, records=${records}, rps=${recordsPerSecond.toFixed(1)}, cursor=${latestCursor ?? "null"})`
    );

    lastLoggedAtMs = currentMs;
  };

  return {
    onPage(key: PhaseKey, details: PageDetails): void {
      const samePhase =
        currentKey !== null &&
        currentKey.resourceType === key.resourceType &&
        currentKey.phase === key.phase;

      if (!samePhase) {
        maybeLog(true);
        currentKey = key;
        phaseStartedAtMs = now();
        lastLoggedAtMs = phaseStartedAtMs;
        pages = 0;
        records = 0;
      }

      pages += 1;
      records += details.size;
      latestCursor = details.cursor;
      maybeLog(false);
    },
    flush(): void {
      maybeLog(true);
    }
  };
}
