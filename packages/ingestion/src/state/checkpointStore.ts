import { open, readFile, readdir, rename, rm, mkdir } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "../logger";
import { silentLogger } from "../logger";
import type { Checkpoint, PhaseKey } from "../types";

export const CHECKPOINT_FORMAT = "crm-export-checkpoint";
export const CHECKPOINT_VERSION = 1;

const CHECKPOINT_SUFFIX = ".checkpoint.json";
const COMPLETION_SUFFIX = ".completed.txt";

export interface CheckpointStore {
  load: (key: PhaseKey) => Promise<Checkpoint | null>;
  save: (key: PhaseKey, checkpoint: Checkpoint) => Promise<void>;
  clear: (key: PhaseKey) => Promise<void>;
  isPhaseComplete: (key: PhaseKey) => Promise<boolean>;
  markComplete: (key: PhaseKey) => Promise<void>;
  reset: () => Promise<number>;
}

export interface FileCheckpointStoreOptions {
  directory: string;
  now?: () => Date;
  logger?: Logger;
}

interface CheckpointDocument {
  format: typeof CHECKPOINT_FORMAT;
  version: typeof CHECKPOINT_VERSION;
  resourceType: string;
  phase: string;
  checkpoint: Checkpoint;
}

interface RecordLike {
  [key: string]: unknown;
}

function isRecordLike(value: unknown): value is RecordLike {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNotFound(error: unknown): boolean {
  return isRecordLike(error) && error.code === "ENOENT";
}

export function checkpointFileName(key: PhaseKey): string {
  return `${key.resourceType}.${key.phase}${CHECKPOINT_SUFFIX}`;
}

export function completionFileName(key: PhaseKey): string {
  return `${key.resourceType}.${key.phase}${COMPLETION_SUFFIX}`;
}

export function serializeCheckpoint(key: PhaseKey, checkpoint: Checkpoint): string {
  const document: CheckpointDocument = {
    format: CHECKPOINT_FORMAT,
    version: CHECKPOINT_VERSION,
    resourceType: key.resourceType,
    phase: key.phase,
    checkpoint
  };

  return `${JSON.stringify(document, null, 2)}\n`;
}

function parseCheckpointPayload(value: unknown): Checkpoint | null {
  if (!isRecordLike(value)) {
    return null;
  }

  if (value.kind === "cursor" && typeof value.cursor === "string") {
    return { kind: "cursor", cursor: value.cursor };
  }

  if (
    value.kind === "index" &&
    typeof value.index === "number" &&
    Number.isSafeInteger(value.index) &&
    value.index >= 0
  ) {
    return { kind: "index", index: value.index };
  }

  return null;
}

/**
 * Parses a checkpoint file body. Returns a reason string instead of a
 * checkpoint when the content cannot be trusted.
 */
export function parseCheckpoint(
  key: PhaseKey,
  raw: string
): { checkpoint: Checkpoint } | { invalid: string } {
  let parsed: unknown;

  try {
    parsed = JSON.parse(raw);
  } catch {
    return { invalid: "invalid JSON" };
  }

  if (!isRecordLike(parsed) || parsed.format !== CHECKPOINT_FORMAT) {
    return { invalid: "unrecognized format" };
  }

  if (parsed.version !== CHECKPOINT_VERSION) {
    return { invalid: `unsupported version ${String(parsed.version)}` };
  }

  if (parsed.resourceType !== key.resourceType || parsed.phase !== key.phase) {
    return { invalid: "key mismatch" };
  }

  const checkpoint = parseCheckpointPayload(parsed.checkpoint);
  if (!checkpoint) {
    return { invalid: "malformed checkpoint payload" };
  }

  return { checkpoint };
}

async function writeFileDurably(filePath: string, contents: string): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  const handle = await open(tmpPath, "w");

  try {
    await handle.writeFile(contents, "utf8");
    await handle.sync();
  } finally {
    await handle.close();
  }

  await rename(tmpPath, filePath);
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const handle = await open(filePath, "r");
    await handle.close();
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }

    throw error;
  }
}

export function createFileCheckpointStore(
  options: FileCheckpointStoreOptions
): CheckpointStore {
  const directory = options.directory;
  const now = options.now ?? (() => new Date());
  const logger = options.logger ?? silentLogger;

  const ensureDirectory = async (): Promise<void> => {
    await mkdir(directory, { recursive: true });
  };

  return {
    async load(key: PhaseKey): Promise<Checkpoint | null> {
      const filePath = path.join(directory, checkpointFileName(key));
      let raw: string;

      try {
        raw = await readFile(filePath, "utf8");
      } catch (error) {
        if (isNotFound(error)) {
          return null;
        }

        logger.warn("checkpoint unreadable, starting fresh", {
          resource: key.resourceType,
          phase: key.phase,
          file: filePath,
          error: error instanceof Error ? error.message : String(error)
        });
        return null;
      }

      const result = parseCheckpoint(key, raw);

      if ("invalid" in result) {
        logger.warn("checkpoint corrupt, starting fresh", {
          resource: key.resourceType,
          phase: key.phase,
          file: filePath,
          reason: result.invalid
        });
        return null;
      }

      return result.checkpoint;
    },

    async save(key: PhaseKey, checkpoint: Checkpoint): Promise<void> {
      await ensureDirectory();
      await writeFileDurably(
        path.join(directory, checkpointFileName(key)),
        serializeCheckpoint(key, checkpoint)
      );
    },

    async clear(key: PhaseKey): Promise<void> {
      await rm(path.join(directory, checkpointFileName(key)), { force: true });
    },

    async isPhaseComplete(key: PhaseKey): Promise<boolean> {
      return fileExists(path.join(directory, completionFileName(key)));
    },

    async markComplete(key: PhaseKey): Promise<void> {
      await ensureDirectory();
      await writeFileDurably(
        path.join(directory, completionFileName(key)),
        `Completed on ${now().toISOString()}\n`
      );
    },

    async reset(): Promise<number> {
      let entries: string[];

      try {
        entries = await readdir(directory);
      } catch (error) {
        if (isNotFound(error)) {
          return 0;
        }

        throw error;
      }

      const stateFiles = entries.filter(
        (name) =>
          name.endsWith(CHECKPOINT_SUFFIX) || name.endsWith(COMPLETION_SUFFIX)
      );

      for (const name of stateFiles) {
        await rm(path.join(directory, name), { force: true });
      }

      return stateFiles.length;
    }
  };
}
