export type ResourceType = "companies" | "contacts" | "notes" | "tasks" | "calls";

export type Phase = "data" | "associations";

export interface PhaseKey {
  resourceType: ResourceType;
  phase: Phase;
}

export interface CrmRecord {
  id: string;
  properties: Record<string, string>;
}

export interface AssociationEdge {
  fromType: ResourceType;
  fromId: string;
  toType: ResourceType;
  toId: string;
}

export type Checkpoint =
  | { kind: "cursor"; cursor: string }
  | { kind: "index"; index: number };

export type PhaseStatus = "skipped" | "drained" | "limited" | "stuck";

export type PhaseState =
  | "fresh"
  | "resuming"
  | "fetching"
  | "persisting"
  | "checkpointing"
  | "drained"
  | "complete"
  | "limited"
  | "stuck"
  | "skipped";

export interface PhaseOutcome {
  resourceType: ResourceType;
  phase: Phase;
  status: PhaseStatus;
  completed: boolean;
  processed: number;
  pages: number;
  cursor: string | number | null;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface ExportConfig {
  databaseUrl: string;
  apiBaseUrl: string;
  accessToken: string;
  apiPageSize: number;
  apiTimeoutMs: number;
  apiMaxRetries: number;
  apiRetryDelayMs: number;
  checkpointDir: string;
  exportDir: string;
  recordLimit: number | null;
  restart: boolean;
  progressLogIntervalMs: number;
  logLevel: LogLevel;
}
