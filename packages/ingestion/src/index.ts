import { config as loadDotenv } from "dotenv";

import { createCrmClient } from "./api/crmClient";
import { createTransportClient } from "./api/transportClient";
import { loadConfig } from "./config";
import { runMigrations } from "./db/migrations";
import { createPool } from "./db/pool";
import { createRecordSink } from "./db/recordSink";
import { ensureResourceTable } from "./db/schema";
import { exportSnapshot } from "./export/csvExporter";
import { resetAfterCleanRun, runExport } from "./ingestion/exportRun";
import { createPageFetchers, discoverProperties } from "./ingestion/pageFetchers";
import { createProgressLogger } from "./ingestion/progressLogger";
import { RESOURCE_TYPES } from "./ingestion/resources";
import { createLogger } from "./logger";
import { createFileCheckpointStore } from "./state/checkpointStore";

loadDotenv();

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  if (!config.accessToken) {
    throw new Error("CRM_ACCESS_TOKEN is required");
  }

  const pool = createPool(config.databaseUrl);
  const sink = createRecordSink(pool);

  try {
    const applied = await runMigrations(pool);
    logger.info("export started", {
      migrationsApplied: applied,
      limit: config.recordLimit,
      restart: config.restart,
      checkpointDir: config.checkpointDir
    });

    const transport = createTransportClient(
      {
        baseUrl: config.apiBaseUrl,
        accessToken: config.accessToken,
        timeoutMs: config.apiTimeoutMs,
        maxRetries: config.apiMaxRetries,
        retryDelayMs: config.apiRetryDelayMs
      },
      { logger }
    );
    const client = createCrmClient(transport);

    const propertiesByType = await discoverProperties(client, logger);
    for (const resourceType of RESOURCE_TYPES) {
      await ensureResourceTable(pool, resourceType, propertiesByType[resourceType]);
      logger.info("table ready", {
        resource: resourceType,
        properties: propertiesByType[resourceType].length
      });
    }

    const checkpoints = createFileCheckpointStore({
      directory: config.checkpointDir,
      logger
    });
    const progressLogger = createProgressLogger({
      intervalMs: config.progressLogIntervalMs,
      log: (message) => logger.info(message)
    });

    const result = await runExport(
      {
        fetchers: createPageFetchers(client, propertiesByType, config.apiPageSize),
        propertiesByType,
        client,
        sink,
        checkpoints,
        logger
      },
      {
        limit: config.recordLimit,
        restart: config.restart,
        hooks: {
          onPage: progressLogger.onPage,
          onTransition(key, from, to) {
            logger.debug("phase transition", {
              resource: key.resourceType,
              phase: key.phase,
              from,
              to
            });
          }
        }
      }
    );

    progressLogger.flush();

    for (const outcome of result.outcomes) {
      logger.info("phase finished", {
        resource: outcome.resourceType,
        phase: outcome.phase,
        status: outcome.status,
        completed: outcome.completed,
        processed: outcome.processed
      });
    }

    await exportSnapshot(pool, config.exportDir, logger);
    await resetAfterCleanRun(checkpoints, result, logger);
  } finally {
    await sink.close?.();
    await pool.end();
  }

  logger.info("export complete");
}

main().catch((error: unknown) => {
  console.error("export failed", error);
  process.exit(1);
});
