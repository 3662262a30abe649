import { config as loadDotenv } from "dotenv";

import { loadConfig } from "../config";
import { createPool } from "../db/pool";
import { exportSnapshot } from "../export/csvExporter";
import { createLogger } from "../logger";

loadDotenv();

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const pool = createPool(config.databaseUrl);

  try {
    const results = await exportSnapshot(pool, config.exportDir, logger);
    const totalRows = results.reduce((sum, result) => sum + result.rows, 0);
    logger.info("snapshot complete", { tables: results.length, rows: totalRows });
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  console.error("snapshot failed", error);
  process.exit(1);
});
