import { config as loadDotenv } from "dotenv";

import { loadConfig } from "../config";
import { runMigrations } from "../db/migrations";
import { createPool } from "../db/pool";
import { createLogger } from "../logger";

loadDotenv();

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const pool = createPool(config.databaseUrl);

  try {
    const applied = await runMigrations(pool);
    logger.info("migrations applied", { count: applied });
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  console.error("migration failed", error);
  process.exit(1);
});
