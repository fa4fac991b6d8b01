import { query, closePool } from "./client";
import { createExtensionsSQL, createIndexesSQL, createTablesSQL } from "./schema";
import { componentLogger } from "../config/logger";

const log = componentLogger("db-setup");

async function main() {
  try {
    await query(createExtensionsSQL);
    await query(createTablesSQL);
    await query(createIndexesSQL);
    log.info("schema ready");
  } finally {
    await closePool();
  }
}

main().catch((err: unknown) => {
  log.error({ err }, "schema setup failed");
  process.exitCode = 1;
});
