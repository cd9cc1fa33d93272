// scripts/init-db.ts
import { Pool } from "pg";
import { loadConfig } from "../packages/api/src/config/configuration";
import { applySchema, SCHEMA_SQL_PATH } from "../packages/api/src/database/database.service";

async function main() {
  const config = loadConfig();
  const pool = new Pool({ connectionString: config.database.url });

  try {
    await applySchema(pool);
    console.log(`Applied ${SCHEMA_SQL_PATH}`);
  } finally {
    await pool.end();
  }
}

main().catch((err) => {
  console.error("Database initialisation failed:", err);
  process.exit(1);
});
