import "dotenv/config";
import { applySqlFile, createUsintDatabase } from "../src/index.js";

/**
 * Creates the Usint store tables from `packages/db/sql/usint.sql`.
 *
 * Run once against an empty database: `npm run db:migrate`.
 */
async function run() {
  const url = process.env.USINT_DATABASE_URL;
  if (!url) {
    throw new Error("USINT_DATABASE_URL is not set");
  }
  const { db, pool } = createUsintDatabase(url);
  try {
    const count = await applySqlFile(db, "usint");
    console.log(`Applied ${count} statements to the Usint store.`);
  } finally {
    await pool.end();
  }
}

run().catch((error) => {
  console.error("Migration failed:", error);
  process.exit(1);
});
