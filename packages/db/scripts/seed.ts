import "dotenv/config";
import { createUsintDatabase, seedParameters, users } from "../src/index.js";

/**
 * Seeds the parameter catalog and, optionally, the local development user.
 *
 * `SEED_USERNAME` (defaults to `REMOTE_USER`) is inserted as an active usint
 * member so that the app can be opened on localhost without LDAP in front.
 */
async function seed() {
  const url = process.env.USINT_DATABASE_URL;
  if (!url) {
    throw new Error("USINT_DATABASE_URL is not set");
  }
  const { db, pool } = createUsintDatabase(url);
  try {
    const count = await seedParameters(db);
    console.log(`Seeded ${count} parameters.`);

    const username = process.env.SEED_USERNAME ?? process.env.REMOTE_USER;
    if (username) {
      await db
        .insert(users)
        .values({
          username,
          isActive: true,
          email: process.env.SEED_EMAIL ?? `${username}@localhost`,
          groups: "usint",
          fullName: username,
        })
        .onConflictDoUpdate({
          target: users.username,
          set: { isActive: true },
        });
      console.log(`Seeded user ${username}.`);
    }
  } finally {
    await pool.end();
  }
}

seed().catch((error) => {
  console.error("Seed failed:", error);
  process.exit(1);
});
