/**
 * Applies apps/api/migrations/NNN_*.sql in order, once each.
 * Run: npm run migrate (from the repository root)
 */
import crypto from "crypto";
import dotenv from "dotenv";
import fs from "fs";
import path from "path";
import pg from "pg";

dotenv.config({ path: path.resolve(__dirname, "../../../.env") });

const MIGRATION_DIR = path.resolve(__dirname, "..", "migrations");
const MIGRATION_FILENAME_RE = /^[0-9]{3}_[A-Za-z0-9_-]+\.sql$/;

type AppliedRow = { filename: string; content_hash: string | null };

function hashContent(content: string): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

function listMigrations(): string[] {
  return fs
    .readdirSync(MIGRATION_DIR)
    .filter((entry) => MIGRATION_FILENAME_RE.test(entry))
    .sort((a, b) => a.localeCompare(b, "en"));
}

async function main(): Promise<void> {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error("DATABASE_URL not set in environment");
  }
  console.log(`Running migrations against: ${databaseUrl.replace(/:[^:@]+@/, ":****@")}`);

  const client = new pg.Client({ connectionString: databaseUrl });
  await client.connect();
  try {
    await client.query(`CREATE TABLE IF NOT EXISTS schema_migrations (
      filename TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      content_hash TEXT
    )`);

    const appliedRows = await client.query<AppliedRow>(
      "SELECT filename, content_hash FROM schema_migrations ORDER BY filename"
    );
    const applied = new Map(appliedRows.rows.map((row) => [row.filename, row.content_hash]));

    const migrations = listMigrations();
    let driftCount = 0;
    for (const migration of migrations) {
      const storedHash = applied.get(migration);
      if (!storedHash) continue;
      const diskHash = hashContent(fs.readFileSync(path.join(MIGRATION_DIR, migration), "utf-8"));
      if (diskHash !== storedHash) {
        console.warn(
          `  WARNING: ${migration} has changed since it was applied (expected ${storedHash.slice(0, 12)}…, got ${diskHash.slice(0, 12)}…)`
        );
        driftCount++;
      }
    }
    if (driftCount > 0) {
      console.warn(`\n${driftCount} migration(s) have drifted from their applied versions. Review before proceeding.\n`);
    }

    let ranCount = 0;
    for (const migration of migrations) {
      if (applied.has(migration)) continue;

      console.log(`\nRunning ${migration}...`);
      const sql = fs.readFileSync(path.join(MIGRATION_DIR, migration), "utf-8");
      const contentHash = hashContent(sql);
      try {
        await client.query("BEGIN");
        await client.query(sql);
        await client.query("INSERT INTO schema_migrations (filename, content_hash) VALUES ($1, $2)", [
          migration,
          contentHash,
        ]);
        await client.query("COMMIT");
      } catch (error) {
        await client.query("ROLLBACK");
        throw error;
      }
      console.log(`  ${migration} completed (hash: ${contentHash.slice(0, 12)}…)`);
      ranCount++;
    }

    if (ranCount === 0) {
      console.log("\nAll migrations already applied, nothing to do.");
    } else {
      console.log(`\n${ranCount} migration(s) applied successfully.`);
    }
  } finally {
    await client.end();
  }
}

main().catch((error: unknown) => {
  console.error("Migration failed:", error instanceof Error ? error.message : error);
  process.exit(1);
});
