import crypto from "crypto";
import dotenv from "dotenv";
import fs from "fs";
import path from "path";
import { Client } from "pg";

dotenv.config({ path: path.resolve(__dirname, "../../../.env") });

const MIGRATION_FILENAME_RE = /^[0-9]{3}_[A-Za-z0-9_-]+\.sql$/;
const migrationDir = path.resolve(__dirname, "..", "migrations");

function hashContent(content: string): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

function redactUrl(url: string): string {
  return url.replace(/:[^:@/]+@/, ":****@");
}

async function appliedMigrations(client: Client): Promise<Map<string, string>> {
  await client.query(`CREATE TABLE IF NOT EXISTS schema_migrations (
    filename TEXT PRIMARY KEY,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    content_hash TEXT
  )`);
  const result = await client.query<{ filename: string; content_hash: string | null }>(
    "SELECT filename, content_hash FROM schema_migrations ORDER BY filename"
  );
  return new Map(result.rows.map((row) => [row.filename, row.content_hash ?? ""]));
}

async function main() {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    console.error("ERROR: DATABASE_URL not set in environment");
    process.exit(1);
  }
  console.log(`Running migrations against: ${redactUrl(databaseUrl)}`);

  const migrations = fs
    .readdirSync(migrationDir)
    .filter((entry) => MIGRATION_FILENAME_RE.test(entry))
    .sort((a, b) => a.localeCompare(b, "en"));

  const client = new Client({ connectionString: databaseUrl });
  await client.connect();
  try {
    const applied = await appliedMigrations(client);

    // Applied files edited on disk stop the run before anything new is applied.
    let drifted = 0;
    for (const migration of migrations) {
      const storedHash = applied.get(migration);
      if (!storedHash) continue;
      const diskHash = hashContent(fs.readFileSync(path.join(migrationDir, migration), "utf-8"));
      if (diskHash !== storedHash) {
        console.error(
          `  ${migration} has changed since it was applied (expected ${storedHash.slice(0, 12)}, got ${diskHash.slice(0, 12)})`
        );
        drifted++;
      }
    }
    if (drifted > 0) {
      throw new Error(`${drifted} migration(s) have drifted from their applied versions; restore them before migrating`);
    }

    let ran = 0;
    for (const migration of migrations) {
      if (applied.has(migration)) continue;

      console.log(`\nRunning ${migration}...`);
      const sql = fs.readFileSync(path.join(migrationDir, migration), "utf-8");
      const contentHash = hashContent(sql);
      await client.query("BEGIN");
      try {
        await client.query(sql);
        await client.query("INSERT INTO schema_migrations (filename, content_hash) VALUES ($1, $2)", [
          migration,
          contentHash,
        ]);
        await client.query("COMMIT");
      } catch (error) {
        await client.query("ROLLBACK");
        throw new Error(`${migration} failed: ${error instanceof Error ? error.message : String(error)}`);
      }
      console.log(`  ${migration} completed (hash: ${contentHash.slice(0, 12)})`);
      ran++;
    }

    console.log(ran === 0 ? "\nAll migrations already applied, nothing to do." : `\n${ran} migration(s) applied.`);
  } finally {
    await client.end();
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
