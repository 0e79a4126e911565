/**
 * Seed script: opens a first application window when none is active.
 * Run: npm run seed (from apps/api)
 *
 *   SEED_DEADLINE_NAME  — window name (default "Bursary Applications <year>")
 *   SEED_DEADLINE_DAYS  — days from now until the window closes (default 30)
 */
import dotenv from "dotenv";
import path from "path";

dotenv.config({ path: path.resolve(__dirname, "../../../.env") });

const DAY_MS = 24 * 60 * 60 * 1000;

async function main() {
  const { DeadlineInputSchema } = await import("@bursary/shared");
  const { PgDeadlineStore } = await import("../src/deadlines");
  const { pool } = await import("../src/db");

  try {
    const deadlines = new PgDeadlineStore();
    const active = await deadlines.getActive();
    if (active) {
      console.log(`[SEED] Active deadline already present: ${active.name} (closes ${active.endDate.toISOString()})`);
      return;
    }

    const now = new Date();
    const days = Number(process.env.SEED_DEADLINE_DAYS) || 30;
    const input = DeadlineInputSchema.parse({
      name: process.env.SEED_DEADLINE_NAME || `Bursary Applications ${now.getUTCFullYear()}`,
      startDate: now.toISOString(),
      endDate: new Date(now.getTime() + days * DAY_MS).toISOString(),
    });
    const created = await deadlines.create(input, now);
    console.log(`[SEED] Created deadline #${created.id}: ${created.name} (closes ${created.endDate.toISOString()})`);
  } finally {
    await pool.end();
  }
}

main().catch((error) => {
  console.error(`[SEED_ERROR] ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
