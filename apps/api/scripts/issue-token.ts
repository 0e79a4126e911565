/**
 * Issue a staff bearer token for the admin API.
 *
 *   npm run issue-token -- --login jdoe --role ADMIN [--hours 8]
 */
import dotenv from "dotenv";
import path from "path";
import { z } from "zod";

dotenv.config({ path: path.resolve(__dirname, "../../../.env") });

const ArgsSchema = z
  .object({
    login: z.string().trim().min(1, "--login is required"),
    role: z.enum(["ADMIN", "OFFICER"]).default("OFFICER"),
    hours: z.coerce.number().positive().max(24 * 30).default(8),
  })
  .strict();

function readArgs(argv: string[]): Record<string, string> {
  const args: Record<string, string> = {};
  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    if (!flag.startsWith("--")) continue;
    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new Error(`Missing value for ${flag}`);
    }
    args[flag.slice(2)] = value;
    i++;
  }
  return args;
}

async function main() {
  const parsed = ArgsSchema.safeParse(readArgs(process.argv.slice(2)));
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      console.error(`[ISSUE_TOKEN_ERROR] ${issue.path.join(".") || "args"}: ${issue.message}`);
    }
    process.exit(1);
  }

  // Loaded after dotenv so JWT_SECRET is in place.
  const { generateToken } = await import("../src/middleware/auth");
  const { login, role, hours } = parsed.data;
  const token = generateToken({ userId: login, userType: role, login }, Math.round(hours * 60 * 60));
  console.log(token);
}

main().catch((error) => {
  console.error(`[ISSUE_TOKEN_ERROR] ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
