/**
 * Create or promote an admin account.
 *
 *   npm run create-superuser -- admin@example.com 'a-long-password' ["Display Name"]
 */
import "dotenv/config";
import { hash } from "bcryptjs";
import { nanoid } from "nanoid";
import { z } from "zod";
import { loadConfig } from "../_core/env";
import { errorMeta, logger } from "../_core/logger";
import { connectDatabase, createUserRepository } from "../db";

const argsSchema = z
  .tuple([z.string().email(), z.string().min(8, "Password must be at least 8 characters")])
  .rest(z.string());

async function main(argv: string[]): Promise<number> {
  const parsed = argsSchema.safeParse(argv);
  if (!parsed.success) {
    logger.error("Usage: create-superuser <email> <password> [name]", {
      issues: parsed.error.issues.map((i) => i.message),
    });
    return 2;
  }
  const [email, password, ...rest] = parsed.data;
  const name = rest.join(" ").trim() || undefined;

  const config = loadConfig();
  logger.configure({ json: config.isProduction });
  const users = createUserRepository(connectDatabase(config.databaseUrl));

  const existing = await users.getUserByEmail(email);
  await users.upsertUser({
    id: existing?.id ?? nanoid(),
    email,
    name: name ?? existing?.name ?? null,
    passwordHash: await hash(password, 12),
    loginMethod: "password",
    role: "admin",
    isActive: true,
  });

  logger.info(existing ? "Promoted existing user to admin" : "Created admin user", { email });
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error) => {
    logger.error("create-superuser failed", errorMeta(error));
    process.exit(1);
  }
);
