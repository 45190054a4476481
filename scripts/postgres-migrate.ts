import { readdir, readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { Pool } from "pg";
import { createLogger } from "../src/infra/logger.js";

const logger = createLogger("info");

async function main(): Promise<void> {
  const connectionString = process.env.SMARTPAY_POSTGRES_URL?.trim();
  if (!connectionString) {
    throw new Error("SMARTPAY_POSTGRES_URL is required.");
  }

  const migrationsDir = resolve(process.cwd(), "sql");
  const files = (await readdir(migrationsDir)).filter((file) => file.endsWith(".sql")).sort();
  const pool = new Pool({ connectionString });

  try {
    for (const file of files) {
      const sql = await readFile(join(migrationsDir, file), "utf8");
      await pool.query(sql);
      logger.info({ file }, "Applied migration");
    }
    logger.info({ applied: files.length }, "db:migrate OK");
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  logger.error({ err: error }, "db:migrate failed");
  process.exitCode = 1;
});
