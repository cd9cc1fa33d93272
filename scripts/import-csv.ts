// scripts/import-csv.ts
//
// Usage: npm run db:import -- <email> <dir>
// Reads <dir>/health_data.csv and <dir>/goals.csv (either may be missing).
import "reflect-metadata";
import { existsSync } from "fs";
import { readFile } from "fs/promises";
import * as path from "path";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "../packages/api/src/app.module";
import { UsersRepository } from "../packages/api/src/database/repositories/users.repository";
import { ImportService } from "../packages/api/src/data/import.service";
import type { ImportResult } from "@vitalog/shared";

function report(label: string, result: ImportResult) {
  console.log(
    `${label}: ${result.imported} imported, ${result.updated} updated, ${result.skipped} skipped`,
  );
  for (const error of result.errors) console.log(`  ${error}`);
}

async function main() {
  const [email, dir] = process.argv.slice(2);
  if (!email || !dir) {
    console.error("Usage: import-csv <email> <dir>");
    process.exit(1);
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ["error", "warn"],
  });

  try {
    const user = await app.get(UsersRepository).findByEmail(email);
    if (!user) {
      console.error(`No user registered as ${email}. Register in the app first.`);
      process.exitCode = 1;
      return;
    }

    const importer = app.get(ImportService, { strict: false });

    const healthCsv = path.join(dir, "health_data.csv");
    if (existsSync(healthCsv)) {
      report("Health data", await importer.importMetrics(user.id, await readFile(healthCsv)));
    } else {
      console.log(`Skipping ${healthCsv}: not found`);
    }

    const goalsCsv = path.join(dir, "goals.csv");
    if (existsSync(goalsCsv)) {
      report("Goals", await importer.importGoals(user.id, await readFile(goalsCsv)));
    } else {
      console.log(`Skipping ${goalsCsv}: not found`);
    }
  } finally {
    await app.close();
  }
}

main().catch((err) => {
  console.error("Import failed:", err);
  process.exit(1);
});
