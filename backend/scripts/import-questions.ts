/**
 * Import a question spreadsheet into the catalog table
 *
 * Usage: npm run import:questions -- <file.xlsx|file.xls|file.csv> [--dry-run]
 */

import "dotenv/config";
import { readFileSync } from "fs";
import { basename } from "path";
import { loadConfig } from "../src/config/env";
import {
  importQuestions,
  parseQuestionRows,
  readSheetRows,
} from "../src/lib/question-import";
import { createSupabaseCollaborators } from "../src/lib/supabase";

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const dryRun = args.includes("--dry-run");
  const filePath = args.find((arg) => !arg.startsWith("--"));

  if (!filePath) {
    console.error("Usage: import-questions <file.xlsx|file.xls|file.csv> [--dry-run]");
    return 1;
  }

  const rows = readSheetRows(new Uint8Array(readFileSync(filePath)), basename(filePath));
  console.log(`Read ${rows.length} row(s) from ${filePath}`);

  if (dryRun) {
    const { valid, errors } = parseQuestionRows(rows);
    console.log(`Valid: ${valid.length}`);
    errors.forEach((error) => console.log(`  ❌ ${error}`));
    return errors.length > 0 ? 1 : 0;
  }

  const config = loadConfig(process.env);
  const { catalog } = createSupabaseCollaborators(config);
  const outcome = await importQuestions(catalog, rows);

  if (outcome.status === "success") {
    console.log(`✅ ${outcome.message}`);
    return 0;
  }

  console.log(`❌ Import ${outcome.status}: ${outcome.valid_count} valid row(s), nothing inserted`);
  outcome.errors.forEach((error) => console.log(`  ${error}`));
  return 1;
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error("Import failed:", error);
    process.exit(1);
  });
