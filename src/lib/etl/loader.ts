import { readdir, readFile } from "node:fs/promises";
import path from "node:path";

import {
  buildEnrollmentModel,
  EnrollmentTableError,
  parseEnrollmentFile,
  type EnrollmentModel,
  type ParsedEnrollmentFile,
} from "./parsers";

export async function listCsvFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(".csv"))
    .map((entry) => path.join(dir, entry.name))
    .sort((a, b) => a.localeCompare(b));
}

/**
 * Parses every CSV in `dir`. Unreadable files are skipped with a warning; a file
 * whose student table is malformed keeps its course with no students.
 */
export async function loadEnrollmentDirectory(dir: string): Promise<EnrollmentModel> {
  const files = await listCsvFiles(dir);
  const parsed: ParsedEnrollmentFile[] = [];

  for (const file of files) {
    try {
      const content = await readFile(file, "utf8");
      parsed.push(parseEnrollmentFile(content, path.basename(file)));
    } catch (error) {
      if (error instanceof EnrollmentTableError) {
        console.warn(`Ignoring student table in ${file}`, error);
        parsed.push({ subject: error.subject, faculty: error.faculty, records: [] });
      } else {
        console.warn(`Skipping enrollment file ${file}`, error);
      }
    }
  }

  return buildEnrollmentModel(parsed);
}
