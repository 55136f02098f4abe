import Papa from "papaparse";
import { z } from "zod";

import type { CourseName, EnrollmentRecord, StudentId } from "@/types/timetable";

export const STUDENT_ID_COLUMN = "Student ID";
export const STUDENT_NAME_COLUMN = "Student Name";
export const UNKNOWN = "Unknown";

const PREAMBLE_SCAN_LINES = 10;
const IGNORED_SUBJECT_CELLS = new Set(["SN", "Serial No."]);

const enrollmentRowSchema = z.object({
  [STUDENT_ID_COLUMN]: z.string().optional().default(""),
  [STUDENT_NAME_COLUMN]: z.string().optional().default(""),
});

export interface ParsedEnrollmentFile {
  subject: CourseName;
  faculty: string;
  records: EnrollmentRecord[];
}

export interface EnrollmentModel {
  records: EnrollmentRecord[];
  roster: Map<CourseName, Set<StudentId>>;
  faculty: Map<CourseName, string>;
}

/** Raised when the student table of an export cannot be read; the course itself is still known. */
export class EnrollmentTableError extends Error {
  constructor(
    message: string,
    readonly subject: CourseName,
    readonly faculty: string
  ) {
    super(message);
    this.name = "EnrollmentTableError";
  }
}

export function normalizeStudentId(value: string): StudentId {
  return value.trim().toUpperCase();
}

/** Splits one preamble line into cells, honouring spreadsheet quoting. */
function lineCells(line: string): string[] {
  const [cells = []] = Papa.parse<string[]>(line, { header: false, delimiter: "," }).data;
  return cells.map((cell) => cell.trim());
}

function scanPreamble(lines: string[]): { faculty: string; headerIndex: number } {
  let faculty = UNKNOWN;
  let headerIndex = -1;

  for (let i = 0; i < Math.min(lines.length, PREAMBLE_SCAN_LINES); i += 1) {
    const line = lines[i];
    if (line.includes("Faculty Name")) {
      const [, name = ""] = lineCells(line);
      if (name) {
        faculty = name;
      }
    }
    if (line.includes(STUDENT_ID_COLUMN) && line.includes(STUDENT_NAME_COLUMN)) {
      headerIndex = i;
      break;
    }
  }

  return { faculty, headerIndex };
}

function detectSubject(lines: string[], headerIndex: number, fileName: string): CourseName {
  let subject = UNKNOWN;
  for (let i = 0; i < Math.max(0, headerIndex); i += 1) {
    const line = lines[i];
    if (line.includes("Faculty Name") || line.includes("Group Mail ID")) continue;
    const [cell = ""] = lineCells(line);
    if (cell && !IGNORED_SUBJECT_CELLS.has(cell)) {
      subject = cell;
    }
  }

  return subject === UNKNOWN ? fileName.split(".")[0] : subject;
}

function parseRoster(
  content: string,
  subject: CourseName,
  faculty: string
): { fields: string[]; rows: Record<string, string>[] } {
  const result = Papa.parse<Record<string, string>>(content, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  const fatal = result.errors.filter((error) => error.type !== "FieldMismatch");
  if (fatal.length > 0) {
    const [firstError] = fatal;
    throw new EnrollmentTableError(`CSV parse error on row ${firstError.row}: ${firstError.message}`, subject, faculty);
  }

  return { fields: result.meta.fields ?? [], rows: result.data };
}

/**
 * Reads one course export: a free-form preamble (subject line, faculty line,
 * mailing list) followed by a student table.
 */
export function parseEnrollmentFile(content: string, fileName: string): ParsedEnrollmentFile {
  const lines = content.replace(/^\uFEFF/, "").split(/\r?\n/);
  const { faculty, headerIndex } = scanPreamble(lines);
  const subject = detectSubject(lines, headerIndex, fileName);

  if (headerIndex === -1) {
    return { subject, faculty, records: [] };
  }

  const { fields, rows } = parseRoster(lines.slice(headerIndex).join("\n"), subject, faculty);
  if (!fields.includes(STUDENT_ID_COLUMN) || !fields.includes(STUDENT_NAME_COLUMN)) {
    return { subject, faculty, records: [] };
  }

  const records: EnrollmentRecord[] = [];
  for (const raw of rows) {
    const row = enrollmentRowSchema.parse(raw);
    const studentId = normalizeStudentId(row[STUDENT_ID_COLUMN]);
    if (!studentId) continue;
    records.push({
      studentId,
      studentName: row[STUDENT_NAME_COLUMN].trim(),
      subject,
    });
  }

  return { subject, faculty, records };
}

export function buildEnrollmentModel(files: readonly ParsedEnrollmentFile[]): EnrollmentModel {
  const records: EnrollmentRecord[] = [];
  const faculty = new Map<CourseName, string>();
  const roster = new Map<CourseName, Set<StudentId>>();

  for (const file of files) {
    faculty.set(file.subject, file.faculty);
    if (!roster.has(file.subject)) {
      roster.set(file.subject, new Set());
    }
    records.push(...file.records);
  }

  for (const record of records) {
    roster.get(record.subject)?.add(record.studentId);
  }

  return { records, roster, faculty };
}
