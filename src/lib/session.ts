import type { CourseName, EnrollmentRecord, StudentProfile } from "@/types/timetable";

export interface Credentials {
  name: string;
  studentId: string;
}

export type LoginResult =
  | { ok: true; student: StudentProfile }
  | { ok: false; reason: "missing-credentials" | "not-found" };

/**
 * Case-insensitive substring match on first name and roll number. The first
 * matching record decides which student is logged in.
 */
export function authenticateStudent(records: readonly EnrollmentRecord[], credentials: Credentials): LoginResult {
  const name = credentials.name.trim().toLowerCase();
  const studentId = credentials.studentId.trim().toLowerCase();

  if (!name || !studentId) {
    return { ok: false, reason: "missing-credentials" };
  }

  const match = records.find(
    (record) =>
      record.studentId.toLowerCase().includes(studentId) &&
      record.studentName.toLowerCase().includes(name)
  );

  if (!match) {
    return { ok: false, reason: "not-found" };
  }

  const courses: CourseName[] = [];
  for (const record of records) {
    if (record.studentId === match.studentId && !courses.includes(record.subject)) {
      courses.push(record.subject);
    }
  }

  return {
    ok: true,
    student: { id: match.studentId, name: match.studentName, courses },
  };
}
