export type Day = "M" | "T" | "W" | "R" | "F";

export type TimeString = `${number}${number}:${number}${number}`;

export type StudentId = string;

export type CourseName = string;

export interface Slot {
  id: string;
  label: string;
  start: TimeString;
  end: TimeString;
}

export interface Calendar {
  days: readonly Day[];
  slots: readonly Slot[];
}

export type CourseRoster = ReadonlyMap<CourseName, ReadonlySet<StudentId>>;

export type CourseFaculty = ReadonlyMap<CourseName, string>;

export interface EnrollmentRecord {
  studentId: StudentId;
  studentName: string;
  subject: CourseName;
}

export interface Placement {
  day: Day;
  slotId: string;
  room: string;
}

export type Assignment = Map<CourseName, Placement>;

export interface GenerationResult {
  assignment: Assignment;
  fullyPlaced: boolean;
  unplacedCourses: Set<CourseName>;
  attempts: number;
  penalty: number;
  timedOut: boolean;
}

export interface TimetableEntry {
  course: CourseName;
  faculty: string;
  day: Day;
  slot: Slot;
  room: string;
}

export interface GridRow {
  slot: Slot;
  cells: string[];
}

export interface WeeklyGrid {
  days: Day[];
  rows: GridRow[];
}

export interface StudentProfile {
  id: StudentId;
  name: string;
  courses: CourseName[];
}
