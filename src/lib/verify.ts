import type {
  Assignment,
  Calendar,
  CourseName,
  CourseRoster,
  Day,
  StudentId,
} from "@/types/timetable";

import { DAY_NAMES, DEFAULT_CALENDAR, MAX_CLASSES_PER_DAY, findSlot } from "./calendar";

export type ScheduleIssue =
  | { kind: "clash"; studentId: StudentId; day: Day; slotId: string; courses: CourseName[]; message: string }
  | { kind: "daily-cap"; studentId: StudentId; day: Day; count: number; message: string }
  | { kind: "unplaced"; course: CourseName; message: string }
  | { kind: "unknown-course"; course: CourseName; message: string };

export function verifyAssignment(
  roster: CourseRoster,
  assignment: Assignment,
  opts: { calendar?: Calendar; maxPerDay?: number } = {}
): ScheduleIssue[] {
  const calendar = opts.calendar ?? DEFAULT_CALENDAR;
  const maxPerDay = opts.maxPerDay ?? MAX_CLASSES_PER_DAY;
  const issues: ScheduleIssue[] = [];

  for (const course of roster.keys()) {
    if (!assignment.has(course)) {
      issues.push({ kind: "unplaced", course, message: `Course ${course} has no slot` });
    }
  }

  for (const course of assignment.keys()) {
    if (!roster.has(course)) {
      issues.push({ kind: "unknown-course", course, message: `Course ${course} is not in the roster` });
    }
  }

  // student -> day -> slot -> courses
  const attendance = new Map<StudentId, Map<Day, Map<string, CourseName[]>>>();
  for (const [course, placement] of assignment) {
    for (const studentId of roster.get(course) ?? []) {
      let days = attendance.get(studentId);
      if (!days) {
        days = new Map();
        attendance.set(studentId, days);
      }
      let slots = days.get(placement.day);
      if (!slots) {
        slots = new Map();
        days.set(placement.day, slots);
      }
      const courses = slots.get(placement.slotId) ?? [];
      courses.push(course);
      slots.set(placement.slotId, courses);
    }
  }

  for (const [studentId, days] of attendance) {
    for (const [day, slots] of days) {
      let count = 0;
      for (const [slotId, courses] of slots) {
        count += courses.length;
        if (courses.length > 1) {
          const slotLabel = findSlot(calendar, slotId)?.label ?? slotId;
          issues.push({
            kind: "clash",
            studentId,
            day,
            slotId,
            courses: [...courses].sort((a, b) => a.localeCompare(b)),
            message: `${studentId} has ${courses.join(", ")} together on ${DAY_NAMES[day]} ${slotLabel}`,
          });
        }
      }
      if (count > maxPerDay) {
        issues.push({
          kind: "daily-cap",
          studentId,
          day,
          count,
          message: `${studentId} has ${count} classes on ${DAY_NAMES[day]} (limit ${maxPerDay})`,
        });
      }
    }
  }

  return issues;
}
