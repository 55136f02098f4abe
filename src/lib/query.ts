import type {
  Assignment,
  Calendar,
  CourseFaculty,
  CourseName,
  TimetableEntry,
  WeeklyGrid,
} from "@/types/timetable";

import { DEFAULT_CALENDAR, dayCharToIndex, findSlot, slotIndex } from "./calendar";

export const EMPTY_CELL = "---";
export const UNKNOWN_FACULTY = "Unknown";

export function filterAssignment(
  assignment: Assignment,
  courseSet: Iterable<CourseName>,
  opts: { faculty?: CourseFaculty; calendar?: Calendar } = {}
): TimetableEntry[] {
  const calendar = opts.calendar ?? DEFAULT_CALENDAR;
  const entries: TimetableEntry[] = [];

  for (const course of new Set(courseSet)) {
    const placement = assignment.get(course);
    if (!placement) continue;
    const slot = findSlot(calendar, placement.slotId);
    if (!slot) {
      throw new Error(`Course ${course} is placed in slot ${placement.slotId}, which is not in the calendar`);
    }
    entries.push({
      course,
      faculty: opts.faculty?.get(course) ?? UNKNOWN_FACULTY,
      day: placement.day,
      slot,
      room: placement.room,
    });
  }

  return entries.sort((a, b) => {
    const dayDiff = dayCharToIndex(a.day) - dayCharToIndex(b.day);
    if (dayDiff !== 0) return dayDiff;
    const slotDiff = slotIndex(calendar, a.slot.id) - slotIndex(calendar, b.slot.id);
    if (slotDiff !== 0) return slotDiff;
    return a.course.localeCompare(b.course);
  });
}

/** Slots as rows, days as columns, both in calendar order. */
export function buildWeeklyGrid(entries: readonly TimetableEntry[], calendar: Calendar = DEFAULT_CALENDAR): WeeklyGrid {
  const days = [...calendar.days];
  const rows = calendar.slots.map((slot) => ({
    slot,
    cells: days.map((day) => {
      const courses = entries
        .filter((entry) => entry.day === day && entry.slot.id === slot.id)
        .map((entry) => entry.course);
      return courses.length > 0 ? courses.join(" / ") : EMPTY_CELL;
    }),
  }));

  return { days, rows };
}
