import { z } from "zod";

import type { Assignment, Calendar, CourseFaculty, GenerationResult } from "@/types/timetable";

import { DEFAULT_CALENDAR } from "./calendar";
import { filterAssignment } from "./query";

const dayLetters = ["M", "T", "W", "R", "F"] as const;

const timetableEntrySchema = z.object({
  course: z.string().min(1),
  faculty: z.string(),
  day: z.enum(dayLetters),
  slotId: z.string().min(1),
  slotLabel: z.string(),
  room: z.string(),
});

export const timetableDocumentSchema = z.object({
  generatedAt: z.string(),
  fullyPlaced: z.boolean(),
  attempts: z.number().int().nonnegative(),
  unplacedCourses: z.array(z.string()),
  entries: z.array(timetableEntrySchema),
});

export type TimetableDocument = z.infer<typeof timetableDocumentSchema>;

export function toTimetableDocument(
  result: GenerationResult,
  opts: { faculty?: CourseFaculty; calendar?: Calendar; generatedAt?: Date } = {}
): TimetableDocument {
  const entries = filterAssignment(result.assignment, result.assignment.keys(), {
    faculty: opts.faculty,
    calendar: opts.calendar,
  });

  return {
    generatedAt: (opts.generatedAt ?? new Date()).toISOString(),
    fullyPlaced: result.fullyPlaced,
    attempts: result.attempts,
    unplacedCourses: Array.from(result.unplacedCourses).sort((a, b) => a.localeCompare(b)),
    entries: entries.map((entry) => ({
      course: entry.course,
      faculty: entry.faculty,
      day: entry.day,
      slotId: entry.slot.id,
      slotLabel: entry.slot.label,
      room: entry.room,
    })),
  };
}

export function parseTimetableDocument(
  content: string,
  calendar: Calendar = DEFAULT_CALENDAR
): { document: TimetableDocument; assignment: Assignment; faculty: Map<string, string> } {
  const document = timetableDocumentSchema.parse(JSON.parse(content));
  const assignment: Assignment = new Map();
  const faculty = new Map<string, string>();

  for (const entry of document.entries) {
    if (!calendar.slots.some((slot) => slot.id === entry.slotId)) {
      throw new Error(`Unknown slot ${entry.slotId} for course ${entry.course}`);
    }
    if (!calendar.days.includes(entry.day)) {
      throw new Error(`Unknown day ${entry.day} for course ${entry.course}`);
    }
    if (assignment.has(entry.course)) {
      throw new Error(`Course ${entry.course} appears more than once`);
    }
    assignment.set(entry.course, { day: entry.day, slotId: entry.slotId, room: entry.room });
    faculty.set(entry.course, entry.faculty);
  }

  return { document, assignment, faculty };
}
