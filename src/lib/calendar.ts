import type { Calendar, Day, Slot } from "@/types/timetable";

export const DAY_NAMES: Record<Day, string> = {
  M: "Monday",
  T: "Tuesday",
  W: "Wednesday",
  R: "Thursday",
  F: "Friday",
};

export const WEEKDAYS: readonly Day[] = ["M", "T", "W", "R", "F"];

export const DEFAULT_SLOTS: readonly Slot[] = [
  { id: "S1", label: "09:00 AM - 10:30 AM", start: "09:00", end: "10:30" },
  { id: "S2", label: "11:00 AM - 12:30 PM", start: "11:00", end: "12:30" },
  { id: "S3", label: "02:00 PM - 03:30 PM", start: "14:00", end: "15:30" },
  { id: "S4", label: "04:00 PM - 05:30 PM", start: "16:00", end: "17:30" },
];

export const DEFAULT_CALENDAR: Calendar = {
  days: WEEKDAYS,
  slots: DEFAULT_SLOTS,
};

export const MAX_CLASSES_PER_DAY = 4;

export function defaultRooms(count = 8): string[] {
  return Array.from({ length: count }, (_, index) => `CR-${index + 1}`);
}

export interface Candidate {
  day: Day;
  slotId: string;
}

export function toMinutes(time: string): number {
  const [hours, minutes] = time.split(":").map(Number);
  return hours * 60 + minutes;
}

export function dayCharToIndex(day: string): number {
  switch (day) {
    case "M":
      return 0;
    case "T":
      return 1;
    case "W":
      return 2;
    case "R":
      return 3;
    case "F":
      return 4;
    default:
      throw new Error(`Unsupported day code: ${day}`);
  }
}

/** Day × slot cross product in calendar order. */
export function enumerateCandidates(calendar: Calendar): Candidate[] {
  const candidates: Candidate[] = [];
  for (const day of calendar.days) {
    for (const slot of calendar.slots) {
      candidates.push({ day, slotId: slot.id });
    }
  }
  return candidates;
}

export function slotIndex(calendar: Calendar, slotId: string): number {
  return calendar.slots.findIndex((slot) => slot.id === slotId);
}

export function findSlot(calendar: Calendar, slotId: string): Slot | undefined {
  return calendar.slots.find((slot) => slot.id === slotId);
}

export function compareCandidates(calendar: Calendar, a: Candidate, b: Candidate): number {
  const dayDiff = dayCharToIndex(a.day) - dayCharToIndex(b.day);
  if (dayDiff !== 0) return dayDiff;
  return slotIndex(calendar, a.slotId) - slotIndex(calendar, b.slotId);
}

export function validateCalendar(calendar: Calendar): void {
  const seen = new Set<string>();
  for (const slot of calendar.slots) {
    if (seen.has(slot.id)) {
      throw new Error(`Duplicate slot id in calendar: ${slot.id}`);
    }
    seen.add(slot.id);
    if (toMinutes(slot.start) >= toMinutes(slot.end)) {
      throw new Error(`Slot ${slot.id} has start time after end time (${slot.start} >= ${slot.end})`);
    }
  }
  if (new Set(calendar.days).size !== calendar.days.length) {
    throw new Error("Calendar lists the same day more than once");
  }
}
