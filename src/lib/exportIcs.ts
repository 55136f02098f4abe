import { randomUUID } from "node:crypto";

import type { Day, TimeString, TimetableEntry } from "@/types/timetable";

export interface TimetableIcsPayload {
  studentName: string;
  termStart: string; // YYYY-MM-DD
  termEnd: string; // YYYY-MM-DD
  entries: TimetableEntry[];
}

const DAY_TO_RRULE: Record<Day, string> = {
  M: "MO",
  T: "TU",
  W: "WE",
  R: "TH",
  F: "FR",
};

const DAY_TO_JS: Record<Day, number> = {
  M: 1,
  T: 2,
  W: 3,
  R: 4,
  F: 5,
};

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

function parseDate(value: string): Date {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    throw new Error(`Invalid date format: ${value}`);
  }
  const [, year, month, day] = match;
  const date = new Date(Number(year), Number(month) - 1, Number(day));
  if (Number.isNaN(date.getTime())) {
    throw new Error(`Unable to parse date: ${value}`);
  }
  return date;
}

function adjustToDay(start: Date, day: Day): Date {
  const offset = (DAY_TO_JS[day] - start.getDay() + 7) % 7;
  const adjusted = new Date(start);
  adjusted.setDate(start.getDate() + offset);
  return adjusted;
}

function formatDate(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

function formatDateTime(date: Date, time: TimeString): string {
  const [hours, minutes] = time.split(":").map(Number);
  return `${formatDate(date)}T${pad(hours)}${pad(minutes)}00`;
}

function formatUtcStamp(date: Date): string {
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}T${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}Z`;
}

export function escapeIcsText(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/,/g, "\\,")
    .replace(/;/g, "\\;")
    .replace(/\n/g, "\\n");
}

function createEventLines(entry: TimetableEntry, termStart: Date, termEnd: Date, dtStamp: string): string[] {
  const firstMeeting = adjustToDay(termStart, entry.day);
  // Weekday never occurs within the term.
  if (firstMeeting > termEnd) {
    return [];
  }
  const uid = `${entry.day}${entry.slot.id}-${randomUUID()}@timetable.local`;

  return [
    "BEGIN:VEVENT",
    `UID:${uid}`,
    `DTSTAMP:${dtStamp}`,
    `SUMMARY:${escapeIcsText(entry.course)}`,
    `DESCRIPTION:${escapeIcsText(`Faculty: ${entry.faculty}`)}`,
    `DTSTART:${formatDateTime(firstMeeting, entry.slot.start)}`,
    `DTEND:${formatDateTime(firstMeeting, entry.slot.end)}`,
    `RRULE:FREQ=WEEKLY;WKST=MO;BYDAY=${DAY_TO_RRULE[entry.day]};UNTIL=${formatDate(termEnd)}T235959`,
    `LOCATION:${escapeIcsText(entry.room)}`,
    "END:VEVENT",
  ];
}

export function buildTimetableIcs(payload: TimetableIcsPayload, stampedAt: Date = new Date()): string {
  const termStart = parseDate(payload.termStart);
  const termEnd = parseDate(payload.termEnd);

  if (termEnd < termStart) {
    throw new Error("Term end must be after term start");
  }

  const dtStamp = formatUtcStamp(stampedAt);

  const lines: string[] = [
    "BEGIN:VCALENDAR",
    "PRODID:-//Timetable//Weekly Grid//EN",
    "VERSION:2.0",
    "CALSCALE:GREGORIAN",
    `X-WR-CALNAME:${escapeIcsText(payload.studentName)} timetable`,
  ];

  for (const entry of payload.entries) {
    lines.push(...createEventLines(entry, termStart, termEnd, dtStamp));
  }

  lines.push("END:VCALENDAR");

  return lines.join("\r\n");
}
