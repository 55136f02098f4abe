import type { TimetableEntry, WeeklyGrid } from "@/types/timetable";

import { DAY_NAMES } from "./calendar";

function renderTable(header: string[], body: string[][]): string {
  const widths = header.map((title, column) =>
    Math.max(title.length, ...body.map((row) => row[column].length))
  );
  const format = (row: string[]) => row.map((cell, column) => cell.padEnd(widths[column])).join(" | ").trimEnd();

  return [format(header), widths.map((width) => "-".repeat(width)).join("-+-"), ...body.map(format)].join("\n");
}

export function renderGrid(grid: WeeklyGrid): string {
  const header = ["Time Slot", ...grid.days.map((day) => DAY_NAMES[day])];
  const body = grid.rows.map((row) => [row.slot.label, ...row.cells]);
  return renderTable(header, body);
}

export function renderEntries(entries: readonly TimetableEntry[]): string {
  const header = ["Subject", "Faculty Name", "Day", "Time Slot", "Room"];
  const body = entries.map((entry) => [
    entry.course,
    entry.faculty,
    DAY_NAMES[entry.day],
    entry.slot.label,
    entry.room,
  ]);
  return renderTable(header, body);
}
