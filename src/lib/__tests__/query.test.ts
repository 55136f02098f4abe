import { describe, expect, it } from "vitest";

import type { Assignment, Calendar } from "@/types/timetable";

import { DEFAULT_SLOTS } from "../calendar";
import { EMPTY_CELL, buildWeeklyGrid, filterAssignment } from "../query";

const assignment: Assignment = new Map([
  ["Marketing", { day: "W", slotId: "S2", room: "CR-3" }],
  ["Finance", { day: "M", slotId: "S3", room: "CR-1" }],
  ["Accounting", { day: "M", slotId: "S1", room: "CR-8" }],
  ["Strategy", { day: "F", slotId: "S4", room: "CR-2" }],
]);

const faculty = new Map([
  ["Marketing", "Prof. Rao"],
  ["Finance", "Dr. Iyer"],
]);

describe("filterAssignment", () => {
  it("projects the requested courses in day then slot order", () => {
    const entries = filterAssignment(assignment, ["Marketing", "Finance", "Accounting"], { faculty });

    expect(entries.map((entry) => [entry.course, entry.day, entry.slot.id, entry.room])).toEqual([
      ["Accounting", "M", "S1", "CR-8"],
      ["Finance", "M", "S3", "CR-1"],
      ["Marketing", "W", "S2", "CR-3"],
    ]);
    expect(entries.map((entry) => entry.faculty)).toEqual(["Unknown", "Dr. Iyer", "Prof. Rao"]);
    expect(entries[1].slot.label).toBe("02:00 PM - 03:30 PM");
  });

  it("returns nothing for an empty course set", () => {
    expect(filterAssignment(assignment, [])).toEqual([]);
  });

  it("skips courses that were never placed", () => {
    const entries = filterAssignment(assignment, ["Strategy", "Unscheduled"]);
    expect(entries.map((entry) => entry.course)).toEqual(["Strategy"]);
  });

  it("gives the same answer when applied twice", () => {
    const courses = new Set(["Strategy", "Finance"]);
    expect(filterAssignment(assignment, courses, { faculty })).toEqual(
      filterAssignment(assignment, courses, { faculty })
    );
  });

  it("rejects placements outside the calendar", () => {
    const stray: Assignment = new Map([["Law", { day: "T", slotId: "S9", room: "CR-1" }]]);
    expect(() => filterAssignment(stray, ["Law"])).toThrow(/S9/);
  });
});

describe("buildWeeklyGrid", () => {
  it("lays out slots as rows and weekdays as columns", () => {
    const entries = filterAssignment(assignment, ["Finance", "Marketing"], { faculty });
    const grid = buildWeeklyGrid(entries);

    expect(grid.days).toEqual(["M", "T", "W", "R", "F"]);
    expect(grid.rows.map((row) => row.slot.id)).toEqual(["S1", "S2", "S3", "S4"]);
    expect(grid.rows[0].cells).toEqual([EMPTY_CELL, EMPTY_CELL, EMPTY_CELL, EMPTY_CELL, EMPTY_CELL]);
    expect(grid.rows[1].cells).toEqual([EMPTY_CELL, EMPTY_CELL, "Marketing", EMPTY_CELL, EMPTY_CELL]);
    expect(grid.rows[2].cells).toEqual(["Finance", EMPTY_CELL, EMPTY_CELL, EMPTY_CELL, EMPTY_CELL]);
  });

  it("follows a custom calendar and joins doubled cells", () => {
    const calendar: Calendar = { days: ["T", "R"], slots: DEFAULT_SLOTS.slice(0, 2) };
    const doubled: Assignment = new Map([
      ["Law", { day: "R", slotId: "S2", room: "CR-1" }],
      ["Ethics", { day: "R", slotId: "S2", room: "CR-2" }],
    ]);
    const grid = buildWeeklyGrid(filterAssignment(doubled, ["Law", "Ethics"], { calendar }), calendar);

    expect(grid.days).toEqual(["T", "R"]);
    expect(grid.rows).toHaveLength(2);
    expect(grid.rows[1].cells).toEqual([EMPTY_CELL, "Ethics / Law"]);
  });
});
