import { describe, expect, it } from "vitest";

import type { GenerationResult } from "@/types/timetable";

import { parseTimetableDocument, toTimetableDocument } from "../serialize";

const result: GenerationResult = {
  assignment: new Map([
    ["Marketing", { day: "T", slotId: "S2", room: "CR-2" }],
    ["Finance", { day: "M", slotId: "S1", room: "CR-5" }],
  ]),
  fullyPlaced: false,
  unplacedCourses: new Set(["Strategy", "Ethics"]),
  attempts: 50,
  penalty: -20,
  timedOut: false,
};

describe("timetable documents", () => {
  it("serialises placements in calendar order", () => {
    const document = toTimetableDocument(result, {
      faculty: new Map([["Finance", "Dr. Iyer"]]),
      generatedAt: new Date("2026-10-19T09:00:00.000Z"),
    });

    expect(document).toEqual({
      generatedAt: "2026-10-19T09:00:00.000Z",
      fullyPlaced: false,
      attempts: 50,
      unplacedCourses: ["Ethics", "Strategy"],
      entries: [
        { course: "Finance", faculty: "Dr. Iyer", day: "M", slotId: "S1", slotLabel: "09:00 AM - 10:30 AM", room: "CR-5" },
        { course: "Marketing", faculty: "Unknown", day: "T", slotId: "S2", slotLabel: "11:00 AM - 12:30 PM", room: "CR-2" },
      ],
    });
  });

  it("reads a saved document back into an assignment", () => {
    const saved = JSON.stringify(toTimetableDocument(result, { faculty: new Map([["Finance", "Dr. Iyer"]]) }));
    const { assignment, faculty } = parseTimetableDocument(saved);

    expect(assignment.get("Finance")).toEqual({ day: "M", slotId: "S1", room: "CR-5" });
    expect(assignment.get("Marketing")).toEqual({ day: "T", slotId: "S2", room: "CR-2" });
    expect(faculty.get("Finance")).toBe("Dr. Iyer");
  });

  it("rejects unknown slots and repeated courses", () => {
    const base = { generatedAt: "x", fullyPlaced: true, attempts: 1, unplacedCourses: [] };
    const entry = { course: "Law", faculty: "Unknown", day: "M", slotId: "S1", slotLabel: "", room: "CR-1" };

    expect(() =>
      parseTimetableDocument(JSON.stringify({ ...base, entries: [{ ...entry, slotId: "S7" }] }))
    ).toThrow(/Unknown slot S7/);
    expect(() => parseTimetableDocument(JSON.stringify({ ...base, entries: [entry, entry] }))).toThrow(
      /more than once/
    );
    expect(() => parseTimetableDocument(JSON.stringify({ ...base, entries: [{ ...entry, day: "S" }] }))).toThrow();
  });
});
