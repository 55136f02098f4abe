import { describe, expect, it } from "vitest";

import type { Assignment, CourseRoster } from "@/types/timetable";

import { verifyAssignment } from "../verify";

const roster: CourseRoster = new Map([
  ["MathA", new Set(["S1", "S2"])],
  ["MathB", new Set(["S1", "S3"])],
  ["Physics", new Set(["S2"])],
]);

describe("verifyAssignment", () => {
  it("accepts a complete clash-free assignment", () => {
    const assignment: Assignment = new Map([
      ["MathA", { day: "M", slotId: "S1", room: "CR-1" }],
      ["MathB", { day: "M", slotId: "S2", room: "CR-1" }],
      ["Physics", { day: "T", slotId: "S1", room: "CR-2" }],
    ]);
    expect(verifyAssignment(roster, assignment)).toEqual([]);
  });

  it("reports a shared student double-booked in one slot", () => {
    const assignment: Assignment = new Map([
      ["MathA", { day: "W", slotId: "S3", room: "CR-1" }],
      ["MathB", { day: "W", slotId: "S3", room: "CR-4" }],
      ["Physics", { day: "T", slotId: "S1", room: "CR-2" }],
    ]);

    expect(verifyAssignment(roster, assignment)).toEqual([
      {
        kind: "clash",
        studentId: "S1",
        day: "W",
        slotId: "S3",
        courses: ["MathA", "MathB"],
        message: "S1 has MathA, MathB together on Wednesday 02:00 PM - 03:30 PM",
      },
    ]);
  });

  it("reports days above the cap", () => {
    const assignment: Assignment = new Map([
      ["MathA", { day: "F", slotId: "S1", room: "CR-1" }],
      ["MathB", { day: "F", slotId: "S2", room: "CR-1" }],
      ["Physics", { day: "F", slotId: "S3", room: "CR-1" }],
    ]);

    const issues = verifyAssignment(roster, assignment, { maxPerDay: 1 });
    expect(issues).toEqual([
      {
        kind: "daily-cap",
        studentId: "S1",
        day: "F",
        count: 2,
        message: "S1 has 2 classes on Friday (limit 1)",
      },
      {
        kind: "daily-cap",
        studentId: "S2",
        day: "F",
        count: 2,
        message: "S2 has 2 classes on Friday (limit 1)",
      },
    ]);
  });

  it("reports unplaced and unknown courses", () => {
    const assignment: Assignment = new Map([
      ["MathA", { day: "M", slotId: "S1", room: "CR-1" }],
      ["Chemistry", { day: "M", slotId: "S2", room: "CR-1" }],
    ]);

    expect(verifyAssignment(roster, assignment).map((issue) => [issue.kind, issue.message])).toEqual([
      ["unplaced", "Course MathB has no slot"],
      ["unplaced", "Course Physics has no slot"],
      ["unknown-course", "Course Chemistry is not in the roster"],
    ]);
  });
});
