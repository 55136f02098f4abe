import type {
  Assignment,
  Calendar,
  CourseName,
  CourseRoster,
  GenerationResult,
} from "@/types/timetable";

import {
  DEFAULT_CALENDAR,
  MAX_CLASSES_PER_DAY,
  type Candidate,
  compareCandidates,
  defaultRooms,
  enumerateCandidates,
  validateCalendar,
} from "./calendar";
import { pickOne, shuffle, type RandomSource } from "./random";
import {
  DEFAULT_SPREADING,
  commitPlacement,
  createScheduleState,
  evaluateCandidate,
  type SpreadingWeights,
} from "./scoring";

export const MAX_ATTEMPTS = 50;

export type TieBreak = "shuffle" | "calendar";

export interface AttemptReport {
  attempt: number;
  placed: number;
  total: number;
  penalty: number;
}

export interface GenerateTimetableInput {
  roster: CourseRoster;
  calendar?: Calendar;
  random?: RandomSource;
  maxAttempts?: number;
  maxPerDay?: number;
  spreading?: SpreadingWeights;
  rooms?: readonly string[];
  tieBreak?: TieBreak;
  /** Wall-clock budget; once spent, the best attempt so far is returned. */
  deadlineMs?: number;
  now?: () => number;
  onAttempt?: (report: AttemptReport) => void;
}

interface AttemptOutcome {
  assignment: Assignment;
  complete: boolean;
  penalty: number;
}

interface AttemptContext {
  roster: CourseRoster;
  calendar: Calendar;
  candidates: Candidate[];
  random: RandomSource;
  maxPerDay: number;
  spreading: SpreadingWeights;
  rooms: readonly string[];
  tieBreak: TieBreak;
}

function runAttempt(courses: CourseName[], ctx: AttemptContext): AttemptOutcome {
  const state = createScheduleState();
  const assignment: Assignment = new Map();
  let totalPenalty = 0;

  for (const course of shuffle(courses, ctx.random)) {
    const students = ctx.roster.get(course) ?? new Set<string>();

    let best: Candidate | undefined;
    let bestPenalty = Infinity;

    for (const candidate of shuffle(ctx.candidates, ctx.random)) {
      const evaluation = evaluateCandidate(state, students, candidate, {
        maxPerDay: ctx.maxPerDay,
        spreading: ctx.spreading,
      });
      if (!evaluation.feasible) continue;

      const better =
        evaluation.penalty < bestPenalty ||
        (ctx.tieBreak === "calendar" &&
          best !== undefined &&
          evaluation.penalty === bestPenalty &&
          compareCandidates(ctx.calendar, candidate, best) < 0);

      if (better) {
        best = candidate;
        bestPenalty = evaluation.penalty;
      }
    }

    if (!best) {
      return { assignment, complete: false, penalty: totalPenalty };
    }

    commitPlacement(state, students, best);
    assignment.set(course, {
      day: best.day,
      slotId: best.slotId,
      room: pickOne(ctx.rooms, ctx.random),
    });
    totalPenalty += bestPenalty;
  }

  return { assignment, complete: true, penalty: totalPenalty };
}

function isBetterOutcome(candidate: AttemptOutcome, current: AttemptOutcome | undefined): boolean {
  if (!current) return true;
  if (candidate.assignment.size !== current.assignment.size) {
    return candidate.assignment.size > current.assignment.size;
  }
  return candidate.penalty < current.penalty;
}

function unplacedOf(roster: CourseRoster, assignment: Assignment): Set<CourseName> {
  const unplaced = new Set<CourseName>();
  for (const course of roster.keys()) {
    if (!assignment.has(course)) {
      unplaced.add(course);
    }
  }
  return unplaced;
}

/**
 * Randomized greedy placement with restarts. Returns the first attempt that
 * places every course; otherwise the final attempt, or the best attempt seen
 * when the deadline cuts the search short.
 */
export function generateTimetable(input: GenerateTimetableInput): GenerationResult {
  const {
    roster,
    calendar = DEFAULT_CALENDAR,
    random = Math.random,
    maxAttempts = MAX_ATTEMPTS,
    maxPerDay = MAX_CLASSES_PER_DAY,
    spreading = DEFAULT_SPREADING,
    rooms = defaultRooms(),
    tieBreak = "shuffle",
    deadlineMs,
    now = Date.now,
    onAttempt,
  } = input;

  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new Error(`maxAttempts must be a positive integer, received ${maxAttempts}`);
  }
  if (!Number.isInteger(maxPerDay) || maxPerDay < 1) {
    throw new Error(`maxPerDay must be a positive integer, received ${maxPerDay}`);
  }
  if (rooms.length === 0) {
    throw new Error("Room pool must contain at least one label");
  }
  validateCalendar(calendar);

  const courses = Array.from(roster.keys());
  const ctx: AttemptContext = {
    roster,
    calendar,
    candidates: enumerateCandidates(calendar),
    random,
    maxPerDay,
    spreading,
    rooms,
    tieBreak,
  };

  const deadlineAt = deadlineMs === undefined ? undefined : now() + deadlineMs;

  let last: AttemptOutcome | undefined;
  let best: AttemptOutcome | undefined;
  let attempts = 0;
  let timedOut = false;

  while (attempts < maxAttempts) {
    if (attempts > 0 && deadlineAt !== undefined && now() >= deadlineAt) {
      timedOut = true;
      break;
    }

    const outcome = runAttempt(courses, ctx);
    attempts += 1;
    onAttempt?.({
      attempt: attempts,
      placed: outcome.assignment.size,
      total: courses.length,
      penalty: outcome.penalty,
    });

    if (outcome.complete) {
      return {
        assignment: outcome.assignment,
        fullyPlaced: true,
        unplacedCourses: new Set(),
        attempts,
        penalty: outcome.penalty,
        timedOut: false,
      };
    }

    last = outcome;
    if (isBetterOutcome(outcome, best)) {
      best = outcome;
    }
  }

  const chosen = (timedOut ? best : last) ?? { assignment: new Map(), complete: false, penalty: 0 };

  return {
    assignment: chosen.assignment,
    fullyPlaced: false,
    unplacedCourses: unplacedOf(roster, chosen.assignment),
    attempts,
    penalty: chosen.penalty,
    timedOut,
  };
}
