import type { Day, StudentId } from "@/types/timetable";

import type { Candidate } from "./calendar";

export interface SpreadingWeights {
  /** Days with fewer occupied slots than this count as lightly loaded. */
  lightLoadThreshold: number;
  lightLoadReward: number;
  stackingPenalty: number;
}

export const DEFAULT_SPREADING: SpreadingWeights = {
  lightLoadThreshold: 2,
  lightLoadReward: 5,
  stackingPenalty: 2,
};

export type StudentScheduleState = Map<StudentId, Map<Day, string[]>>;

export type CandidateEvaluation =
  | { feasible: true; penalty: number }
  | { feasible: false; reason: "clash" | "daily-cap"; studentId: StudentId };

export function createScheduleState(): StudentScheduleState {
  return new Map();
}

export function occupiedSlots(state: StudentScheduleState, studentId: StudentId, day: Day): readonly string[] {
  return state.get(studentId)?.get(day) ?? [];
}

export function evaluateCandidate(
  state: StudentScheduleState,
  students: Iterable<StudentId>,
  candidate: Candidate,
  opts: { maxPerDay: number; spreading: SpreadingWeights }
): CandidateEvaluation {
  const { maxPerDay, spreading } = opts;
  let penalty = 0;

  for (const studentId of students) {
    const taken = occupiedSlots(state, studentId, candidate.day);

    if (taken.includes(candidate.slotId)) {
      return { feasible: false, reason: "clash", studentId };
    }

    if (taken.length >= maxPerDay) {
      return { feasible: false, reason: "daily-cap", studentId };
    }

    if (taken.length < spreading.lightLoadThreshold) {
      penalty -= spreading.lightLoadReward;
    } else {
      penalty += spreading.stackingPenalty;
    }
  }

  return { feasible: true, penalty };
}

export function commitPlacement(
  state: StudentScheduleState,
  students: Iterable<StudentId>,
  candidate: Candidate
): void {
  for (const studentId of students) {
    let days = state.get(studentId);
    if (!days) {
      days = new Map();
      state.set(studentId, days);
    }
    const taken = days.get(candidate.day);
    if (taken) {
      taken.push(candidate.slotId);
    } else {
      days.set(candidate.day, [candidate.slotId]);
    }
  }
}
