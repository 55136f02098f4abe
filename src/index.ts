export * from "@/types/timetable";
export {
  DAY_NAMES,
  DEFAULT_CALENDAR,
  DEFAULT_SLOTS,
  MAX_CLASSES_PER_DAY,
  WEEKDAYS,
  defaultRooms,
} from "./lib/calendar";
export { parseEnv, type Env } from "./lib/config";
export { loadEnrollmentDirectory } from "./lib/etl/loader";
export {
  buildEnrollmentModel,
  EnrollmentTableError,
  normalizeStudentId,
  parseEnrollmentFile,
  type EnrollmentModel,
  type ParsedEnrollmentFile,
} from "./lib/etl/parsers";
export { buildTimetableIcs, type TimetableIcsPayload } from "./lib/exportIcs";
export {
  MAX_ATTEMPTS,
  generateTimetable,
  type AttemptReport,
  type GenerateTimetableInput,
  type TieBreak,
} from "./lib/generator";
export { EMPTY_CELL, buildWeeklyGrid, filterAssignment } from "./lib/query";
export { createSeededRandom, type RandomSource } from "./lib/random";
export { DEFAULT_SPREADING, type SpreadingWeights } from "./lib/scoring";
export { parseTimetableDocument, toTimetableDocument, type TimetableDocument } from "./lib/serialize";
export { authenticateStudent, type Credentials, type LoginResult } from "./lib/session";
export { verifyAssignment, type ScheduleIssue } from "./lib/verify";
