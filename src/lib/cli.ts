import { readFile, writeFile } from "node:fs/promises";

import { z } from "zod";

import type { Assignment, CourseFaculty, GenerationResult } from "@/types/timetable";

import { DEFAULT_CALENDAR, defaultRooms } from "./calendar";
import { parseEnv, type Env } from "./config";
import { loadEnrollmentDirectory } from "./etl/loader";
import type { EnrollmentModel } from "./etl/parsers";
import { buildTimetableIcs } from "./exportIcs";
import { generateTimetable } from "./generator";
import { buildWeeklyGrid, filterAssignment } from "./query";
import { createSeededRandom } from "./random";
import { renderEntries, renderGrid } from "./render";
import { parseTimetableDocument, toTimetableDocument } from "./serialize";
import { authenticateStudent } from "./session";
import { verifyAssignment } from "./verify";

export const USAGE = [
  "Usage: tsx scripts/timetable.ts <generate|view> [options]",
  "  --dir <path>          directory of course CSV files",
  "  --seed <n>            seed for reproducible runs",
  "  --attempts <n>        restart budget (default 50)",
  "  --deadline <ms>       stop searching after this many milliseconds",
  "  --out <file.json>     generate: write the master timetable",
  "  --from <file.json>    view: read a saved master timetable instead of generating",
  "  --name <first name>   view: student first name",
  "  --id <roll number>    view: student roll number",
  "  --ics <file.ics>      view: export the week as a calendar feed",
  "  --term-start <date>   view: first day of term (YYYY-MM-DD), required with --ics",
  "  --term-end <date>     view: last day of term (YYYY-MM-DD), required with --ics",
].join("\n");

const FLAG_KEYS = {
  dir: "dir",
  seed: "seed",
  attempts: "attempts",
  deadline: "deadline",
  out: "out",
  from: "from",
  name: "name",
  id: "id",
  ics: "ics",
  "term-start": "termStart",
  "term-end": "termEnd",
} as const;

type FlagName = keyof typeof FLAG_KEYS;

function isFlagName(value: string): value is FlagName {
  return Object.prototype.hasOwnProperty.call(FLAG_KEYS, value);
}

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "must be a YYYY-MM-DD date");

const cliOptionsSchema = z.object({
  command: z.enum(["generate", "view"]),
  dir: z.string().min(1).optional(),
  seed: z.coerce.number().int().min(0).optional(),
  attempts: z.coerce.number().int().min(1).optional(),
  deadline: z.coerce.number().int().min(1).optional(),
  out: z.string().min(1).optional(),
  from: z.string().min(1).optional(),
  name: z.string().optional(),
  id: z.string().optional(),
  ics: z.string().min(1).optional(),
  termStart: isoDate.optional(),
  termEnd: isoDate.optional(),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const [command, ...rest] = argv;
  const raw: Record<string, string> = {};

  for (let i = 0; i < rest.length; i += 1) {
    const token = rest[i];
    if (!token.startsWith("--")) {
      throw new Error(`Unexpected argument: ${token}`);
    }
    const eq = token.indexOf("=");
    const flag = eq === -1 ? token.slice(2) : token.slice(2, eq);
    if (!isFlagName(flag)) {
      throw new Error(`Unknown option: --${flag}`);
    }
    let value: string | undefined;
    if (eq !== -1) {
      value = token.slice(eq + 1);
    } else {
      value = rest[i + 1];
      i += 1;
    }
    if (value === undefined) {
      throw new Error(`Missing value for --${flag}`);
    }
    raw[FLAG_KEYS[flag]] = value;
  }

  return cliOptionsSchema.parse({ command, ...raw });
}

interface RunContext {
  options: CliOptions;
  env: Env;
  model: EnrollmentModel;
}

function runGeneration({ options, env, model }: RunContext): GenerationResult {
  const seed = options.seed ?? env.TIMETABLE_SEED;
  return generateTimetable({
    roster: model.roster,
    calendar: DEFAULT_CALENDAR,
    random: seed === undefined ? Math.random : createSeededRandom(seed),
    maxAttempts: options.attempts ?? env.TIMETABLE_MAX_ATTEMPTS,
    deadlineMs: options.deadline ?? env.TIMETABLE_DEADLINE_MS,
    rooms: defaultRooms(env.TIMETABLE_ROOM_COUNT),
  });
}

async function commandGenerate(ctx: RunContext): Promise<number> {
  const result = runGeneration(ctx);
  const entries = filterAssignment(result.assignment, result.assignment.keys(), {
    faculty: ctx.model.faculty,
  });

  console.log(
    `Placed ${result.assignment.size}/${ctx.model.roster.size} courses in ${result.attempts} attempt${result.attempts === 1 ? "" : "s"}.`
  );
  console.log(renderEntries(entries));

  const issues = verifyAssignment(ctx.model.roster, result.assignment);
  if (issues.length === 0) {
    console.log("Verification: clash-free, daily cap respected, every course placed.");
  } else {
    console.log(`Verification: ${issues.length} issue${issues.length === 1 ? "" : "s"}`);
    for (const issue of issues) {
      console.log(`  - ${issue.message}`);
    }
  }

  if (ctx.options.out) {
    const document = toTimetableDocument(result, { faculty: ctx.model.faculty });
    await writeFile(ctx.options.out, `${JSON.stringify(document, null, 2)}\n`, "utf8");
    console.log(`Wrote ${ctx.options.out}`);
  }

  return result.fullyPlaced ? 0 : 2;
}

async function loadMasterTimetable(ctx: RunContext): Promise<{ assignment: Assignment; faculty: CourseFaculty }> {
  if (ctx.options.from) {
    const { assignment, faculty } = parseTimetableDocument(await readFile(ctx.options.from, "utf8"));
    return { assignment, faculty };
  }
  const result = runGeneration(ctx);
  return { assignment: result.assignment, faculty: ctx.model.faculty };
}

async function commandView(ctx: RunContext): Promise<number> {
  const { name = "", id = "", ics, termStart, termEnd } = ctx.options;

  if (ics && (!termStart || !termEnd)) {
    console.error("--ics needs --term-start and --term-end");
    return 1;
  }

  const login = authenticateStudent(ctx.model.records, { name, studentId: id });
  if (!login.ok) {
    console.error(
      login.reason === "missing-credentials"
        ? "Please enter both Name and Roll Number."
        : "Credentials not found. Please verify your Name and Roll Number."
    );
    return 1;
  }

  const { assignment, faculty } = await loadMasterTimetable(ctx);
  const entries = filterAssignment(assignment, login.student.courses, { faculty });

  console.log(`Welcome, ${login.student.name} (${login.student.id}).`);
  console.log(renderGrid(buildWeeklyGrid(entries)));
  console.log("");
  console.log(renderEntries(entries));

  const missing = login.student.courses.filter((course) => !assignment.has(course));
  if (missing.length > 0) {
    console.log(`Not scheduled: ${missing.join(", ")}`);
  }

  if (ics && termStart && termEnd) {
    await writeFile(ics, buildTimetableIcs({ studentName: login.student.name, termStart, termEnd, entries }), "utf8");
    console.log(`Wrote ${ics}`);
  }

  return 0;
}

function describeError(error: unknown, zodPrefix: string): string {
  if (error instanceof z.ZodError) {
    return `${zodPrefix}: ${error.issues.map((issue) => `${issue.path.join(".") || "input"} ${issue.message}`).join("; ")}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/** Exit codes: 0 ok, 1 usage / input error, 2 timetable generated but incomplete. */
export async function runCli(argv: readonly string[], rawEnv: Partial<Record<string, string>>): Promise<number> {
  let options: CliOptions;
  let env: Env;
  try {
    options = parseCliArgs(argv);
    env = parseEnv(rawEnv);
  } catch (error) {
    console.error(describeError(error, "Invalid arguments"));
    console.error(USAGE);
    return 1;
  }

  const dir = options.dir ?? env.TIMETABLE_DATA_DIR;
  let model: EnrollmentModel;
  try {
    model = await loadEnrollmentDirectory(dir);
  } catch (error) {
    console.error(`Unable to read enrollment directory ${dir}:`, error instanceof Error ? error.message : error);
    return 1;
  }
  if (model.records.length === 0) {
    console.error(`No enrollment data found in ${dir}. Add the course CSV files to activate the system.`);
    return 1;
  }

  const ctx: RunContext = { options, env, model };
  try {
    return await (options.command === "generate" ? commandGenerate(ctx) : commandView(ctx));
  } catch (error) {
    console.error(describeError(error, "Invalid timetable data"));
    return 1;
  }
}
