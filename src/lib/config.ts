import { z } from "zod";

const optionalInt = (min: number) =>
  z.preprocess((value) => (value === "" ? undefined : value), z.coerce.number().int().min(min).optional());

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  TIMETABLE_DATA_DIR: z.string().min(1).default("data"),
  TIMETABLE_SEED: optionalInt(0),
  TIMETABLE_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(50),
  TIMETABLE_DEADLINE_MS: optionalInt(1),
  TIMETABLE_ROOM_COUNT: z.coerce.number().int().min(1).default(8),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(input: Partial<Record<string, string>>): Env {
  return envSchema.parse(input);
}
