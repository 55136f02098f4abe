// Ambient type declarations for environment variables
// This file must not include runtime code.

declare global {
  namespace NodeJS {
    interface ProcessEnv {
      NODE_ENV?: "development" | "production" | "test";
      TIMETABLE_DATA_DIR?: string;
      TIMETABLE_SEED?: string; // integer as string
      TIMETABLE_MAX_ATTEMPTS?: string;
      TIMETABLE_DEADLINE_MS?: string;
      TIMETABLE_ROOM_COUNT?: string;
    }
  }
}

export {};
