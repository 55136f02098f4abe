#!/usr/bin/env tsx
import { runCli } from "@/lib/cli";

runCli(process.argv.slice(2), process.env)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
