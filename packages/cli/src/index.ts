#!/usr/bin/env tsx
import "dotenv/config";
import { CommanderError } from "commander";
import { createProgram } from "./program.js";

// Log and exit on anything that escapes the command handlers
process.on("unhandledRejection", (reason) => {
  console.error("[waymark] Unhandled rejection:", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  console.error("[waymark] Uncaught exception:", err);
  process.exit(1);
});

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    // Commander has already printed its own usage errors, help and version
    if (err instanceof CommanderError) process.exit(err.exitCode);
    console.error("[waymark]", err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
