#!/usr/bin/env node
/**
 * nanobot-entrypoint: container entrypoint for the nanobot gateway.
 *
 * Bootstraps the CLI program, installs error handlers, and delegates to
 * Commander. The process exits with the status the command reports, which
 * for `start` is the gateway's own.
 */
import process from "node:process";
import { buildProgram } from "./cli/program.js";

const program = buildProgram();

process.on("uncaughtException", (error) => {
  console.error(
    "[entrypoint] Uncaught exception:",
    error instanceof Error ? (error.stack ?? error.message) : error,
  );
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  console.error(
    "[entrypoint] Unhandled rejection:",
    reason instanceof Error ? (reason.stack ?? reason.message) : reason,
  );
  process.exit(1);
});

void program
  .parseAsync(process.argv)
  .then(() => {
    process.exit(process.exitCode ?? 0);
  })
  .catch((err) => {
    console.error(
      "[entrypoint] Startup failed:",
      err instanceof Error ? (err.stack ?? err.message) : err,
    );
    process.exit(1);
  });
