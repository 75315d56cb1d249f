#!/usr/bin/env node
/**
 * levelog — level-filtered console logging from the command line.
 *
 * Bootstraps the CLI program, installs error handlers, and delegates to
 * Commander.
 */
import process from "node:process";
import { buildProgram, formatCliError } from "./cli/program.js";

const program = buildProgram();

process.on("uncaughtException", (error) => {
  console.error(`[levelog] Uncaught exception: ${formatCliError(error)}`);
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  console.error(`[levelog] Unhandled rejection: ${formatCliError(reason)}`);
  process.exit(1);
});

void program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`[levelog] ${formatCliError(err)}`);
  process.exit(1);
});
