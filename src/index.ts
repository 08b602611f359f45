#!/usr/bin/env node
import dotenv from "dotenv";
import { runCli } from "./cli";
import { fallbackOptionsFromArgv } from "./config";
import { exitCodeForError, toCliError, TransportError } from "./errors";
import { emitError } from "./output";

// Values already in the environment win over .env entries.
dotenv.config();

async function main(): Promise<void> {
  const controller = new AbortController();
  process.on("SIGINT", () => {
    controller.abort();
    const err = new TransportError("Interrupted by user.", { interrupted: true });
    emitError(err, fallbackOptionsFromArgv(process.argv));
    process.exit(exitCodeForError(err));
  });

  process.exitCode = await runCli(process.argv, { env: process.env, signal: controller.signal });
}

main().catch((err) => {
  const opts = fallbackOptionsFromArgv(process.argv);
  const cliErr = toCliError(err);
  emitError(cliErr, opts);
  process.exit(exitCodeForError(cliErr));
});
