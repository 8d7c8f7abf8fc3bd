#!/usr/bin/env node
import { createProgram } from "./cli.js";
import { ConfigError } from "./config.js";
import { EXIT, exit } from "./exit-codes.js";
import { EnvelopeError } from "./shared/errors.js";

async function main() {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  const code =
    error instanceof ConfigError || error instanceof EnvelopeError
      ? EXIT.INVALID_ARGS
      : EXIT.GENERIC_ERROR;
  exit(code, message);
});
