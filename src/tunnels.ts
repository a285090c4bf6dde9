#!/usr/bin/env tsx
import { errorMessage } from "./errors";
import { runCli } from "./cli/main";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("Error:", errorMessage(err));
    process.exit(1);
  });
