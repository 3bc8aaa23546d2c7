#!/usr/bin/env node
import { main } from "./cli";
import { errorMessage } from "./errors";

main().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exitCode = 1;
});
