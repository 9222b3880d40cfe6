#!/usr/bin/env node

import { createProcessContext } from "./cli/context";
import { runCli } from "./cli/run";

runCli(process.argv.slice(2), createProcessContext())
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
