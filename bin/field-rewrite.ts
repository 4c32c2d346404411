#!/usr/bin/env node

import { hideBin } from "yargs/helpers";
import { runCli } from "../src/cli.js";

runCli(hideBin(process.argv)).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  },
);
