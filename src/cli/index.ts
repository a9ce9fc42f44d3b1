#!/usr/bin/env node
import { buildProgram } from "./program";
import { exitWithError } from "./commands/shared";

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => exitWithError(error));
