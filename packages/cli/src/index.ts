#!/usr/bin/env node
import { getLogger } from "@bookpress/core";
import { createProgram } from "./program.js";

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    getLogger().fatal({ err }, "Unexpected error");
    process.exitCode = 1;
  });
