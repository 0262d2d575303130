#!/usr/bin/env node
import { buildProgram } from "./cli.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((e: unknown) => {
    console.error(e instanceof Error ? e.message : String(e));
    process.exit(1);
  });
