#!/usr/bin/env node
import { createPipelineCli } from "./cli/pipeline-cli.js";

createPipelineCli()
  .parseAsync(process.argv)
  .catch((err) => {
    console.error(err instanceof Error ? `${err.name}: ${err.message}` : String(err));
    process.exitCode = 1;
  });
