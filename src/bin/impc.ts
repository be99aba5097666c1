#!/usr/bin/env node
import { runImpc } from './impc-core.js';

runImpc(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`impc error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  });
