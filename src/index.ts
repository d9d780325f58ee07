#!/usr/bin/env node
/**
 * Jenkins build trigger entry point
 */
import { runTrigger } from '@/trigger-runner';

runTrigger(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    process.stderr.write(`Unhandled error: ${String(error)}\n`);
    process.exitCode = 1;
  });
