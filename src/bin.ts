#!/usr/bin/env node
import { runCli } from './cli';

runCli(process.argv.slice(2))
  .then((status) => {
    process.exitCode = status;
  })
  .catch((error: unknown) => {
    console.error('depot-trust failed:', error);
    process.exitCode = 1;
  });
