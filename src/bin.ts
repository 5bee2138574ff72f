#!/usr/bin/env node
import { cli } from './cli';

cli(process.argv).catch(err => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
