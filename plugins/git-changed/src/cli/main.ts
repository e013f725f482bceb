#!/usr/bin/env node
import { CommanderError } from 'commander';
import { logger } from '../shared/logger.js';
import { GitChangedError } from '../shared/errors.js';
import { runCli } from './program.js';

runCli(process.argv).catch((err: unknown) => {
  // commander has already printed its own usage errors
  if (err instanceof CommanderError) {
    process.exitCode = err.exitCode;
    return;
  }
  if (err instanceof GitChangedError) {
    logger.debug({ code: err.code, context: err.context }, 'run aborted');
  } else {
    logger.error({ err }, 'unexpected failure');
  }
  process.stderr.write(`error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = 1;
});
