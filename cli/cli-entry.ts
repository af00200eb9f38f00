#!/usr/bin/env tsx
import { CommanderError } from 'commander';
import { main } from './index';
import { ErrorHandler } from './error/ErrorHandler';

export { main };

main().catch((error: unknown) => {
  if (error instanceof CommanderError) {
    // commander has already printed help, the version or the usage problem
    process.exitCode = error.exitCode;
    return;
  }
  new ErrorHandler().handleError(error);
});
