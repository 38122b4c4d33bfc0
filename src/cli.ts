#!/usr/bin/env node

import { runCli } from './cli/program.js';
import { errorMessage } from './utils/errors.js';
import { UIHelper } from './utils/ui.js';

process.on('unhandledRejection', (reason) => {
  UIHelper.showError(`Unhandled Promise rejection: ${errorMessage(reason)}`);
  process.exit(1);
});

runCli(process.argv).then(
  exitCode => process.exit(exitCode),
  (error: unknown) => {
    UIHelper.showError(`Unexpected error: ${errorMessage(error)}`);
    process.exit(1);
  }
);
