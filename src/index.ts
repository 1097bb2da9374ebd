#!/usr/bin/env node

// replyforge - Entry Point

import { CommanderError } from 'commander';
import { createCLI } from './cli/index.js';
import { handleError } from './utils/error-handler.js';

const includeStack = process.env.NODE_ENV === 'development' || !!process.env.DEBUG;

async function main() {
  try {
    const program = createCLI();
    await program.parseAsync(process.argv);
  } catch (error) {
    // Commander exit override errors for --help / --version
    if (error instanceof CommanderError) {
      if (error.code === 'commander.version' || error.code === 'commander.helpDisplayed') {
        return;
      }
    }

    handleError(error, { context: 'main', includeStack });
    process.exit(1);
  }
}

// Handle unhandled promise rejections globally
process.on('unhandledRejection', reason => {
  handleError(reason, { context: 'unhandledRejection', includeStack });
});

// Handle uncaught exceptions globally
process.on('uncaughtException', error => {
  handleError(error, {
    context: 'uncaughtException',
    includeStack: true,
    exitProcess: true,
    exitCode: 1,
  });
});

void main();
