#!/usr/bin/env node
/**
 * cart-multi-ship - Entry Point
 */

import('./cli.js')
  .then(({ parseCommand, runCommand }) => {
    const { command, args } = parseCommand(process.argv.slice(2));
    return runCommand(command, args);
  })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
