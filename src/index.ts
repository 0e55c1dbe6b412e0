#!/usr/bin/env node

import { runCli } from './cli.js';

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled Rejection:', reason);
  process.exitCode = 1;
});

process.exitCode = await runCli(process.argv.slice(2));
