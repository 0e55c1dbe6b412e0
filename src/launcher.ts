#!/usr/bin/env node

import { fileURLToPath } from 'node:url';
import { getRuntimeConfig } from './config/runtime.config.js';
import { defaultErrorClassifier } from './core/errors/error-classifier.js';
import { EntrypointRunner } from './services/runner/entrypoint-runner.js';

// Fixed in the image: the parser always sits next to this file
const ENTRY_SCRIPT = fileURLToPath(new URL('./index.js', import.meta.url));

const runner = new EntrypointRunner({
  scriptPath: ENTRY_SCRIPT,
  args: process.argv.slice(2),
  allowRoot: getRuntimeConfig().allowRoot,
});

try {
  process.exitCode = await runner.run();
} catch (error) {
  const failure = defaultErrorClassifier.classify(error);
  console.error(`ERROR: ${failure.message}`);
  process.exitCode = failure.exitCode;
}
