#!/usr/bin/env node
import { log } from './logger.js';
import { loadConfig } from './config.js';
import { run } from './graplsub.js';

const config = loadConfig();
if (!config.ok) {
  log('error', [config.error.message]);
  process.exitCode = 1;
} else {
  process.exitCode = await run(config.value);
}
