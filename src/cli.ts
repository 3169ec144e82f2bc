#!/usr/bin/env node
import { DEFAULT_CONFIG } from './config.js';
import { consoleLogger } from './logger.js';
import { runPipeline } from './pipeline.js';

async function main(): Promise<void> {
  try {
    await runPipeline(DEFAULT_CONFIG);
  } catch (err) {
    const message = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
    consoleLogger.error(message);
    process.exitCode = 1;
  }
}

void main();
