#!/usr/bin/env node
/**
 * cloud-reporter CLI エントリポイント
 */

import dotenv from 'dotenv';
import path from 'path';
import { logger } from '../logger.js';
import { createProgram } from './program.js';

dotenv.config({
  path: path.resolve(process.cwd(), '.env'),
});

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    logger.error('CLI error', {
      error: error instanceof Error ? error.message : error,
    });
    process.exitCode = 1;
  }
}

void main();
