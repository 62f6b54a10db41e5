#!/usr/bin/env node
import { config } from '../config';
import { runShift } from './shiftCommand';

try {
  process.exitCode = runShift(process.argv.slice(2));
} catch (error) {
  const showFullError = config.nodeEnv === 'development' || !(error instanceof Error);
  console.error('Error:', showFullError ? error : error.message);
  process.exitCode = 1;
}
