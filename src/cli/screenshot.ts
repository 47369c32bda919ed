#!/usr/bin/env tsx
/**
 * CLI: Quote Page Capture
 *
 * Usage:
 *   quote-snap
 *
 * Settings come from the environment (or a .env file), e.g.:
 *   STOCK_SYMBOL=VIX INDEX_SYMBOLS=VIX quote-snap
 */

import { config as loadDotenv } from 'dotenv';
import { run } from './run.js';

loadDotenv();

process.exitCode = await run(process.argv.slice(2), process.env);
