#!/usr/bin/env node
/**
 * main.ts — `moneybird` binary. Loads .env, then hands off to runCli.
 */

import 'dotenv/config';
import { runCli } from './cli.js';

process.exitCode = await runCli(process.argv.slice(2), {
  env: process.env,
  stdout: process.stdout,
  stderr: process.stderr,
});
