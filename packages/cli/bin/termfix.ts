#!/usr/bin/env node
/**
 * Thin wrapper that launches the CLI without pulling in the package exports.
 */
import { runCli } from '../src/runner.js';

// runCli reports its own failures and sets process.exitCode.
void runCli(process.argv);
