#!/usr/bin/env node
/**
 * @fileoverview Executable entry point for ics-agenda.
 */

import { runCli } from './cli.js';
import { initObservability } from './utils/observability/index.js';

initObservability();

process.exitCode = runCli(process.argv.slice(2));
