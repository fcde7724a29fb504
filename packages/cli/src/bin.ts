#!/usr/bin/env node
/**
 * branchgate CLI Entry Point
 *
 * Main executable for the branchgate command-line tool.
 */

import { createProgram } from './program.js';
import { installInterruptHandler } from './utils/interrupt.js';

installInterruptHandler();

await createProgram().parseAsync();
