#!/usr/bin/env node
/**
 * TVM802 Export - CLI Entry Point
 */

import 'dotenv/config';
import { runCli } from './cli/commands.js';

process.exitCode = await runCli(process.argv.slice(2));
