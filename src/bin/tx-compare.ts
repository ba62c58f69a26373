#!/usr/bin/env node
import { runCompare } from '../cli/compare.js';

process.exitCode = await runCompare(process.argv.slice(2));
