#!/usr/bin/env node
import { runConvert } from '../cli/convert.js';

process.exitCode = await runConvert(process.argv.slice(2));
