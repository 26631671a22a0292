#!/usr/bin/env node
import { runMain } from './cli.js';

runMain(process.argv.slice(2));
