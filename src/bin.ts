#!/usr/bin/env node
import { run } from './cli/cliRun.js';

await run();
