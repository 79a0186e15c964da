#!/usr/bin/env node
import { createCLI } from './cli/index.js';

await createCLI().parseAsync(process.argv);
