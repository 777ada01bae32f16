#!/usr/bin/env node

import { createCli } from './program.js';

await createCli(process.argv.slice(2)).parseAsync();
