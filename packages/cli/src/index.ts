#!/usr/bin/env node

/**
 * packsync CLI - bring a directory in line with a .mrpack modpack
 */

import { createProgram } from './program.js';

await createProgram().parseAsync(process.argv);
