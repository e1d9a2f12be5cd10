#!/usr/bin/env node

/**
 * SnowWeb CLI
 *
 * Static site server for Nix-built content: serves one content root over
 * HTTP or HTTPS and swaps it atomically on rebuild.
 */

import { createProgram } from './command.js';

await createProgram().parseAsync();
