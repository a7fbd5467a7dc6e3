#!/usr/bin/env node
/**
 * install-script-gen - turns AUR helper transcripts into install scripts
 */

import { runMain } from './cli/main.js';

await runMain(process.argv.slice(2));
