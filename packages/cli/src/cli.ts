#!/usr/bin/env node

/**
 * TallyDB CLI entry point
 */

import { processIO } from "./lib/io.js";
import { run } from "./program.js";

process.exitCode = await run(process.argv.slice(2), processIO());
