#!/usr/bin/env node
/**
 * sssg CLI
 *
 * Usage:
 *   sssg
 *   sssg --src posts --dst _site
 *   SSSG_DEBUG=load,render sssg --drafts
 */

import { run } from "../cli.js";

const code = await run(process.argv.slice(2));
process.exit(code);
