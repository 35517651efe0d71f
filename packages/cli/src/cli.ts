#!/usr/bin/env -S npx tsx
/**
 * pseudolex command-line entry point
 */

import { buildProgram } from "./program.js";

buildProgram().parse();
