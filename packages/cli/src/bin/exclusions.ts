#!/usr/bin/env node
/**
 * bin/exclusions.ts — Entry point for the `exclusions` CLI command.
 *
 *   exclusions union <rules...> [--trace] [--no-cache]
 *   exclusions intersect <rules...> [--trace] [--no-cache]
 *   exclusions format <rule> [--trace]
 */

import { createProgram } from '../commands/index.js'

createProgram().parse()
