#!/usr/bin/env tsx
/**
 * imgconv CLI - convert an image file into another format
 */

import { run } from './run'

process.exitCode = run(process.argv.slice(2))
