#!/usr/bin/env node
/**
 * Cadence CLI - Main entry point
 * Provides the `cadence` command-line interface
 */

import { createLogger } from '../utils/logger.js'
import { createProgram, getPackageVersion } from './program.js'

const logger = createLogger('cli')

/** Main entry point */
async function main(): Promise<void> {
  try {
    const version = await getPackageVersion()
    const program = createProgram(version)
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Errors are handled internally by main() which calls process.exit(1)
void main()
