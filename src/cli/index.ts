#!/usr/bin/env node
/**
 * @module cli/index
 * @description CLI entry point for developer-facing commands
 * @status COMPLETE
 * @dependencies commander, src/cli/commands
 */

import { Command } from 'commander';
import { analyzeCommand, analyzersCommand } from './commands';

// ============================================================================
// Program Definition
// ============================================================================

const program = new Command();

program
  .name('query-inspect')
  .description('Detect ORM anti-patterns (N+1, unused joins, unpaginated reads, ...) in captured query traces')
  .version('0.1.0');

// ============================================================================
// Register Commands
// ============================================================================

program.addCommand(analyzeCommand);
program.addCommand(analyzersCommand);

// ============================================================================
// Parse Arguments
// ============================================================================

program.parse(process.argv);
