/**
 * @module cli/commands/analyze
 * @description Analyze command - detect ORM anti-patterns in a captured query trace
 * @status COMPLETE
 * @dependencies commander, zod, src/trace, src/metadata, src/analyzer, src/output
 */

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { analyzeTrace, filterBySeverity, resolveAnalyzerConfig, type AnalysisOptions } from '../../analyzer';
import { createConsoleLogger } from '../../logging/logger';
import { StaticMetadataProvider } from '../../metadata';
import { formatReportJson, formatReportText } from '../../output';
import { parseTraceDocument } from '../../trace';
import { CodedError, err, ok, type Logger, type Result } from '../../types/common';
import { ISSUE_SEVERITIES, ISSUE_TYPES, type IssueSeverity } from '../../types/issues';

// ============================================================================
// Types
// ============================================================================

interface AnalyzeOptions {
  metadata?: string;
  config?: string;
  format: string;
  severity?: string;
  type?: string;
  limit?: string;
  failOn?: string;
  dedup: boolean;
  verbose: boolean;
}

/**
 * File contents handed to the analysis; paths are resolved by the caller
 */
export interface AnalyzeInputs {
  trace: string;
  metadata?: string;
  config?: string;
}

export interface AnalyzeOutcome {
  /** Text written to stdout, or the error written to stderr */
  output: string;
  /** 0 = ok, 1 = invalid input, 2 = --fail-on severity reached */
  exitCode: 0 | 1 | 2;
}

// ============================================================================
// Option Schemas
// ============================================================================

const severitySchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.toUpperCase() : value),
  z.enum(ISSUE_SEVERITIES)
);
const issueTypeSchema = z.enum(ISSUE_TYPES);
const formatSchema = z.enum(['json', 'text']);
const limitSchema = z.coerce.number().int().positive();

// ============================================================================
// Command Definition
// ============================================================================

export const analyzeCommand = new Command('analyze')
  .description('Detect ORM anti-patterns in a captured query trace')
  .argument('<trace>', 'Path to the trace JSON file')
  .option('-m, --metadata <file>', 'Entity metadata JSON file')
  .option('-c, --config <file>', 'Analyzer configuration JSON file')
  .option('-f, --format <format>', 'Output format: json or text', 'text')
  .option('-s, --severity <level>', 'Minimum severity to report (critical, warning, info)')
  .option('-t, --type <type>', 'Only report this issue type')
  .option('-l, --limit <n>', 'Limit number of issues printed')
  .option('--fail-on <level>', 'Exit with code 2 when an issue at this severity or above is reported')
  .option('--no-dedup', 'Report overlapping issues separately')
  .option('-v, --verbose', 'Log analyzer diagnostics to stderr', false)
  .action((file: string, options: AnalyzeOptions) => {
    runAnalyze(file, options);
  });

// ============================================================================
// Implementation
// ============================================================================

function runAnalyze(file: string, options: AnalyzeOptions): void {
  const inputs: AnalyzeInputs = { trace: '' };
  try {
    inputs.trace = readInput(file);
    if (options.metadata) inputs.metadata = readInput(options.metadata);
    if (options.config) inputs.config = readInput(options.config);
  } catch (error) {
    console.error(`Error reading file: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }

  const logger = createConsoleLogger(options.verbose ? 'debug' : 'warn');
  const outcome = executeAnalyze(inputs, options, logger);
  if (outcome.exitCode === 1) {
    console.error(outcome.output);
  } else {
    console.log(outcome.output);
  }
  process.exitCode = outcome.exitCode;
}

function readInput(file: string): string {
  const filePath = path.resolve(file);
  if (!fs.existsSync(filePath)) {
    throw new Error(`File not found: ${filePath}`);
  }
  return fs.readFileSync(filePath, 'utf-8');
}

/**
 * Validate inputs and options, run the analysis and render the report
 */
export function executeAnalyze(
  inputs: AnalyzeInputs,
  options: Partial<AnalyzeOptions>,
  logger?: Logger
): AnalyzeOutcome {
  const format = formatSchema.safeParse(options.format ?? 'text');
  if (!format.success) return failure(`Unknown format: ${String(options.format)}`);

  let minSeverity: IssueSeverity | undefined;
  if (options.severity !== undefined) {
    const parsed = severitySchema.safeParse(options.severity);
    if (!parsed.success) return failure(`Unknown severity: ${options.severity}`);
    minSeverity = parsed.data;
  }

  let failOn: IssueSeverity | undefined;
  if (options.failOn !== undefined) {
    const parsed = severitySchema.safeParse(options.failOn);
    if (!parsed.success) return failure(`Unknown severity: ${options.failOn}`);
    failOn = parsed.data;
  }

  const analysisOptions: AnalysisOptions = { logger, deduplicate: options.dedup !== false, minSeverity };

  if (options.type !== undefined) {
    const parsed = issueTypeSchema.safeParse(options.type.toLowerCase());
    if (!parsed.success) return failure(`Unknown issue type: ${options.type}`);
    analysisOptions.issueTypes = [parsed.data];
  }

  let limit: number | undefined;
  if (options.limit !== undefined) {
    const parsed = limitSchema.safeParse(options.limit);
    if (!parsed.success) return failure(`Invalid limit: ${options.limit}`);
    limit = parsed.data;
  }

  const trace = parseTraceDocument(inputs.trace);
  if (!trace.success) return failure(`Trace error: ${trace.error.message}`);

  if (inputs.metadata !== undefined) {
    const json = parseJson(inputs.metadata);
    if (!json.success) return failure(`Metadata error: ${json.error}`);
    const metadata = StaticMetadataProvider.fromDocument(json.data);
    if (!metadata.success) return failure(`Metadata error: ${metadata.error.message}`);
    analysisOptions.metadata = metadata.data;
  }

  try {
    if (inputs.config !== undefined) {
      const json = parseJson(inputs.config);
      if (!json.success) return failure(`Config error: ${json.error}`);
      analysisOptions.config = resolveAnalyzerConfig(json.data);
    }

    const result = analyzeTrace(trace.data, analysisOptions);
    const printed = limit === undefined ? result.issues : result.issues.slice(0, limit);
    const output =
      format.data === 'json'
        ? JSON.stringify(formatReportJson(result, printed), null, 2)
        : formatReportText(result, printed);

    const failed = failOn !== undefined && filterBySeverity(result.issues, failOn).length > 0;
    return { output, exitCode: failed ? 2 : 0 };
  } catch (error) {
    if (error instanceof CodedError) return failure(`Config error: ${error.message}`);
    throw error;
  }
}

// ============================================================================
// Helpers
// ============================================================================

function failure(message: string): AnalyzeOutcome {
  return { output: message, exitCode: 1 };
}

function parseJson(content: string): Result<unknown, string> {
  try {
    return ok(JSON.parse(content));
  } catch (error) {
    return err(error instanceof Error ? error.message : String(error));
  }
}

