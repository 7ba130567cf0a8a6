/**
 * @module cli/commands
 * @description CLI command exports
 * @status COMPLETE
 * @dependencies commander
 */

export { analyzeCommand, executeAnalyze, type AnalyzeInputs, type AnalyzeOutcome } from './analyze';
export { analyzersCommand, formatAnalyzers } from './analyzers';
