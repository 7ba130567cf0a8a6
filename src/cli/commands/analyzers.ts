/**
 * @module cli/commands/analyzers
 * @description Analyzers command - list the default pipeline and what each analyzer detects
 * @status COMPLETE
 * @dependencies commander, src/analyzer
 */

import { Command } from 'commander';
import { createDefaultAnalyzers, type QueryAnalyzer } from '../../analyzer';

export const analyzersCommand = new Command('analyzers')
  .description('List analyzers in pipeline order with the issue types they detect')
  .option('-f, --format <format>', 'Output format: json or text', 'text')
  .action((options: { format: string }) => {
    console.log(formatAnalyzers(createDefaultAnalyzers(), options.format === 'json'));
  });

export function formatAnalyzers(analyzers: readonly QueryAnalyzer[], json: boolean): string {
  if (json) {
    return JSON.stringify(
      analyzers.map((analyzer) => ({ name: analyzer.name, detects: analyzer.detects })),
      null,
      2
    );
  }

  const width = Math.max(...analyzers.map((analyzer) => analyzer.name.length));
  return analyzers.map((analyzer) => `${analyzer.name.padEnd(width)}  ${analyzer.detects.join(', ')}`).join('\n');
}
