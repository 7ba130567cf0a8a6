/**
 * @module output/index
 * @description Report formatters for the CLI (JSON and text)
 * @status COMPLETE
 * @dependencies src/output/issue-formatter.ts
 */

export {
  formatIssue,
  formatReportJson,
  formatReportText,
  type OutputIssue,
  type OutputQuery,
  type OutputReport,
} from './issue-formatter';
