/**
 * Diagnostics - collection and reporting of load/validation findings
 */
export { DiagnosticCollector } from './DiagnosticCollector.js';
export type { Diagnostic, DiagnosticInput, DiagnosticStage } from './DiagnosticCollector.js';
export { DiagnosticReporter, REPORT_FORMATS } from './DiagnosticReporter.js';
export type { ReportFormat, ReportOptions, SummaryStats } from './DiagnosticReporter.js';
