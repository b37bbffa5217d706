/**
 * DiagnosticReporter - Formats diagnostics for output
 *
 * Supports multiple output formats:
 * - text: Human-readable format with severity indicators
 * - json: Machine-readable JSON format for CI integration
 * - csv: Spreadsheet-compatible format
 *
 * Usage:
 *   const reporter = new DiagnosticReporter(collector);
 *   console.log(reporter.report({ format: 'text', includeSummary: true }));
 */

import type { Diagnostic, DiagnosticCollector } from './DiagnosticCollector.js';

export type ReportFormat = 'text' | 'json' | 'csv';

export const REPORT_FORMATS: readonly ReportFormat[] = ['text', 'json', 'csv'];

export interface ReportOptions {
  format: ReportFormat;
  includeSummary?: boolean;
  /** Leave out warnings and info entries (summary still counts them) */
  errorsOnly?: boolean;
}

export interface SummaryStats {
  total: number;
  fatal: number;
  errors: number;
  warnings: number;
  info: number;
}

export class DiagnosticReporter {
  constructor(private collector: DiagnosticCollector) {}

  /**
   * Generate a formatted report of all diagnostics.
   */
  report(options: ReportOptions): string {
    let diagnostics = this.collector.getAll();
    if (options.errorsOnly) {
      diagnostics = diagnostics.filter(d => d.severity === 'fatal' || d.severity === 'error');
    }

    if (options.format === 'json') {
      return this.jsonReport(diagnostics, options);
    } else if (options.format === 'csv') {
      return this.csvReport(diagnostics);
    } else {
      return this.textReport(diagnostics, options);
    }
  }

  /**
   * Human-readable summary of diagnostic counts.
   */
  summary(): string {
    const stats = this.getStats();

    if (stats.total === 0) {
      return 'No issues found.';
    }

    const parts: string[] = [];
    if (stats.fatal > 0) {
      parts.push(`Fatal: ${stats.fatal}`);
    }
    if (stats.errors > 0) {
      parts.push(`Errors: ${stats.errors}`);
    }
    if (stats.warnings > 0) {
      parts.push(`Warnings: ${stats.warnings}`);
    }
    if (stats.info > 0) {
      parts.push(`Info: ${stats.info}`);
    }

    return parts.join(', ');
  }

  getStats(): SummaryStats {
    const diagnostics = this.collector.getAll();
    return {
      total: diagnostics.length,
      fatal: diagnostics.filter(d => d.severity === 'fatal').length,
      errors: diagnostics.filter(d => d.severity === 'error').length,
      warnings: diagnostics.filter(d => d.severity === 'warning').length,
      info: diagnostics.filter(d => d.severity === 'info').length,
    };
  }

  private textReport(diagnostics: Diagnostic[], options: ReportOptions): string {
    const lines: string[] = [];

    if (diagnostics.length === 0) {
      lines.push('No issues found.');
    }

    for (const diag of diagnostics) {
      const location = this.formatLocation(diag);
      const parts = [this.getSeverityIcon(diag.severity), diag.code];
      if (location) parts.push(location);
      parts.push(diag.message);
      lines.push(parts.join(' '));

      if (diag.suggestion) {
        lines.push(`   Suggestion: ${diag.suggestion}`);
      }
    }

    if (options.includeSummary && diagnostics.length > 0) {
      lines.push('');
      lines.push(this.summary());
    }

    return lines.join('\n');
  }

  private jsonReport(diagnostics: Diagnostic[], options: ReportOptions): string {
    const result: {
      diagnostics: Diagnostic[];
      summary?: SummaryStats;
    } = {
      diagnostics,
    };

    if (options.includeSummary) {
      result.summary = this.getStats();
    }

    return JSON.stringify(result, null, 2);
  }

  private csvReport(diagnostics: Diagnostic[]): string {
    const header = 'severity,code,stage,file,line,location,message,suggestion';
    const rows = diagnostics.map(d =>
      [
        d.severity,
        d.code,
        d.stage,
        d.file ? this.csvEscape(d.file) : '',
        d.line ?? '',
        d.location ? this.csvEscape(d.location) : '',
        this.csvEscape(d.message),
        d.suggestion ? this.csvEscape(d.suggestion) : '',
      ].join(',')
    );
    return [header, ...rows].join('\n');
  }

  private getSeverityIcon(severity: Diagnostic['severity']): string {
    switch (severity) {
      case 'fatal':
        return '[FATAL]';
      case 'error':
        return '[ERROR]';
      case 'warning':
        return '[WARN]';
      case 'info':
        return '[INFO]';
    }
  }

  /**
   * `(file:line)`, `(file)` or `(location)` when there is no file.
   */
  private formatLocation(diag: Diagnostic): string {
    if (diag.file) {
      return diag.line ? `(${diag.file}:${diag.line})` : `(${diag.file})`;
    }
    if (diag.location) {
      return `(${diag.location})`;
    }
    return '';
  }

  /**
   * Always quote; double internal quotes.
   */
  private csvEscape(value: string): string {
    return `"${value.replace(/"/g, '""')}"`;
  }
}
