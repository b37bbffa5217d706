/**
 * DiagnosticCollector - Collects findings from loading and validation
 *
 * Converts DocsiteError instances (with code, severity, context) and plain
 * Error instances into unified Diagnostic entries. A MissingFileError
 * becomes one entry per unresolved path.
 *
 * Usage:
 *   const collector = new DiagnosticCollector();
 *   collector.addFromError('validate', err);
 *
 *   if (collector.hasErrors()) {
 *     process.exitCode = 1;
 *   }
 */

import { DocsiteError, MissingFileError } from '../errors/DocsiteError.js';

/**
 * Which step produced a diagnostic
 */
export type DiagnosticStage = 'load' | 'validate' | 'plugins' | 'theme' | 'i18n';

/**
 * Diagnostic entry - unified format for all errors/warnings
 */
export interface Diagnostic {
  code: string;
  severity: 'fatal' | 'error' | 'warning' | 'info';
  message: string;
  stage: DiagnosticStage;
  file?: string;
  line?: number;
  /** Position inside the document, e.g. `nav > Getting Started > About` */
  location?: string;
  timestamp: number;
  suggestion?: string;
}

/**
 * Diagnostic input (without timestamp, which is auto-generated)
 */
export type DiagnosticInput = Omit<Diagnostic, 'timestamp'>;

export class DiagnosticCollector {
  private diagnostics: Diagnostic[] = [];

  /**
   * Record a thrown error.
   *
   * Plain Error instances become generic errors with code 'ERR_UNKNOWN'.
   */
  addFromError(stage: DiagnosticStage, error: Error): void {
    if (error instanceof MissingFileError) {
      for (const ref of error.missing) {
        this.add({
          code: error.code,
          severity: error.severity,
          message: `File not found: ${ref.path}`,
          stage,
          file: ref.path,
          location: ref.location,
          suggestion: error.suggestion,
        });
      }
      return;
    }

    if (error instanceof DocsiteError) {
      this.add({
        code: error.code,
        severity: error.severity,
        message: error.message,
        stage,
        file: error.context.filePath,
        line: error.context.lineNumber,
        location: error.context.location,
        suggestion: error.suggestion,
      });
      return;
    }

    this.add({
      code: 'ERR_UNKNOWN',
      severity: 'error',
      message: error.message,
      stage,
    });
  }

  /**
   * Add a diagnostic directly. Timestamp is set automatically.
   */
  add(diagnostic: DiagnosticInput): void {
    this.diagnostics.push({
      ...diagnostic,
      timestamp: Date.now(),
    });
  }

  /**
   * Get all diagnostics (a copy).
   */
  getAll(): Diagnostic[] {
    return [...this.diagnostics];
  }

  getByStage(stage: DiagnosticStage): Diagnostic[] {
    return this.diagnostics.filter(d => d.stage === stage);
  }

  getByCode(code: string): Diagnostic[] {
    return this.diagnostics.filter(d => d.code === code);
  }

  hasFatal(): boolean {
    return this.diagnostics.some(d => d.severity === 'fatal');
  }

  /**
   * Check if any error (including fatal) exists.
   */
  hasErrors(): boolean {
    return this.diagnostics.some(d => d.severity === 'error' || d.severity === 'fatal');
  }

  hasWarnings(): boolean {
    return this.diagnostics.some(d => d.severity === 'warning');
  }

  count(): number {
    return this.diagnostics.length;
  }

  /**
   * Format diagnostics as JSON lines (one JSON object per line).
   */
  toDiagnosticsLog(): string {
    return this.diagnostics.map(d => JSON.stringify(d)).join('\n');
  }

  clear(): void {
    this.diagnostics = [];
  }
}
