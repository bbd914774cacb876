/**
 * Diagnostics reported for content that was dropped during parsing.
 * They are data handed to the caller, never thrown.
 */

export type DiagnosticCode = 'MALFORMED_LINE' | 'MALFORMED_KEY_VALUE';

export interface Diagnostic {
  code: DiagnosticCode;
  /** Human-readable reason */
  message: string;
  /** The offending line, trimmed */
  line: string;
  /** 1-based position within the document, when known */
  lineNumber?: number;
  /** The dropped tag/field fragment (MALFORMED_KEY_VALUE only) */
  fragment?: string;
}

export type DiagnosticSink = (diagnostic: Diagnostic) => void;
