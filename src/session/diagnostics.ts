/**
 * Non-fatal conditions surfaced to the operator while the session continues.
 */
export type DiagnosticKind = 'timeout' | 'read-error';

export interface Diagnostic {
  kind: DiagnosticKind;
  message: string;
  command: string;
}

export interface Diagnostics {
  report(diagnostic: Diagnostic): void;
}

/**
 * Writes each diagnostic as one line on stderr.
 */
export const consoleDiagnostics: Diagnostics = {
  report({ message }) {
    console.error(message);
  },
};
