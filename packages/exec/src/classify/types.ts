export type LineSeverity = 'error' | 'warning' | 'info';

export interface ClassifiedLine {
  text: string;
  severity: LineSeverity;
}

/**
 * Strategy that tags one line of tool output. Classification is best-effort:
 * it reads text only and never looks at exit codes.
 */
export interface OutputClassifier {
  classify(line: string): LineSeverity;
}

export interface ParsedCommand {
  bin: string;
  args: string[];
  /** Leading `KEY=value` assignments */
  env: Record<string, string>;
  raw: string;
}
