/**
 * adb output matching rules
 * Every text heuristic applied to adb output lives here so the pusher never
 * inspects raw text itself.
 */

export interface PushOutputRules {
  /** Lowercased marker adb prints ahead of a hard failure */
  errorMarker: string;
  /** Tag carried by transport trace lines that report a write */
  traceTag: string;
  /** Tag marking the write as a file data packet */
  dataTag: string;
  /** Captures the byte count of a data packet */
  lengthPattern: RegExp;
  /** adb's own log prefix: "adb I 10-18 12:00:01.123 ..." */
  diagnosticPrefix: RegExp;
}

export const DEFAULT_PUSH_OUTPUT_RULES: PushOutputRules = {
  errorMarker: "adb: error:",
  traceTag: "writex",
  dataTag: "DATA",
  lengthPattern: /\blen=(\d+)\b/,
  diagnosticPrefix: /^adb [VDIWEF] /,
};

/**
 * Decide whether captured push output reports success.
 * Blank output is a failure; so is any occurrence of the error marker.
 */
export function isPushSuccess(
  output: string | readonly string[],
  rules: PushOutputRules = DEFAULT_PUSH_OUTPUT_RULES
): boolean {
  const text = typeof output === "string" ? output : output.join("\n");
  if (text.trim().length === 0) {
    return false;
  }
  return !text.toLowerCase().includes(rules.errorMarker);
}

export function isErrorLine(line: string, rules: PushOutputRules = DEFAULT_PUSH_OUTPUT_RULES): boolean {
  return line.trimStart().toLowerCase().startsWith(rules.errorMarker);
}
