/**
 * Sanitized views of DAP data returned by the tools. Field names are
 * snake_case to match the tool parameters.
 */

/**
 * A variable as shown to the caller, with the readable engine form when the
 * type has one
 */
export interface FormattedVariable {
  name: string;
  value: string;
  type: string;
  formatted?: string;
  expandable?: boolean;
  variables_reference?: number;
  evaluate_name?: string;
}

export interface ModelThread {
  id: number;
  name: string;
}

export interface ModelStackFrame {
  id: number;
  name: string;
  source?: string;
  line: number;
  column: number;
}

export interface ModelScope {
  name: string;
  variables_reference: number;
  expensive: boolean;
}

export interface ModelBreakpoint {
  id?: number;
  verified: boolean;
  line?: number;
  message?: string;
}

export interface ModelSourceBreakpoints {
  file: string;
  breakpoints: ModelBreakpoint[];
}

/** Lines recorded for one file, sent with the next launch or attach. */
export interface PendingBreakpoints {
  file: string;
  lines: number[];
}
