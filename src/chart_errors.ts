/**
 * Purpose: Define the error taxonomy raised by table contracts and band layout.
 * Intent: Give callers a typed, code-stable failure they can branch on.
 */

export type ChartDataErrorDetail =
  | { kind: "EmptyInput" }
  | { kind: "MissingColumns"; columns: string[]; dataset: string }
  | { kind: "InvalidValue"; column: string; row: number; expected: string }
  | { kind: "MultipleValues"; column: string; values: string[] }
  | { kind: "NoScenario" }
  | { kind: "MultipleScenarios"; values: string[] }
  | { kind: "TooManyLines"; count: number; max: number }
  | { kind: "MissingStartValue"; year: number }
  | { kind: "ScenarioNotFound"; scenarios: string[] }
  | { kind: "UnknownTechnology"; technology: string }
  | { kind: "DegenerateRange"; value: number };

export type ChartDataErrorKind = ChartDataErrorDetail["kind"];

const codes: Readonly<Record<ChartDataErrorKind, string>> = Object.freeze({
  EmptyInput: "AP_EMPTY_INPUT",
  MissingColumns: "AP_MISSING_COLUMNS",
  InvalidValue: "AP_INVALID_VALUE",
  MultipleValues: "AP_MULTIPLE_VALUES",
  NoScenario: "AP_NO_SCENARIO",
  MultipleScenarios: "AP_MULTIPLE_SCENARIOS",
  TooManyLines: "AP_TOO_MANY_LINES",
  MissingStartValue: "AP_MISSING_START_VALUE",
  ScenarioNotFound: "AP_SCENARIO_NOT_FOUND",
  UnknownTechnology: "AP_UNKNOWN_TECHNOLOGY",
  DegenerateRange: "AP_DEGENERATE_RANGE",
});

export class ChartDataError extends Error {
  readonly code: string;
  readonly detail: ChartDataErrorDetail;
  readonly hint: string | undefined;

  constructor(detail: ChartDataErrorDetail, message: string, hint?: string) {
    super(hint ? `${message}\n${hint}` : message);
    this.name = "ChartDataError";
    this.code = codes[detail.kind];
    this.detail = detail;
    this.hint = hint;
  }

  get kind(): ChartDataErrorKind {
    return this.detail.kind;
  }
}

export function isChartDataError(e: unknown): e is ChartDataError {
  return e instanceof ChartDataError;
}
