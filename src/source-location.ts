// ============================================================
// SOURCE LOCATION
// ============================================================

/**
 * A point in source text.
 * `line` and `column` are 1-based; `offset` is the 0-based index of the
 * Unicode scalar (not UTF-16 unit) in the source.
 */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}
