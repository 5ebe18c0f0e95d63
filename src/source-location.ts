/** A point in source text */
export interface SourceLocation {
  /** 1-based line, advanced by LF */
  readonly line: number;
  /** 1-based column within the line */
  readonly column: number;
  /** 0-based character offset from the start of the document */
  readonly offset: number;
}

/** Half-open range: `end` is the location just past the last character */
export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}
