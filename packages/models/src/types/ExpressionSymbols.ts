/**
 * The tokens used by the default expression engine to build and parse keys.
 *
 * Defaults: `.` delimiter, `..` escaped delimiter, `[@`/`]` around
 * attributes and `(`/`)` around indices.
 */
export interface ExpressionSymbols {
  propertyDelimiter: string;
  /** null disables escaping of the delimiter inside names */
  escapedDelimiter: string | null;
  attributeStart: string;
  /** null when attribute names run to the end of the segment */
  attributeEnd: string | null;
  indexStart: string;
  indexEnd: string;
}
