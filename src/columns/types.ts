/**
 * A storage column name split by whether it is wrapped in double quotes.
 * Exactly one of `unquoted` and `quoted` is set.
 */
export interface IParsedColumnName {
  /**
   * The name as the engine returned it
   */
  raw: string;

  /**
   * The name itself, when it is not quote-wrapped
   */
  unquoted?: string;

  /**
   * The text between the quotes, when it is quote-wrapped
   */
  quoted?: string;
}
