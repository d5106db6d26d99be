/**
 * Lexer errors. Callers tell them apart by class or by `code`.
 */

import { BaseError } from '../../../Shared/Types/errors.js';
import type { ErrorDetails } from '../../../Shared/Types/errors.js';

export class ArgumentParsingError extends BaseError {
  constructor(message: string, code: string = 'ARGUMENT_PARSING_ERROR', details?: ErrorDetails) {
    super(message, code, details);
  }
}

/** A quote character showed up inside an unquoted word. */
export class UnexpectedQuoteError extends ArgumentParsingError {
  constructor(public readonly quote: string) {
    super(`Unexpected quote mark, ${JSON.stringify(quote)}, in non-quoted string`, 'UNEXPECTED_QUOTE', { quote });
  }
}

/** Something other than whitespace followed a closing quote. */
export class InvalidEndOfQuotedStringError extends ArgumentParsingError {
  constructor(public readonly char: string) {
    super(
      `Expected space after closing quotation but received ${JSON.stringify(char)}`,
      'INVALID_END_OF_QUOTED_STRING',
      { char },
    );
  }
}

/** Input ended inside a quoted word. */
export class ExpectedClosingQuoteError extends ArgumentParsingError {
  constructor(public readonly closeQuote: string) {
    super(`Expected closing ${closeQuote}.`, 'EXPECTED_CLOSING_QUOTE', { closeQuote });
  }
}
