export type ParserStatus = 'invalidArgs' | 'dataFormat' | 'unsupported'

/**
 * Raised by the Goa parser. `status` tells callers whether the dump is
 * malformed, the request was invalid, or the field is absent in this mode.
 */
export class DiveParserError extends Error {
  readonly status: ParserStatus

  constructor(status: ParserStatus, message: string) {
    super(message)
    this.name = 'DiveParserError'
    this.status = status
  }
}

export function isUnsupported(error: unknown): error is DiveParserError {
  return error instanceof DiveParserError && error.status === 'unsupported'
}
