/**
 * HeaderParser - validates a Goa dive dump and locates its mode-specific header.
 *
 * The dump starts with two length bytes (id section, logbook section), followed
 * by both sections, the mode-specific header and the packed sample records.
 */
import type { DiagnosticLogger } from './diagnostics.ts'
import { DiveParserError } from './errors.ts'
import { GOA_LAYOUTS, isGoaDiveMode } from './layouts.ts'
import type { GoaHeader } from './types.ts'

const MIN_ID_LENGTH = 9
const MIN_LOGBOOK_LENGTH = 23

/** Offset of the dive-mode code inside the logbook section */
const LOGBOOK_DIVEMODE = 2

/**
 * Validate the dump and compute the parser state. Checks run in order and the
 * first failure is logged and thrown as a `dataFormat` error.
 */
export function parseHeader(data: Uint8Array, logger: DiagnosticLogger): GoaHeader {
  const size = data.length
  if (size < 2) {
    throw formatError(logger, `Invalid dive length (${size}).`)
  }

  const idLength = data[0]
  const logbookLength = data[1]
  if (idLength < MIN_ID_LENGTH || logbookLength < MIN_LOGBOOK_LENGTH) {
    throw formatError(logger, `Invalid id or logbook length (${idLength} ${logbookLength}).`)
  }

  const headerSize = 2 + idLength + logbookLength
  if (size < headerSize) {
    throw formatError(logger, `Invalid dive length (${size}).`)
  }

  const logbookStart = 2 + idLength
  const diveMode = data[logbookStart + LOGBOOK_DIVEMODE]
  if (!isGoaDiveMode(diveMode)) {
    throw formatError(logger, `Invalid dive mode (${diveMode}).`)
  }

  const layout = GOA_LAYOUTS[diveMode]

  if (size < headerSize + layout.headerSize) {
    throw formatError(logger, `Invalid dive length (${size}).`)
  }

  return Object.freeze({ layout, headerSize, diveMode })
}

function formatError(logger: DiagnosticLogger, message: string): DiveParserError {
  logger.error(message)
  return new DiveParserError('dataFormat', message)
}
