/**
 * GoaParser - top-level orchestrator for parsing a Goa dive dump.
 *
 * Flow: validate header → read summary fields → decode samples → fold into profile
 */
import type { DiveProfilePoint, DiveSummary } from '../types/DiveLog.ts'
import { type ParserOptions, resolveLogger } from './diagnostics.ts'
import { GoaDiveParser } from './GoaDiveParser.ts'
import { toDiveProfile, toDiveSummary } from './profileMapping.ts'

export interface ParseGoaResult {
  summary: DiveSummary
  profile: DiveProfilePoint[]
}

/**
 * Parse a Goa dive dump into its summary and profile.
 *
 * @param buffer Raw dive bytes as downloaded from the device
 * @param onProgress Optional progress callback (0-100)
 */
export function parseGoaBuffer(
  buffer: Uint8Array,
  onProgress?: (progress: number, message: string) => void,
  options?: ParserOptions,
): ParseGoaResult {
  const report = (pct: number, msg: string) => {
    if (onProgress) onProgress(pct, msg)
  }
  const logger = resolveLogger(options)

  // Step 1: Validate header
  report(10, 'Decoding header...')
  const parser = new GoaDiveParser(buffer, { logger })

  // Step 2: Summary fields
  report(40, 'Reading summary...')
  const summary = toDiveSummary(parser)

  // Step 3: Samples
  report(60, 'Decoding samples...')
  const profile = toDiveProfile(parser.samples())

  if (profile.length === 0) {
    logger.warn('Goa parser: dive contains no samples')
  }

  report(100, 'Complete!')

  return { summary, profile }
}
