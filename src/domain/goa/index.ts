// Entry point for the Goa dive dump parser.
export { GoaDiveParser } from './GoaDiveParser.ts'
export { parseGoaBuffer, type ParseGoaResult } from './GoaParser.ts'
export { toDiveProfile, toDiveSummary } from './profileMapping.ts'
export { parseHeader } from './HeaderParser.ts'
export { decodeSamples, sampleInterval } from './SampleDecoder.ts'
export { GOA_LAYOUTS, getLayout } from './layouts.ts'
export { DiveParserError, isUnsupported, type ParserStatus } from './errors.ts'
export type { DiagnosticLogger, ParserOptions } from './diagnostics.ts'
export {
  FieldType,
  GoaDiveMode,
  type DiveDateTime,
  type DiveMode,
  type DiveSample,
  type GasMix,
  type GasUsage,
  type GoaHeader,
  type GoaLayout,
  type NumericFieldType,
  type SampleCallback,
  type SampleType,
} from './types.ts'
export type { DiveProfilePoint, DiveSummary } from '../types/DiveLog.ts'
