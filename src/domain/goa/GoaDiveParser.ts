import { type ParserOptions, resolveLogger } from './diagnostics.ts'
import { DiveParserError } from './errors.ts'
import {
  readDatetime,
  readDiveMode,
  readGasMix,
  readNumericField,
  unsupported,
} from './FieldExtractor.ts'
import { parseHeader } from './HeaderParser.ts'
import { decodeSamples, forEachSample } from './SampleDecoder.ts'
import {
  type DiveDateTime,
  type DiveMode,
  type DiveSample,
  type GasMix,
  type GoaDiveMode,
  type GoaHeader,
  type GoaLayout,
  type NumericFieldType,
  type SampleCallback,
  FieldType,
} from './types.ts'

/**
 * Parser for a single Goa dive dump.
 *
 * The header is validated once, in the constructor; a dump that fails
 * validation throws and no parser is created. The buffer is referenced, not
 * copied, and must not change while the parser is in use.
 */
export class GoaDiveParser {
  private readonly data: Uint8Array
  private readonly header: GoaHeader

  constructor(data: Uint8Array, options?: ParserOptions) {
    if (!(data instanceof Uint8Array)) {
      throw new DiveParserError('invalidArgs', 'Dive data must be a Uint8Array.')
    }
    this.data = data
    this.header = parseHeader(data, resolveLogger(options))
  }

  get diveMode(): GoaDiveMode {
    return this.header.diveMode
  }

  get layout(): GoaLayout {
    return this.header.layout
  }

  /** Bytes before the mode-specific header */
  get headerSize(): number {
    return this.header.headerSize
  }

  getDatetime(): DiveDateTime {
    return readDatetime(this.data, this.header)
  }

  getField(type: FieldType.GASMIX, index: number): GasMix
  getField(type: FieldType.DIVEMODE): DiveMode
  getField(type: NumericFieldType): number
  getField(type: FieldType, index?: number): number | GasMix | DiveMode
  getField(type: FieldType, index = 0): number | GasMix | DiveMode {
    switch (type) {
      case FieldType.DIVETIME:
      case FieldType.MAXDEPTH:
      case FieldType.AVGDEPTH:
      case FieldType.TEMPERATURE_MINIMUM:
      case FieldType.ATMOSPHERIC:
      case FieldType.GASMIX_COUNT:
        return readNumericField(this.data, this.header, type)
      case FieldType.GASMIX:
        return readGasMix(this.data, this.header, index)
      case FieldType.DIVEMODE:
        return readDiveMode(this.header)
      default:
        throw unsupported(type, this.header)
    }
  }

  /** Fresh pass over the sample records */
  samples(): Generator<DiveSample, void, undefined> {
    return decodeSamples(this.data, this.header)
  }

  forEachSample(callback: SampleCallback): void {
    forEachSample(this.data, this.header, callback)
  }
}
