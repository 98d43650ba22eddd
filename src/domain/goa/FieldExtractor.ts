/**
 * FieldExtractor - reads single summary fields from the mode-specific header.
 *
 * All offsets are relative to `headerSize`. The header decoder has already
 * checked that the whole mode-specific header is present, so reads at layout
 * offsets never run past the buffer.
 */
import { readUint16LE } from './ByteStream.ts'
import { DiveParserError } from './errors.ts'
import { GASMIX_SLOTS } from './layouts.ts'
import {
  type DiveDateTime,
  type DiveMode,
  type GasMix,
  type GoaHeader,
  type NumericFieldType,
  FieldType,
  GoaDiveMode,
} from './types.ts'

/** Layout keys of fields stored as a scaled 16-bit word */
type ScaledOffset = 'divetime' | 'maxdepth' | 'avgdepth' | 'temperature' | 'atmospheric'

const SCALED_FIELDS: Record<Exclude<NumericFieldType, FieldType.GASMIX_COUNT>, { offset: ScaledOffset; divisor: number }> = {
  [FieldType.DIVETIME]: { offset: 'divetime', divisor: 1 },
  [FieldType.MAXDEPTH]: { offset: 'maxdepth', divisor: 10 },
  [FieldType.AVGDEPTH]: { offset: 'avgdepth', divisor: 10 },
  [FieldType.TEMPERATURE_MINIMUM]: { offset: 'temperature', divisor: 10 },
  [FieldType.ATMOSPHERIC]: { offset: 'atmospheric', divisor: 1000 },
}

/** The mode-specific section of the dump (a view, not a copy) */
export function modeData(data: Uint8Array, header: GoaHeader): Uint8Array {
  return data.subarray(header.headerSize)
}

export function readDatetime(data: Uint8Array, header: GoaHeader): DiveDateTime {
  const section = modeData(data, header)
  const p = header.layout.datetime

  return {
    year: readUint16LE(section, p),
    month: section[p + 2],
    day: section[p + 3],
    hour: section[p + 4],
    minute: section[p + 5],
    second: 0,
    timezone: null,
  }
}

/**
 * Read a numeric field, applying its scale factor. Dive time is in seconds,
 * depths in meters, temperature in degrees Celsius, atmospheric pressure in bar.
 */
export function readNumericField(data: Uint8Array, header: GoaHeader, type: NumericFieldType): number {
  if (type === FieldType.GASMIX_COUNT) {
    return countGasMixes(data, header)
  }

  const { offset, divisor } = SCALED_FIELDS[type]
  const position = header.layout[offset]
  if (position === undefined) {
    throw unsupported(type, header)
  }

  const raw = readUint16LE(modeData(data, header), position)
  return divisor === 1 ? raw : raw / divisor
}

/**
 * Number of configured gas mixes. Slots are scanned in order and the first
 * slot with a zero oxygen percentage ends the list.
 */
export function countGasMixes(data: Uint8Array, header: GoaHeader): number {
  const gasmix = header.layout.gasmix
  if (gasmix === undefined) return 0

  const section = modeData(data, header)
  let count = 0
  for (let i = 0; i < GASMIX_SLOTS; i++) {
    if (section[gasmix + 2 * i + 1] === 0) break
    count++
  }
  return count
}

export function readGasMix(data: Uint8Array, header: GoaHeader, index: number): GasMix {
  const gasmix = header.layout.gasmix
  if (gasmix === undefined) {
    throw unsupported(FieldType.GASMIX, header)
  }

  const count = countGasMixes(data, header)
  if (!Number.isInteger(index) || index < 0 || index >= count) {
    throw new DiveParserError('invalidArgs', `Invalid gas mix index (${index}); dive has ${count} gas mixes.`)
  }

  const oxygen = modeData(data, header)[gasmix + 2 * index + 1] / 100
  const helium = 0
  return {
    oxygen,
    helium,
    nitrogen: 1 - oxygen - helium,
    usage: 'none',
  }
}

export function readDiveMode(header: GoaHeader): DiveMode {
  switch (header.diveMode) {
    case GoaDiveMode.SCUBA:
    case GoaDiveMode.NITROX:
      return 'opencircuit'
    case GoaDiveMode.GAUGE:
      return 'gauge'
    case GoaDiveMode.FREEDIVE:
      return 'freedive'
    default:
      throw new DiveParserError('dataFormat', `Unknown dive mode (${String(header.diveMode)}).`)
  }
}

export function unsupported(type: FieldType, header: GoaHeader): DiveParserError {
  return new DiveParserError('unsupported', `Field ${type} is not available in dive mode ${GoaDiveMode[header.diveMode]}.`)
}
