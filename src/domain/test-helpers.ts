import { GOA_LAYOUTS, getLayout } from './goa/layouts.ts'
import { DiveParserError } from './goa/errors.ts'
import { type GoaLayout, GoaDiveMode, RECORD_TYPE } from './goa/types.ts'

export interface GoaDumpOptions {
  /** Raw dive-mode code; codes without a layout need `modeHeaderSize` */
  mode?: number
  idLength?: number
  logbookLength?: number
  /** Overrides the layout's header size (for invalid mode codes) */
  modeHeaderSize?: number
  datetime?: { year: number; month: number; day: number; hour: number; minute: number }
  divetime?: number
  maxdepth?: number
  avgdepth?: number
  temperature?: number
  atmospheric?: number
  /** Oxygen percentages, one per gas mix slot */
  oxygen?: number[]
  /** Raw 16-bit sample records */
  records?: number[]
  /** Extra bytes after the records */
  trailing?: number[]
}

/** Header size before the mode-specific section for the default lengths */
export const DEFAULT_PREFIX_SIZE = 2 + 9 + 23

/**
 * Build a Goa dive dump. Field values are raw (unscaled) and written at the
 * mode's layout offsets; fields the layout lacks are skipped.
 */
export function buildGoaDump(options: GoaDumpOptions = {}): Uint8Array {
  const mode = options.mode ?? GoaDiveMode.SCUBA
  const idLength = options.idLength ?? 9
  const logbookLength = options.logbookLength ?? 23
  const layout: GoaLayout | undefined = getLayout(mode)
  const modeHeaderSize = options.modeHeaderSize ?? layout?.headerSize ?? GOA_LAYOUTS[GoaDiveMode.SCUBA].headerSize
  const records = options.records ?? []
  const trailing = options.trailing ?? []

  const prefixSize = 2 + idLength + logbookLength
  const size = prefixSize + modeHeaderSize + records.length * 2 + trailing.length
  const data = new Uint8Array(size)

  data[0] = idLength
  data[1] = logbookLength
  data[2 + idLength + 2] = mode

  if (layout) {
    const put16 = (offset: number | undefined, value: number | undefined) => {
      if (offset === undefined || value === undefined) return
      writeUint16LE(data, prefixSize + offset, value)
    }

    if (options.datetime) {
      const p = prefixSize + layout.datetime
      writeUint16LE(data, p, options.datetime.year)
      data[p + 2] = options.datetime.month
      data[p + 3] = options.datetime.day
      data[p + 4] = options.datetime.hour
      data[p + 5] = options.datetime.minute
    }

    put16(layout.divetime, options.divetime)
    put16(layout.maxdepth, options.maxdepth)
    put16(layout.avgdepth, options.avgdepth)
    put16(layout.temperature, options.temperature)
    put16(layout.atmospheric, options.atmospheric)

    const gasmix = layout.gasmix
    if (gasmix !== undefined && options.oxygen) {
      options.oxygen.forEach((o2, i) => {
        data[prefixSize + gasmix + 2 * i + 1] = o2
      })
    }
  }

  let offset = prefixSize + modeHeaderSize
  for (const record of records) {
    writeUint16LE(data, offset, record)
    offset += 2
  }
  data.set(trailing, offset)

  return data
}

export function writeUint16LE(data: Uint8Array, offset: number, value: number): void {
  data[offset] = value & 0xFF
  data[offset + 1] = (value >> 8) & 0xFF
}

/** Depth record: raw depth in 1/10 m, gas mix selector 0 or 1 */
export function depthRecord(depth: number, gasmix = 0): number {
  return ((depth | (gasmix << 11)) << 2) | RECORD_TYPE.DEPTH
}

/** Depth record using the aliased second depth type */
export function depth2Record(depth: number, gasmix = 0): number {
  return ((depth | (gasmix << 11)) << 2) | RECORD_TYPE.DEPTH2
}

/** Temperature record, raw value in 1/10 °C */
export function temperatureRecord(temperature: number): number {
  return (temperature << 2) | RECORD_TYPE.TEMPERATURE
}

/** Time record carrying a surface interval in seconds */
export function timeRecord(surftime: number): number {
  return (surftime << 2) | RECORD_TYPE.TIME
}

/** Run `fn` and return the DiveParserError it throws */
export function captureParserError(fn: () => unknown): DiveParserError {
  try {
    fn()
  } catch (error) {
    if (error instanceof DiveParserError) return error
    throw error
  }
  throw new Error('Expected a DiveParserError to be thrown')
}
