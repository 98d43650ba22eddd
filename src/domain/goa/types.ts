/**
 * Goa binary format types - enums and interfaces for the dive dump layout.
 */

/** Dive-mode codes as stored in the logbook section */
export enum GoaDiveMode {
  SCUBA = 0,
  NITROX = 1,
  FREEDIVE = 2,
  GAUGE = 3,
}

/** Sample record type, the low two bits of each 16-bit record */
export const RECORD_TYPE = {
  DEPTH: 0,
  DEPTH2: 1,
  TIME: 2,
  TEMPERATURE: 3,
} as const

/**
 * Byte offsets of the summary fields, relative to the start of the
 * mode-specific header. An absent offset means the mode does not record
 * that field.
 */
export interface GoaLayout {
  /** Length of the mode-specific header; sample records follow it */
  readonly headerSize: number
  readonly datetime: number
  readonly divetime?: number
  readonly gasmix?: number
  readonly atmospheric?: number
  readonly maxdepth?: number
  readonly avgdepth?: number
  readonly temperature?: number
}

/** Parser state produced once by the header decoder */
export interface GoaHeader {
  readonly layout: GoaLayout
  /** Bytes from buffer start to the mode-specific header */
  readonly headerSize: number
  readonly diveMode: GoaDiveMode
}

/** Summary field types understood by dive-log consumers */
export enum FieldType {
  DIVETIME = 'divetime',
  MAXDEPTH = 'maxdepth',
  AVGDEPTH = 'avgdepth',
  GASMIX_COUNT = 'gasmixCount',
  GASMIX = 'gasmix',
  SALINITY = 'salinity',
  ATMOSPHERIC = 'atmospheric',
  TEMPERATURE_SURFACE = 'temperatureSurface',
  TEMPERATURE_MINIMUM = 'temperatureMinimum',
  TEMPERATURE_MAXIMUM = 'temperatureMaximum',
  TANK_COUNT = 'tankCount',
  TANK = 'tank',
  DIVEMODE = 'divemode',
  DECOMODEL = 'decomodel',
  LOCATION = 'location',
}

/** Numeric summary fields (seconds, meters, degrees, bar, or a count) */
export type NumericFieldType =
  | FieldType.DIVETIME
  | FieldType.MAXDEPTH
  | FieldType.AVGDEPTH
  | FieldType.TEMPERATURE_MINIMUM
  | FieldType.ATMOSPHERIC
  | FieldType.GASMIX_COUNT

/** Dive mode as reported to consumers */
export type DiveMode = 'opencircuit' | 'gauge' | 'freedive'

export type GasUsage = 'none' | 'oxygen' | 'diluent' | 'sidemount'

export interface GasMix {
  oxygen: number
  helium: number
  nitrogen: number
  usage: GasUsage
}

export interface DiveDateTime {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
  /** Offset from UTC in seconds; null when the device does not record one */
  timezone: number | null
}

export type SampleType = 'time' | 'depth' | 'temperature' | 'gasmix'

/** One decoded telemetry event */
export type DiveSample =
  /** Elapsed time in milliseconds */
  | { type: 'time'; time: number }
  /** Depth in meters */
  | { type: 'depth'; depth: number }
  /** Water temperature in degrees Celsius */
  | { type: 'temperature'; temperature: number }
  /** Index of the gas mix now breathed */
  | { type: 'gasmix'; gasmix: number }

export type SampleCallback = (sample: DiveSample) => void
