import type { DiveDateTime, DiveMode, GasMix } from '../goa/types.ts'

/**
 * One completed sample burst from a dive profile
 */
export interface DiveProfilePoint {
  /** Elapsed time in seconds */
  time: number

  /** Depth in meters */
  depth: number

  /** Water temperature (°C), only on points where the device logged one */
  temperature?: number

  /** Gas mix index, only on points where the breathed gas changed */
  gasmix?: number
}

/**
 * Summary fields read from the dive header.
 * Optional members are absent when the dive mode does not record them.
 */
export interface DiveSummary {
  datetime: DiveDateTime
  diveMode: DiveMode

  /** Dive time in seconds */
  diveTime?: number

  // Depths (m)
  maxDepth?: number
  avgDepth?: number

  /** Minimum water temperature (°C) */
  minTemperature?: number

  /** Surface pressure (bar) */
  atmospheric?: number

  gasMixes: GasMix[]
}
