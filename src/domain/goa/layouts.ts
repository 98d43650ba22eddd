import { type GoaLayout, GoaDiveMode } from './types.ts'

const OPEN_CIRCUIT_LAYOUT: GoaLayout = Object.freeze({
  headerSize: 92,
  datetime: 12,
  divetime: 20,
  gasmix: 26,
  atmospheric: 30,
  maxdepth: 73,
  avgdepth: 75,
  temperature: 77,
})

/** Per-mode summary layouts, indexed by dive-mode code */
export const GOA_LAYOUTS: Readonly<Record<GoaDiveMode, GoaLayout>> = Object.freeze({
  [GoaDiveMode.SCUBA]: OPEN_CIRCUIT_LAYOUT,
  [GoaDiveMode.NITROX]: OPEN_CIRCUIT_LAYOUT,
  [GoaDiveMode.FREEDIVE]: Object.freeze({
    headerSize: 38,
    datetime: 12,
    divetime: 20,
    maxdepth: 23,
    temperature: 25,
  }),
  [GoaDiveMode.GAUGE]: Object.freeze({
    headerSize: 40,
    datetime: 12,
    divetime: 20,
    atmospheric: 22,
    maxdepth: 24,
    avgdepth: 26,
    temperature: 28,
  }),
})

/** Number of gas mix slots in open-circuit headers */
export const GASMIX_SLOTS = 2

export function isGoaDiveMode(code: number): code is GoaDiveMode {
  return code === GoaDiveMode.SCUBA
    || code === GoaDiveMode.NITROX
    || code === GoaDiveMode.FREEDIVE
    || code === GoaDiveMode.GAUGE
}

/**
 * Layout for a raw dive-mode code, or undefined when the code is not a known mode.
 */
export function getLayout(code: number): GoaLayout | undefined {
  return isGoaDiveMode(code) ? GOA_LAYOUTS[code] : undefined
}
