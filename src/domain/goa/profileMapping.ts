/**
 * Maps decoded samples and header fields into the viewer-facing
 * DiveProfilePoint / DiveSummary types.
 */
import type { DiveProfilePoint, DiveSummary } from '../types/DiveLog.ts'
import { isUnsupported } from './errors.ts'
import type { GoaDiveParser } from './GoaDiveParser.ts'
import { type DiveSample, type GasMix, FieldType } from './types.ts'

/**
 * Fold a sample stream into profile points. Every time sample opens a new
 * point; the depth, temperature and gas mix samples after it fill it in.
 */
export function toDiveProfile(samples: Iterable<DiveSample>): DiveProfilePoint[] {
  const points: DiveProfilePoint[] = []
  let current: DiveProfilePoint | null = null

  for (const sample of samples) {
    switch (sample.type) {
      case 'time':
        current = { time: sample.time / 1000, depth: 0 }
        points.push(current)
        break
      case 'depth':
        if (current) current.depth = sample.depth
        break
      case 'temperature':
        if (current) current.temperature = sample.temperature
        break
      case 'gasmix':
        if (current) current.gasmix = sample.gasmix
        break
    }
  }

  return points
}

export function toDiveSummary(parser: GoaDiveParser): DiveSummary {
  const gasMixes: GasMix[] = []
  const gasmixCount = parser.getField(FieldType.GASMIX_COUNT)
  for (let i = 0; i < gasmixCount; i++) {
    gasMixes.push(parser.getField(FieldType.GASMIX, i))
  }

  return {
    datetime: parser.getDatetime(),
    diveMode: parser.getField(FieldType.DIVEMODE),
    diveTime: optionalField(() => parser.getField(FieldType.DIVETIME)),
    maxDepth: optionalField(() => parser.getField(FieldType.MAXDEPTH)),
    avgDepth: optionalField(() => parser.getField(FieldType.AVGDEPTH)),
    minTemperature: optionalField(() => parser.getField(FieldType.TEMPERATURE_MINIMUM)),
    atmospheric: optionalField(() => parser.getField(FieldType.ATMOSPHERIC)),
    gasMixes,
  }
}

/** Undefined for fields the dive mode does not record; other errors propagate */
function optionalField<T>(read: () => T): T | undefined {
  try {
    return read()
  } catch (error) {
    if (isUnsupported(error)) return undefined
    throw error
  }
}
