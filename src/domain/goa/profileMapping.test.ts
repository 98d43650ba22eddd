import { describe, it, expect, vi } from 'vitest'
import { toDiveProfile, toDiveSummary } from './profileMapping'
import { GoaDiveParser } from './GoaDiveParser'
import { DiveParserError } from './errors'
import { FieldType, GoaDiveMode, type DiveSample } from './types'
import { buildGoaDump, type GoaDumpOptions } from '../test-helpers'

function makeParser(options: GoaDumpOptions): GoaDiveParser {
  return new GoaDiveParser(buildGoaDump(options), { logger: { error: vi.fn(), warn: vi.fn() } })
}

describe('toDiveProfile', () => {
  it('opens a point on each time sample', () => {
    const samples: DiveSample[] = [
      { type: 'time', time: 5000 },
      { type: 'temperature', temperature: 21.5 },
      { type: 'depth', depth: 15 },
      { type: 'gasmix', gasmix: 0 },
      { type: 'time', time: 10000 },
      { type: 'depth', depth: 16 },
    ]

    expect(toDiveProfile(samples)).toEqual([
      { time: 5, depth: 15, temperature: 21.5, gasmix: 0 },
      { time: 10, depth: 16 },
    ])
  })

  it('defaults depth to zero when a point has no depth sample', () => {
    expect(toDiveProfile([{ type: 'time', time: 2000 }])).toEqual([{ time: 2, depth: 0 }])
  })

  it('drops samples before the first time sample', () => {
    const samples: DiveSample[] = [
      { type: 'depth', depth: 3 },
      { type: 'time', time: 5000 },
      { type: 'depth', depth: 4 },
    ]

    expect(toDiveProfile(samples)).toEqual([{ time: 5, depth: 4 }])
  })

  it('returns an empty profile for no samples', () => {
    expect(toDiveProfile([])).toEqual([])
  })
})

describe('toDiveSummary', () => {
  it('reads every open-circuit field', () => {
    const parser = makeParser({
      mode: GoaDiveMode.NITROX,
      datetime: { year: 2024, month: 8, day: 2, hour: 10, minute: 30 },
      divetime: 2400,
      maxdepth: 254,
      avgdepth: 131,
      temperature: 203,
      atmospheric: 1011,
      oxygen: [32, 0],
    })

    const summary = toDiveSummary(parser)
    expect(summary.diveMode).toBe('opencircuit')
    expect(summary.datetime).toEqual({
      year: 2024, month: 8, day: 2, hour: 10, minute: 30, second: 0, timezone: null,
    })
    expect(summary.diveTime).toBe(2400)
    expect(summary.maxDepth).toBe(25.4)
    expect(summary.avgDepth).toBe(13.1)
    expect(summary.minTemperature).toBe(20.3)
    expect(summary.atmospheric).toBe(1.011)
    expect(summary.gasMixes).toHaveLength(1)
    expect(summary.gasMixes[0].oxygen).toBeCloseTo(0.32)
  })

  it('leaves fields the freedive layout lacks undefined', () => {
    const summary = toDiveSummary(makeParser({ mode: GoaDiveMode.FREEDIVE, maxdepth: 180, divetime: 95 }))

    expect(summary.diveMode).toBe('freedive')
    expect(summary.maxDepth).toBe(18)
    expect(summary.diveTime).toBe(95)
    expect(summary.avgDepth).toBeUndefined()
    expect(summary.atmospheric).toBeUndefined()
    expect(summary.gasMixes).toEqual([])
  })

  it('propagates errors other than unsupported fields', () => {
    const parser = makeParser({})
    vi.spyOn(parser, 'getField').mockImplementation((type: FieldType) => {
      throw new DiveParserError('dataFormat', `broken ${type}`)
    })

    expect(() => toDiveSummary(parser)).toThrow('broken gasmixCount')
  })
})
