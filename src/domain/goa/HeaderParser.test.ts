import { describe, it, expect, vi } from 'vitest'
import { parseHeader } from './HeaderParser'
import { GOA_LAYOUTS } from './layouts'
import { GoaDiveMode } from './types'
import { buildGoaDump, captureParserError, DEFAULT_PREFIX_SIZE } from '../test-helpers'

function makeLogger() {
  return { error: vi.fn(), warn: vi.fn() }
}

const MODES = [
  GoaDiveMode.SCUBA,
  GoaDiveMode.NITROX,
  GoaDiveMode.FREEDIVE,
  GoaDiveMode.GAUGE,
]

describe('parseHeader', () => {
  describe('buffer length', () => {
    for (const mode of MODES) {
      const name = GoaDiveMode[mode]
      const minimum = DEFAULT_PREFIX_SIZE + GOA_LAYOUTS[mode].headerSize

      it(`accepts a ${name} dump of exactly ${minimum} bytes`, () => {
        const data = buildGoaDump({ mode })
        expect(data.length).toBe(minimum)

        const header = parseHeader(data, makeLogger())
        expect(header.diveMode).toBe(mode)
        expect(header.headerSize).toBe(DEFAULT_PREFIX_SIZE)
        expect(header.layout).toBe(GOA_LAYOUTS[mode])
      })

      it(`rejects a ${name} dump one byte short`, () => {
        const data = buildGoaDump({ mode }).subarray(0, minimum - 1)
        const logger = makeLogger()

        const error = captureParserError(() => parseHeader(data, logger))
        expect(error.status).toBe('dataFormat')
        expect(error.message).toBe(`Invalid dive length (${minimum - 1}).`)
        expect(logger.error).toHaveBeenCalledWith(`Invalid dive length (${minimum - 1}).`)
      })
    }

    it('rejects an empty buffer', () => {
      const error = captureParserError(() => parseHeader(new Uint8Array(0), makeLogger()))
      expect(error.status).toBe('dataFormat')
      expect(error.message).toBe('Invalid dive length (0).')
    })

    it('rejects a buffer holding only the id length', () => {
      const error = captureParserError(() => parseHeader(new Uint8Array([9]), makeLogger()))
      expect(error.message).toBe('Invalid dive length (1).')
    })

    it('rejects a buffer shorter than its id and logbook sections', () => {
      const data = new Uint8Array(20)
      data[0] = 9
      data[1] = 23

      const error = captureParserError(() => parseHeader(data, makeLogger()))
      expect(error.status).toBe('dataFormat')
      expect(error.message).toBe('Invalid dive length (20).')
    })
  })

  describe('section lengths', () => {
    it('rejects an id section shorter than 9 bytes', () => {
      const logger = makeLogger()
      const data = buildGoaDump({ idLength: 8 })

      const error = captureParserError(() => parseHeader(data, logger))
      expect(error.status).toBe('dataFormat')
      expect(error.message).toBe('Invalid id or logbook length (8 23).')
      expect(logger.error).toHaveBeenCalledTimes(1)
    })

    it('rejects a logbook section shorter than 23 bytes', () => {
      const data = buildGoaDump({ logbookLength: 22 })

      const error = captureParserError(() => parseHeader(data, makeLogger()))
      expect(error.status).toBe('dataFormat')
      expect(error.message).toBe('Invalid id or logbook length (9 22).')
    })

    it('checks section lengths before anything else', () => {
      // Mode code 7 would also be invalid; the length check fires first.
      const data = buildGoaDump({ idLength: 3, mode: 7, modeHeaderSize: 92 })

      const error = captureParserError(() => parseHeader(data, makeLogger()))
      expect(error.message).toBe('Invalid id or logbook length (3 23).')
    })

    it('places the mode-specific header after longer sections', () => {
      const data = buildGoaDump({ mode: GoaDiveMode.GAUGE, idLength: 12, logbookLength: 30 })

      const header = parseHeader(data, makeLogger())
      expect(header.headerSize).toBe(2 + 12 + 30)
      expect(header.diveMode).toBe(GoaDiveMode.GAUGE)
    })
  })

  describe('dive mode', () => {
    it('rejects dive mode code 4', () => {
      const logger = makeLogger()
      const data = buildGoaDump({ mode: 4, modeHeaderSize: 92 })

      const error = captureParserError(() => parseHeader(data, logger))
      expect(error.status).toBe('dataFormat')
      expect(error.message).toBe('Invalid dive mode (4).')
      expect(logger.error).toHaveBeenCalledWith('Invalid dive mode (4).')
    })

    it('rejects dive mode code 255', () => {
      const data = buildGoaDump({ mode: 255, modeHeaderSize: 92 })

      const error = captureParserError(() => parseHeader(data, makeLogger()))
      expect(error.message).toBe('Invalid dive mode (255).')
    })
  })

  it('returns frozen parser state', () => {
    const header = parseHeader(buildGoaDump(), makeLogger())
    expect(Object.isFrozen(header)).toBe(true)
    expect(Object.isFrozen(header.layout)).toBe(true)
  })

  it('logs nothing for a valid dump', () => {
    const logger = makeLogger()
    parseHeader(buildGoaDump(), logger)
    expect(logger.error).not.toHaveBeenCalled()
    expect(logger.warn).not.toHaveBeenCalled()
  })
})
