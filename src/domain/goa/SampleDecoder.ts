/**
 * SampleDecoder - single forward pass over the packed sample records.
 *
 * Each record is a little-endian 16-bit word: the low two bits select the
 * record type and the remaining 14 bits carry its value.
 *
 * Key behaviors:
 * - Depth records (types 0 and 1) advance time by one sample interval
 * - Temperature records are held until the next completed sample
 * - A time record longer than one interval first emits a surfaced point one
 *   interval later, then advances by the rest of the surface time
 * - Gas mix samples are only emitted for open-circuit modes, and only on change
 * - A trailing odd byte is ignored
 */
import { ByteStream } from './ByteStream.ts'
import {
  type DiveSample,
  type GoaHeader,
  type SampleCallback,
  GoaDiveMode,
  RECORD_TYPE,
} from './types.ts'

const DEPTH_MASK = 0x07FF
const GASMIX_MASK = 0x0800
const GASMIX_SHIFT = 11

/** Seconds between two depth samples */
export function sampleInterval(diveMode: GoaDiveMode): number {
  return diveMode === GoaDiveMode.FREEDIVE ? 2 : 5
}

/**
 * Decode the sample region into time-ordered samples. Every call starts a new
 * pass at the first record.
 */
export function* decodeSamples(data: Uint8Array, header: GoaHeader): Generator<DiveSample, void, undefined> {
  const { layout, headerSize, diveMode } = header
  const stream = new ByteStream(data, headerSize + layout.headerSize)

  const interval = sampleInterval(diveMode)
  const tracksGasmix = diveMode === GoaDiveMode.SCUBA || diveMode === GoaDiveMode.NITROX

  let time = 0
  let depth = 0
  let gasmix = 0
  let previousGasmix: number | null = null
  let temperature: number | null = null

  while (stream.remaining >= 2) {
    const raw = stream.readUint16LE()
    const type = raw & 0x0003
    const value = (raw & 0xFFFC) >> 2

    let complete = false

    switch (type) {
      case RECORD_TYPE.DEPTH:
      case RECORD_TYPE.DEPTH2: {
        depth = value & DEPTH_MASK
        gasmix = (value & GASMIX_MASK) >> GASMIX_SHIFT
        time += interval
        complete = true
        break
      }

      case RECORD_TYPE.TEMPERATURE: {
        temperature = value
        break
      }

      case RECORD_TYPE.TIME: {
        let surftime = value
        if (surftime > interval) {
          surftime -= interval
          time += interval

          yield { type: 'time', time: time * 1000 }
          yield { type: 'depth', depth: 0 }
        }
        time += surftime
        depth = 0
        complete = true
        break
      }
    }

    if (!complete) continue

    yield { type: 'time', time: time * 1000 }

    if (temperature !== null) {
      yield { type: 'temperature', temperature: temperature / 10 }
      temperature = null
    }

    yield { type: 'depth', depth: depth / 10 }

    if (tracksGasmix && gasmix !== previousGasmix) {
      yield { type: 'gasmix', gasmix }
      previousGasmix = gasmix
    }
  }
}

/**
 * Push every sample to a callback, synchronously and in order.
 */
export function forEachSample(data: Uint8Array, header: GoaHeader, callback: SampleCallback): void {
  for (const sample of decodeSamples(data, header)) {
    callback(sample)
  }
}
