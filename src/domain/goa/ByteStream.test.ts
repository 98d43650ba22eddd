import { describe, it, expect } from 'vitest'
import { ByteStream, readUint16LE } from './ByteStream'

describe('ByteStream', () => {
  it('reads little-endian words and tracks the remaining bytes', () => {
    const stream = new ByteStream(new Uint8Array([0x58, 0x02, 0xF2, 0x00, 0x7F]))

    expect(stream.readUint16LE()).toBe(600)
    expect(stream.remaining).toBe(3)
    expect(stream.readUint16LE()).toBe(242)
    expect(stream.remaining).toBe(1)
    expect(() => stream.readUint16LE()).toThrow(RangeError)
  })

  it('respects a start offset and end bound', () => {
    const stream = new ByteStream(new Uint8Array([1, 2, 3, 4, 5, 6]), 2, 5)

    expect(stream.remaining).toBe(3)
    expect(stream.readUint16LE()).toBe(0x0403)
    expect(stream.remaining).toBe(1)
    expect(() => stream.readUint16LE()).toThrow(RangeError)
  })

  it('reports nothing remaining when started past the end', () => {
    expect(new ByteStream(new Uint8Array(4), 6).remaining).toBe(0)
  })
})

describe('readUint16LE', () => {
  it('combines the low and high byte', () => {
    expect(readUint16LE(new Uint8Array([0x00, 0xF5, 0x03]), 1)).toBe(0x03F5)
  })
})
