/**
 * Forward cursor over little-endian 16-bit words in a Uint8Array.
 * Never copies the underlying buffer.
 */
export class ByteStream {
  private data: Uint8Array
  private offset: number
  private end: number

  constructor(data: Uint8Array, offset = 0, end?: number) {
    this.data = data
    this.offset = offset
    this.end = end ?? data.length
  }

  get remaining(): number {
    return Math.max(0, this.end - this.offset)
  }

  readUint16LE(): number {
    if (this.offset + 2 > this.end) {
      throw new RangeError('ByteStream: read past end')
    }
    const value = readUint16LE(this.data, this.offset)
    this.offset += 2
    return value
  }
}

/**
 * Unsigned little-endian 16-bit word at an absolute offset.
 */
export function readUint16LE(data: Uint8Array, offset: number): number {
  return data[offset] | (data[offset + 1] << 8)
}
