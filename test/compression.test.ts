import { describe, expect, it } from 'vitest'

import {
  Algorithm,
  PortableCodec,
  compressFingerprint,
  decodeBase64,
  decompressFingerprint,
  encodeBase64,
  isFingerprintError
} from '../src/index.js'

function bytes(...values: number[]): Uint8Array {
  return new Uint8Array(values)
}

describe('compressFingerprint', () => {
  it('writes the algorithm and a big-endian count header', () => {
    expect(compressFingerprint(new Int32Array([]), Algorithm.Test2)).toEqual(bytes(1, 0, 0, 0))
    expect(compressFingerprint(new Int32Array([0, 0, 0]), Algorithm.Test2)).toEqual(bytes(1, 0, 0, 3, 0, 0))
  })

  it('packs set-bit deltas of consecutive XORs into 3-bit values', () => {
    expect(compressFingerprint(new Int32Array([1]), Algorithm.Test2)).toEqual(bytes(1, 0, 0, 1, 1))
    expect(compressFingerprint(new Int32Array([1, 3]), Algorithm.Test2)).toEqual(bytes(1, 0, 0, 2, 0x81, 0))
    expect(compressFingerprint(new Int32Array([5, 5, 5]), Algorithm.Test5)).toEqual(bytes(4, 0, 0, 3, 0x11, 0))
  })

  it('moves large deltas into the 5-bit exceptional stream', () => {
    expect(compressFingerprint(new Int32Array([-0x80000000]), Algorithm.Test2)).toEqual(bytes(1, 0, 0, 1, 7, 25))
  })

  it('rejects unknown algorithms', () => {
    expect(() => compressFingerprint(new Int32Array([1]), 9)).toThrow(/Unknown algorithm id: 9/)
  })
})

describe('decompressFingerprint', () => {
  it('reverses compression including the sign bit', () => {
    const decoded = decompressFingerprint(bytes(1, 0, 0, 1, 7, 25))
    expect(decoded.algorithm).toBe(Algorithm.Test2)
    expect(Array.from(decoded.fingerprint)).toEqual([-0x80000000])
  })

  it('restores the XOR chain', () => {
    const decoded = decompressFingerprint(bytes(1, 0, 0, 2, 0x81, 0))
    expect(Array.from(decoded.fingerprint)).toEqual([1, 3])
  })

  it('handles all 32 bits set', () => {
    const input = new Int32Array([-1, 0, 123456789, -987654321])
    const decoded = decompressFingerprint(compressFingerprint(input, Algorithm.Test3))
    expect(decoded.algorithm).toBe(Algorithm.Test3)
    expect(decoded.fingerprint).toEqual(input)
  })

  it('fails on input shorter than the header', () => {
    expect(() => decompressFingerprint(bytes(1, 0, 0))).toThrow(/too short/)
  })

  it('fails on an unknown algorithm tag', () => {
    expect(() => decompressFingerprint(bytes(7, 0, 0, 0))).toThrow(/Unknown algorithm id: 7/)
  })

  it('fails when fewer sub-fingerprints are present than announced', () => {
    expect(() => decompressFingerprint(bytes(1, 0, 0, 2, 1))).toThrow(/found 1 of 2/)
  })

  it('fails when exceptional bits are missing', () => {
    try {
      decompressFingerprint(bytes(1, 0, 0, 1, 7))
      expect.unreachable()
    } catch (error) {
      expect(isFingerprintError(error, 'DecodeError')).toBe(true)
    }
  })

  it('fails when a bit position runs past 32', () => {
    // 7 + 31 from the exceptional stream = bit 38
    expect(() => decompressFingerprint(bytes(1, 0, 0, 1, 7, 31))).toThrow(/out of range/)
  })
})

describe('base64', () => {
  it('uses the URL-safe alphabet without padding', () => {
    expect(encodeBase64(bytes(1, 0, 0, 1, 1))).toBe('AQAAAQE')
    expect(encodeBase64(bytes(2, 0, 0, 1, 0x49, 0x92, 0x24, 0x49, 0x92, 0x24, 0x49, 0x92, 0x24, 0x49, 0x92, 0x24, 0)))
      .toBe('AgAAAUmSJEmSJEmSJEmSJAA')
  })

  it('decodes text back to bytes', () => {
    expect(decodeBase64('AQAAAoEA')).toEqual(bytes(1, 0, 0, 2, 0x81, 0))
  })

  it('rejects characters outside the alphabet', () => {
    expect(() => decodeBase64('AQAA+QE')).toThrow(/not valid URL-safe base64/)
    expect(() => decodeBase64('AQAAAQE=')).toThrow(/not valid URL-safe base64/)
  })

  it('rejects impossible lengths', () => {
    expect(() => decodeBase64('AQAAA')).toThrow(/not valid URL-safe base64/)
  })
})

describe('PortableCodec', () => {
  it('hands out buffers that must be released once', () => {
    const codec = new PortableCodec()
    const result = codec.encodeFingerprint(new Int32Array([1]), Algorithm.Test2, true)
    expect(result.size).toBe(7)
    expect(codec.liveBuffers).toBe(1)

    const pointer = result.pointer
    if (pointer === null) {
      throw new Error('expected a buffer')
    }
    expect(Buffer.from(codec.readBytes(pointer, result.size)).toString('latin1')).toBe('AQAAAQE')

    codec.dealloc(pointer)
    expect(codec.liveBuffers).toBe(0)
    expect(() => codec.dealloc(pointer)).toThrow(/already released/)
  })
})
