import { isAlgorithm, type DecodedFingerprint } from '../types/index.js'
import type { EngineCodec, EngineDecodeResult, EngineEncodeResult } from './engine.js'
import { ENGINE_OK, FingerprintError } from './errors.js'

// Compressed layout:
//   [algorithm:u8][count:u24 big endian][3-bit normal values][5-bit exceptional values]
// Every sub-fingerprint is XORed with its predecessor, then stored as the deltas between
// its set bit positions followed by a 0 terminator.

const HEADER_SIZE = 4
const NORMAL_BITS = 3
const EXCEPTIONAL_BITS = 5
const MAX_NORMAL_VALUE = (1 << NORMAL_BITS) - 1
const MAX_COUNT = 0xffffff

const BASE64_TEXT = /^[A-Za-z0-9_-]*$/

function packBits(values: number[], width: number): Uint8Array {
  const out = new Uint8Array(Math.ceil((values.length * width) / 8))
  let bit = 0

  for (const value of values) {
    for (let i = 0; i < width; i++, bit++) {
      if ((value >> i) & 1) {
        out[bit >> 3] |= 1 << (bit & 7)
      }
    }
  }

  return out
}

function unpackBits(bytes: Uint8Array, offset: number, width: number): number[] {
  const available = Math.max(0, bytes.length - offset) * 8
  const count = Math.floor(available / width)
  const values: number[] = new Array(count)
  let bit = offset * 8

  for (let n = 0; n < count; n++) {
    let value = 0
    for (let i = 0; i < width; i++, bit++) {
      value |= ((bytes[bit >> 3] >> (bit & 7)) & 1) << i
    }
    values[n] = value
  }

  return values
}

/**
 * Compress a raw fingerprint into the engine's binary form
 */
export function compressFingerprint(fingerprint: Int32Array, algorithm: number): Uint8Array {
  if (!isAlgorithm(algorithm)) {
    throw new FingerprintError('EncodeError', `Unknown algorithm id: ${algorithm}`)
  }
  if (fingerprint.length > MAX_COUNT) {
    throw new FingerprintError('EncodeError', `Fingerprint too long: ${fingerprint.length} > ${MAX_COUNT}`)
  }

  const normal: number[] = []
  const exceptional: number[] = []
  let previous = 0

  for (const current of fingerprint) {
    let x = (current ^ previous) >>> 0
    let bit = 1
    let lastBit = 0
    previous = current

    while (x !== 0) {
      if (x & 1) {
        const delta = bit - lastBit
        if (delta >= MAX_NORMAL_VALUE) {
          normal.push(MAX_NORMAL_VALUE)
          exceptional.push(delta - MAX_NORMAL_VALUE)
        } else {
          normal.push(delta)
        }
        lastBit = bit
      }
      x >>>= 1
      bit++
    }
    normal.push(0)
  }

  const normalBytes = packBits(normal, NORMAL_BITS)
  const exceptionalBytes = packBits(exceptional, EXCEPTIONAL_BITS)
  const out = new Uint8Array(HEADER_SIZE + normalBytes.length + exceptionalBytes.length)

  out[0] = algorithm
  out[1] = (fingerprint.length >> 16) & 0xff
  out[2] = (fingerprint.length >> 8) & 0xff
  out[3] = fingerprint.length & 0xff
  out.set(normalBytes, HEADER_SIZE)
  out.set(exceptionalBytes, HEADER_SIZE + normalBytes.length)

  return out
}

/**
 * Decompress the engine's binary form back into a raw fingerprint
 */
export function decompressFingerprint(bytes: Uint8Array): DecodedFingerprint {
  if (bytes.length < HEADER_SIZE) {
    throw new FingerprintError('DecodeError', `Encoded fingerprint too short: ${bytes.length} bytes`)
  }

  const algorithm = bytes[0]
  if (!isAlgorithm(algorithm)) {
    throw new FingerprintError('DecodeError', `Unknown algorithm id: ${algorithm}`)
  }

  const count = (bytes[1] << 16) | (bytes[2] << 8) | bytes[3]
  const normal = unpackBits(bytes, HEADER_SIZE, NORMAL_BITS)

  let terminators = 0
  let used = 0
  let exceptionalCount = 0
  while (terminators < count && used < normal.length) {
    const value = normal[used++]
    if (value === 0) {
      terminators++
    } else if (value === MAX_NORMAL_VALUE) {
      exceptionalCount++
    }
  }

  if (terminators < count) {
    throw new FingerprintError('DecodeError', `Truncated fingerprint: found ${terminators} of ${count} sub-fingerprints`)
  }

  const exceptionalOffset = HEADER_SIZE + Math.ceil((used * NORMAL_BITS) / 8)
  const exceptional = unpackBits(bytes, exceptionalOffset, EXCEPTIONAL_BITS)
  if (exceptional.length < exceptionalCount) {
    throw new FingerprintError('DecodeError', `Truncated exceptional bits: ${exceptional.length} of ${exceptionalCount}`)
  }

  const fingerprint = new Int32Array(count)
  let index = 0
  let value = 0
  let lastBit = 0
  let nextExceptional = 0

  for (let i = 0; i < used; i++) {
    let delta = normal[i]

    if (delta === 0) {
      fingerprint[index] = index > 0 ? value ^ fingerprint[index - 1] : value
      index++
      value = 0
      lastBit = 0
      continue
    }

    if (delta === MAX_NORMAL_VALUE) {
      delta += exceptional[nextExceptional++]
    }

    lastBit += delta
    if (lastBit > 32) {
      throw new FingerprintError('DecodeError', `Bit position ${lastBit} out of range in sub-fingerprint ${index}`)
    }
    value |= 1 << (lastBit - 1)
  }

  return { fingerprint, algorithm }
}

/**
 * URL-safe base64 without padding, as the engine writes it
 */
export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64url')
}

export function decodeBase64(text: string): Uint8Array {
  if (!BASE64_TEXT.test(text) || text.length % 4 === 1) {
    throw new FingerprintError('DecodeError', 'Encoded fingerprint is not valid URL-safe base64')
  }
  return new Uint8Array(Buffer.from(text, 'base64url'))
}

/**
 * Output buffer handed out by the portable codec
 */
export class PortableBuffer {
  released = false

  constructor(readonly bytes: Uint8Array) {}
}

/**
 * Engine codec capability implemented in TypeScript.
 * Produces the same bytes as libchromaprint, so fingerprints can be encoded and
 * decoded without the native library. Failures are raised as FingerprintError
 * carrying the reason instead of a bare status.
 */
export class PortableCodec implements EngineCodec<PortableBuffer> {
  private live = 0

  /** Buffers handed out and not yet released */
  get liveBuffers(): number {
    return this.live
  }

  decodeFingerprint(encoded: Uint8Array, base64: boolean): EngineDecodeResult<PortableBuffer> {
    const bytes = base64 ? decodeBase64(Buffer.from(encoded).toString('latin1')) : encoded
    const { fingerprint, algorithm } = decompressFingerprint(bytes)
    const raw = new Uint8Array(fingerprint.buffer, fingerprint.byteOffset, fingerprint.byteLength)

    return { status: ENGINE_OK, pointer: this.allocate(raw), size: fingerprint.length, algorithm }
  }

  encodeFingerprint(fingerprint: Int32Array, algorithm: number, base64: boolean): EngineEncodeResult<PortableBuffer> {
    const compressed = compressFingerprint(fingerprint, algorithm)
    const out = base64 ? new Uint8Array(Buffer.from(encodeBase64(compressed), 'latin1')) : compressed

    return { status: ENGINE_OK, pointer: this.allocate(out), size: out.length }
  }

  readInt32(pointer: PortableBuffer, size: number): Int32Array {
    this.assertLive(pointer)
    const copy = pointer.bytes.slice(0, size * 4)
    return new Int32Array(copy.buffer, 0, size)
  }

  readBytes(pointer: PortableBuffer, size: number): Uint8Array {
    this.assertLive(pointer)
    return pointer.bytes.slice(0, size)
  }

  dealloc(pointer: PortableBuffer): void {
    this.assertLive(pointer)
    pointer.released = true
    this.live--
  }

  protected allocate(bytes: Uint8Array): PortableBuffer {
    this.live++
    return new PortableBuffer(bytes)
  }

  protected assertLive(pointer: PortableBuffer): void {
    if (pointer.released) {
      throw new FingerprintError('InvalidState', 'Buffer already released')
    }
  }
}

/**
 * Shared portable codec used when no engine is given
 */
export const portableCodec = new PortableCodec()
