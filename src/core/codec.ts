import { isAlgorithm, type Algorithm, type DecodedFingerprint } from '../types/index.js'
import { portableCodec } from './compression.js'
import type { EngineCodec } from './engine.js'
import { FingerprintError, checkStatus, guardEngineCall, releaseAfter, type FingerprintErrorKind } from './errors.js'

const ASCII_TEXT = /^[\x00-\x7f]*$/

const INT32_MIN = -0x80000000
const UINT32_MAX = 0xffffffff

/**
 * Options shared by the codec functions
 */
export interface CodecOptions<Pointer> {
  /** Use the URL-safe base64 text form (default: true) */
  base64?: boolean
  /** Codec backend (default: the portable TypeScript codec) */
  engine?: EngineCodec<Pointer>
}

/**
 * Run an engine codec call, copy its output and release the engine buffer on every path
 */
function withEngineBuffer<Pointer, R extends { status: number; pointer: Pointer | null }, T>(
  engine: EngineCodec<Pointer>,
  kind: FingerprintErrorKind,
  operation: string,
  call: () => R,
  read: (pointer: Pointer, result: R) => T
): T {
  const result = guardEngineCall(kind, operation, call)
  const { pointer } = result
  return releaseAfter(
    kind,
    operation,
    () => {
      checkStatus(result.status, kind, operation)
      if (pointer === null) {
        throw new FingerprintError(kind, `${operation} returned no buffer`, { operation })
      }
      return guardEngineCall(kind, operation, () => read(pointer, result))
    },
    () => {
      if (pointer !== null) {
        engine.dealloc(pointer)
      }
    }
  )
}

function decodeWith<Pointer>(engine: EngineCodec<Pointer>, bytes: Uint8Array, base64: boolean): DecodedFingerprint {
  return withEngineBuffer(
    engine,
    'DecodeError',
    'decode_fingerprint',
    () => engine.decodeFingerprint(bytes, base64),
    (pointer, { size, algorithm }) => {
      if (!isAlgorithm(algorithm)) {
        throw new FingerprintError('DecodeError', `Unknown algorithm id: ${algorithm}`, { operation: 'decode_fingerprint' })
      }
      return { fingerprint: engine.readInt32(pointer, size), algorithm }
    }
  )
}

function encodeWith<Pointer>(engine: EngineCodec<Pointer>, fingerprint: Int32Array, algorithm: Algorithm, base64: boolean): Uint8Array {
  return withEngineBuffer(
    engine,
    'EncodeError',
    'encode_fingerprint',
    () => engine.encodeFingerprint(fingerprint, algorithm, base64),
    (pointer, { size }) => engine.readBytes(pointer, size)
  )
}

function textBytes(text: string): Uint8Array {
  if (!ASCII_TEXT.test(text)) {
    throw new FingerprintError('DecodeError', 'Encoded fingerprint text must be ASCII', { operation: 'decode_fingerprint' })
  }
  return new Uint8Array(Buffer.from(text, 'latin1'))
}

function toInt32Array(fingerprint: ArrayLike<number>): Int32Array {
  if (fingerprint instanceof Int32Array) {
    return fingerprint
  }

  const out = new Int32Array(fingerprint.length)
  for (let i = 0; i < fingerprint.length; i++) {
    const value = fingerprint[i]
    if (!Number.isInteger(value) || value < INT32_MIN || value > UINT32_MAX) {
      throw new FingerprintError('EncodeError', `Sub-fingerprint ${i} is not a 32-bit integer: ${value}`)
    }
    out[i] = value | 0
  }
  return out
}

/**
 * Decode an encoded fingerprint into its raw sub-fingerprints and algorithm
 * @param encoded Encoded fingerprint, text (base64) or raw bytes
 */
export function decodeFingerprint<Pointer = unknown>(
  encoded: string | Uint8Array,
  options: CodecOptions<Pointer> = {}
): DecodedFingerprint {
  const { base64 = true, engine } = options
  const bytes = typeof encoded === 'string' ? textBytes(encoded) : encoded

  return engine ? decodeWith(engine, bytes, base64) : decodeWith(portableCodec, bytes, base64)
}

/**
 * Encode raw sub-fingerprints tagged with their algorithm
 * @returns Encoded bytes (ASCII text when `base64` is set)
 */
export function encodeFingerprint<Pointer = unknown>(
  fingerprint: ArrayLike<number>,
  algorithm: number,
  options: CodecOptions<Pointer> = {}
): Uint8Array {
  const { base64 = true, engine } = options

  if (!isAlgorithm(algorithm)) {
    throw new FingerprintError('EncodeError', `Unknown algorithm id: ${algorithm}`, { operation: 'encode_fingerprint' })
  }

  const input = toInt32Array(fingerprint)
  return engine ? encodeWith(engine, input, algorithm, base64) : encodeWith(portableCodec, input, algorithm, base64)
}

/**
 * Encode into the text form and return it as a string
 */
export function encodeFingerprintText<Pointer = unknown>(
  fingerprint: ArrayLike<number>,
  algorithm: number,
  engine?: EngineCodec<Pointer>
): string {
  const bytes = encodeFingerprint(fingerprint, algorithm, { base64: true, engine })
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1')
}
