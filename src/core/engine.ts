/**
 * Result of the engine's decode call.
 * `pointer` owns `size` sub-fingerprints and must be passed to `dealloc`.
 */
export interface EngineDecodeResult<Pointer> {
  status: number
  pointer: Pointer | null
  size: number
  algorithm: number
}

/**
 * Result of the engine's encode call.
 * `pointer` owns `size` bytes and must be passed to `dealloc`.
 */
export interface EngineEncodeResult<Pointer> {
  status: number
  pointer: Pointer | null
  size: number
}

/**
 * Result of reading a finished fingerprint out of an engine instance
 */
export interface EngineFingerprintResult<Pointer> {
  status: number
  pointer: Pointer | null
}

/**
 * Stateless part of the engine: fingerprint compression.
 * Every method returning a status uses ENGINE_OK (1) for success.
 */
export interface EngineCodec<Pointer> {
  decodeFingerprint(encoded: Uint8Array, base64: boolean): EngineDecodeResult<Pointer>
  encodeFingerprint(fingerprint: Int32Array, algorithm: number, base64: boolean): EngineEncodeResult<Pointer>
  /** Copy `size` signed 32-bit integers out of an engine buffer */
  readInt32(pointer: Pointer, size: number): Int32Array
  /** Copy `size` bytes out of an engine buffer */
  readBytes(pointer: Pointer, size: number): Uint8Array
  /** Release a buffer the engine allocated */
  dealloc(pointer: Pointer): void
}

/**
 * Full engine capability: stateful fingerprint computation on top of the codec.
 * `Handle` is the opaque engine instance, owned by exactly one Fingerprinter.
 */
export interface FingerprintEngine<Handle, Pointer> extends EngineCodec<Pointer> {
  version(): string
  create(algorithm: number): Handle | null
  free(handle: Handle): void
  start(handle: Handle, sampleRate: number, channels: number): number
  /** `data` holds `sampleCount` 16-bit little-endian samples */
  feed(handle: Handle, data: Uint8Array, sampleCount: number): number
  finish(handle: Handle): number
  getFingerprint(handle: Handle): EngineFingerprintResult<Pointer>
  /** Copy a NUL-terminated string out of an engine buffer */
  readString(pointer: Pointer): string
}
