import koffi from 'koffi'
import type { IKoffiLib, KoffiFunction } from 'koffi'
import type { EngineDecodeResult, EngineEncodeResult, EngineFingerprintResult, FingerprintEngine } from './engine.js'
import { FingerprintError } from './errors.js'

/**
 * Configuration for loading libchromaprint
 */
export interface LibraryConfig {
  /** Library paths tried before the platform defaults */
  libraryPaths?: string[]
  /** Platform used to pick default library names (default: process.platform) */
  platform?: NodeJS.Platform
  /** Enable verbose logging */
  verbose?: boolean
}

/**
 * Opaque pointer returned by koffi for engine instances and engine-owned buffers
 */
export interface NativePointer {
  readonly address: unknown
}

/**
 * Library names to try for a platform, most recent ABI first
 */
export function libraryCandidates(platform: NodeJS.Platform = process.platform): string[] {
  switch (platform) {
    case 'darwin':
      return ['libchromaprint.1.dylib', 'libchromaprint.0.dylib']
    case 'win32':
      return ['chromaprint.dll', 'libchromaprint.dll']
    case 'cygwin':
      return ['libchromaprint.dll.a', 'cygchromaprint-1.dll', 'cygchromaprint-0.dll']
    default:
      return ['libchromaprint.so.1', 'libchromaprint.so.0']
  }
}

interface ChromaprintSymbols {
  getVersion: KoffiFunction
  create: KoffiFunction
  free: KoffiFunction
  start: KoffiFunction
  feed: KoffiFunction
  finish: KoffiFunction
  getFingerprint: KoffiFunction
  decodeFingerprint: KoffiFunction
  encodeFingerprint: KoffiFunction
  dealloc: KoffiFunction
}

// Output pointers are declared as void ** so koffi hands back the raw address
// instead of decoding it; the engine must get that address back in dealloc.
function bindSymbols(lib: IKoffiLib): ChromaprintSymbols {
  return {
    getVersion: lib.func('const char *chromaprint_get_version(void)'),
    create: lib.func('void *chromaprint_new(int algorithm)'),
    free: lib.func('void chromaprint_free(void *ctx)'),
    start: lib.func('int chromaprint_start(void *ctx, int sample_rate, int num_channels)'),
    feed: lib.func('int chromaprint_feed(void *ctx, const void *data, int size)'),
    finish: lib.func('int chromaprint_finish(void *ctx)'),
    getFingerprint: lib.func('int chromaprint_get_fingerprint(void *ctx, _Out_ void **fingerprint)'),
    decodeFingerprint: lib.func(
      'int chromaprint_decode_fingerprint(const void *encoded_fp, int encoded_size, _Out_ void **fp, _Out_ int *size, _Out_ int *algorithm, int base64)'
    ),
    encodeFingerprint: lib.func(
      'int chromaprint_encode_fingerprint(const void *fp, int size, int algorithm, _Out_ void **encoded_fp, _Out_ int *encoded_size, int base64)'
    ),
    dealloc: lib.func('void chromaprint_dealloc(void *ptr)')
  }
}

function asStatus(value: unknown): number {
  return typeof value === 'number' ? value : 0
}

function asPointer(value: unknown): NativePointer | null {
  return value === null || value === undefined ? null : { address: value }
}

function asNumbers(value: unknown, operation: string): ArrayLike<number> {
  if (value instanceof Int32Array || value instanceof Uint32Array || value instanceof Uint8Array) {
    return value
  }
  if (Array.isArray(value) && value.every((item): item is number => typeof item === 'number')) {
    return value
  }
  throw new FingerprintError('EngineError', `${operation}: unexpected buffer contents`, { operation })
}

/**
 * libchromaprint bound through koffi
 */
export class NativeEngine implements FingerprintEngine<NativePointer, NativePointer> {
  private symbols: ChromaprintSymbols
  private unloaded = false

  constructor(
    private lib: IKoffiLib,
    readonly libraryName: string
  ) {
    this.symbols = bindSymbols(lib)
  }

  version(): string {
    const version: unknown = this.symbols.getVersion()
    return typeof version === 'string' ? version : ''
  }

  create(algorithm: number): NativePointer | null {
    return asPointer(this.symbols.create(algorithm))
  }

  free(handle: NativePointer): void {
    // The library's memory went away with it; late releases are dropped
    if (this.unloaded) {
      return
    }
    this.symbols.free(handle.address)
  }

  start(handle: NativePointer, sampleRate: number, channels: number): number {
    return asStatus(this.symbols.start(handle.address, sampleRate, channels))
  }

  feed(handle: NativePointer, data: Uint8Array, sampleCount: number): number {
    return asStatus(this.symbols.feed(handle.address, data, sampleCount))
  }

  finish(handle: NativePointer): number {
    return asStatus(this.symbols.finish(handle.address))
  }

  getFingerprint(handle: NativePointer): EngineFingerprintResult<NativePointer> {
    const out: unknown[] = [null]
    const status = asStatus(this.symbols.getFingerprint(handle.address, out))
    return { status, pointer: asPointer(out[0]) }
  }

  decodeFingerprint(encoded: Uint8Array, base64: boolean): EngineDecodeResult<NativePointer> {
    const out: unknown[] = [null]
    const size = [0]
    const algorithm = [-1]
    const status = asStatus(
      this.symbols.decodeFingerprint(encoded, encoded.length, out, size, algorithm, base64 ? 1 : 0)
    )
    return { status, pointer: asPointer(out[0]), size: size[0], algorithm: algorithm[0] }
  }

  encodeFingerprint(fingerprint: Int32Array, algorithm: number, base64: boolean): EngineEncodeResult<NativePointer> {
    const out: unknown[] = [null]
    const size = [0]
    const status = asStatus(
      this.symbols.encodeFingerprint(fingerprint, fingerprint.length, algorithm, out, size, base64 ? 1 : 0)
    )
    return { status, pointer: asPointer(out[0]), size: size[0] }
  }

  readString(pointer: NativePointer): string {
    const value: unknown = koffi.decode(pointer.address, 'char', -1)
    if (typeof value !== 'string') {
      throw new FingerprintError('EngineError', 'get_fingerprint: expected a string', { operation: 'get_fingerprint' })
    }
    return value
  }

  readInt32(pointer: NativePointer, size: number): Int32Array {
    if (size === 0) {
      return new Int32Array(0)
    }
    return Int32Array.from(asNumbers(koffi.decode(pointer.address, 'int32_t', size), 'decode_fingerprint'))
  }

  readBytes(pointer: NativePointer, size: number): Uint8Array {
    if (size === 0) {
      return new Uint8Array(0)
    }
    return Uint8Array.from(asNumbers(koffi.decode(pointer.address, 'uint8_t', size), 'encode_fingerprint'))
  }

  dealloc(pointer: NativePointer): void {
    if (this.unloaded) {
      return
    }
    this.symbols.dealloc(pointer.address)
  }

  /**
   * Unload the shared library. Instances and buffers still alive must not be used
   * afterwards; destroying them becomes a no-op.
   */
  unload(): void {
    if (this.unloaded) {
      return
    }
    this.unloaded = true
    this.lib.unload()
  }
}

let loaded: NativeEngine | null = null

/**
 * Load libchromaprint once per process and return the bound engine
 */
export function loadChromaprint(config: LibraryConfig = {}): NativeEngine {
  if (loaded) {
    return loaded
  }

  const { libraryPaths = [], platform = process.platform, verbose = false } = config
  const names = [...libraryPaths, ...libraryCandidates(platform)]
  const failures: string[] = []

  for (const name of names) {
    let lib: IKoffiLib
    try {
      lib = koffi.load(name)
    } catch (error) {
      failures.push(`${name}: ${error instanceof Error ? error.message : String(error)}`)
      if (verbose) {
        console.warn(`Could not load ${name}:`, error)
      }
      continue
    }

    loaded = new NativeEngine(lib, name)
    if (verbose) {
      console.log(`Loaded ${name} (chromaprint ${loaded.version()})`)
    }
    return loaded
  }

  throw new FingerprintError('LibraryUnavailable', `Couldn't find libchromaprint (tried ${names.join(', ')})`, {
    cause: failures
  })
}

/**
 * Drop the cached engine and unload the library.
 * Destroy every Fingerprinter first; calls other than destroy on one left alive reach unloaded code.
 */
export function unloadChromaprint(): void {
  if (!loaded) {
    return
  }
  const engine = loaded
  loaded = null
  engine.unload()
}

/**
 * Version string reported by an engine
 */
export function getVersion(engine: Pick<FingerprintEngine<unknown, unknown>, 'version'>): string {
  return engine.version()
}
