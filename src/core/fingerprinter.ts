import { Algorithm, isAlgorithm, type AudioFormat, type SessionState } from '../types/index.js'
import type { FingerprintEngine } from './engine.js'
import { FingerprintError, checkStatus, guardEngineCall, releaseAfter } from './errors.js'
import { pcmSampleCount, splitPcm } from './pcm.js'

// Frees handles whose Fingerprinter was collected without destroy().
// The held value must not reference the Fingerprinter itself.
const handleRegistry = new FinalizationRegistry<() => void>((release) => {
  release()
})

/**
 * Fingerprinting session over a single engine instance.
 *
 * Lifecycle: created → started → finished, and destroyed from any state.
 * Every call runs synchronously; a failed call leaves the state unchanged.
 */
export class Fingerprinter<Handle, Pointer> {
  private handle: Handle | null
  private currentState: SessionState = 'created'
  private audioFormat: AudioFormat | null = null
  private samples = 0
  readonly algorithm: Algorithm

  constructor(
    private readonly engine: FingerprintEngine<Handle, Pointer>,
    algorithm: number = Algorithm.Default
  ) {
    if (!isAlgorithm(algorithm)) {
      throw new FingerprintError('InvalidArgument', `Unknown algorithm id: ${algorithm}`)
    }
    this.algorithm = algorithm

    const handle = guardEngineCall('EngineError', 'new', () => engine.create(algorithm))
    if (handle === null) {
      throw new FingerprintError('EngineError', 'Engine returned no instance', { operation: 'new' })
    }

    this.handle = handle
    handleRegistry.register(this, () => engine.free(handle), this)
  }

  get state(): SessionState {
    return this.currentState
  }

  /** Audio format passed to start, or null before that */
  get format(): AudioFormat | null {
    return this.audioFormat
  }

  /** Samples fed so far, across all channels */
  get fedSamples(): number {
    return this.samples
  }

  get isDestroyed(): boolean {
    return this.handle === null
  }

  /**
   * Configure the engine for an audio stream
   * @param sampleRate Sample rate in Hz
   * @param channels Number of interleaved channels
   */
  start(sampleRate: number, channels: number): void {
    const handle = this.require('start', 'created')

    if (!Number.isInteger(sampleRate) || sampleRate <= 0) {
      throw new FingerprintError('InvalidArgument', `Sample rate must be a positive integer, got ${sampleRate}`)
    }
    if (!Number.isInteger(channels) || channels <= 0) {
      throw new FingerprintError('InvalidArgument', `Channel count must be a positive integer, got ${channels}`)
    }

    const status = guardEngineCall('EngineError', 'start', () => this.engine.start(handle, sampleRate, channels))
    checkStatus(status, 'EngineError', 'start')

    this.audioFormat = { sampleRate, channels }
    this.currentState = 'started'
  }

  /**
   * Append 16-bit little-endian interleaved samples to the stream
   * @param chunk PCM bytes; not retained after the call
   */
  feed(chunk: Uint8Array): void {
    const handle = this.require('feed', 'started')
    const sampleCount = pcmSampleCount(chunk)

    const status = guardEngineCall('EngineError', 'feed', () => this.engine.feed(handle, chunk, sampleCount))
    checkStatus(status, 'EngineError', 'feed')

    this.samples += sampleCount
  }

  /**
   * End the stream and compute the fingerprint
   * @returns Fingerprint in the engine's base64 text form
   */
  finish(): string {
    const handle = this.require('finish', 'started')

    const status = guardEngineCall('EngineError', 'finish', () => this.engine.finish(handle))
    checkStatus(status, 'EngineError', 'finish')

    const result = guardEngineCall('EngineError', 'get_fingerprint', () => this.engine.getFingerprint(handle))
    const { pointer } = result
    const fingerprint = releaseAfter(
      'EngineError',
      'get_fingerprint',
      () => {
        checkStatus(result.status, 'EngineError', 'get_fingerprint')
        if (pointer === null) {
          throw new FingerprintError('EngineError', 'Engine returned no fingerprint', { operation: 'get_fingerprint' })
        }
        return guardEngineCall('EngineError', 'get_fingerprint', () => this.engine.readString(pointer))
      },
      () => {
        if (pointer !== null) {
          this.engine.dealloc(pointer)
        }
      }
    )

    this.currentState = 'finished'
    return fingerprint
  }

  /**
   * Release the engine instance. Safe to call more than once.
   */
  destroy(): void {
    if (this.handle === null) {
      return
    }

    const handle = this.handle
    this.handle = null
    this.currentState = 'destroyed'
    handleRegistry.unregister(this)
    this.engine.free(handle)
  }

  private require(operation: string, expected: SessionState): Handle {
    if (this.handle === null || this.currentState !== expected) {
      throw new FingerprintError('InvalidState', `Cannot ${operation} a fingerprinter in state '${this.currentState}'`, {
        operation
      })
    }
    return this.handle
  }
}

/**
 * Options for fingerprinting a complete PCM buffer
 */
export interface FingerprintPcmOptions {
  /** Sample rate in Hz */
  sampleRate: number
  /** Number of interleaved channels */
  channels: number
  /** Fingerprinting algorithm (default: Algorithm.Default) */
  algorithm?: Algorithm
  /** Bytes per feed call (default: 64 KiB) */
  chunkSize?: number
}

/**
 * Run `fn` with a fresh fingerprinter that is destroyed afterwards, whatever happens
 */
export function withFingerprinter<Handle, Pointer, T>(
  engine: FingerprintEngine<Handle, Pointer>,
  algorithm: Algorithm,
  fn: (fingerprinter: Fingerprinter<Handle, Pointer>) => T
): T {
  const fingerprinter = new Fingerprinter(engine, algorithm)
  try {
    return fn(fingerprinter)
  } finally {
    fingerprinter.destroy()
  }
}

/**
 * Fingerprint a complete PCM buffer
 * @param pcm 16-bit little-endian interleaved samples
 * @returns Fingerprint in the engine's base64 text form
 */
export function fingerprintPcm<Handle, Pointer>(
  engine: FingerprintEngine<Handle, Pointer>,
  pcm: Uint8Array,
  options: FingerprintPcmOptions
): string {
  const { sampleRate, channels, algorithm = Algorithm.Default, chunkSize = 64 * 1024 } = options
  pcmSampleCount(pcm)
  const chunks = splitPcm(pcm, chunkSize)

  return withFingerprinter(engine, algorithm, (fingerprinter) => {
    fingerprinter.start(sampleRate, channels)
    for (const chunk of chunks) {
      fingerprinter.feed(chunk)
    }
    return fingerprinter.finish()
  })
}
