/**
 * chromaprint-session: audio fingerprinting sessions and fingerprint encoding over libchromaprint
 *
 * @packageDocumentation
 */

// Core exports
export * from './core/index.js'
export * from './types/index.js'

import type { Algorithm } from './types/index.js'
import { Fingerprinter, fingerprintPcm, type FingerprintPcmOptions } from './core/fingerprinter.js'
import { FingerprintSessionManager, type SessionCallbacks, type SessionManagerConfig } from './core/session.js'
import { loadChromaprint, type LibraryConfig, type NativeEngine, type NativePointer } from './core/native.js'

/**
 * Fingerprinter bound to the native library
 */
export type NativeFingerprinter = Fingerprinter<NativePointer, NativePointer>

/**
 * Chromaprint configuration
 */
export interface ChromaprintConfig {
  /** Native library loading */
  library?: LibraryConfig
  /** Session management for concurrent streams */
  session?: SessionManagerConfig
}

/**
 * High-level entry point
 * Loads libchromaprint once and hands out fingerprinters and session managers bound to it
 */
export class Chromaprint {
  readonly engine: NativeEngine
  private config: ChromaprintConfig

  constructor(config: ChromaprintConfig = {}) {
    this.config = config
    this.engine = loadChromaprint(config.library)
  }

  /**
   * Version of the loaded library
   */
  get version(): string {
    return this.engine.version()
  }

  /**
   * Create a fingerprinter; the caller must destroy it
   */
  createFingerprinter(algorithm?: Algorithm): NativeFingerprinter {
    return new Fingerprinter(this.engine, algorithm)
  }

  /**
   * Fingerprint a complete PCM buffer
   */
  fingerprint(pcm: Uint8Array, options: FingerprintPcmOptions): string {
    return fingerprintPcm(this.engine, pcm, options)
  }

  /**
   * Create a session manager for concurrent streams
   */
  createSessionManager(callbacks: SessionCallbacks = {}): FingerprintSessionManager<NativePointer, NativePointer> {
    return new FingerprintSessionManager(this.engine, this.config.session ?? {}, callbacks)
  }
}

/**
 * Default export
 */
export default Chromaprint
