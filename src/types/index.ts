/**
 * Fingerprinting algorithm variants understood by the engine.
 * The id is stored as the first byte of every compressed fingerprint.
 */
export enum Algorithm {
  Test1 = 0,
  Test2 = 1,
  Test3 = 2,
  Test4 = 3,
  Test5 = 4,
  Default = Test2
}

/**
 * Fingerprinter lifecycle state
 */
export type SessionState = 'created' | 'started' | 'finished' | 'destroyed'

/**
 * Audio parameters fixed by `start`
 */
export interface AudioFormat {
  /** Sample rate in Hz */
  sampleRate: number
  /** Number of interleaved channels */
  channels: number
}

/**
 * Raw fingerprint together with the algorithm that produced it
 */
export interface DecodedFingerprint {
  /** Sub-fingerprints as signed 32-bit integers */
  fingerprint: Int32Array
  /** Algorithm id carried by the encoded form */
  algorithm: Algorithm
}

/**
 * Per-session accounting kept by the session manager
 */
export interface SessionInfo {
  /** Unique session identifier */
  sessionId: string
  /** Audio format the session was started with */
  format: AudioFormat
  /** Algorithm used by the session */
  algorithm: Algorithm
  /** Session start timestamp */
  startTime: number
  /** Total bytes fed */
  totalBytes: number
  /** Number of chunks fed */
  chunkCount: number
}

export function isAlgorithm(value: number): value is Algorithm {
  return Number.isInteger(value) && value >= Algorithm.Test1 && value <= Algorithm.Test5
}
