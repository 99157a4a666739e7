import { Algorithm, type AudioFormat, type SessionInfo } from '../types/index.js'
import type { FingerprintEngine } from './engine.js'
import { Fingerprinter } from './fingerprinter.js'
import { calculateDuration, pcmSampleCount } from './pcm.js'

/**
 * Session constraints configuration
 */
export interface SessionManagerConfig {
  /** Maximum PCM bytes per session (default: 20MB) */
  maxBytes?: number
  /** Maximum session duration in milliseconds (default: 10min) */
  maxDurationMs?: number
  /** Maximum number of audio chunks (default: 10000) */
  maxChunks?: number
  /** Idle timeout in milliseconds (default: 30s) */
  idleTimeoutMs?: number
  /** Enable verbose logging */
  verbose?: boolean
}

export type LimitReason = 'max_bytes' | 'max_duration' | 'max_chunks'

/**
 * Session event callbacks
 */
export interface SessionCallbacks {
  /** Called when a session is created */
  onCreate?: (session: SessionInfo) => void | Promise<void>
  /** Called when a session is ended */
  onEnd?: (session: SessionInfo) => void | Promise<void>
  /** Called when a chunk would exceed a session limit */
  onLimitExceeded?: (session: SessionInfo, reason: LimitReason) => void
  /** Called when a session becomes idle */
  onIdle?: (session: SessionInfo) => void | Promise<void>
}

export interface SessionStats {
  /** Wall-clock time since the session was created, in ms */
  duration: number
  totalBytes: number
  chunkCount: number
  /** Seconds of audio fed */
  audioDuration: number
}

interface ManagedSession<Handle, Pointer> {
  info: SessionInfo
  fingerprinter: Fingerprinter<Handle, Pointer>
  lastActivity: number
}

/**
 * Session Manager
 * Keeps one started Fingerprinter per stream and enforces per-stream limits
 */
export class FingerprintSessionManager<Handle, Pointer> {
  private sessions: Map<string, ManagedSession<Handle, Pointer>> = new Map()
  private config: Required<SessionManagerConfig>
  private callbacks: SessionCallbacks

  constructor(
    private engine: FingerprintEngine<Handle, Pointer>,
    config: SessionManagerConfig = {},
    callbacks: SessionCallbacks = {}
  ) {
    this.config = {
      maxBytes: 20 * 1024 * 1024, // 20MB
      maxDurationMs: 600_000,     // 10 minutes
      maxChunks: 10_000,
      idleTimeoutMs: 30_000,      // 30 seconds
      verbose: false,
      ...config
    }
    this.callbacks = callbacks
  }

  /**
   * Create and start a fingerprinting session.
   * An existing session with the same id is ended first.
   */
  createSession(sessionId: string, format: AudioFormat, algorithm: Algorithm = Algorithm.Default): SessionInfo {
    if (this.sessions.has(sessionId)) {
      this.discard(sessionId)
    }

    const fingerprinter = new Fingerprinter(this.engine, algorithm)
    try {
      fingerprinter.start(format.sampleRate, format.channels)
    } catch (error) {
      fingerprinter.destroy()
      throw error
    }

    const now = Date.now()
    const info: SessionInfo = {
      sessionId,
      format: { ...format },
      algorithm,
      startTime: now,
      totalBytes: 0,
      chunkCount: 0
    }
    this.sessions.set(sessionId, { info, fingerprinter, lastActivity: now })

    const { onCreate } = this.callbacks
    if (onCreate) {
      this.notify('onCreate', () => onCreate(info))
    }

    if (this.config.verbose) {
      console.log(`Session created: ${sessionId} (${format.sampleRate}Hz, ${format.channels}ch)`)
    }
    return info
  }

  getSession(sessionId: string): SessionInfo | undefined {
    return this.sessions.get(sessionId)?.info
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId)
  }

  /**
   * Feed a PCM chunk to a session
   * Returns false if the session is unknown or a limit would be exceeded
   */
  feed(sessionId: string, chunk: Uint8Array): boolean {
    const session = this.sessions.get(sessionId)
    if (!session) {
      console.warn(`Session not found: ${sessionId}`)
      return false
    }

    pcmSampleCount(chunk)
    const { info } = session

    // Check limits
    const newTotalBytes = info.totalBytes + chunk.length
    if (newTotalBytes > this.config.maxBytes) {
      console.warn(`Session ${sessionId} exceeded max bytes: ${newTotalBytes} > ${this.config.maxBytes}`)
      this.limitExceeded(info, 'max_bytes')
      return false
    }

    const duration = Date.now() - info.startTime
    if (duration > this.config.maxDurationMs) {
      console.warn(`Session ${sessionId} exceeded max duration: ${duration}ms > ${this.config.maxDurationMs}ms`)
      this.limitExceeded(info, 'max_duration')
      return false
    }

    if (info.chunkCount >= this.config.maxChunks) {
      console.warn(`Session ${sessionId} exceeded max chunks: ${info.chunkCount} >= ${this.config.maxChunks}`)
      this.limitExceeded(info, 'max_chunks')
      return false
    }

    session.fingerprinter.feed(chunk)
    info.totalBytes = newTotalBytes
    info.chunkCount++
    session.lastActivity = Date.now()

    return true
  }

  /**
   * Finish a session's stream and end the session
   * @returns Fingerprint text, or null if the session is unknown
   */
  finish(sessionId: string): string | null {
    const session = this.sessions.get(sessionId)
    if (!session) {
      return null
    }

    const fingerprint = session.fingerprinter.finish()
    this.endSession(sessionId)
    return fingerprint
  }

  getStats(sessionId: string): SessionStats | null {
    const session = this.sessions.get(sessionId)
    if (!session) {
      return null
    }

    const { info } = session
    return {
      duration: Date.now() - info.startTime,
      totalBytes: info.totalBytes,
      chunkCount: info.chunkCount,
      audioDuration: info.totalBytes > 0
        ? calculateDuration(info.totalBytes, info.format.sampleRate, info.format.channels)
        : 0
    }
  }

  /**
   * End a session, releasing its engine instance
   */
  endSession(sessionId: string): SessionInfo | null {
    const info = this.discard(sessionId)
    if (!info) {
      return null
    }

    const { onEnd } = this.callbacks
    if (onEnd) {
      this.notify('onEnd', () => onEnd(info))
    }

    if (this.config.verbose) {
      console.log(`Session ended: ${sessionId}`)
    }
    return info
  }

  /**
   * Check for idle sessions and call callback
   * @returns Ids of the idle sessions
   */
  checkIdleSessions(): string[] {
    const now = Date.now()
    const idle: string[] = []

    for (const [sessionId, session] of this.sessions) {
      if (now - session.lastActivity > this.config.idleTimeoutMs) {
        idle.push(sessionId)
        const { onIdle } = this.callbacks
        if (onIdle) {
          this.notify('onIdle', () => onIdle(session.info))
        }
      }
    }

    return idle
  }

  getActiveSessions(): string[] {
    return Array.from(this.sessions.keys())
  }

  getSessionCount(): number {
    return this.sessions.size
  }

  /**
   * End every session
   */
  clearAll(): void {
    for (const sessionId of Array.from(this.sessions.keys())) {
      this.endSession(sessionId)
    }
  }

  private limitExceeded(info: SessionInfo, reason: LimitReason): void {
    const { onLimitExceeded } = this.callbacks
    if (onLimitExceeded) {
      this.notify('onLimitExceeded', () => onLimitExceeded(info, reason))
    }
  }

  /**
   * Run a callback, logging anything it throws or rejects with
   */
  private notify(name: keyof SessionCallbacks, callback: () => void | Promise<void>): void {
    try {
      Promise.resolve(callback()).catch(error => {
        console.error(`Error in ${name} callback:`, error)
      })
    } catch (error) {
      console.error(`Error in ${name} callback:`, error)
    }
  }

  private discard(sessionId: string): SessionInfo | null {
    const session = this.sessions.get(sessionId)
    if (!session) {
      return null
    }

    this.sessions.delete(sessionId)
    session.fingerprinter.destroy()
    return session.info
  }
}
