/**
 * Fingerprint example
 *
 * Loads libchromaprint, fingerprints a generated tone in one call and then again
 * through a session manager fed in chunks. Requires libchromaprint to be installed.
 */

import { Chromaprint, decodeFingerprint, int16ToPcm, splitPcm } from '../src/index.js'

const SAMPLE_RATE = 44100
const CHANNELS = 1

// 5 seconds of a 440Hz tone
const samples = new Int16Array(SAMPLE_RATE * 5)
for (let i = 0; i < samples.length; i++) {
  samples[i] = Math.round(Math.sin((2 * Math.PI * 440 * i) / SAMPLE_RATE) * 8000)
}
const pcm = int16ToPcm(samples)

const chromaprint = new Chromaprint({
  library: { verbose: true },
  session: { maxDurationMs: 60_000, verbose: true }
})
console.log(`Using chromaprint ${chromaprint.version} from ${chromaprint.engine.libraryName}`)

const direct = chromaprint.fingerprint(pcm, { sampleRate: SAMPLE_RATE, channels: CHANNELS })
console.log('Fingerprint:', direct)
console.log('Sub-fingerprints:', decodeFingerprint(direct).fingerprint.length)

const manager = chromaprint.createSessionManager({
  onEnd: (session) => {
    console.log(`Session ${session.sessionId}: ${session.chunkCount} chunks, ${session.totalBytes} bytes`)
  }
})

manager.createSession('tone', { sampleRate: SAMPLE_RATE, channels: CHANNELS })
for (const chunk of splitPcm(pcm, 4096)) {
  manager.feed('tone', chunk)
}

const streamed = manager.finish('tone')
console.log(streamed === direct ? '✓ Chunked fingerprint matches' : '✗ Chunked fingerprint differs')
