import { FingerprintError } from './errors.js'

const BYTES_PER_SAMPLE = 2

/**
 * Validate a PCM chunk of 16-bit samples
 * @param chunk Raw little-endian PCM bytes
 * @throws FingerprintError (InvalidArgument) if the length is odd
 */
export function assertPcmChunk(chunk: Uint8Array): void {
  if (!(chunk instanceof Uint8Array)) {
    throw new FingerprintError('InvalidArgument', 'PCM chunk must be a Uint8Array or Buffer')
  }
  if (chunk.length % BYTES_PER_SAMPLE !== 0) {
    throw new FingerprintError('InvalidArgument', `PCM chunk length must be even, got ${chunk.length} bytes`)
  }
}

/**
 * Number of 16-bit samples (across all channels) in a PCM chunk
 * @param chunk Raw little-endian PCM bytes
 * @returns Sample count
 */
export function pcmSampleCount(chunk: Uint8Array): number {
  assertPcmChunk(chunk)
  return chunk.length / BYTES_PER_SAMPLE
}

/**
 * Convert interleaved Int16 samples to little-endian PCM bytes
 * @param samples Interleaved samples
 * @returns PCM chunk, independent of host byte order
 */
export function int16ToPcm(samples: Int16Array): Uint8Array {
  const out = new Uint8Array(samples.length * BYTES_PER_SAMPLE)
  const view = new DataView(out.buffer)

  for (let i = 0; i < samples.length; i++) {
    view.setInt16(i * BYTES_PER_SAMPLE, samples[i], true)
  }

  return out
}

/**
 * Split PCM data into chunks of at most `chunkSize` bytes
 * @param pcm Raw PCM bytes
 * @param chunkSize Maximum chunk size in bytes (must be even and positive)
 * @returns Views into `pcm`, in order
 */
export function splitPcm(pcm: Uint8Array, chunkSize: number): Uint8Array[] {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0 || chunkSize % BYTES_PER_SAMPLE !== 0) {
    throw new FingerprintError('InvalidArgument', `Chunk size must be a positive even integer, got ${chunkSize}`)
  }

  const chunks: Uint8Array[] = []
  for (let offset = 0; offset < pcm.length; offset += chunkSize) {
    chunks.push(pcm.subarray(offset, offset + chunkSize))
  }
  return chunks
}

/**
 * Calculate audio duration from PCM data
 * @param dataSize Size of PCM data in bytes
 * @param sampleRate Sample rate in Hz
 * @param channels Number of channels
 * @param bitsPerSample Bits per sample
 * @returns Duration in seconds
 */
export function calculateDuration(
  dataSize: number,
  sampleRate: number,
  channels: number,
  bitsPerSample: number = 16
): number {
  const bytesPerSample = (bitsPerSample / 8) * channels
  const totalSamples = dataSize / bytesPerSample
  return totalSamples / sampleRate
}
