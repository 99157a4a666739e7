import {
  ENGINE_OK,
  PortableBuffer,
  PortableCodec,
  compressFingerprint,
  encodeBase64,
  type EngineFingerprintResult,
  type FingerprintEngine
} from '../src/index.js'

const BLOCK_BYTES = 8192
const FAILED = 0

export class FakeHandle {
  readonly chunks: Uint8Array[] = []
  started = false
  fingerprint: Int32Array | null = null
  freed = false

  constructor(readonly algorithm: number) {}
}

export type FakeOperation = 'create' | 'start' | 'feed' | 'finish' | 'getFingerprint' | 'dealloc'

/**
 * In-process engine: hashes every 8 KiB block of the concatenated stream into one sub-fingerprint
 */
export class FakeEngine extends PortableCodec implements FingerprintEngine<FakeHandle, PortableBuffer> {
  readonly handles: FakeHandle[] = []
  readonly failing = new Set<FakeOperation>()
  freeCount = 0

  version(): string {
    return '1.5.1-fake'
  }

  create(algorithm: number): FakeHandle | null {
    if (this.failing.has('create')) {
      return null
    }
    const handle = new FakeHandle(algorithm)
    this.handles.push(handle)
    return handle
  }

  free(handle: FakeHandle): void {
    if (handle.freed) {
      throw new Error('double free')
    }
    handle.freed = true
    this.freeCount++
  }

  start(handle: FakeHandle, sampleRate: number, channels: number): number {
    if (this.failing.has('start') || sampleRate > 192_000 || channels > 2) {
      return FAILED
    }
    handle.chunks.length = 0
    handle.fingerprint = null
    handle.started = true
    return ENGINE_OK
  }

  feed(handle: FakeHandle, data: Uint8Array, sampleCount: number): number {
    if (this.failing.has('feed') || !handle.started || data.length !== sampleCount * 2) {
      return FAILED
    }
    handle.chunks.push(data.slice())
    return ENGINE_OK
  }

  finish(handle: FakeHandle): number {
    if (this.failing.has('finish') || !handle.started) {
      return FAILED
    }
    handle.fingerprint = hashBlocks(Buffer.concat(handle.chunks))
    return ENGINE_OK
  }

  getFingerprint(handle: FakeHandle): EngineFingerprintResult<PortableBuffer> {
    if (this.failing.has('getFingerprint') || handle.fingerprint === null) {
      return { status: FAILED, pointer: null }
    }
    const text = encodeBase64(compressFingerprint(handle.fingerprint, handle.algorithm))
    return { status: ENGINE_OK, pointer: this.allocate(new Uint8Array(Buffer.from(text, 'latin1'))) }
  }

  dealloc(pointer: PortableBuffer): void {
    if (this.failing.has('dealloc')) {
      throw new Error('dealloc failed')
    }
    super.dealloc(pointer)
  }

  readString(pointer: PortableBuffer): string {
    this.assertLive(pointer)
    return Buffer.from(pointer.bytes).toString('latin1')
  }
}

function hashBlocks(stream: Uint8Array): Int32Array {
  const count = Math.ceil(stream.length / BLOCK_BYTES)
  const out = new Int32Array(count)

  for (let block = 0; block < count; block++) {
    // FNV-1a, seeded with the block index
    let hash = 0x811c9dc5 ^ block
    const end = Math.min(stream.length, (block + 1) * BLOCK_BYTES)
    for (let i = block * BLOCK_BYTES; i < end; i++) {
      hash ^= stream[i]
      hash = Math.imul(hash, 0x01000193)
    }
    out[block] = hash
  }

  return out
}
