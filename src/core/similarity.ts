export interface SimilarityOptions {
  /** Minimum number of overlapping sub-fingerprints; shorter overlaps score 0 */
  minLength?: number
}

function popcount(n: number): number {
  n = n - ((n >>> 1) & 0x55555555)
  n = (n & 0x33333333) + ((n >>> 2) & 0x33333333)
  return Math.imul((n + (n >>> 4)) & 0x0f0f0f0f, 0x01010101) >>> 24
}

/**
 * Fraction of matching bits over the common prefix of two raw fingerprints (0..1)
 */
export function fingerprintSimilarity(a: ArrayLike<number>, b: ArrayLike<number>, options: SimilarityOptions = {}): number {
  const { minLength = 0 } = options
  const length = Math.min(a.length, b.length)

  if (length === 0 || length < minLength) {
    return 0
  }

  let error = 0
  for (let i = 0; i < length; i++) {
    error += popcount(a[i] ^ b[i])
  }

  return 1 - error / (length * 32)
}
