/**
 * Codec round trip example
 *
 * Encodes a raw fingerprint with the portable codec, decodes it again and
 * compares the two. No native library is needed.
 */

import {
  Algorithm,
  decodeFingerprint,
  encodeFingerprint,
  encodeFingerprintText,
  fingerprintSimilarity
} from '../src/index.js'

const raw = Int32Array.from({ length: 16 }, (_, i) => Math.imul(i + 1, 0x9e3779b1))

console.log('━━━ Encode ━━━')
const text = encodeFingerprintText(raw, Algorithm.Test2)
const binary = encodeFingerprint(raw, Algorithm.Test2, { base64: false })
console.log('Text form:', text)
console.log('Binary form:', binary.length, 'bytes')

console.log('\n━━━ Decode ━━━')
const decoded = decodeFingerprint(text)
console.log('Algorithm:', Algorithm[decoded.algorithm])
console.log('Sub-fingerprints:', decoded.fingerprint.length)

const similarity = fingerprintSimilarity(raw, decoded.fingerprint)
console.log(similarity === 1 ? '✓ Round trip matches' : `✗ Similarity ${similarity}`)

console.log('\n━━━ Damaged input ━━━')
try {
  decodeFingerprint(text.slice(0, 8))
} catch (error) {
  console.log('Rejected:', error instanceof Error ? error.message : error)
}
