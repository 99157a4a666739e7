export * from './errors.js'
export * from './engine.js'
export * from './compression.js'
export * from './codec.js'
export * from './pcm.js'
export * from './fingerprinter.js'
export * from './session.js'
export * from './similarity.js'
export * from './native.js'
