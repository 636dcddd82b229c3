export * from './exec.js'
export * from './files.js'
export * from './freq.js'
export * from './hash.js'
export * from './http.js'
export * from './tee.js'
export * from './text.js'
