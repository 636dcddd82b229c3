export * from './AsyncQueue.js'
export * from './clamp.js'
export * from './Environment.js'
export * from './isError.js'
export * from './splitSettledResults.js'
