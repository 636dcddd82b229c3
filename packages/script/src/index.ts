export * from './Pipe.js'
export * from './sources.js'
