export * from './AutoCloseReader.js'
export * from './CapturedError.js'
export * from './config.js'
export * from './errors.js'
export * from './exitStatus.js'
export * from './io.js'
export * from './LineScanner.js'
export * from './Pipeline.js'
export * from './PipelineOptionsSchema.js'
export * from './stage.js'
export * from './StreamPair.js'
export * from './types.js'
