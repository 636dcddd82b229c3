import { Environment } from '@pipeworks/helpers'
import { DEFAULT_INITIAL_BUFFER_SIZE, DEFAULT_MAX_LINE_LENGTH } from './LineScanner.js'

export enum PipelineEnvironment {
  MaxLineLength = 'PIPEWORKS_MAX_LINE_LENGTH',
  InitialBufferSize = 'PIPEWORKS_INITIAL_BUFFER_SIZE',
  ExitOnError = 'PIPEWORKS_EXIT_ON_ERROR',
}

export interface PipelineConfig {
  maxLineLength: number
  initialBufferSize: number
  exitOnError: boolean
}

export function loadConfig(env: Record<string, string | undefined> = process.env): PipelineConfig {
  const environment = new Environment<PipelineEnvironment>(env)

  const maxLineLength = environment.get(PipelineEnvironment.MaxLineLength)
    .default(String(DEFAULT_MAX_LINE_LENGTH))
    .asInteger({ min: 1, max: DEFAULT_MAX_LINE_LENGTH })

  return {
    maxLineLength,
    initialBufferSize: environment.get(PipelineEnvironment.InitialBufferSize)
      .default(String(DEFAULT_INITIAL_BUFFER_SIZE))
      .asInteger({ min: 1, max: maxLineLength }),
    exitOnError: environment.get(PipelineEnvironment.ExitOnError).default('false').asBoolean(),
  }
}
