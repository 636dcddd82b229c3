import { Logger } from '@aws-lambda-powertools/logger'
import { z } from 'zod'
import { Writer } from './types.js'

const WriterSchema = z.custom<Writer>(
  value => typeof value === 'object' && value !== null && 'write' in value && typeof value.write === 'function',
  'Expected an object with a write() method',
)

const LoggerSchema = z.custom<Logger>(
  value => (typeof value === 'object' || typeof value === 'function') && value !== null,
  'Expected a Logger',
)

export const PipelineOptionsSchema = z.object({
  stdout: WriterSchema.optional(),
  stderr: WriterSchema.optional(),
  exitOnError: z.boolean().optional(),
  maxLineLength: z.number().int().positive().optional(),
  initialBufferSize: z.number().int().positive().optional(),
  logger: LoggerSchema.optional(),
})

export type PipelineOptions = z.input<typeof PipelineOptionsSchema>
