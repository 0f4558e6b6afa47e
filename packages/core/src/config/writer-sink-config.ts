import { z } from 'zod';

import { WriterSinkConfigError } from '../errors/index.js';
import type { Clock } from '../formatting/index.js';
import { LOG_LEVELS, parseLogLevel, type LogLevel } from '../levels/index.js';
import type { StructuredLogger } from '../logging/index.js';
import type { ByteSink } from '../output/index.js';
import { DEFAULT_LOG_LEVEL, WriterSink } from '../sinks/index.js';

const logLevelSchema = z
  .string()
  .transform((value, context): LogLevel => {
    const level = parseLogLevel(value);
    if (level === undefined) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown log level "${value}". Expected one of: ${LOG_LEVELS.join(', ')}`,
      });
      return z.NEVER;
    }
    return level;
  });

export const writerSinkConfigSchema = z
  .object({
    level: logLevelSchema.optional().transform((level) => level ?? DEFAULT_LOG_LEVEL),
  })
  .strict();

export type WriterSinkConfigInput = z.input<typeof writerSinkConfigSchema>;
export type WriterSinkConfig = z.output<typeof writerSinkConfigSchema>;

/**
 * Validates an in-memory configuration record, for example one assembled from
 * environment variables or a host application's own settings.
 *
 * @param input - Untrusted configuration value.
 * @returns The configuration with its level parsed and defaulted.
 * @throws {WriterSinkConfigError} When the record has unknown keys or an unknown level.
 */
export function parseWriterSinkConfig(input: unknown): WriterSinkConfig {
  const result = writerSinkConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new WriterSinkConfigError(
      result.error.issues.map((issue) => {
        const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
        return `${location}: ${issue.message}`;
      }),
    );
  }
  return result.data;
}

export interface WriterSinkOverrides {
  readonly clock?: Clock;
  readonly diagnostics?: StructuredLogger;
}

/**
 * Builds a writer sink from a configuration record.
 *
 * @param output - Byte sink that receives rendered lines.
 * @param config - Untrusted configuration, validated with {@link parseWriterSinkConfig}.
 * @param overrides - Collaborators that cannot be expressed as configuration.
 */
export function createWriterSink(
  output: ByteSink,
  config: unknown = {},
  overrides: WriterSinkOverrides = {},
): WriterSink {
  const { level } = parseWriterSinkConfig(config);
  return new WriterSink({ output, level, ...overrides });
}
