import { LEVEL_METADATA_KEY, type EventMetadata } from '../events/index.js';
import { isLevelEnabled, parseLogLevel, type LogLevel } from '../levels/index.js';

/**
 * Decides whether an event passes a sink threshold.
 *
 * Events are kept unless their metadata carries a `level` entry naming a level below
 * the threshold. A `level` value that names no level keeps the event.
 *
 * @param metadata - Metadata attached to the event, if any.
 * @param threshold - Minimum level configured on the sink.
 * @returns `true` when the event should be written.
 */
export function shouldLog(metadata: EventMetadata | undefined, threshold: LogLevel): boolean {
  if (metadata === undefined || !Object.hasOwn(metadata, LEVEL_METADATA_KEY)) {
    return true;
  }

  const level = parseLogLevel(metadata[LEVEL_METADATA_KEY] ?? '');
  if (level === undefined) {
    return true;
  }

  return isLevelEnabled(level, threshold);
}
