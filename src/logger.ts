import { pino, type DestinationStream, type LevelWithSilent, type Logger } from 'pino';

/** Credential fields masked by default: query-string names and option names */
export const DEFAULT_REDACT_PATHS: string[] = [
  'tkn',
  'email',
  'authKey',
  'authEmail',
  '*.tkn',
  '*.email',
  '*.authKey',
  '*.authEmail',
];

export interface CreateLoggerOptions {
  level?: LevelWithSilent;
  /** `true` (default) masks DEFAULT_REDACT_PATHS; an array is merged with them */
  redact?: boolean | string[];
  /** Where log lines are written; stdout when omitted */
  destination?: DestinationStream;
}

function resolveRedactPaths(
  redact: boolean | string[] | undefined
): string[] | undefined {
  if (redact === false) return undefined;
  if (Array.isArray(redact)) return [...DEFAULT_REDACT_PATHS, ...redact];
  return DEFAULT_REDACT_PATHS;
}

/**
 * Create a pino logger with credential redaction.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug' });
 * logger.debug({ tkn: 'test-secret', zone: 'example.com' }, 'Request');
 * // {"level":"DEBUG","tkn":"[Redacted]","zone":"example.com","msg":"Request",...}
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const paths = resolveRedactPaths(options.redact);
  const config = {
    level: options.level ?? 'info',
    ...(paths && { redact: { paths, censor: '[Redacted]' } }),
    formatters: {
      level: (label: string) => ({ level: label.toUpperCase() }),
    },
  };

  return options.destination ? pino(config, options.destination) : pino(config);
}
