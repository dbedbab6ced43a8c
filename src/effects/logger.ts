import pino from 'pino';

// Pretty stream for console output
const prettyStream = pino.transport({
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'HH:MM:ss',
    ignore: 'pid,hostname',
  },
});

/** Global pino logger instance. The level is raised or lowered at startup from LOG_LEVEL. */
export const logger = pino({ level: 'info' }, prettyStream);

/**
 * Output multi-line text to stdout as-is (for startup banner, without timestamps or levels)
 * @param lines - The lines of text to output
 */
export function printBanner(lines: string[]): void {
  for (const line of lines) {
    process.stdout.write(line + '\n');
  }
}
