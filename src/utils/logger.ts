import pino, { type DestinationStream, type LevelWithSilent, type TransportTargetOptions } from 'pino';

export const LOG_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent'
] as const satisfies readonly LevelWithSilent[];

export function parseLogLevel(value: string | undefined): LevelWithSilent | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
}

const LOG_FILE_MAX_SIZE = '10m';
const LOG_FILE_KEEP = 5;

/** With a log file, the console only carries warnings and errors; the file gets everything. */
export function buildLogTargets(logFile: string): TransportTargetOptions[] {
  return [
    { target: 'pino/file', level: 'warn', options: { destination: 1 } },
    {
      target: 'pino-roll',
      level: 'trace',
      options: { file: logFile, size: LOG_FILE_MAX_SIZE, limit: { count: LOG_FILE_KEEP }, mkdir: true }
    }
  ];
}

function buildDestination(logFile: string | undefined): DestinationStream {
  if (!logFile) {
    return pino.destination(1);
  }
  return pino.transport({ targets: buildLogTargets(logFile) });
}

export const logger = pino(
  {
    name: 'offload-loadtest',
    level: parseLogLevel(process.env.LOG_LEVEL) ?? 'info'
  },
  buildDestination(process.env.LOG_FILE)
);

export function setLogLevel(level: LevelWithSilent): void {
  logger.level = level;
}
