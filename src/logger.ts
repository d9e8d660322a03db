import pino, { type DestinationStream } from "pino";

export interface LoggerOptions {
  level?: string;
  name?: string;
  /** Write target; stdout when omitted. Tests pass an in-memory stream. */
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}) {
  const { level = "info", name = "corpus-engine" } = options;

  return pino(
    {
      name,
      level,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    options.destination ?? pino.destination(1),
  );
}

export type Logger = ReturnType<typeof createLogger>;
