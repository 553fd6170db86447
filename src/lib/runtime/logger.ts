export type LogLevel = "error" | "info" | "debug";

export type LogPayload = Record<string, unknown>;

export type Logger = {
  error: (event: string, payload?: LogPayload) => void;
  info: (event: string, payload?: LogPayload) => void;
  debug: (event: string, payload?: LogPayload) => void;
};

const LOG_TAG = "[mgrs-csv]";

const levelRank: Record<LogLevel, number> = {
  error: 0,
  info: 1,
  debug: 2
};

/**
 * Tagged console logger. Everything goes to `stream` (stderr by default) so
 * stdout stays free for CSV output.
 */
export const createLogger = (
  level: LogLevel,
  stream: NodeJS.WritableStream = process.stderr
): Logger => {
  const output = new console.Console({ stdout: stream, stderr: stream });
  const emit =
    (target: LogLevel, write: (...args: unknown[]) => void) =>
    (event: string, payload?: LogPayload) => {
      if (levelRank[target] > levelRank[level]) {
        return;
      }
      if (payload) {
        write(`${LOG_TAG} ${event}`, payload);
      } else {
        write(`${LOG_TAG} ${event}`);
      }
    };

  return {
    error: emit("error", output.error.bind(output)),
    info: emit("info", output.info.bind(output)),
    debug: emit("debug", output.debug.bind(output))
  };
};
