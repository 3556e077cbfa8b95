// Thin wrapper over console so components can be given a silent or spy logger.
export type Logger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export function createLogger(component: string, sink: Pick<Console, "log" | "warn" | "error"> = console): Logger {
  const prefix = `[${component}]`;
  return {
    info: (message) => sink.log(`${prefix} ${message}`),
    warn: (message) => sink.warn(`${prefix} ${message}`),
    error: (message) => sink.error(`${prefix} ${message}`),
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
