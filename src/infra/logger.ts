export type SimLogger = {
  info: (message: string) => void;
  warn: (message: string) => void;
};

export const silentLogger: SimLogger = {
  info: () => {},
  warn: () => {},
};

export function createConsoleLogger(prefix = "[concierge-sim]"): SimLogger {
  return {
    info: (message) => console.log(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
  };
}
