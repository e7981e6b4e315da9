export type Logger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug?: (message: string) => void;
};

export const noopLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
