import { failure, muted, warning } from './ui/colors';

export type Logger = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

/**
 * Diagnostics go to stderr so command output on stdout stays pipeable.
 * `debug` lines are dropped unless verbose.
 */
export function createLogger(
  { verbose = false }: { verbose?: boolean } = {},
  write: (line: string) => void = (line) => console.error(line),
): Logger {
  return {
    debug: (msg) => {
      if (verbose) write(muted(`[debug] ${msg}`));
    },
    info: (msg) => write(msg),
    warn: (msg) => write(warning(msg)),
    error: (msg) => write(failure(msg)),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
