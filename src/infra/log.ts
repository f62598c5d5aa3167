export type Logger = {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
  debug?: (msg: string) => void;
};

export const DEFAULT_LOGGER: Logger = {
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};

/** Everything to stderr, so stdout stays clean for `--json` output. */
export function createStderrLogger(opts: { verbose?: boolean } = {}): Logger {
  const write = (msg: string) => console.error(msg);
  return {
    info: opts.verbose ? write : () => undefined,
    warn: write,
    error: write,
    debug: opts.verbose ? write : undefined,
  };
}
