import lockfile from "proper-lockfile";

export type FileLockOptions = {
  retries?: {
    retries: number;
    factor: number;
    minTimeout: number;
    maxTimeout: number;
    randomize: boolean;
  };
  stale?: number;
};

/**
 * Run `fn` while holding an advisory lock on `filePath`. The file must exist;
 * the lock lives in a `<file>.lock` directory beside it.
 */
export async function withFileLock<T>(
  filePath: string,
  opts: FileLockOptions,
  fn: () => Promise<T>,
): Promise<T> {
  const release = await lockfile.lock(filePath, {
    retries: opts.retries,
    stale: opts.stale,
  });
  try {
    return await fn();
  } finally {
    await release();
  }
}
