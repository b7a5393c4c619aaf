/** Unrecognized mode or action token. */
export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArgumentError";
  }
}

/**
 * Another invocation holds the instance lock and did not let go within the
 * acquisition timeout.
 */
export class LockTimeoutError extends Error {
  constructor(
    public readonly lockPath: string,
    public readonly holderPid: number | null
  ) {
    const holder = holderPid === null ? "" : ` (held by pid ${holderPid})`;
    super(`Could not acquire ${lockPath}${holder}: another instance is probably running`);
    this.name = "LockTimeoutError";
  }
}
