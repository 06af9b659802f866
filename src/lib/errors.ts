/**
 * Raised when an install step (bootstrap or package install) exits non-zero.
 * Aborts the rest of the run.
 */
export class SubprocessError extends Error {
  constructor(
    public command: string,
    public exitCode: number,
    public output: string = ''
  ) {
    super(`Command failed: ${command}\nExit code: ${exitCode}`);
    this.name = 'SubprocessError';
  }
}
