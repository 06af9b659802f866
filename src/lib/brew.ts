import { SubprocessError } from './errors.ts';
import type { ProcessRunner, RunResult } from './exec.ts';

export const BREW_INSTALL_URL = 'https://raw.githubusercontent.com/Homebrew/install/HEAD/install.sh';

/**
 * A package manager able to bootstrap itself and install packages by name.
 */
export interface PackageManager {
  /** Display name used in status lines. */
  name: string;
  isAvailable(): Promise<boolean>;
  /** Installs the manager itself. Throws SubprocessError on failure. */
  bootstrap(): Promise<void>;
  /** Installs one package. Throws SubprocessError on failure. */
  installPackage(pkg: string): Promise<void>;
}

function check(result: RunResult): RunResult {
  if (!result.ok) {
    throw new SubprocessError(result.command, result.exitCode, result.all || result.stderr);
  }
  return result;
}

/**
 * Manages the host's Homebrew installation.
 */
export function createBrew(runner: ProcessRunner): PackageManager {
  return {
    name: 'Homebrew',

    isAvailable: () => runner.which('brew'),

    /**
     * Fetches the official installer script and runs it with bash.
     */
    bootstrap: async () => {
      const { stdout: script } = check(await runner.run('curl', ['-fsSL', BREW_INSTALL_URL]));
      check(await runner.run('/bin/bash', ['-c', script], { silent: false }));
    },

    installPackage: async (pkg) => {
      check(await runner.run('brew', ['install', pkg], { silent: false }));
    },
  };
}
