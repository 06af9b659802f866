import { COMMAND_NOT_FOUND, type ExecOptions, type ProcessRunner, type RunResult } from './exec.ts';

export interface RecordedCall {
  file: string;
  args: string[];
  options?: ExecOptions;
}

export interface FakeRunnerSetup {
  /** Executables that resolve on PATH. */
  present?: string[];
  /** Combined `--version` output per tool. */
  versions?: Record<string, string>;
  /** stdout per command line, e.g. `curl -fsSL <url>`. */
  outputs?: Record<string, string>;
  /** Exit codes for command lines that should fail. */
  failures?: Record<string, number>;
}

/**
 * In-process ProcessRunner that records every invocation, for tests.
 */
export class FakeRunner implements ProcessRunner {
  readonly calls: RecordedCall[] = [];
  private readonly present: Set<string>;

  constructor(private readonly setup: FakeRunnerSetup = {}) {
    this.present = new Set(setup.present ?? []);
  }

  async run(file: string, args: string[], options?: ExecOptions): Promise<RunResult> {
    this.calls.push({ file, args, options });
    const command = [file, ...args].join(' ');

    const failure = this.setup.failures?.[command];
    if (failure !== undefined) {
      return { ok: false, exitCode: failure, stdout: '', stderr: 'failed', all: 'failed', command };
    }

    if (args.length === 1 && args[0] === '--version') {
      const version = this.setup.versions?.[file];
      if (version === undefined) {
        return { ok: false, exitCode: COMMAND_NOT_FOUND, stdout: '', stderr: '', all: '', command };
      }
      return { ok: true, exitCode: 0, stdout: version, stderr: '', all: version, command };
    }

    const stdout = this.setup.outputs?.[command] ?? '';
    return { ok: true, exitCode: 0, stdout, stderr: '', all: stdout, command };
  }

  async which(name: string): Promise<boolean> {
    this.calls.push({ file: 'which', args: [name] });
    return this.present.has(name);
  }

  /** Command lines run so far, `which` lookups included. */
  commandLines(): string[] {
    return this.calls.map((call) => [call.file, ...call.args].join(' '));
  }

  installs(): string[] {
    return this.calls
      .filter((call) => call.file === 'brew' && call.args[0] === 'install')
      .map((call) => call.args.slice(1).join(' '));
  }
}
