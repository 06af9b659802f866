import chalk from 'chalk';
import { createBrew, type PackageManager } from '../lib/brew.ts';
import { SubprocessError } from '../lib/errors.ts';
import { execaRunner, type ProcessRunner } from '../lib/exec.ts';
import { logger } from '../lib/logger.ts';
import { createProvisioner, type ProvisionConfig } from '../lib/provision.ts';

export interface SetupDeps {
  runner?: ProcessRunner;
  manager?: PackageManager;
  config?: ProvisionConfig;
}

/**
 * Provisions the machine and prints the version report.
 * Resolves with the exit code for the process.
 */
export async function setupCommand(deps: SetupDeps = {}): Promise<number> {
  const runner = deps.runner ?? execaRunner;
  const manager = deps.manager ?? createBrew(runner);
  const provisioner = createProvisioner({ runner, manager, config: deps.config });

  console.log(chalk.bold('=== Dev Tools Setup ==='));

  try {
    const { versions } = await provisioner.provision();

    console.log('');
    console.log(chalk.bold('=== Installed Versions ==='));
    for (const entry of versions) {
      console.log(entry.found ? entry.line : chalk.yellow(entry.line));
    }

    console.log('');
    console.log(chalk.bold.green('Setup complete!'));
    return 0;
  } catch (err) {
    if (err instanceof SubprocessError) {
      logger.error(err.message);
      if (err.output) logger.debug(err.output);
      return err.exitCode || 1;
    }
    logger.error(`Setup failed: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
