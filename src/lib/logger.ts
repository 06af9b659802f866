import chalk from 'chalk';

/**
 * Console logger used for status lines during a run.
 */
export const logger = {
  info: (message: string): void => {
    console.log(`${chalk.blue('ℹ')} ${message}`);
  },

  success: (message: string): void => {
    console.log(`${chalk.green('✔')} ${message}`);
  },

  error: (message: string): void => {
    console.error(`${chalk.red('✖')} ${message}`);
  },

  // Only printed when DEBUG is set.
  debug: (message: string): void => {
    if (!process.env.DEBUG) return;
    console.log(chalk.gray(`[debug] ${message}`));
  },
};
