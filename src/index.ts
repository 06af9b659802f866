import { setupCommand } from './commands/setup.ts';

process.exitCode = await setupCommand();
