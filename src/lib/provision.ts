import type { PackageManager } from './brew.ts';
import type { ProcessRunner } from './exec.ts';
import { logger } from './logger.ts';

export const DEFAULT_TOOLS: readonly string[] = ['git', 'node', 'python3', 'docker', 'jq', 'wget'];

export const REPORT_TOOLS: readonly string[] = ['git', 'node', 'python3', 'docker', 'jq', 'wget'];

export const NOT_FOUND_SUFFIX = 'not found';

export interface ProvisionConfig {
  /** Tools to detect or install, in order. */
  tools: readonly string[];
  /** Tools listed in the final version report, in order. */
  reportTools: readonly string[];
}

export const DEFAULT_CONFIG: ProvisionConfig = Object.freeze({
  tools: DEFAULT_TOOLS,
  reportTools: REPORT_TOOLS,
});

export type ManagerStatus = 'present' | 'installed';

export type ToolOutcome =
  | { tool: string; status: 'present'; version: string }
  | { tool: string; status: 'installed' };

export interface VersionEntry {
  tool: string;
  found: boolean;
  /** First line of `<tool> --version`, or the not-found placeholder. */
  line: string;
}

export interface ProvisionSummary {
  manager: ManagerStatus;
  tools: ToolOutcome[];
  versions: VersionEntry[];
}

export interface ProvisionerDeps {
  runner: ProcessRunner;
  manager: PackageManager;
  config?: ProvisionConfig;
}

export function notFound(tool: string): string {
  return `${tool} ${NOT_FOUND_SUFFIX}`;
}

/**
 * Builds the provisioning steps over a runner and a package manager.
 * Every step runs one process at a time; a failed install throws and ends the run.
 */
export function createProvisioner({ runner, manager, config = DEFAULT_CONFIG }: ProvisionerDeps) {
  const versionEntry = async (tool: string): Promise<VersionEntry> => {
    const result = await runner.run(tool, ['--version']);
    const firstLine = result.ok ? result.all.split(/\r?\n/)[0] : '';
    if (!firstLine) {
      logger.debug(`Version query for ${tool} failed (exit code ${result.exitCode})`);
      return { tool, found: false, line: notFound(tool) };
    }
    return { tool, found: true, line: firstLine };
  };

  const queryVersion = async (tool: string): Promise<string> => (await versionEntry(tool)).line;

  const ensurePackageManager = async (): Promise<ManagerStatus> => {
    if (await manager.isAvailable()) {
      logger.success(`${manager.name} already installed.`);
      return 'present';
    }
    logger.info(`Installing ${manager.name}...`);
    await manager.bootstrap();
    logger.success(`${manager.name} installed.`);
    return 'installed';
  };

  const ensureTool = async (tool: string): Promise<ToolOutcome> => {
    if (await runner.which(tool)) {
      const version = await queryVersion(tool);
      logger.success(`${tool} already installed: ${version}`);
      return { tool, status: 'present', version };
    }
    logger.info(`Installing ${tool}...`);
    await manager.installPackage(tool);
    return { tool, status: 'installed' };
  };

  const reportVersions = async (): Promise<VersionEntry[]> => {
    const entries: VersionEntry[] = [];
    for (const tool of config.reportTools) {
      entries.push(await versionEntry(tool));
    }
    return entries;
  };

  const provision = async (): Promise<ProvisionSummary> => {
    const managerStatus = await ensurePackageManager();

    const tools: ToolOutcome[] = [];
    for (const tool of config.tools) {
      tools.push(await ensureTool(tool));
    }

    const versions = await reportVersions();
    return { manager: managerStatus, tools, versions };
  };

  return { ensurePackageManager, ensureTool, queryVersion, reportVersions, provision };
}

export type Provisioner = ReturnType<typeof createProvisioner>;
