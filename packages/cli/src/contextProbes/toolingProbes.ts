/**
 * Probes that only run when the failed command belongs to a specific tool.
 */

import { nonEmptyLines, type ContextProbe } from './context.js';

const COMPOSE_FILES = ['docker-compose.yml', 'docker-compose.yaml'];

export const GitProbe: ContextProbe = {
  name: 'git',
  appliesTo: (baseCommand) => baseCommand === 'git',
  async run(context) {
    const status = await context.exec('git status --porcelain');
    const remotes = await context.exec('git remote -v');
    return {
      gitStatus: status.stdout,
      gitRemotes: remotes.stdout,
    };
  },
};

export const DockerProbe: ContextProbe = {
  name: 'docker',
  appliesTo: (baseCommand) => baseCommand === 'docker' || baseCommand === 'docker-compose',
  async run(context) {
    const containers = await context.exec('docker ps --format "{{.Names}} ({{.Status}})"');
    const composeFiles: string[] = [];
    for (const file of COMPOSE_FILES) {
      if (await context.isFile(file)) {
        composeFiles.push(file);
      }
    }
    return {
      dockerContainers: containers.exitCode === 0 ? nonEmptyLines(containers.stdout) : [],
      composeFiles,
    };
  },
};

export const PackageProbe: ContextProbe = {
  name: 'packages',
  appliesTo: (baseCommand) => baseCommand === 'apt' || baseCommand === 'apt-get',
  async run(context) {
    const updates = await context.exec('apt list --upgradable 2>/dev/null | head -n 5');
    return { availableUpdates: nonEmptyLines(updates.stdout) };
  },
};

export const ServiceProbe: ContextProbe = {
  name: 'services',
  appliesTo: (baseCommand) => baseCommand === 'systemctl' || baseCommand === 'service',
  async run(context) {
    const failed = await context.exec('systemctl list-units --state=failed --no-legend | head -n 3');
    return { failedServices: nonEmptyLines(failed.stdout) };
  },
};
