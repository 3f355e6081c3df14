import { describeError } from '@termfix/core';

import type { ContextFragment, ContextProbe, ProbeContext } from './context.js';
import EnvironmentProbe from './environmentProbe.js';
import FileProbe from './fileProbe.js';
import ManProbe from './manProbe.js';
import { NetworkProbe, ProcessTreeProbe } from './systemProbe.js';
import { DockerProbe, GitProbe, PackageProbe, ServiceProbe } from './toolingProbes.js';

export * from './context.js';
export { EnvironmentProbe, RELEVANT_ENV_VARS } from './environmentProbe.js';
export { FileProbe, UNREADABLE_FILE } from './fileProbe.js';
export { ManProbe, extractManSections, NO_MANUAL_ENTRY, CLEAN_GIT_NOTE } from './manProbe.js';
export { NetworkProbe, ProcessTreeProbe } from './systemProbe.js';
export { DockerProbe, GitProbe, PackageProbe, ServiceProbe } from './toolingProbes.js';

export type ProbeFailure = {
  probe: string;
  message: string;
};

export type ContextProbeReport = {
  fragment: ContextFragment;
  failures: ProbeFailure[];
};

const DEFAULT_PROBES: ContextProbe[] = [
  EnvironmentProbe,
  ProcessTreeProbe,
  FileProbe,
  NetworkProbe,
  ManProbe,
  GitProbe,
  DockerProbe,
  PackageProbe,
  ServiceProbe,
];

export function getContextProbes(): ContextProbe[] {
  return [...DEFAULT_PROBES];
}

/**
 * Run every applicable probe in order. A failing probe contributes nothing
 * and is reported in `failures`; later probes still run.
 */
export async function runContextProbes(
  context: ProbeContext,
  probes: readonly ContextProbe[] = DEFAULT_PROBES,
): Promise<ContextProbeReport> {
  let fragment: ContextFragment = {};
  const failures: ProbeFailure[] = [];

  for (const probe of probes) {
    if (probe.appliesTo && !probe.appliesTo(context.baseCommand)) {
      continue;
    }
    try {
      fragment = { ...fragment, ...(await probe.run(context)) };
    } catch (error) {
      failures.push({ probe: probe.name, message: describeError(error) });
    }
  }

  return { fragment, failures };
}
