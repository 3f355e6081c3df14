import { nonEmptyLines, type ContextProbe } from './context.js';

const PROCESS_LINES = 10;
const SOCKET_LINES = 5;

export const ProcessTreeProbe: ContextProbe = {
  name: 'processes',
  async run(context) {
    const output = await context.exec('ps -ef --forest');
    if (output.exitCode !== 0) {
      return {};
    }
    return { processTree: nonEmptyLines(output.stdout).slice(-PROCESS_LINES) };
  },
};

export const NetworkProbe: ContextProbe = {
  name: 'network',
  async run(context) {
    const output = await context.exec('ss -tulpn');
    if (output.exitCode !== 0) {
      return {};
    }
    return { networkState: nonEmptyLines(output.stdout).slice(0, SOCKET_LINES) };
  },
};
