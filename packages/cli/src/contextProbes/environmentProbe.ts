import type { ContextProbe } from './context.js';

export const RELEVANT_ENV_VARS = ['PATH', 'SHELL', 'USER', 'HOME', 'PWD', 'OLDPWD'] as const;

export const EnvironmentProbe: ContextProbe = {
  name: 'environment',
  async run(context) {
    const envVars: Record<string, string> = {};
    for (const name of RELEVANT_ENV_VARS) {
      envVars[name] = context.env[name] ?? '';
    }
    return { envVars };
  },
};

export default EnvironmentProbe;
