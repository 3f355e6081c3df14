import { describe, expect, test } from '@jest/globals';

import type { ErrorContext } from '../../contracts/errorContext.js';
import { buildDiagnosisPrompt } from '../diagnosisPrompt.js';

const baseContext: ErrorContext = {
  command: 'git push',
  errorOutput: 'fatal: no upstream branch',
  cwd: '/home/dev/repo',
  exitCode: 128,
  history: ['git init', 'git add .', 'git commit -m init', 'git push'],
  relevantFiles: [],
  manExcerpt: '',
  os: 'Ubuntu 22.04',
};

describe('buildDiagnosisPrompt', () => {
  test('renders the core facts with defaults for missing probes', () => {
    const lines = buildDiagnosisPrompt(baseContext).split('\n');

    expect(lines.slice(0, 10)).toEqual([
      '**[Terminal Context Analysis]**',
      '**System Environment**: Unknown on Ubuntu 22.04',
      '**Working Directory**: /home/dev/repo (0 files)',
      '**Recent Commands**: git add ., git commit -m init, git push',
      '**Failed Command**: `git push`',
      '**Error Message**: fatal: no upstream branch',
      '**Exit Code**: 128',
      '**Referenced Files**: None detected',
      '**Recently Touched Files**: None',
      '**Man Page Excerpt**: N/A',
    ]);
    expect(lines[10]).toBe('');
    expect(lines[11]).toBe('**Required Analysis Format:**');
    expect(lines).toContain('Fix: `[executable command]`');
  });

  test('adds optional probe output and bounds its size', () => {
    const prompt = buildDiagnosisPrompt({
      ...baseContext,
      envVars: { SHELL: '/bin/bash' },
      gitStatus: 'M'.repeat(250),
      dockerContainers: ['web', 'db', 'cache', 'worker'],
      failedServices: ['nginx.service'],
      referencedFiles: ['app.py'],
      relevantFiles: ['README.md'],
      fileContext: {
        files: ['app.py', 'README.md'],
        dirs: [],
        fileContents: { 'app.py': 'x'.repeat(301) },
      },
    });
    const lines = prompt.split('\n');

    expect(lines).toContain('**System Environment**: /bin/bash on Ubuntu 22.04');
    expect(lines).toContain('**Working Directory**: /home/dev/repo (2 files)');
    expect(lines).toContain(`**Git Status**: ${'M'.repeat(200)}`);
    expect(lines).toContain('**Docker Containers**: web, db, cache');
    expect(lines).toContain('**Failed Services**: nginx.service');
    expect(lines).toContain('**Referenced Files**: app.py');
    expect(lines).toContain('**Recently Touched Files**: README.md');
    expect(prompt).toContain(`**File app.py**: \`\`\`\n${'x'.repeat(300)}...\n\`\`\``);
    expect(prompt).not.toContain('**Git Remotes**');
  });
});
