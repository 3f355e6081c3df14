import { describe, expect, test } from '@jest/globals';

import { buildGenerationPrompt } from '../generationPrompt.js';

describe('buildGenerationPrompt', () => {
  test('embeds the query and the POSIX context', () => {
    const prompt = buildGenerationPrompt('update packages', {
      os: 'Ubuntu 22.04',
      cwd: '/srv/app',
      git: false,
      history: [],
    });
    const lines = prompt.split('\n');

    expect(lines[0]).toBe(
      'SYSTEM: You are a Linux terminal expert. Generate exactly ONE command or command sequence.',
    );
    expect(lines).toContain('USER QUERY: update packages');
    expect(lines).toContain('- OS: Ubuntu 22.04');
    expect(lines).toContain('- Directory: /srv/app');
    expect(lines).toContain('1. System-level operations (apt, dnf, pacman, etc.)');
    expect(lines).toContain('🛠️ Command: ```sudo apt update && sudo apt upgrade -y```');
    expect(prompt).not.toContain('- Git repo:');
  });

  test('switches to the Windows flavour and mentions git repositories', () => {
    const prompt = buildGenerationPrompt('list all files', {
      os: 'Windows 11',
      cwd: '',
      git: true,
      history: [],
    });
    const lines = prompt.split('\n');

    expect(lines[0]).toBe(
      'SYSTEM: You are a Windows PowerShell/Command Prompt expert. Generate exactly ONE command or command sequence.',
    );
    expect(lines).toContain('- Directory: Unknown');
    expect(lines).toContain('- Git repo: Yes (only relevant for Git-specific queries)');
    expect(lines).toContain('🛠️ Command: ```[executable Windows command(s)]```');
    expect(lines).toContain('🛠️ Command: ```dir```');
  });

  test('does not pick the Windows flavour for Darwin', () => {
    const prompt = buildGenerationPrompt('list files', {
      os: 'Darwin 23.1.0',
      cwd: '/Users/dev',
      git: false,
      history: [],
    });

    expect(prompt.startsWith('SYSTEM: You are a Linux terminal expert.')).toBe(true);
  });
});
