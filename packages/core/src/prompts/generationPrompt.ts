import type { GenerationContext } from '../contracts/errorContext.js';
import { isWindowsFamily } from '../services/commandSafety/osFamily.js';

interface PromptFlavor {
  role: string;
  focus: string;
  commandHint: string;
  priorities: readonly string[];
  examples: readonly PromptExample[];
}

interface PromptExample {
  query: string;
  analysis: string;
  command: string;
  details: string;
  warning: string;
}

const GIT_EXAMPLE: PromptExample = {
  query: 'update git repo',
  analysis: 'Update local Git repository with remote changes',
  command: 'git pull origin main',
  details: 'Fetches and merges changes from the remote repository',
  warning: 'Ensure working directory is clean before updating',
};

const WINDOWS_FLAVOR: PromptFlavor = {
  role: 'You are a Windows PowerShell/Command Prompt expert.',
  focus:
    'Primary focus is on Windows system operations (file operations, directory management, Windows-specific commands).',
  commandHint: 'executable Windows command(s)',
  priorities: [
    'Windows file system operations (dir, copy, move, del, etc.)',
    'Windows system operations (systeminfo, tasklist, etc.)',
    'Repository operations (only if explicitly requested)',
  ],
  examples: [
    {
      query: 'list all files in current directory',
      analysis: 'List all files and directories in the current directory using Windows command',
      command: 'dir',
      details: 'Shows all files and directories with details like size, date, and attributes',
      warning: 'None',
    },
    GIT_EXAMPLE,
  ],
};

const POSIX_FLAVOR: PromptFlavor = {
  role: 'You are a Linux terminal expert.',
  focus:
    'Primary focus is on system-level operations (package management, system updates, file operations).',
  commandHint: 'executable command(s)',
  priorities: [
    'System-level operations (apt, dnf, pacman, etc.)',
    'File system operations',
    'Repository operations (only if explicitly requested)',
  ],
  examples: [
    {
      query: 'update packages',
      analysis: 'Update system packages using the appropriate package manager',
      command: 'sudo apt update && sudo apt upgrade -y',
      details: 'Updates package lists and upgrades all installed packages',
      warning: 'System may require restart after certain updates',
    },
    GIT_EXAMPLE,
  ],
};

const formatExample = (example: PromptExample): string =>
  [
    `Query: "${example.query}"`,
    `🧠 Analysis: ${example.analysis}`,
    `🛠️ Command: \`\`\`${example.command}\`\`\``,
    `📝 Details: ${example.details}`,
    `⚠️ Warning: ${example.warning}`,
  ].join('\n');

/**
 * Prompt for turning a natural-language request into exactly one command.
 * The Windows flavour is chosen from the OS name in the context.
 */
export function buildGenerationPrompt(query: string, context: GenerationContext): string {
  const flavor = isWindowsFamily(context.os) ? WINDOWS_FLAVOR : POSIX_FLAVOR;
  const contextLines = [`- OS: ${context.os}`, `- Directory: ${context.cwd || 'Unknown'}`];
  if (context.git) {
    contextLines.push('- Git repo: Yes (only relevant for Git-specific queries)');
  }

  return [
    `SYSTEM: ${flavor.role} Generate exactly ONE command or command sequence.`,
    flavor.focus,
    'Only consider Git operations if the query explicitly mentions Git/repository operations.',
    '',
    `USER QUERY: ${query}`,
    '',
    'RESPONSE FORMAT:',
    '🧠 Analysis: [1-line explanation]',
    `🛠️ Command: \`\`\`[${flavor.commandHint}]\`\`\``,
    '📝 Details: [technical specifics]',
    '⚠️ Warning: [if dangerous]',
    '',
    'CURRENT CONTEXT:',
    ...contextLines,
    '',
    'PRIORITY ORDER:',
    ...flavor.priorities.map((priority, index) => `${index + 1}. ${priority}`),
    '',
    'EXAMPLES:',
    flavor.examples.map(formatExample).join('\n\n'),
    '',
  ].join('\n');
}

export default {
  buildGenerationPrompt,
};
