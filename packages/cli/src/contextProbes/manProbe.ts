import type { ContextProbe } from './context.js';

const MAN_SECTIONS = new Set(['NAME', 'SYNOPSIS', 'DESCRIPTION']);
const MAX_EXCERPT_LINES = 11;
const SAFE_COMMAND_NAME = /^[\w.+-]+$/;

export const NO_MANUAL_ENTRY = 'No manual entry available';
export const CLEAN_GIT_NOTE = 'Git status: No changes to commit (working directory clean)';

/**
 * Keep the NAME, SYNOPSIS and DESCRIPTION headings and their indented body
 * lines, stopping once the excerpt is long enough.
 */
export function extractManSections(content: string): string {
  const lines: string[] = [];
  let inSection = false;

  for (const line of content.split('\n')) {
    if (MAN_SECTIONS.has(line.trim().toUpperCase()) && !line.startsWith(' ')) {
      inSection = true;
      lines.push(line.trim());
    } else if (inSection && line.startsWith(' ')) {
      lines.push(line.trim());
    }
    if (lines.length >= MAX_EXCERPT_LINES) {
      break;
    }
  }

  return lines.join('\n');
}

export const ManProbe: ContextProbe = {
  name: 'man',
  async run(context) {
    const { baseCommand } = context;
    if (!SAFE_COMMAND_NAME.test(baseCommand)) {
      return { manExcerpt: NO_MANUAL_ENTRY };
    }

    if (baseCommand === 'git') {
      const status = await context.exec('git status --porcelain');
      if (status.exitCode === 0 && !status.stdout.trim()) {
        return { manExcerpt: CLEAN_GIT_NOTE };
      }
    }

    const manual = await context.exec(`man ${baseCommand} 2>/dev/null | col -b`);
    const excerpt = manual.exitCode === 0 ? extractManSections(manual.stdout) : '';
    return { manExcerpt: excerpt || NO_MANUAL_ENTRY };
  },
};

export default ManProbe;
