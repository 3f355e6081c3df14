import type { ErrorContext } from '../contracts/errorContext.js';
import { truncate } from '../utils/text.js';

const GIT_STATUS_LIMIT = 200;
const DOCKER_CONTAINER_LIMIT = 3;
const FILE_SNIPPET_LIMIT = 300;
const HISTORY_WINDOW = 3;

const RESPONSE_FORMAT = [
  '**Required Analysis Format:**',
  '<think>',
  'Step 1: Identify the exact error message and command that failed',
  'Step 2: Analyze why the command failed (syntax, missing files, permissions, etc.)',
  'Step 3: Find the correct command or fix based on context',
  'Step 4: Consider any potential risks',
  '</think>',
  '',
  'Root Cause: <1-line diagnosis>',
  'Fix: `[executable command]`',
  'Technical Explanation: <specific system-level reason>',
  'Potential Risks: <if any>',
  'Prevention Tip: <actionable advice>',
].join('\n');

function specializedContext(context: ErrorContext): string[] {
  const lines: string[] = [];
  if (context.gitStatus) {
    lines.push(`**Git Status**: ${context.gitStatus.slice(0, GIT_STATUS_LIMIT)}`);
  }
  if (context.gitRemotes) {
    lines.push(`**Git Remotes**: ${context.gitRemotes}`);
  }
  if (context.dockerContainers && context.dockerContainers.length > 0) {
    lines.push(
      `**Docker Containers**: ${context.dockerContainers.slice(0, DOCKER_CONTAINER_LIMIT).join(', ')}`,
    );
  }
  if (context.composeFiles && context.composeFiles.length > 0) {
    lines.push(`**Compose Files**: ${context.composeFiles.join(', ')}`);
  }
  if (context.failedServices && context.failedServices.length > 0) {
    lines.push(`**Failed Services**: ${context.failedServices.join(', ')}`);
  }
  if (context.availableUpdates && context.availableUpdates.length > 0) {
    lines.push(`**Available Updates**: ${context.availableUpdates.join(', ')}`);
  }
  if (context.processTree && context.processTree.length > 0) {
    lines.push(`**Process Tree**:\n${context.processTree.join('\n')}`);
  }
  if (context.networkState && context.networkState.length > 0) {
    lines.push(`**Listening Sockets**:\n${context.networkState.join('\n')}`);
  }
  return lines;
}

function fileSnippets(context: ErrorContext): string[] {
  const contents = context.fileContext?.fileContents ?? {};
  return Object.entries(contents).map(
    ([file, content]) =>
      `**File ${file}**: \`\`\`\n${truncate(content, FILE_SNIPPET_LIMIT)}\n\`\`\``,
  );
}

/**
 * Prompt asking the model to diagnose a failed command. Optional probe
 * results are interpolated only when the collector supplied them.
 */
export function buildDiagnosisPrompt(context: ErrorContext): string {
  const shell = context.envVars?.SHELL ?? 'Unknown';
  const fileCount = context.fileContext?.files.length ?? 0;
  const recent = context.history.slice(-HISTORY_WINDOW).join(', ');
  const referenced =
    context.referencedFiles && context.referencedFiles.length > 0
      ? context.referencedFiles.join(', ')
      : 'None detected';
  const related = context.relevantFiles.length > 0 ? context.relevantFiles.join(', ') : 'None';

  return [
    '**[Terminal Context Analysis]**',
    `**System Environment**: ${shell} on ${context.os || 'Linux'}`,
    `**Working Directory**: ${context.cwd} (${fileCount} files)`,
    `**Recent Commands**: ${recent}`,
    `**Failed Command**: \`${context.command}\``,
    `**Error Message**: ${context.errorOutput}`,
    `**Exit Code**: ${context.exitCode}`,
    `**Referenced Files**: ${referenced}`,
    `**Recently Touched Files**: ${related}`,
    `**Man Page Excerpt**: ${context.manExcerpt || 'N/A'}`,
    ...specializedContext(context),
    ...fileSnippets(context),
    '',
    RESPONSE_FORMAT,
  ].join('\n');
}

export default {
  buildDiagnosisPrompt,
};
