const FENCE_LANGUAGE_TAGS = new Set([
  'bash',
  'sh',
  'shell',
  'zsh',
  'fish',
  'console',
  'powershell',
  'pwsh',
  'ps1',
  'cmd',
  'bat',
]);

const LEADING_TICKS = /^`{1,3}/;
const TRAILING_TICKS = /`{1,3}$/;
// A leading run of one to three backticks up to the next run of the same length.
const LEADING_CODE_SPAN = /^(`{1,3})(?!`)([\s\S]*?)\1(?!`)/;

function dropLanguageTag(code: string): string {
  const lines = code.split('\n');
  if (lines.length > 1 && FENCE_LANGUAGE_TAGS.has(lines[0].trim().toLowerCase())) {
    lines.shift();
  }
  return lines.join('\n').trim();
}

/**
 * Unwrap a command that the model wrapped in inline backticks or a Markdown
 * fence. Only the first code span is kept, so commentary after it is
 * dropped. A leading shell language tag on its own line is dropped too.
 */
export function unwrapCommand(value: string): string {
  const trimmed = value.trim();
  if (!trimmed.startsWith('`')) {
    return trimmed;
  }

  const span = LEADING_CODE_SPAN.exec(trimmed);
  if (span) {
    return dropLanguageTag(span[2]);
  }

  // Unclosed fence.
  return dropLanguageTag(trimmed.replace(LEADING_TICKS, '').replace(TRAILING_TICKS, ''));
}
