/**
 * Terminal rendering for generation and diagnosis results. Every helper
 * returns lines so callers decide where they are written.
 */

import chalk from 'chalk';

import type {
  DiagnosisRecord,
  ErrorContext,
  GenerationRecord,
  ResultRecord,
} from '@termfix/core';

import { NO_MANUAL_ENTRY } from './contextProbes/manProbe.js';

const RULE = '─';

export function heading(title: string): string {
  return chalk.cyan.bold(`${RULE.repeat(2)} ${title} ${RULE.repeat(2)}`);
}

function bulletLines(items: readonly string[], style: (value: string) => string = chalk.dim): string[] {
  return items.map((item) => style(`› ${item}`));
}

function indent(text: string, prefix = '  '): string[] {
  return text.split('\n').map((line) => `${prefix}${line}`);
}

function contentsOf<S extends string>(records: readonly ResultRecord<S>[], type: S | 'thinking'): string[] {
  const contents: string[] = [];
  for (const record of records) {
    if (record.type === type && record.content !== null) {
      contents.push(record.content);
    }
  }
  return contents;
}

function firstContent<S extends string>(
  records: readonly ResultRecord<S>[],
  type: S,
): string | null {
  return contentsOf(records, type)[0] ?? null;
}

export function renderThinking(fragments: readonly string[], title = 'Thinking Process'): string[] {
  if (fragments.length === 0) {
    return [];
  }
  return [chalk.yellow(title), ...bulletLines(fragments), ''];
}

export function renderGeneration(records: readonly GenerationRecord[]): string[] {
  const lines: string[] = [heading('COMMAND ANALYSIS'), ''];
  lines.push(...renderThinking(contentsOf(records, 'thinking')));

  const analysis: string[] = [];
  for (const record of records) {
    if (record.content === null) {
      continue;
    }
    if (record.type === 'warning') {
      analysis.push(chalk.red(`⚠ ${record.content}`));
    } else if (record.type === 'analysis') {
      analysis.push(chalk.cyan(`ⓘ ${record.content}`));
    }
  }
  if (analysis.length > 0) {
    lines.push(chalk.blue('Analysis'), ...analysis, '');
  }

  const details = contentsOf(records, 'details');
  if (details.length > 0) {
    lines.push(chalk.gray('Technical Details'), ...details.map((item) => chalk.dim(item)), '');
  }

  const command = firstContent(records, 'command');
  if (command) {
    lines.push(chalk.green('Generated Command'), ...indent(chalk.bold(command)));
  } else {
    lines.push(chalk.red('No valid command generated'));
  }

  return lines;
}

/**
 * History, related files and the manual excerpt shown before a diagnosis.
 */
export function renderContextSummary(context: ErrorContext): string[] {
  const lines: string[] = [];
  if (context.history.length > 0) {
    lines.push(chalk.gray('Recent Commands'), ...bulletLines(context.history.slice(-3)));
  }
  if (context.relevantFiles.length > 0) {
    lines.push(chalk.gray('Related Files'), ...bulletLines(context.relevantFiles));
  }
  if (context.manExcerpt && !context.manExcerpt.includes(NO_MANUAL_ENTRY)) {
    lines.push(chalk.blueBright('📘 MANUAL REFERENCE'), ...indent(context.manExcerpt));
  }
  return lines.length > 0 ? [...lines, ''] : [];
}

function labeledBlock(label: string, content: string | null): string[] {
  return content ? [chalk.bold(label), ...indent(content)] : [];
}

export function renderDiagnosis(records: readonly DiagnosisRecord[]): string[] {
  const lines: string[] = [heading('Error Analysis')];
  lines.push(...renderThinking(contentsOf(records, 'thinking'), 'Cognitive Process'));

  const diagnosis = [
    ...labeledBlock('Root Cause', firstContent(records, 'cause')),
    ...labeledBlock('Technical Explanation', firstContent(records, 'explanation')),
  ];
  if (diagnosis.length > 0) {
    lines.push(chalk.cyan('Diagnosis'), ...diagnosis, '');
  }

  const fix = firstContent(records, 'fix');
  if (fix) {
    lines.push(chalk.greenBright.bold('⚡ RECOMMENDED FIX'), ...indent(chalk.green(fix)), '');
  }

  const additional = [
    ...labeledBlock('Potential Risks', firstContent(records, 'risk')),
    ...labeledBlock('Prevention Tip', firstContent(records, 'prevention')),
  ];
  if (additional.length > 0) {
    lines.push(chalk.yellow('Additional Information'), ...additional);
  }

  return lines;
}

export function renderDebugContext(context: ErrorContext): string[] {
  return [chalk.gray('[DEBUG] Error Context:'), chalk.gray(JSON.stringify(context, null, 2))];
}

export function renderError(message: string): string {
  return chalk.red(message);
}
