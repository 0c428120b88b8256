import type { CLIErrorView } from '@regexforge/core';

const BOLD_RED = '\u001B[1;31m';
const RESET = '\u001B[0m';
const INDENT = '  ';
const MIN_VALUE_WIDTH = 20;

type Row = readonly [label: string, value: string, wrap: boolean];

function wrapWords(text: string, width: number): string[] {
  const lines: string[] = [];
  let line = '';
  for (const word of text.split(/\s+/).filter(Boolean)) {
    if (line && line.length + 1 + word.length > width) {
      lines.push(line);
      line = word;
    } else {
      line = line ? `${line} ${word}` : word;
    }
  }
  if (line) lines.push(line);
  return lines;
}

function rowsOf(view: CLIErrorView): Row[] {
  const rows: Row[] = [];
  if (view.pattern !== undefined) {
    rows.push(['pattern', `/${view.pattern}/`, false]);
  }
  for (const detail of view.details) {
    rows.push([detail.label, detail.value, true]);
  }
  if (view.hint !== undefined) rows.push(['hint', view.hint, true]);
  rows.push(['exit', String(view.exitCode), false]);
  return rows;
}

/**
 * Error report for stderr: `error[CODE]: message`, then one aligned row per
 * known fact. The pattern row is never wrapped, so it can be copied back
 * as is.
 */
export function renderErrorReport(view: CLIErrorView): string {
  const heading = `error[${view.code}]`;
  const lines = [
    `${view.colors ? BOLD_RED + heading + RESET : heading}: ${view.message}`,
  ];

  const rows = rowsOf(view);
  const labelWidth = Math.max(...rows.map(([label]) => label.length)) + 2;
  const valueWidth = Math.max(
    MIN_VALUE_WIDTH,
    view.terminalWidth - INDENT.length - labelWidth
  );
  const continuation = ' '.repeat(INDENT.length + labelWidth);

  for (const [label, value, wrap] of rows) {
    const [first = '', ...rest] = wrap ? wrapWords(value, valueWidth) : [value];
    lines.push(INDENT + label.padEnd(labelWidth) + first);
    for (const line of rest) lines.push(continuation + line);
  }
  return lines.join('\n');
}
