import type { CLIErrorView } from '@routedoc/core';

const RESET = '\u001B[0m';
const STYLES = {
  heading: '\u001B[1;31m',
  hint: '\u001B[36m',
} as const;

type Style = keyof typeof STYLES;

function paint(view: CLIErrorView, style: Style, text: string): string {
  return view.colors ? `${STYLES[style]}${text}${RESET}` : text;
}

/**
 * Greedy word wrap after a fixed lead. Continuation lines are indented
 * to the first word so labelled blocks stay aligned.
 */
function wrap(lead: string, text: string, width: number): string[] {
  const indent = ' '.repeat(lead.length + 1);
  const lines: string[] = [];
  let line = lead;
  let empty = true;
  for (const word of text.split(/\s+/)) {
    if (word === '') continue;
    if (!empty && line.length + 1 + word.length > width) {
      lines.push(line);
      line = `${indent}${word}`;
    } else {
      line = `${line} ${word}`;
    }
    empty = false;
  }
  lines.push(line);
  return lines;
}

/**
 * Render a CLI error view:
 *
 *   error[E200]: Value does not match request schema
 *     route: GET /pets/:id
 *     - pathParams.id: must be integer, got "abc"
 *     hint: ...
 */
export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth > 0 ? view.terminalWidth : 80;
  const lines = [paint(view, 'heading', `error[${view.code}]: ${view.message}`)];

  const facts: [string, string | undefined][] = [
    ['route', view.route],
    ['at', view.location],
    ['cause', view.cause],
  ];
  for (const [label, value] of facts) {
    if (value !== undefined) lines.push(...wrap(`  ${label}:`, value, width));
  }
  for (const detail of view.details) {
    lines.push(...wrap('  -', detail, width));
  }
  for (const hint of view.hints) {
    for (const line of wrap('  hint:', hint, width)) {
      lines.push(paint(view, 'hint', line));
    }
  }
  return lines.join('\n');
}

export function stripAnsi(input: string): string {
  return input.replace(/\u001B\[[\d;]*m/g, '');
}
