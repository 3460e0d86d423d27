/**
 * Readability formatting for successful AWS CLI output.
 *
 * Formatting is idempotent: applying it to its own output changes nothing.
 * It only sees output text, never the result status.
 *
 * @module
 */

export type OutputFormatHint = 'json' | 'table' | 'list';

const FORMAT_HINTS: readonly OutputFormatHint[] = ['json', 'table', 'list'];

export const LIST_BULLET = '• ';

export function parseOutputFormatHint(value: string | undefined): OutputFormatHint | undefined {
  const lowered = value?.toLowerCase();
  return FORMAT_HINTS.find((hint) => hint === lowered);
}

export function isJson(text: string): boolean {
  if (text.trim().length === 0) return false;
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

function prettyJson(text: string): string | null {
  try {
    return JSON.stringify(JSON.parse(text), null, 2);
  } catch {
    return null;
  }
}

function nonEmptyLines(text: string): string[] {
  return text.split('\n').filter((line) => line.trim().length > 0);
}

function isSeparatorLine(line: string): boolean {
  return /^[ -]*-[ -]*$/.test(line);
}

function isBulleted(text: string): boolean {
  const lines = nonEmptyLines(text);
  return lines.length > 0 && lines.every((line) => line.trimStart().startsWith(LIST_BULLET));
}

/**
 * Insert a dashed separator under the header row, one `-` per non-space
 * header character.
 */
export function formatTableOutput(text: string): string {
  const lines = text.trim().split('\n');
  if (lines.length <= 1 || isSeparatorLine(lines[1])) {
    return text;
  }
  const header = lines[0];
  const separator = header.replace(/[^ ]/g, '-');
  return [header, separator, ...lines.slice(1)].join('\n');
}

/** Prefix each non-empty line with a bullet, after its indentation. */
export function formatListOutput(text: string): string {
  if (text.trim().length === 0 || isBulleted(text)) {
    return text;
  }
  return text
    .trim()
    .split('\n')
    .map((line) => {
      const content = line.trimStart();
      if (content.length === 0) return line;
      const indentation = line.slice(0, line.length - content.length);
      return `${indentation}${LIST_BULLET}${content}`;
    })
    .join('\n');
}

/**
 * Format output using `hint`, or detect the shape when no hint is given:
 * JSON documents are pretty-printed, user listings and single-word lines
 * become bullet lists, multi-column lines get a header separator.
 */
export function formatAwsOutput(output: string, hint?: OutputFormatHint): string {
  if (output.trim().length === 0) {
    return output;
  }

  switch (hint) {
    case 'json':
      return prettyJson(output) ?? output;
    case 'table':
      return formatTableOutput(output);
    case 'list':
      return formatListOutput(output);
    case undefined:
      break;
  }

  const trimmed = output.trim();
  if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
    const pretty = prettyJson(output);
    if (pretty !== null) return pretty;
  }

  if (isBulleted(output)) {
    return output;
  }
  if (output.includes('USER')) {
    return formatListOutput(output);
  }

  const lines = nonEmptyLines(trimmed);
  if (lines.length > 1) {
    if (lines.every((line) => line.trim().split(/\s+/).length > 1)) {
      return formatTableOutput(output);
    }
    return formatListOutput(output);
  }

  return output;
}
