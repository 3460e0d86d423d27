/**
 * Quote- and escape-aware command line scanning.
 *
 * Tokenization follows POSIX word splitting for the subset the gateway
 * accepts: single quotes are literal, double quotes honour `\"` and `\\`,
 * and a backslash outside quotes escapes the next character. No expansion
 * of variables, globs or command substitution takes place.
 *
 * Pipe splitting works on the raw text and keeps quotes and backslashes in
 * each stage, so every stage can be tokenized again on its own.
 *
 * @module
 */

/**
 * Split a command line into argv-style tokens.
 *
 * An unterminated quote is tolerated: the rest of the input belongs to the
 * current token.
 */
export function tokenize(command: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let inSingle = false;
  let inDouble = false;
  let escaped = false;
  let quotedBackslash = false;

  for (const char of command) {
    if (inDouble) {
      if (quotedBackslash) {
        // Inside double quotes only \" and \\ are escapes.
        current += char === '"' || char === '\\' ? char : `\\${char}`;
        quotedBackslash = false;
      } else if (char === '\\') {
        quotedBackslash = true;
      } else if (char === '"') {
        inDouble = false;
      } else {
        current += char;
      }
      continue;
    }

    if (escaped) {
      current += char;
      escaped = false;
      continue;
    }

    if (inSingle) {
      if (char === "'") {
        inSingle = false;
      } else {
        current += char;
      }
      continue;
    }

    if (char === '\\') {
      escaped = true;
      inToken = true;
      continue;
    }
    if (char === "'") {
      inSingle = true;
      inToken = true;
      continue;
    }
    if (char === '"') {
      inDouble = true;
      inToken = true;
      continue;
    }
    if (/\s/.test(char)) {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
      continue;
    }

    current += char;
    inToken = true;
  }

  if (escaped || quotedBackslash) {
    // Trailing backslash with nothing to escape stays literal.
    current += '\\';
  }
  if (inToken) {
    tokens.push(current);
  }
  return tokens;
}

/**
 * Offsets of every pipe operator that is outside quotes and not escaped.
 */
function findPipeOffsets(command: string): number[] {
  const offsets: number[] = [];
  let inSingle = false;
  let inDouble = false;
  let escaped = false;

  for (let index = 0; index < command.length; index += 1) {
    const char = command[index];

    if (escaped) {
      escaped = false;
      continue;
    }
    if (char === '\\' && !inSingle) {
      escaped = true;
      continue;
    }
    if (char === "'" && !inDouble) {
      inSingle = !inSingle;
      continue;
    }
    if (char === '"' && !inSingle) {
      inDouble = !inDouble;
      continue;
    }
    if (char === '|' && !inSingle && !inDouble) {
      offsets.push(index);
    }
  }

  return offsets;
}

/** True when the command contains at least one unquoted, unescaped `|`. */
export function isPipeCommand(command: string): boolean {
  return findPipeOffsets(command).length > 0;
}

/**
 * Split a pipeline into trimmed stage strings.
 *
 * Empty stages are kept (`a || b` yields `['a', '', 'b']`) so the validator
 * can report their position. Blank input yields no stages.
 */
export function splitPipeCommand(command: string): string[] {
  if (command.trim().length === 0) {
    return [];
  }

  const stages: string[] = [];
  let start = 0;
  for (const offset of findPipeOffsets(command)) {
    stages.push(command.slice(start, offset).trim());
    start = offset + 1;
  }
  stages.push(command.slice(start).trim());
  return stages;
}
