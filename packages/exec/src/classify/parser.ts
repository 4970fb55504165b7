import type { ParsedCommand } from './types';

const ENV_ASSIGNMENT = /^([a-zA-Z_][a-zA-Z0-9_]*)=(.*)$/s;

/**
 * Splits a command line into tokens, honouring single/double quotes and backslash escapes.
 */
export function tokenize(input: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let quote: "'" | '"' | null = null;
  let escape = false;
  let inToken = false;

  for (const char of input.trim()) {
    if (escape) {
      current += char;
      escape = false;
    } else if (char === '\\') {
      escape = true;
      inToken = true;
    } else if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
    } else if (char === "'" || char === '"') {
      quote = char;
      inToken = true;
    } else if (/\s/.test(char)) {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
    } else {
      current += char;
      inToken = true;
    }
  }

  if (inToken) {
    tokens.push(current);
  }
  return tokens;
}

/**
 * Parses a configured command line such as `RUSTFLAGS=-Dwarnings cargo clippy --package ignite`.
 * Leading assignments become environment entries; the first other token is the program.
 */
export function parseCommand(input: string): ParsedCommand {
  const tokens = tokenize(input);
  const env: Record<string, string> = {};

  let cmdIndex = 0;
  for (; cmdIndex < tokens.length; cmdIndex++) {
    const match = ENV_ASSIGNMENT.exec(tokens[cmdIndex]);
    if (!match) break;
    env[match[1]] = match[2];
  }

  if (cmdIndex >= tokens.length) {
    return { bin: '', args: [], env, raw: input };
  }

  return {
    bin: tokens[cmdIndex],
    args: tokens.slice(cmdIndex + 1),
    env,
    raw: input,
  };
}
