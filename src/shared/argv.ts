/**
 * Split operator-typed parameters into an argument vector. Single and double
 * quotes group words and are removed; nothing is expanded or evaluated.
 */
export function splitArguments(input: string): string[] {
  const args: string[] = [];
  let current = '';
  let inWord = false;
  let quote: '"' | "'" | null = null;

  for (const ch of input) {
    if (quote) {
      if (ch === quote) quote = null;
      else current += ch;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) {
        args.push(current);
        current = '';
        inWord = false;
      }
    } else {
      current += ch;
      inWord = true;
    }
  }
  if (quote) {
    throw new Error(`Unterminated ${quote === '"' ? 'double' : 'single'} quote in: ${input}`);
  }
  if (inWord) args.push(current);
  return args;
}
