const TRAILING_IDENTIFIER = /[A-Za-z_$][\w$]*$/;

export interface Completion {
  /** The identifier being completed */
  prefix: string;
  matches: string[];
  /** The input with the prefix extended as far as all matches agree */
  text: string;
}

export function trailingIdentifier(input: string): string {
  return TRAILING_IDENTIFIER.exec(input)?.[0] ?? '';
}

export function longestCommonPrefix(words: readonly string[]): string {
  if (words.length === 0) {
    return '';
  }
  let prefix = words[0];
  for (const word of words.slice(1)) {
    let length = 0;
    while (length < prefix.length && length < word.length && prefix[length] === word[length]) {
      length++;
    }
    prefix = prefix.slice(0, length);
  }
  return prefix;
}

/**
 * Completes the identifier at the end of `input` from `candidates`.
 */
export function completeFrom(input: string, candidates: readonly string[]): Completion {
  const prefix = trailingIdentifier(input);
  const matches = candidates.filter(candidate => candidate.startsWith(prefix));
  if (matches.length === 0) {
    return { prefix, matches, text: input };
  }
  const head = input.slice(0, input.length - prefix.length);
  return { prefix, matches, text: head + longestCommonPrefix(matches) };
}
