export type TextMatcher = (command: string) => boolean;

const matchEverything: TextMatcher = () => true;

/**
 * Whitespace-separated terms, all required, matched as substrings. A term is
 * case-sensitive only when it contains an uppercase letter.
 */
export function compileTextMatcher(text: string | undefined): TextMatcher {
  const terms = (text ?? "").split(/\s+/u).filter((term) => term.length > 0);
  if (terms.length === 0) {
    return matchEverything;
  }
  const compiled = terms.map((term) => {
    const caseSensitive = term !== term.toLowerCase();
    return { needle: caseSensitive ? term : term.toLowerCase(), caseSensitive };
  });
  return (command) => {
    let lowered: string | undefined;
    for (const term of compiled) {
      if (term.caseSensitive) {
        if (!command.includes(term.needle)) return false;
        continue;
      }
      lowered ??= command.toLowerCase();
      if (!lowered.includes(term.needle)) return false;
    }
    return true;
  };
}
