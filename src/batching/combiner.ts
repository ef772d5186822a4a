const GREETINGS = new Set([
  "hola",
  "holi",
  "buenas",
  "buenos dias",
  "buenos días",
  "buenas tardes",
  "buenas noches",
  "gracias",
  "muchas gracias",
  "mil gracias",
  "chao",
  "adios",
  "adiós",
  "hello",
  "hi",
  "hey",
  "thanks",
  "thank you",
  "bye",
]);

const CONNECTIVES = new Set([
  "a",
  "al",
  "con",
  "de",
  "del",
  "en",
  "para",
  "por",
  "sin",
  "el",
  "la",
  "los",
  "las",
  "un",
  "una",
  "the",
  "of",
  "to",
  "for",
  "in",
  "with",
]);

function normalizeToken(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/[!¡?¿.,;:]+/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

export function isGreeting(fragment: string): boolean {
  return GREETINGS.has(normalizeToken(fragment));
}

/** True when the fragment ends on a preposition or article and reads as cut off. */
export function continuesIntoNext(fragment: string): boolean {
  const words = normalizeToken(fragment).split(" ");
  const last = words[words.length - 1];
  return last !== undefined && CONNECTIVES.has(last);
}

/**
 * Group fragments into clauses. Greetings stand alone; a fragment ending on a
 * connective is held and joined with whatever follows it.
 */
export function splitClauses(fragments: readonly string[]): string[] {
  const clauses: string[] = [];
  let run: string[] = [];

  const flushRun = () => {
    if (run.length > 0) {
      clauses.push(run.join(" "));
      run = [];
    }
  };

  for (const fragment of fragments) {
    if (isGreeting(fragment)) {
      flushRun();
      clauses.push(fragment);
      continue;
    }
    run.push(fragment);
    if (!continuesIntoNext(fragment)) flushRun();
  }
  flushRun();

  return clauses;
}

/**
 * Merge the fragments of one turn into a single text, in arrival order.
 * Every fragment appears exactly once, separated by a single space.
 */
export function combineFragments(fragments: readonly string[]): string {
  if (fragments.length === 1) return fragments[0] ?? "";
  return splitClauses(fragments).join(" ");
}
