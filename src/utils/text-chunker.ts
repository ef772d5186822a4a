import type { ProviderId } from "../config/types.js";

export const PROVIDER_LIMITS: Record<ProviderId, number> = {
  evolution: 4096,
  twilio: 1600,
};

const SENTENCE_END = /[.!?]\s+(?=[A-ZÁÉÍÓÚÑ¿¡])/g;

/**
 * Split `text` into pieces no longer than `maxLength`, preferring paragraph,
 * then sentence, then line, then word boundaries. A boundary is only taken
 * when it keeps at least 30% of the window, otherwise the next kind is tried.
 */
export function chunkText(text: string, maxLength: number): string[] {
  if (text.length <= maxLength) return [text];

  const chunks: string[] = [];
  let remaining = text;

  while (remaining.length > 0) {
    if (remaining.length <= maxLength) {
      chunks.push(remaining);
      break;
    }

    const slice = remaining.slice(0, maxLength);
    const minSplit = maxLength * 0.3;
    let splitAt = -1;

    const paraIdx = slice.lastIndexOf("\n\n");
    if (paraIdx > minSplit) {
      splitAt = paraIdx + 2;
    }

    if (splitAt === -1) {
      let lastEnd = -1;
      for (const match of slice.matchAll(SENTENCE_END)) {
        lastEnd = (match.index ?? 0) + match[0].length;
      }
      if (lastEnd > minSplit) splitAt = lastEnd;
    }

    if (splitAt === -1) {
      const newlineIdx = slice.lastIndexOf("\n");
      if (newlineIdx > minSplit) splitAt = newlineIdx + 1;
    }

    if (splitAt === -1) {
      const spaceIdx = slice.lastIndexOf(" ");
      if (spaceIdx > minSplit) splitAt = spaceIdx + 1;
    }

    if (splitAt === -1) {
      splitAt = maxLength;
    }

    chunks.push(remaining.slice(0, splitAt));
    remaining = remaining.slice(splitAt);
  }

  return chunks;
}
