/**
 * Greedy line fill. Words are added to the current line while the measured
 * width stays within `maxWidth`; a word that is wider than `maxWidth` on its
 * own is placed alone on its line.
 */
export const wrapText = (text: string, maxWidth: number, measure: (line: string) => number): string[] => {
  const words = text.split(/\s+/).filter((w) => w.length > 0);
  const lines: string[] = [];
  let current = '';

  for (const word of words) {
    if (current === '') {
      current = word;
      continue;
    }
    const candidate = `${current} ${word}`;
    if (measure(candidate) <= maxWidth) {
      current = candidate;
    } else {
      lines.push(current);
      current = word;
    }
  }
  if (current !== '') lines.push(current);

  return lines;
};

/** Splits on blank lines; single newlines inside a paragraph are treated as spaces. */
export const splitParagraphs = (text: string): string[] =>
  text
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
