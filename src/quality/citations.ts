/**
 * Citation markers.
 *
 * Body text cites sources as `[1]`, `[1, 2]` or `[3 4]`. A group is only a
 * citation when it holds nothing but numbers, commas and whitespace, so
 * `[see above]` and `[a](link)` never count.
 */

const CITATION_GROUP = /\[(\d+(?:[\s,]+?\d+)*)\]/g;

function numbersIn(group: string): number[] {
  return (group.match(/\d+/g) ?? []).map(Number);
}

/**
 * Every citation number used in `text`.
 */
export function extractCitations(text: string): Set<number> {
  const found = new Set<number>();
  for (const match of text.matchAll(CITATION_GROUP)) {
    for (const n of numbersIn(match[1] ?? "")) {
      found.add(n);
    }
  }
  return found;
}

/**
 * Remove the given numbers from every citation group.
 *
 * Only groups that contain one of the numbers are rewritten: `[5]` is
 * removed, `[2, 5]` and `[5 2]` become `[2]`, and `[15]` stays when 5 is
 * removed. Running it twice gives the same text as running it once.
 */
export function removeCitations(text: string, numbers: ReadonlySet<number>): string {
  if (numbers.size === 0) {
    return text;
  }
  return text.replace(CITATION_GROUP, (whole: string, group: string) => {
    const cited = numbersIn(group);
    if (!cited.some((n) => numbers.has(n))) {
      return whole;
    }
    const kept = cited.filter((n) => !numbers.has(n));
    return kept.length > 0 ? `[${kept.join(", ")}]` : "";
  });
}
