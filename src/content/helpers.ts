/**
 * Text helpers: word counts, tag stripping, read time and publication date.
 */

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed === "" ? 0 : trimmed.split(/\s+/).length;
}

/** Length in characters (code points), so an emoji counts once. */
export function charLength(text: string): number {
  return Array.from(text).length;
}

/** The first `count` characters, never splitting a surrogate pair. */
export function leadingChars(text: string, count: number): string {
  return Array.from(text).slice(0, count).join("");
}

export function stripHtmlTags(text: string): string {
  return text.replace(/<[^>]*>/g, "");
}

/**
 * Whole minutes, never less than one.
 */
export function estimateReadTime(wordCount: number, wordsPerMinute = 200): number {
  return Math.max(1, Math.ceil(wordCount / wordsPerMinute));
}

/** DD.MM.YYYY in local time */
export function formatDate(date: Date): string {
  const day = String(date.getDate()).padStart(2, "0");
  const month = String(date.getMonth() + 1).padStart(2, "0");
  return `${day}.${month}.${date.getFullYear()}`;
}

/**
 * A date between `daysBack` days ago and `now`, inclusive, as DD.MM.YYYY.
 */
export function generateRandomDate(
  daysBack = 90,
  now: Date = new Date(),
  random: () => number = Math.random
): string {
  const offset = Math.floor(random() * (daysBack + 1));
  const date = new Date(now.getTime());
  date.setDate(date.getDate() - offset);
  return formatDate(date);
}
