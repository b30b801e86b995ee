export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Cuts by code point so a surrogate pair is never split. */
export function truncate(text: string, maxLength: number, marker = ""): string {
  const chars = Array.from(text);
  if (chars.length <= maxLength) return text;
  return chars.slice(0, maxLength).join("") + marker;
}
