/**
 * Models sometimes wrap JSON in markdown fences (```json ... ```) even when told not to.
 */
export function stripCodeFences(text: string): string {
  return text.replace(/```json/gi, '').replace(/```/g, '').trim();
}

/** Parse a model reply as JSON. Throws SyntaxError on malformed input. */
export function parseJsonReply(text: string): unknown {
  return JSON.parse(stripCodeFences(text));
}
