/**
 * Replace every backslash-escaped character with the character itself
 * (`\&` -> `&`, `\\` -> `\`). Single pass, left to right.
 */
export function unescape(text: string): string {
  return text.replace(/\\(.)/gs, "$1");
}
