// node/src/utils/text.ts

/** Length in Unicode code points; an emoji outside the BMP counts once. */
export function charLength(text: string): number {
  return Array.from(text).length;
}
