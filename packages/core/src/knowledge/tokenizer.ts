/**
 * Bag-of-words tokenizer for keyword matching.
 *
 * Latin-script words stay whole. Scripts written without spaces (Han, Kana,
 * Hangul) are split into character bigrams so that "退火炉温度异常" shares
 * tokens with "退火" and "温度".
 */

const WORD_RUN = /[\p{L}\p{N}_-]+/gu
const CJK_CHAR = /[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Hangul}]/u

function splitByScript(run: string): Array<{ text: string; cjk: boolean }> {
  const segments: Array<{ text: string; cjk: boolean }> = []
  for (const char of run) {
    const cjk = CJK_CHAR.test(char)
    const last = segments[segments.length - 1]
    if (last && last.cjk === cjk) {
      last.text += char
    } else {
      segments.push({ text: char, cjk })
    }
  }
  return segments
}

function bigrams(segment: string): string[] {
  const chars = Array.from(segment)
  if (chars.length < 2) return chars
  const grams: string[] = []
  for (let i = 0; i < chars.length - 1; i++) {
    grams.push(chars[i] + chars[i + 1])
  }
  return grams
}

/** Tokens in first-seen order, without duplicates. */
export function tokenize(text: string): string[] {
  const tokens = new Set<string>()
  for (const match of text.toLowerCase().matchAll(WORD_RUN)) {
    for (const segment of splitByScript(match[0])) {
      if (segment.cjk) {
        for (const gram of bigrams(segment.text)) tokens.add(gram)
      } else {
        tokens.add(segment.text)
      }
    }
  }
  return [...tokens]
}
