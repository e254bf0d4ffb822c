export const MAX_INPUT_CHARS = 2000
export const TRUNCATION_MARKER = "[Response truncated due to length]"

const MARKER_WORDS = TRUNCATION_MARKER.split(" ").length

export const sanitize = (s: string, max = MAX_INPUT_CHARS) =>
  String(s || "")
    .replace(/[<>{}[\]$`\\]/g, "")
    .slice(0, max)

const countWords = (s: string) => s.split(/\s+/).filter(Boolean).length

// never returns more words than the input: the marker is left off, or the hard cut shortened, to make room
export function enforceOutputLength(text: string, maxWords = 200): string {
  const words = text.split(/\s+/).filter(Boolean)
  if (words.length <= maxWords) return text

  const truncated = words.slice(0, maxWords).join(" ")
  const end = Math.max(truncated.lastIndexOf("."), truncated.lastIndexOf("?"), truncated.lastIndexOf("!"))
  if (end > 0) {
    const head = truncated.slice(0, end + 1)
    return countWords(head) + MARKER_WORDS <= words.length ? `${head} ${TRUNCATION_MARKER}` : head
  }

  const keep = Math.min(maxWords, words.length - MARKER_WORDS)
  if (keep < 1) return truncated
  return `${words.slice(0, keep).join(" ")}... ${TRUNCATION_MARKER}`
}
