// First <tag>...</tag> pair anywhere in the text, same tag name on both ends, non-greedy.
const WRAPPING_TAG_PATTERN = /<(?<tag>\w+)>(?<content>[\s\S]*?)<\/\k<tag>>/

/**
 * Models sometimes answer inside an XML-like wrapper such as <answer>...</answer>.
 * Returns the trimmed inner content of the first matching pair, or the text
 * unchanged when there is none.
 */
export function stripWrappingTag(text: string): string {
  const match = WRAPPING_TAG_PATTERN.exec(text.trim())
  const content = match?.groups?.content
  return content === undefined ? text : content.trim()
}
