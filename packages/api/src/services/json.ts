/**
 * Parse the JSON object an LLM returned in JSON mode.
 * Tolerates a fenced or prefixed reply by falling back to the outermost braces.
 */
export function parseJsonObject(text: string): unknown {
  const trimmed = text.trim();
  try {
    return JSON.parse(trimmed);
  } catch (error) {
    const start = trimmed.indexOf('{');
    const end = trimmed.lastIndexOf('}');
    if (start === -1 || end <= start) {
      throw new Error(`LLM reply is not JSON: ${trimmed.slice(0, 80)}`, { cause: error });
    }
    return JSON.parse(trimmed.slice(start, end + 1));
  }
}
