const TAG_RE = /<([A-Za-z_][\w.-]*)>([\s\S]*?)<\/\1>/g;

/**
 * Collect `<name>value</name>` pairs from model output, in order of first
 * appearance. Values are trimmed; a name seen more than once maps to all of
 * its values in order.
 */
export function extractTagValues(text: string): Map<string, string | string[]> {
  const tags = new Map<string, string | string[]>();

  for (const match of text.matchAll(TAG_RE)) {
    const name = match[1];
    const value = match[2].trim();
    const existing = tags.get(name);
    if (existing === undefined) {
      tags.set(name, value);
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      tags.set(name, [existing, value]);
    }
  }

  return tags;
}
