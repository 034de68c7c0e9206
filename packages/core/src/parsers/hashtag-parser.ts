/**
 * Extracts #tag markers from task titles and merges them with native tags.
 * A tag is '#' followed by letters, digits or underscores; "C# code" has none.
 */

const TAG_RE = /#([\p{L}\p{N}_]+)/gu;
// A tag together with the whitespace right before it
const TAG_WITH_SPACE_RE = /\s*#[\p{L}\p{N}_]+/gu;

export interface ExtractedTags {
  readonly cleanTitle: string;
  readonly tags: string[];
}

/** Collect all matches from a global regex into an array of the first capture group */
function allMatches(re: RegExp, str: string): string[] {
  const results: string[] = [];
  re.lastIndex = 0;
  let m: RegExpExecArray | null;
  while ((m = re.exec(str)) !== null) {
    if (m[1] !== undefined) results.push(m[1]);
  }
  return results;
}

export function extractTags(title: string): ExtractedTags {
  return {
    cleanTitle: title.replace(TAG_WITH_SPACE_RE, '').trim(),
    tags: allMatches(TAG_RE, title),
  };
}

/**
 * Title tags first, then native tags. Duplicates are compared case-insensitively;
 * the first spelling wins.
 */
export function mergeTags(hashtags: readonly string[], native: readonly string[]): string[] {
  const seen = new Set<string>();
  const merged: string[] = [];
  for (const tag of [...hashtags, ...native]) {
    const key = tag.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    merged.push(tag);
  }
  return merged;
}
