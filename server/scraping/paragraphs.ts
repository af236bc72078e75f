/**
 * Phrase lists that strip boilerplate from a site's paragraph stream. All phrase
 * matching is case-insensitive substring matching unless noted.
 */
export interface ParagraphRules {
  /** Stop collecting at the first paragraph containing any of these; everything after is footer. */
  hardStop?: readonly string[];
  /** Drop paragraphs containing any of these. */
  skip?: readonly string[];
  /** Drop paragraphs containing every phrase of any one group. */
  skipAll?: ReadonlyArray<readonly string[]>;
  /** Drop paragraphs whose whole lowercased text equals one of these. */
  skipExact?: readonly string[];
  /** Drop short paragraphs containing any of these phrases. */
  skipShort?: { phrases: readonly string[]; maxLength: number };
  /** Reject the whole article when any paragraph contains one of these. */
  rejectArticle?: readonly string[];
  /** Checked against the first non-empty paragraph only. */
  firstParagraph?: {
    reject?: readonly string[];
    /** Case-sensitive prefixes, e.g. obituaries opening with `Born`. */
    rejectPrefixes?: readonly string[];
  };
}

export type ParagraphOutcome =
  | { kind: 'accepted'; paragraphs: string[] }
  | { kind: 'rejected'; reason: string };

const containsAny = (text: string, phrases: readonly string[] | undefined): string | undefined =>
  phrases?.find((phrase) => text.includes(phrase));

export const filterParagraphs = (blocks: readonly string[], rules: ParagraphRules): ParagraphOutcome => {
  const paragraphs: string[] = [];
  let firstChecked = false;

  for (const raw of blocks) {
    const text = raw.trim();
    if (!text) continue;
    const lowered = text.toLowerCase();

    if (!firstChecked) {
      firstChecked = true;
      const disclaimer = containsAny(lowered, rules.firstParagraph?.reject);
      if (disclaimer) {
        return { kind: 'rejected', reason: `first paragraph contains "${disclaimer}"` };
      }
      const prefix = rules.firstParagraph?.rejectPrefixes?.find((p) => text.startsWith(p));
      if (prefix) {
        return { kind: 'rejected', reason: `first paragraph starts with "${prefix}"` };
      }
    }

    const blocked = containsAny(lowered, rules.rejectArticle);
    if (blocked) {
      return { kind: 'rejected', reason: `blocked content "${blocked}"` };
    }

    if (containsAny(lowered, rules.hardStop)) break;
    if (rules.skipExact?.includes(lowered)) continue;
    if (containsAny(lowered, rules.skip)) continue;
    if (rules.skipAll?.some((group) => group.every((phrase) => lowered.includes(phrase)))) continue;
    if (rules.skipShort && lowered.length < rules.skipShort.maxLength && containsAny(lowered, rules.skipShort.phrases)) {
      continue;
    }

    paragraphs.push(text);
  }

  return { kind: 'accepted', paragraphs };
};
