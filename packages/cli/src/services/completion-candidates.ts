export type CompletionCandidate = {
  slug: string;
  /** Shown next to the slug by shells that support descriptions */
  help: string;
};

const bySlug = (a: CompletionCandidate, b: CompletionCandidate) => (a.slug < b.slug ? -1 : a.slug > b.slug ? 1 : 0);

/**
 * Filters slugs against what has been typed so far.
 *
 * Result order: the exact match, then prefix matches, then matches inside the
 * slug, then suffix matches; each group sorted by slug. Matching is
 * case-sensitive.
 */
export function filterCandidates(current: string, candidates: CompletionCandidate[]): CompletionCandidate[] {
  let exact: CompletionCandidate | undefined;
  const startsWith: CompletionCandidate[] = [];
  const contains: CompletionCandidate[] = [];
  const endsWith: CompletionCandidate[] = [];

  for (const candidate of candidates) {
    if (candidate.slug === current) {
      exact = candidate;
    } else if (candidate.slug.startsWith(current)) {
      startsWith.push(candidate);
    } else if (candidate.slug.endsWith(current)) {
      endsWith.push(candidate);
    } else if (candidate.slug.includes(current)) {
      contains.push(candidate);
    }
  }

  return [
    ...(exact ? [exact] : []),
    ...startsWith.sort(bySlug),
    ...contains.sort(bySlug),
    ...endsWith.sort(bySlug),
  ];
}
