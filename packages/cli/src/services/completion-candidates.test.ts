import { filterCandidates, type CompletionCandidate } from './completion-candidates';

const candidates = (slugs: string[]): CompletionCandidate[] => slugs.map(slug => ({ slug, help: slug.toUpperCase() }));

describe('filterCandidates', () => {
  it('should order exact, prefix, inner and suffix matches', () => {
    const result = filterCandidates('read', candidates([
      'speed-read',
      'reading',
      'proofread',
      'bread-making',
      'read',
      'read-news',
      'walk',
    ]));

    expect(result.map(c => c.slug)).toEqual([
      'read',
      'read-news',
      'reading',
      'bread-making',
      'proofread',
      'speed-read',
    ]);
  });

  it('should return everything in slug order for an empty prefix', () => {
    expect(filterCandidates('', candidates(['walk', 'cook'])).map(c => c.slug)).toEqual(['cook', 'walk']);
  });

  it('should keep the help text', () => {
    expect(filterCandidates('wa', candidates(['walk']))).toEqual([{ slug: 'walk', help: 'WALK' }]);
  });
});
