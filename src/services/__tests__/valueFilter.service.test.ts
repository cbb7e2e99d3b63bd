import { describe, it, expect } from 'vitest';
import { filterValuable } from '../valueFilter.service';
import { DomainCandidate } from '../../types/domain';

function candidate(overrides: Partial<DomainCandidate> & { name: string }): DomainCandidate {
  return {
    namespace: 'se',
    releaseDate: '2026-01-11',
    available: 'available',
    indexed: 'present',
    estimatedPages: null,
    indexSource: 'archive',
    checkedAt: '2026-01-10T20:00:00.000Z',
    ...overrides,
  };
}

describe('filterValuable', () => {
  it('keeps an indexed candidate without a page count', () => {
    const kept = filterValuable([candidate({ name: 'x.se', estimatedPages: null })], 1);

    expect(kept.map((c) => c.name)).toEqual(['x.se']);
  });

  it('applies the minimum as an inclusive bound', () => {
    const kept = filterValuable(
      [
        candidate({ name: 'below.se', estimatedPages: 4 }),
        candidate({ name: 'equal.se', estimatedPages: 5 }),
        candidate({ name: 'above.se', estimatedPages: 6 }),
      ],
      5,
    );

    expect(kept.map((c) => c.name)).toEqual(['equal.se', 'above.se']);
  });

  it('drops absent and unknown candidates regardless of pages', () => {
    const kept = filterValuable(
      [
        candidate({ name: 'absent.se', indexed: 'absent', estimatedPages: 0 }),
        candidate({ name: 'unknown.se', indexed: 'unknown', estimatedPages: null, indexSource: '' }),
        candidate({ name: 'present.se', estimatedPages: 2 }),
      ],
      0,
    );

    expect(kept.map((c) => c.name)).toEqual(['present.se']);
    expect(kept.every((c) => c.indexed === 'present')).toBe(true);
  });
});
