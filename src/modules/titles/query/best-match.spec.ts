import { bestMatchScore, rankByBestMatch } from './best-match';

describe('bestMatchScore', () => {
  it('adds up exact, prefix, substring and suffix signals', () => {
    expect(bestMatchScore('Action', 'action')).toBe(6);
    expect(bestMatchScore('Action Movie', 'action')).toBe(3);
    expect(bestMatchScore('The Action', 'action')).toBe(2);
    expect(bestMatchScore('The Action Hero', 'action')).toBe(1);
    expect(bestMatchScore('Drama', 'action')).toBe(0);
  });

  it('ignores case on both sides', () => {
    expect(bestMatchScore('ALIEN', 'aLiEn')).toBe(6);
  });
});

describe('rankByBestMatch', () => {
  const titles = [
    { id: 1, title: 'The Action Hero' },
    { id: 2, title: 'The Action' },
    { id: 3, title: 'Action' },
    { id: 4, title: 'Action Movie' },
    { id: 5, title: 'Action' },
  ];

  it('puts the best matches first for descending order', () => {
    const ranked = rankByBestMatch(titles, 'action', 'DESC');
    expect(ranked.map((t) => t.id)).toEqual([3, 5, 4, 2, 1]);
  });

  it('reverses scores for ascending order and keeps ties in input order', () => {
    const ranked = rankByBestMatch(titles, 'action', 'ASC');
    expect(ranked.map((t) => t.id)).toEqual([1, 2, 4, 3, 5]);
  });

  it('does not mutate its input', () => {
    rankByBestMatch(titles, 'action', 'DESC');
    expect(titles.map((t) => t.id)).toEqual([1, 2, 3, 4, 5]);
  });
});
