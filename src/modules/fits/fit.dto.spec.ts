import type { PostRow } from '../database/schema';
import { roundRating, shareUrlFor, toFitDto } from './fit.dto';

const row: PostRow = {
  id: 'post-1',
  username: 'ava',
  caption: null,
  category: null,
  imageFile: 'post-1.png',
  shareToken: 'abcd1234',
  pinHash: 'not-exposed',
  createdAt: '2026-10-01T12:00:00.000Z',
};

describe('roundRating', () => {
  it('rounds to one decimal', () => {
    expect(roundRating(8)).toBe(8);
    expect(roundRating(22 / 3)).toBe(7.3);
    expect(roundRating(6.66)).toBe(6.7);
    expect(roundRating(5.5)).toBe(5.5);
  });

  it('sends exact ties to the even tenth', () => {
    expect(roundRating((7 + 7 + 8 + 7) / 4)).toBe(7.2);
    expect(roundRating((6 + 6 + 7 + 6) / 4)).toBe(6.2);
    expect(roundRating(7.75)).toBe(7.8);
    expect(roundRating(0.05)).toBe(0.1);
  });

  it('rounds on the stored binary value, not the decimal literal', () => {
    // 1.15 and 7.35 are stored slightly below the midpoint.
    expect(roundRating(23 / 20)).toBe(1.1);
    expect(roundRating(7.35)).toBe(7.3);
  });

  it('is null without ratings', () => {
    expect(roundRating(null)).toBeNull();
    expect(roundRating(undefined)).toBeNull();
  });
});

describe('toFitDto', () => {
  it('builds the public shape with an absolute image url and no pin hash', () => {
    const dto = toFitDto(row, { avg_rating: null, total_ratings: 0, reactions: {} }, 'https://cdn.example/');
    expect(dto).toEqual({
      id: 'post-1',
      username: 'ava',
      caption: '',
      category: 'other',
      image_url: 'https://cdn.example/uploads/post-1.png',
      share_token: 'abcd1234',
      created_at: '2026-10-01T12:00:00.000Z',
      avg_rating: null,
      total_ratings: 0,
      reactions: {},
    });
  });
});

describe('shareUrlFor', () => {
  it('is a relative rate path', () => {
    expect(shareUrlFor('abcd1234')).toBe('/rate/abcd1234');
  });
});
