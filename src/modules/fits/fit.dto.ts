import type { PostRow } from '../database/schema';
import { publicAssetUrl } from '../../common/assets/public-asset-url';

export type ReactionCountsDto = Record<string, number>;

export type FitStatsDto = {
  /** Mean score rounded to one decimal; null until the first rating. */
  avg_rating: number | null;
  total_ratings: number;
  reactions: ReactionCountsDto;
};

export type FitDto = {
  id: string;
  username: string;
  caption: string;
  category: string;
  image_url: string;
  share_token: string;
  created_at: string;
} & FitStatsDto;

export type CreatedFitDto = {
  id: string;
  share_token: string;
  share_url: string;
};

export type RatedFitDto = { message: string } & FitStatsDto;

export type ReactedFitDto = {
  message: string;
  reactions: ReactionCountsDto;
};

export type MessageDto = { message: string };

export function shareUrlFor(shareToken: string): string {
  return `/rate/${shareToken}`;
}

/**
 * One decimal, ties to even, decided on the exact binary value of `avg`:
 * 7.25 is a true tie and gives 7.2, while 1.15 is stored just below the tie and gives 1.1.
 */
export function roundRating(avg: number | null | undefined): number | null {
  if (avg == null || !Number.isFinite(avg)) return null;
  // toFixed switches to exponent notation from 1e21 on; such values have no fraction anyway.
  if (Math.abs(avg) >= 1e21) return avg;
  if (avg < 0) {
    const rounded = roundRating(-avg);
    return rounded === null ? null : -rounded;
  }

  // toFixed(100) prints the exact expansion for any value with at most 100 fractional digits.
  const [whole, fraction] = avg.toFixed(100).split('.');
  const tenth = Number(fraction[0]);
  const rest = fraction.slice(1);
  let tenths = Number(whole) * 10 + tenth;

  const above = rest[0] > '5' || (rest[0] === '5' && /[1-9]/.test(rest.slice(1)));
  const tie = /^50*$/.test(rest);
  if (above || (tie && tenth % 2 === 1)) tenths += 1;
  return tenths / 10;
}

export function toFitDto(post: PostRow, stats: FitStatsDto, publicBaseUrl: string): FitDto {
  return {
    id: post.id,
    username: post.username,
    caption: post.caption ?? '',
    category: post.category ?? 'other',
    image_url: publicAssetUrl({ publicBaseUrl, key: post.imageFile }),
    share_token: post.shareToken,
    created_at: post.createdAt,
    ...stats,
  };
}
