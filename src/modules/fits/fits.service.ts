import { BadRequestException, ForbiddenException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { desc, eq, or, sql } from 'drizzle-orm';
import { DatabaseService } from '../database/database.service';
import { posts, ratings, reactions, type PostRow } from '../database/schema';
import { UploadsService } from '../uploads/uploads.service';
import { isImageContentType, storedImageFilename } from '../uploads/uploads.utils';
import {
  roundRating,
  shareUrlFor,
  toFitDto,
  type CreatedFitDto,
  type FitDto,
  type FitStatsDto,
  type MessageDto,
  type RatedFitDto,
  type ReactedFitDto,
  type ReactionCountsDto,
} from './fit.dto';
import { hashPin, newPostId, newShareToken, pinAllowsDelete } from './fits.utils';

export const MIN_SCORE = 1;
export const MAX_SCORE = 10;
export const DEFAULT_RATER_NAME = 'Anonymous';
export const DEFAULT_CATEGORY = 'other';

export type UploadedImage = {
  originalName: string | null;
  contentType: string | null;
  bytes: Buffer;
};

export type CreateFitInput = {
  username: string;
  caption?: string | null;
  category?: string | null;
  pin?: string | null;
  image: UploadedImage;
};

@Injectable()
export class FitsService {
  private readonly logger = new Logger(FitsService.name);

  constructor(
    private readonly database: DatabaseService,
    private readonly uploads: UploadsService,
  ) {}

  async create(input: CreateFitInput): Promise<CreatedFitDto> {
    if (!isImageContentType(input.image.contentType)) {
      throw new BadRequestException('File must be an image');
    }

    const id = newPostId();
    const shareToken = newShareToken();
    const imageFile = storedImageFilename(id, input.image.originalName);

    // File first, then row. Not atomic: a failed insert leaves the file behind.
    await this.uploads.write(imageFile, input.image.bytes);

    this.database.db
      .insert(posts)
      .values({
        id,
        username: input.username,
        caption: input.caption ?? '',
        category: input.category ?? DEFAULT_CATEGORY,
        imageFile,
        shareToken,
        pinHash: input.pin ? hashPin(input.pin) : null,
        createdAt: new Date().toISOString(),
      })
      .run();

    this.logger.log(`Created fit ${id} share=${shareToken}`);
    return { id, share_token: shareToken, share_url: shareUrlFor(shareToken) };
  }

  /** Every post, newest first (insertion order breaks timestamp ties). */
  async list(params: { publicBaseUrl: string }): Promise<FitDto[]> {
    const rows = this.database.db
      .select()
      .from(posts)
      .orderBy(desc(posts.createdAt), desc(sql`rowid`))
      .all();
    return rows.map((row) => toFitDto(row, this.statsFor(row.id), params.publicBaseUrl));
  }

  async getByToken(params: { token: string; publicBaseUrl: string }): Promise<FitDto> {
    const row = this.requirePost(params.token);
    return toFitDto(row, this.statsFor(row.id), params.publicBaseUrl);
  }

  async rate(params: { token: string; score: number; raterName?: string | null }): Promise<RatedFitDto> {
    if (!Number.isInteger(params.score) || params.score < MIN_SCORE || params.score > MAX_SCORE) {
      throw new BadRequestException(`Score must be ${MIN_SCORE}-${MAX_SCORE}`);
    }
    const post = this.requirePost(params.token);

    this.database.db
      .insert(ratings)
      .values({
        postId: post.id,
        raterName: params.raterName ?? DEFAULT_RATER_NAME,
        score: params.score,
        createdAt: new Date().toISOString(),
      })
      .run();

    return { message: 'Rated! ✨', ...this.statsFor(post.id) };
  }

  async react(params: { token: string; emoji: string }): Promise<ReactedFitDto> {
    const post = this.requirePost(params.token);

    this.database.db
      .insert(reactions)
      .values({
        postId: post.id,
        emoji: params.emoji,
        createdAt: new Date().toISOString(),
      })
      .run();

    return { message: 'Reacted!', reactions: this.reactionCounts(post.id) };
  }

  async remove(params: { token: string; pin?: string | null }): Promise<MessageDto> {
    const post = this.requirePost(params.token);
    if (!pinAllowsDelete(post.pinHash, params.pin)) {
      throw new ForbiddenException('Invalid PIN');
    }

    // Not atomic: a failing row delete after this leaves a post without its image.
    await this.uploads.remove(post.imageFile);
    // Ratings and reactions go with it (ON DELETE CASCADE).
    this.database.db.delete(posts).where(eq(posts.id, post.id)).run();

    this.logger.log(`Deleted fit ${post.id}`);
    return { message: 'Post deleted ✨' };
  }

  /** Aggregates are recomputed on every read; nothing is cached or stored. */
  statsFor(postId: string): FitStatsDto {
    const agg = this.database.db
      .select({
        avg: sql<number | null>`avg(${ratings.score})`,
        total: sql<number>`count(*)`,
      })
      .from(ratings)
      .where(eq(ratings.postId, postId))
      .get();

    return {
      avg_rating: roundRating(agg?.avg),
      total_ratings: Number(agg?.total ?? 0),
      reactions: this.reactionCounts(postId),
    };
  }

  private reactionCounts(postId: string): ReactionCountsDto {
    const rows = this.database.db
      .select({ emoji: reactions.emoji, count: sql<number>`count(*)` })
      .from(reactions)
      .where(eq(reactions.postId, postId))
      .groupBy(reactions.emoji)
      .all();
    return Object.fromEntries(rows.map((r) => [r.emoji, Number(r.count)]));
  }

  /** Share token or raw id; both resolve. */
  private findByToken(token: string): PostRow | undefined {
    return this.database.db
      .select()
      .from(posts)
      .where(or(eq(posts.shareToken, token), eq(posts.id, token)))
      .limit(1)
      .get();
  }

  private requirePost(token: string): PostRow {
    const post = this.findByToken(token);
    if (!post) throw new NotFoundException('Post not found');
    return post;
  }
}
