import { integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';

export const FIT_CATEGORIES = ['fit', 'makeup', 'food', 'nails', 'style', 'other'] as const;

// `image_url` holds the stored filename, not a URL; the absolute URL is built per request.
export const posts = sqliteTable('posts', {
  id: text('id').primaryKey(),
  username: text('username').notNull(),
  caption: text('caption').default(''),
  category: text('category').default('other'),
  imageFile: text('image_url').notNull(),
  shareToken: text('share_token').notNull().unique(),
  pinHash: text('pin_hash'),
  createdAt: text('created_at').notNull(),
});

export const ratings = sqliteTable('ratings', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  postId: text('post_id')
    .notNull()
    .references(() => posts.id, { onDelete: 'cascade' }),
  raterName: text('rater_name').default('Anonymous'),
  score: integer('score').notNull(),
  createdAt: text('created_at').notNull(),
});

export const reactions = sqliteTable('reactions', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  postId: text('post_id')
    .notNull()
    .references(() => posts.id, { onDelete: 'cascade' }),
  emoji: text('emoji').notNull(),
  createdAt: text('created_at').notNull(),
});

export type PostRow = typeof posts.$inferSelect;

// Kept in sync with the tables above; applied on every startup.
export const SCHEMA_DDL = `
  CREATE TABLE IF NOT EXISTS posts (
    id TEXT PRIMARY KEY,
    username TEXT NOT NULL,
    caption TEXT DEFAULT '',
    category TEXT DEFAULT 'other',
    image_url TEXT NOT NULL,
    share_token TEXT UNIQUE NOT NULL,
    pin_hash TEXT,
    created_at TEXT NOT NULL
  );
  CREATE TABLE IF NOT EXISTS ratings (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    post_id TEXT NOT NULL,
    rater_name TEXT DEFAULT 'Anonymous',
    score INTEGER NOT NULL CHECK(score BETWEEN 1 AND 10),
    created_at TEXT NOT NULL,
    FOREIGN KEY(post_id) REFERENCES posts(id) ON DELETE CASCADE
  );
  CREATE TABLE IF NOT EXISTS reactions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    post_id TEXT NOT NULL,
    emoji TEXT NOT NULL,
    created_at TEXT NOT NULL,
    FOREIGN KEY(post_id) REFERENCES posts(id) ON DELETE CASCADE
  );
`;
