import { randomUUID } from 'node:crypto';
import type { ErrorLog, Platform, Post, PostStats, PostStatus, ToneStyle } from '@socialdraft/shared';
import { ALL_STATUSES, UPCOMING_POSTS_LIMIT, toIsoString } from '@socialdraft/shared';
import type { SqlExecutor } from '../../db';
import { getParamPlaceholders, normalizeForDb } from '../../utils/db';
import { InvalidTransitionError, NotFoundError, ValidationError } from '../../utils/errors';
import { toErrorLog, toPost, type ErrorLogRow, type PostRow } from './mappers';

export interface NewPostInput {
  userId: string;
  topicId: string;
  platform: Platform;
  content: string;
  hashtags: string[];
  tone: ToneStyle;
  status: Extract<PostStatus, 'draft' | 'pending'>;
  scheduledTime?: string | null;
}

export interface PostListFilters {
  userId: string;
  status?: PostStatus;
  platform?: Platform;
  limit?: number;
  offset?: number;
}

export interface PostList {
  total: number;
  posts: Post[];
}

export interface PublishSuccessRecord {
  postId: string;
  platformPostId: string | null;
  postedAt: string;
}

export interface PublishFailureRecord {
  postId: string;
  retryCount: number;
  status: Extract<PostStatus, 'pending' | 'failed'>;
  // Only applied while the post stays pending.
  scheduledTime: string | null;
  lastError: string;
  errorType: string | null;
  recordedAt: string;
}

export interface PostContentUpdate {
  content: string;
  hashtags?: string[];
}

const DEFAULT_LIST_LIMIT = 50;
const MAX_LIST_LIMIT = 200;

// ── Scheduler-facing queries ──

export async function insertPost(db: SqlExecutor, input: NewPostInput, now = new Date()): Promise<Post> {
  const nowIso = now.toISOString();
  const post: Post = {
    id: randomUUID(),
    userId: input.userId,
    topicId: input.topicId,
    platform: input.platform,
    content: input.content,
    hashtags: input.hashtags,
    tone: input.tone,
    status: input.status,
    scheduledTime: input.scheduledTime ?? null,
    postedAt: null,
    platformPostId: null,
    retryCount: 0,
    lastError: null,
    createdAt: nowIso,
    updatedAt: nowIso,
  };

  const placeholders = getParamPlaceholders(db.dialect, 11);
  await db.execute(
    `INSERT INTO posts (
      id, user_id, topic_id, platform, content, hashtags, tone, status, scheduled_time,
      created_at, updated_at
    ) VALUES (${placeholders.join(', ')})`,
    [
      post.id,
      post.userId,
      post.topicId,
      post.platform,
      post.content,
      normalizeForDb(post.hashtags),
      post.tone,
      post.status,
      post.scheduledTime,
      post.createdAt,
      post.updatedAt,
    ],
  );
  return post;
}

export async function getPostById(db: SqlExecutor, postId: string, userId?: string): Promise<Post | null> {
  const [idPlaceholder, userPlaceholder] = getParamPlaceholders(db.dialect, 2);
  const rows = userId
    ? await db.query<PostRow>(
        `SELECT * FROM posts WHERE id = ${idPlaceholder} AND user_id = ${userPlaceholder} LIMIT 1`,
        [postId, userId],
      )
    : await db.query<PostRow>(`SELECT * FROM posts WHERE id = ${idPlaceholder} LIMIT 1`, [postId]);
  return rows.length ? toPost(rows[0]) : null;
}

// Pending posts whose scheduled time is unset or has passed, oldest first.
export async function findDuePosts(db: SqlExecutor, now: Date): Promise<Post[]> {
  const [nowPlaceholder] = getParamPlaceholders(db.dialect, 1);
  const rows = await db.query<PostRow>(
    `SELECT * FROM posts
     WHERE status = 'pending'
       AND (scheduled_time IS NULL OR scheduled_time <= ${nowPlaceholder})
     ORDER BY created_at ASC`,
    [now.toISOString()],
  );
  return rows.map(toPost);
}

// Both publish outcomes only apply to posts that are still pending; they resolve
// false/null when the post changed state while it was being published.
export async function markPostPosted(db: SqlExecutor, record: PublishSuccessRecord): Promise<boolean> {
  const placeholders = getParamPlaceholders(db.dialect, 5);
  const changes = await db.execute(
    `UPDATE posts
     SET status = 'posted', posted_at = ${placeholders[0]}, platform_post_id = ${placeholders[1]},
         last_error = NULL, updated_at = ${placeholders[2]}
     WHERE id = ${placeholders[3]} AND status = ${placeholders[4]}`,
    [record.postedAt, record.platformPostId, record.postedAt, record.postId, 'pending'],
  );
  return changes > 0;
}

export async function recordPublishFailure(
  db: SqlExecutor,
  failure: PublishFailureRecord,
): Promise<ErrorLog | null> {
  let changes: number;
  if (failure.status === 'failed') {
    const placeholders = getParamPlaceholders(db.dialect, 5);
    changes = await db.execute(
      `UPDATE posts
       SET status = 'failed', retry_count = ${placeholders[0]}, last_error = ${placeholders[1]},
           updated_at = ${placeholders[2]}
       WHERE id = ${placeholders[3]} AND status = ${placeholders[4]}`,
      [failure.retryCount, failure.lastError, failure.recordedAt, failure.postId, 'pending'],
    );
  } else {
    const placeholders = getParamPlaceholders(db.dialect, 6);
    changes = await db.execute(
      `UPDATE posts
       SET retry_count = ${placeholders[0]}, last_error = ${placeholders[1]},
           scheduled_time = ${placeholders[2]}, updated_at = ${placeholders[3]}
       WHERE id = ${placeholders[4]} AND status = ${placeholders[5]}`,
      [
        failure.retryCount,
        failure.lastError,
        failure.scheduledTime,
        failure.recordedAt,
        failure.postId,
        'pending',
      ],
    );
  }
  if (changes === 0) {
    return null;
  }

  const errorLog: ErrorLog = {
    id: randomUUID(),
    postId: failure.postId,
    errorMessage: failure.lastError,
    errorType: failure.errorType,
    attemptNumber: failure.retryCount,
    createdAt: failure.recordedAt,
  };
  const placeholders = getParamPlaceholders(db.dialect, 6);
  await db.execute(
    `INSERT INTO error_logs (id, post_id, error_message, error_type, attempt_number, created_at)
     VALUES (${placeholders.join(', ')})`,
    [
      errorLog.id,
      errorLog.postId,
      errorLog.errorMessage,
      errorLog.errorType,
      errorLog.attemptNumber,
      errorLog.createdAt,
    ],
  );
  return errorLog;
}

// ── Read models ──

export async function listPosts(db: SqlExecutor, filters: PostListFilters): Promise<PostList> {
  const conditions: string[] = [];
  const params: unknown[] = [];

  const addCondition = (column: string, value: unknown) => {
    params.push(value);
    const [placeholder] = getParamPlaceholders(db.dialect, 1, params.length);
    conditions.push(`${column} = ${placeholder}`);
  };

  addCondition('user_id', filters.userId);
  if (filters.status) addCondition('status', filters.status);
  if (filters.platform) addCondition('platform', filters.platform);

  const whereSql = `WHERE ${conditions.join(' AND ')}`;
  const filterParams = [...params];

  const limitValue = Math.min(Math.max(1, filters.limit ?? DEFAULT_LIST_LIMIT), MAX_LIST_LIMIT);
  const offsetValue = Math.max(0, filters.offset ?? 0);
  const [limitPlaceholder, offsetPlaceholder] = getParamPlaceholders(db.dialect, 2, params.length + 1);
  params.push(limitValue, offsetValue);

  const rows = await db.query<PostRow>(
    `SELECT * FROM posts ${whereSql} ORDER BY created_at DESC LIMIT ${limitPlaceholder} OFFSET ${offsetPlaceholder}`,
    params,
  );
  const countRows = await db.query<{ total: number | string }>(
    `SELECT COUNT(*) as total FROM posts ${whereSql}`,
    filterParams,
  );

  return {
    total: Number(countRows[0]?.total ?? 0),
    posts: rows.map(toPost),
  };
}

export async function getPostStats(db: SqlExecutor, userId: string): Promise<PostStats> {
  const [userPlaceholder] = getParamPlaceholders(db.dialect, 1);
  const rows = await db.query<{ status: string; count: number | string }>(
    `SELECT status, COUNT(*) as count FROM posts WHERE user_id = ${userPlaceholder} GROUP BY status`,
    [userId],
  );

  const stats: PostStats = { draft: 0, pending: 0, posted: 0, failed: 0, total: 0 };
  for (const row of rows) {
    const count = Number(row.count ?? 0);
    const status = ALL_STATUSES.find((candidate) => candidate === row.status);
    if (status) stats[status] = count;
    stats.total += count;
  }
  return stats;
}

export async function listUpcomingPosts(
  db: SqlExecutor,
  userId: string,
  limit = UPCOMING_POSTS_LIMIT,
): Promise<Post[]> {
  const [userPlaceholder, limitPlaceholder] = getParamPlaceholders(db.dialect, 2);
  const rows = await db.query<PostRow>(
    `SELECT * FROM posts
     WHERE user_id = ${userPlaceholder} AND status = 'pending' AND scheduled_time IS NOT NULL
     ORDER BY scheduled_time ASC
     LIMIT ${limitPlaceholder}`,
    [userId, limit],
  );
  return rows.map(toPost);
}

export async function listErrorLogs(db: SqlExecutor, postId: string): Promise<ErrorLog[]> {
  const [postPlaceholder] = getParamPlaceholders(db.dialect, 1);
  const rows = await db.query<ErrorLogRow>(
    `SELECT * FROM error_logs WHERE post_id = ${postPlaceholder} ORDER BY attempt_number ASC, created_at ASC`,
    [postId],
  );
  return rows.map(toErrorLog);
}

// ── User lifecycle operations ──

async function requirePost(db: SqlExecutor, userId: string, postId: string): Promise<Post> {
  const post = await getPostById(db, postId, userId);
  if (!post) {
    throw new NotFoundError('post', postId);
  }
  return post;
}

// Status conditions are repeated in each UPDATE/DELETE so a tick that publishes
// the post between the read and the write cannot be overwritten.
function assertChanged(changes: number, message: string): void {
  if (changes === 0) {
    throw new InvalidTransitionError(message);
  }
}

export function parseScheduledTime(value: unknown): string | null {
  if (value === null || value === undefined || value === '') return null;
  const iso = toIsoString(value);
  if (!iso) {
    throw new ValidationError('scheduledTime is not a valid date');
  }
  return iso;
}

export async function updatePostContent(
  db: SqlExecutor,
  userId: string,
  postId: string,
  update: PostContentUpdate,
): Promise<Post> {
  const post = await requirePost(db, userId, postId);
  const notEditable = 'Can only edit draft or failed posts';
  if (post.status !== 'draft' && post.status !== 'failed') {
    throw new InvalidTransitionError(notEditable);
  }
  const content = update.content.trim();
  if (!content) {
    throw new ValidationError('content is required');
  }

  const hashtags = update.hashtags ?? post.hashtags;
  const placeholders = getParamPlaceholders(db.dialect, 4);
  const changes = await db.execute(
    `UPDATE posts
     SET content = ${placeholders[0]}, hashtags = ${placeholders[1]}, updated_at = ${placeholders[2]}
     WHERE id = ${placeholders[3]} AND status IN ('draft', 'failed')`,
    [content, normalizeForDb(hashtags), new Date().toISOString(), postId],
  );
  assertChanged(changes, notEditable);
  return requirePost(db, userId, postId);
}

// draft/failed/pending -> pending with a fresh retry budget.
export async function approvePost(
  db: SqlExecutor,
  userId: string,
  postId: string,
  scheduledTime: string | null = null,
): Promise<Post> {
  const post = await requirePost(db, userId, postId);
  if (post.status === 'posted') {
    throw new InvalidTransitionError('Post already published');
  }
  const normalizedTime = parseScheduledTime(scheduledTime);

  const placeholders = getParamPlaceholders(db.dialect, 3);
  const changes = await db.execute(
    `UPDATE posts
     SET status = 'pending', scheduled_time = ${placeholders[0]}, retry_count = 0, last_error = NULL,
         updated_at = ${placeholders[1]}
     WHERE id = ${placeholders[2]} AND status <> 'posted'`,
    [normalizedTime, new Date().toISOString(), postId],
  );
  assertChanged(changes, 'Post already published');
  return requirePost(db, userId, postId);
}

export async function cancelPost(db: SqlExecutor, userId: string, postId: string): Promise<Post> {
  const post = await requirePost(db, userId, postId);
  if (post.status === 'posted') {
    throw new InvalidTransitionError('Cannot cancel published post');
  }

  const placeholders = getParamPlaceholders(db.dialect, 2);
  const changes = await db.execute(
    `UPDATE posts
     SET status = 'draft', scheduled_time = NULL, updated_at = ${placeholders[0]}
     WHERE id = ${placeholders[1]} AND status <> 'posted'`,
    [new Date().toISOString(), postId],
  );
  assertChanged(changes, 'Cannot cancel published post');
  return requirePost(db, userId, postId);
}

export async function retryPost(db: SqlExecutor, userId: string, postId: string): Promise<Post> {
  const post = await requirePost(db, userId, postId);
  if (post.status !== 'failed') {
    throw new InvalidTransitionError('Only failed posts can be retried');
  }

  const placeholders = getParamPlaceholders(db.dialect, 2);
  const changes = await db.execute(
    `UPDATE posts
     SET status = 'pending', retry_count = 0, last_error = NULL, updated_at = ${placeholders[0]}
     WHERE id = ${placeholders[1]} AND status = 'failed'`,
    [new Date().toISOString(), postId],
  );
  assertChanged(changes, 'Only failed posts can be retried');
  return requirePost(db, userId, postId);
}

export async function deletePost(db: SqlExecutor, userId: string, postId: string): Promise<void> {
  const post = await requirePost(db, userId, postId);
  if (post.status === 'posted') {
    throw new InvalidTransitionError('Cannot delete published post');
  }

  const [idPlaceholder] = getParamPlaceholders(db.dialect, 1);
  const changes = await db.execute(`DELETE FROM posts WHERE id = ${idPlaceholder} AND status <> 'posted'`, [
    postId,
  ]);
  assertChanged(changes, 'Cannot delete published post');
}
