import { randomUUID } from 'node:crypto';
import type { Topic, TopicSummary, TopicWithPosts, ToneStyle } from '@socialdraft/shared';
import { toIsoString } from '@socialdraft/shared';
import type { SqlExecutor } from '../../db';
import { getParamPlaceholders } from '../../utils/db';
import { NotFoundError } from '../../utils/errors';
import { toPost, type PostRow } from './mappers';

interface TopicRow {
  id: string;
  user_id: string;
  name: string;
  description: string | null;
  tone: string;
  created_at: unknown;
}

interface TopicSummaryRow extends TopicRow {
  post_count: number | string;
}

export interface CreateTopicInput {
  userId: string;
  name: string;
  description?: string | null;
  tone: ToneStyle;
}

function toTopic(row: TopicRow): Topic {
  return {
    id: row.id,
    userId: row.user_id,
    name: row.name,
    description: row.description ?? null,
    tone: row.tone as ToneStyle,
    createdAt: toIsoString(row.created_at) ?? '',
  };
}

export async function createTopic(db: SqlExecutor, input: CreateTopicInput, now = new Date()): Promise<Topic> {
  const topic: Topic = {
    id: randomUUID(),
    userId: input.userId,
    name: input.name,
    description: input.description ?? null,
    tone: input.tone,
    createdAt: now.toISOString(),
  };

  const placeholders = getParamPlaceholders(db.dialect, 6);
  await db.execute(
    `INSERT INTO topics (id, user_id, name, description, tone, created_at)
     VALUES (${placeholders.join(', ')})`,
    [topic.id, topic.userId, topic.name, topic.description, topic.tone, topic.createdAt],
  );
  return topic;
}

export async function getTopicById(db: SqlExecutor, userId: string, topicId: string): Promise<Topic | null> {
  const [idPlaceholder, userPlaceholder] = getParamPlaceholders(db.dialect, 2);
  const rows = await db.query<TopicRow>(
    `SELECT * FROM topics WHERE id = ${idPlaceholder} AND user_id = ${userPlaceholder} LIMIT 1`,
    [topicId, userId],
  );
  return rows.length ? toTopic(rows[0]) : null;
}

export async function listTopics(
  db: SqlExecutor,
  userId: string,
  options: { limit?: number; offset?: number } = {},
): Promise<TopicSummary[]> {
  const limitValue = Math.min(Math.max(1, options.limit ?? 50), 200);
  const offsetValue = Math.max(0, options.offset ?? 0);
  const [userPlaceholder, limitPlaceholder, offsetPlaceholder] = getParamPlaceholders(db.dialect, 3);

  const rows = await db.query<TopicSummaryRow>(
    `SELECT t.*, (SELECT COUNT(*) FROM posts p WHERE p.topic_id = t.id) AS post_count
     FROM topics t
     WHERE t.user_id = ${userPlaceholder}
     ORDER BY t.created_at DESC
     LIMIT ${limitPlaceholder} OFFSET ${offsetPlaceholder}`,
    [userId, limitValue, offsetValue],
  );

  return rows.map((row) => ({ ...toTopic(row), postCount: Number(row.post_count ?? 0) }));
}

export async function getTopicWithPosts(
  db: SqlExecutor,
  userId: string,
  topicId: string,
): Promise<TopicWithPosts | null> {
  const topic = await getTopicById(db, userId, topicId);
  if (!topic) return null;

  const [topicPlaceholder] = getParamPlaceholders(db.dialect, 1);
  const rows = await db.query<PostRow>(
    `SELECT * FROM posts WHERE topic_id = ${topicPlaceholder} ORDER BY created_at ASC`,
    [topicId],
  );
  return { ...topic, posts: rows.map(toPost) };
}

// Posts and their error logs go with the topic (ON DELETE CASCADE).
export async function deleteTopic(db: SqlExecutor, userId: string, topicId: string): Promise<void> {
  const topic = await getTopicById(db, userId, topicId);
  if (!topic) {
    throw new NotFoundError('topic', topicId);
  }

  const [idPlaceholder] = getParamPlaceholders(db.dialect, 1);
  await db.execute(`DELETE FROM topics WHERE id = ${idPlaceholder}`, [topicId]);
}
