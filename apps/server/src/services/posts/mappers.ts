import type { ErrorLog, Platform, Post, PostStatus, ToneStyle } from '@socialdraft/shared';
import { toIsoString } from '@socialdraft/shared';
import { parseStringArray } from '../../utils/db';

export interface PostRow {
  id: string;
  user_id: string;
  topic_id: string;
  platform: string;
  content: string;
  hashtags: unknown;
  tone: string;
  status: string;
  scheduled_time: unknown;
  posted_at: unknown;
  platform_post_id: string | null;
  retry_count: number | string;
  last_error: string | null;
  created_at: unknown;
  updated_at: unknown;
}

export interface ErrorLogRow {
  id: string;
  post_id: string;
  error_message: string;
  error_type: string | null;
  attempt_number: number | string;
  created_at: unknown;
}

export function toPost(row: PostRow): Post {
  return {
    id: row.id,
    userId: row.user_id,
    topicId: row.topic_id,
    platform: row.platform as Platform,
    content: row.content,
    hashtags: parseStringArray(row.hashtags),
    tone: row.tone as ToneStyle,
    status: row.status as PostStatus,
    scheduledTime: toIsoString(row.scheduled_time),
    postedAt: toIsoString(row.posted_at),
    platformPostId: row.platform_post_id ?? null,
    retryCount: Number(row.retry_count ?? 0),
    lastError: row.last_error ?? null,
    createdAt: toIsoString(row.created_at) ?? '',
    updatedAt: toIsoString(row.updated_at) ?? '',
  };
}

export function toErrorLog(row: ErrorLogRow): ErrorLog {
  return {
    id: row.id,
    postId: row.post_id,
    errorMessage: row.error_message,
    errorType: row.error_type ?? null,
    attemptNumber: Number(row.attempt_number),
    createdAt: toIsoString(row.created_at) ?? '',
  };
}
