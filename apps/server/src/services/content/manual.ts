import type { Post, Topic } from '@socialdraft/shared';
import { formatDate, formatTime } from '@socialdraft/shared';
import type { DatabaseClient } from '../../db';
import { NotFoundError, ValidationError } from '../../utils/errors';
import { insertPost, parseScheduledTime } from '../posts/store';
import { createTopic } from '../posts/topics';
import { getUserById } from '../users/store';
import { parsePlatforms } from './input';

export interface ManualPostRequest {
  content: string;
  platforms: string[];
  // Unset means the next scheduler tick picks the posts up.
  scheduledTime?: string | null;
}

export interface ManualPostResult {
  topic: Topic;
  posts: Post[];
}

export function manualTopicName(now: Date): string {
  return `Manual Post - ${formatDate(now)} ${formatTime(now)}`;
}

// User-written content goes straight to `pending`; publishing is left to the scheduler.
export async function createManualPosts(
  db: DatabaseClient,
  userId: string,
  request: ManualPostRequest,
  now = new Date(),
): Promise<ManualPostResult> {
  const content = request.content.trim();
  if (!content) {
    throw new ValidationError('content is required');
  }
  const platforms = parsePlatforms(request.platforms);
  const scheduledTime = parseScheduledTime(request.scheduledTime);

  if (!(await getUserById(db, userId))) {
    throw new NotFoundError('user', userId);
  }

  return db.transaction(async (tx) => {
    const topic = await createTopic(
      tx,
      { userId, name: manualTopicName(now), description: 'Manually created post', tone: 'professional' },
      now,
    );

    const posts: Post[] = [];
    for (const platform of platforms) {
      posts.push(
        await insertPost(
          tx,
          {
            userId,
            topicId: topic.id,
            platform,
            content,
            hashtags: [],
            tone: 'professional',
            status: 'pending',
            scheduledTime,
          },
          now,
        ),
      );
    }
    return { topic, posts };
  });
}
