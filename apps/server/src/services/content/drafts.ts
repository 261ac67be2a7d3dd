import type { Platform, Post, Topic } from '@socialdraft/shared';
import { ALL_PLATFORMS, createLogger, type Logger } from '@socialdraft/shared';
import type { DatabaseClient } from '../../db';
import { NotFoundError, ValidationError } from '../../utils/errors';
import { insertPost } from '../posts/store';
import { createTopic } from '../posts/topics';
import { getUserById } from '../users/store';
import { LlmError, type GeneratedContent, type LlmClient } from './generator';
import { parsePlatforms, parseTone } from './input';

const TOPIC_MIN_LENGTH = 3;
const TOPIC_MAX_LENGTH = 500;
const CONTEXT_MAX_LENGTH = 1000;

export interface GenerateDraftsRequest {
  topic: string;
  platforms?: string[];
  tone?: string;
  additionalContext?: string | null;
}

export type DraftResult =
  | { platform: Platform; status: 'draft'; post: Post }
  | { platform: Platform; status: 'error'; error: string };

export interface GenerateDraftsResult {
  topic: Topic;
  results: DraftResult[];
}

type Generation = { platform: Platform; generated: GeneratedContent } | { platform: Platform; error: string };

/**
 * Generates one draft per requested platform and stores them under a new topic.
 *
 * An `LlmError` for one platform is reported in that platform's result while the
 * others still generate; any other error aborts the request before anything is stored.
 */
export async function generateDrafts(
  db: DatabaseClient,
  llm: LlmClient,
  userId: string,
  request: GenerateDraftsRequest,
  logger: Logger = createLogger('drafts'),
): Promise<GenerateDraftsResult> {
  const topicName = request.topic.trim();
  if (topicName.length < TOPIC_MIN_LENGTH || topicName.length > TOPIC_MAX_LENGTH) {
    throw new ValidationError(`topic must be between ${TOPIC_MIN_LENGTH} and ${TOPIC_MAX_LENGTH} characters`);
  }
  const additionalContext = request.additionalContext?.trim() || null;
  if (additionalContext && additionalContext.length > CONTEXT_MAX_LENGTH) {
    throw new ValidationError(`additionalContext must be at most ${CONTEXT_MAX_LENGTH} characters`);
  }
  const platforms = parsePlatforms(request.platforms ?? ALL_PLATFORMS);
  const tone = parseTone(request.tone);

  if (!(await getUserById(db, userId))) {
    throw new NotFoundError('user', userId);
  }

  const generations: Generation[] = [];
  for (const platform of platforms) {
    try {
      const generated = await llm.generateContent({ topic: topicName, platform, tone, additionalContext });
      generations.push({ platform, generated });
    } catch (error) {
      if (!(error instanceof LlmError)) throw error;
      logger.warn(`${llm.provider} generation for ${platform} failed: ${error.message}`);
      generations.push({ platform, error: error.message });
    }
  }

  const now = new Date();
  return db.transaction(async (tx) => {
    const topic = await createTopic(
      tx,
      { userId, name: topicName, description: additionalContext, tone },
      now,
    );

    const results: DraftResult[] = [];
    for (const generation of generations) {
      if ('error' in generation) {
        results.push({ platform: generation.platform, status: 'error', error: generation.error });
        continue;
      }
      const post = await insertPost(
        tx,
        {
          userId,
          topicId: topic.id,
          platform: generation.platform,
          content: generation.generated.content,
          hashtags: generation.generated.hashtags,
          tone,
          status: 'draft',
        },
        now,
      );
      results.push({ platform: generation.platform, status: 'draft', post });
    }

    const drafted = results.filter((result) => result.status === 'draft').length;
    logger.info(`Generated ${drafted}/${results.length} drafts for topic ${topic.id}`);
    return { topic, results };
  });
}
