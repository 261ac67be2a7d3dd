import type { Logger, Post } from '@socialdraft/shared';
import {
  DEFAULT_CHECK_INTERVAL_SECONDS,
  DEFAULT_MAX_RETRY_ATTEMPTS,
  addMinutes,
  createLogger,
} from '@socialdraft/shared';
import type { DatabaseClient } from '../../db';
import { toErrorMessage, toErrorType, NotFoundError } from '../../utils/errors';
import { findDuePosts, markPostPosted, recordPublishFailure } from '../posts/store';
import { getUserById } from '../users/store';
import type { CredentialResolver } from './credentials';
import type { PublishResult, PublisherRegistry } from './publisher';

// error_type recorded when a publisher answers `success: false` without throwing.
export const PUBLISH_REJECTED = 'PublishRejected';

export interface PostSchedulerDeps {
  db: DatabaseClient;
  publishers: Partial<PublisherRegistry>;
  resolveCredentials: CredentialResolver;
  logger?: Logger;
  now?: () => Date;
}

export interface PostSchedulerOptions {
  checkIntervalSeconds?: number;
  maxRetryAttempts?: number;
  runOnStart?: boolean;
}

export interface TickSummary {
  processed: number;
  posted: number;
  retried: number;
  failed: number;
  // Posts cancelled or edited by their owner while the publish was in flight.
  skipped: number;
}

export interface SchedulerStatus {
  running: boolean;
  intervalSeconds: number;
  maxRetryAttempts: number;
}

type PostOutcome = 'posted' | 'retried' | 'failed' | 'skipped';

function emptySummary(): TickSummary {
  return { processed: 0, posted: 0, retried: 0, failed: 0, skipped: 0 };
}

/**
 * Publishes due posts on a fixed interval.
 *
 * Each tick loads every pending post whose `scheduled_time` is unset or has
 * passed and publishes them one at a time. A failed attempt bumps `retry_count`
 * and pushes `scheduled_time` out by 2^(n-1) minutes until `maxRetryAttempts`
 * is reached, at which point the post is marked `failed`. Every post's outcome
 * is committed in its own transaction.
 */
export class PostScheduler {
  private readonly db: DatabaseClient;
  private readonly publishers: Partial<PublisherRegistry>;
  private readonly resolveCredentials: CredentialResolver;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private readonly checkIntervalSeconds: number;
  private readonly maxRetryAttempts: number;
  private readonly runOnStart: boolean;

  private timer: NodeJS.Timeout | null = null;
  private ticking = false;

  constructor(deps: PostSchedulerDeps, options: PostSchedulerOptions = {}) {
    this.db = deps.db;
    this.publishers = deps.publishers;
    this.resolveCredentials = deps.resolveCredentials;
    this.logger = deps.logger ?? createLogger('scheduler');
    this.now = deps.now ?? (() => new Date());

    this.checkIntervalSeconds = options.checkIntervalSeconds ?? DEFAULT_CHECK_INTERVAL_SECONDS;
    this.maxRetryAttempts = options.maxRetryAttempts ?? DEFAULT_MAX_RETRY_ATTEMPTS;
    this.runOnStart = options.runOnStart ?? false;
  }

  start(): void {
    if (this.timer) {
      this.logger.warn('Scheduler already running');
      return;
    }

    this.timer = setInterval(() => {
      void this.checkPendingPosts();
    }, this.checkIntervalSeconds * 1000);
    this.logger.info(`Scheduler started (interval: ${this.checkIntervalSeconds}s)`);

    if (this.runOnStart) {
      void this.checkPendingPosts();
    }
  }

  // An in-flight tick is left to finish on its own.
  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.logger.info('Scheduler stopped');
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.isRunning(),
      intervalSeconds: this.checkIntervalSeconds,
      maxRetryAttempts: this.maxRetryAttempts,
    };
  }

  async checkPendingPosts(): Promise<TickSummary> {
    const summary = emptySummary();
    if (this.ticking) {
      this.logger.debug('Previous tick still running; skipping');
      return summary;
    }

    this.ticking = true;
    try {
      let duePosts: Post[];
      try {
        duePosts = await findDuePosts(this.db, this.now());
      } catch (error) {
        this.logger.error(`Failed to load due posts: ${toErrorMessage(error)}`);
        return summary;
      }

      for (const post of duePosts) {
        summary.processed += 1;
        try {
          summary[await this.processPost(post)] += 1;
        } catch (error) {
          this.logger.error(`Failed to record outcome for post ${post.id}: ${toErrorMessage(error)}`);
        }
      }

      if (summary.processed > 0) {
        this.logger.info(
          `Tick processed ${summary.processed} posts (posted ${summary.posted}, retried ${summary.retried}, failed ${summary.failed}, skipped ${summary.skipped})`,
        );
      }
      return summary;
    } finally {
      this.ticking = false;
    }
  }

  async publishPost(post: Post): Promise<PublishResult> {
    const user = await getUserById(this.db, post.userId);
    if (!user) {
      throw new NotFoundError('user', post.userId);
    }

    const createPublisher = this.publishers[post.platform];
    if (!createPublisher) {
      return { success: false, message: 'Unsupported platform' };
    }

    const credentials = await this.resolveCredentials(user.id, post.platform);
    const publisher = createPublisher(credentials);
    return publisher.postContent(post.content, post.hashtags.length ? post.hashtags : undefined);
  }

  async handleFailure(
    post: Post,
    message: string,
    errorType: string | null = null,
  ): Promise<Exclude<PostOutcome, 'posted'>> {
    const now = this.now();
    const retryCount = post.retryCount + 1;
    const exhausted = retryCount >= this.maxRetryAttempts;
    const delayMinutes = 2 ** (retryCount - 1);

    const errorLog = await this.db.transaction((tx) =>
      recordPublishFailure(tx, {
        postId: post.id,
        retryCount,
        status: exhausted ? 'failed' : 'pending',
        scheduledTime: exhausted ? null : addMinutes(now, delayMinutes).toISOString(),
        lastError: message,
        errorType,
        recordedAt: now.toISOString(),
      }),
    );

    if (!errorLog) {
      this.logger.warn(`Post ${post.id} is no longer pending; dropping failure: ${message}`);
      return 'skipped';
    }
    if (exhausted) {
      this.logger.error(`Post ${post.id} failed after ${retryCount} attempts: ${message}`);
      return 'failed';
    }
    this.logger.warn(`Post ${post.id} will retry in ${delayMinutes} min: ${message}`);
    return 'retried';
  }

  private async processPost(post: Post): Promise<PostOutcome> {
    this.logger.info(`Publishing post ${post.id} to ${post.platform} (attempt ${post.retryCount + 1})...`);

    let result: PublishResult;
    try {
      result = await this.publishPost(post);
    } catch (error) {
      return this.handleFailure(post, toErrorMessage(error), toErrorType(error));
    }

    if (!result.success) {
      return this.handleFailure(post, result.message ?? 'Unknown error', PUBLISH_REJECTED);
    }

    const record = { postId: post.id, platformPostId: result.postId ?? null, postedAt: this.now().toISOString() };
    const marked = await this.db.transaction((tx) => markPostPosted(tx, record));
    if (!marked) {
      this.logger.warn(`Post ${post.id} was published as ${record.platformPostId ?? 'unknown'} but is no longer pending`);
      return 'skipped';
    }
    this.logger.info(`Post ${post.id} published${result.mock ? ' (mock)' : ''}`);
    return 'posted';
  }
}
