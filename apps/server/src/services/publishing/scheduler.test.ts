import type { Logger, Platform } from '@socialdraft/shared';
import { addMinutes, silentLogger } from '@socialdraft/shared';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createFixture, interleaveAfterFirstQuery, seedPost, type Fixture } from '../../test/helpers';
import { approvePost, cancelPost, getPostById, listErrorLogs } from '../posts/store';
import { EMPTY_CREDENTIALS, type PublishResult, type Publisher, type PublisherRegistry } from './publisher';
import { PUBLISH_REJECTED, PostScheduler, type PostSchedulerOptions } from './scheduler';

const T0 = '2026-03-01T09:00:00.000Z';

function publisherFor(platform: Platform, postContent: Publisher['postContent']) {
  return () => ({ platform, postContent });
}

function createRecordingLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() } satisfies Logger;
}

describe('PostScheduler', () => {
  let fixture: Fixture;
  let current: Date;

  const createScheduler = (
    publishers: Partial<PublisherRegistry>,
    options: PostSchedulerOptions = {},
    logger: Logger = silentLogger,
  ) =>
    new PostScheduler(
      {
        db: fixture.db,
        publishers,
        resolveCredentials: async () => EMPTY_CREDENTIALS,
        logger,
        now: () => current,
      },
      options,
    );

  beforeEach(async () => {
    fixture = await createFixture();
    current = new Date(T0);
  });

  afterEach(async () => {
    vi.useRealTimers();
    await fixture.db.close();
  });

  describe('checkPendingPosts', () => {
    it('publishes each due pending post exactly once, in creation order', async () => {
      await seedPost(fixture, { content: 'first' }, new Date('2026-03-01T08:00:00.000Z'));
      await seedPost(
        fixture,
        { content: 'second', scheduledTime: '2026-03-01T08:30:00.000Z' },
        new Date('2026-03-01T08:01:00.000Z'),
      );
      await seedPost(
        fixture,
        { content: 'later', scheduledTime: '2026-03-01T10:00:00.000Z' },
        new Date('2026-03-01T08:02:00.000Z'),
      );
      await seedPost(fixture, { content: 'draft', status: 'draft' }, new Date('2026-03-01T08:03:00.000Z'));
      const postContent = vi.fn<Publisher['postContent']>().mockResolvedValue({ success: true, postId: 'li-1' });
      const scheduler = createScheduler({ linkedin: publisherFor('linkedin', postContent) });

      const summary = await scheduler.checkPendingPosts();

      expect(summary).toEqual({ processed: 2, posted: 2, retried: 0, failed: 0, skipped: 0 });
      expect(postContent.mock.calls.map(([content]) => content)).toEqual(['first', 'second']);
    });

    it('passes hashtags only when the post has some', async () => {
      await seedPost(fixture, { hashtags: [] }, new Date('2026-03-01T08:00:00.000Z'));
      await seedPost(fixture, { hashtags: ['#a', '#b'] }, new Date('2026-03-01T08:01:00.000Z'));
      const postContent = vi.fn<Publisher['postContent']>().mockResolvedValue({ success: true });
      const scheduler = createScheduler({ linkedin: publisherFor('linkedin', postContent) });

      await scheduler.checkPendingPosts();

      expect(postContent.mock.calls).toEqual([
        ['Shipping the new release today.', undefined],
        ['Shipping the new release today.', ['#a', '#b']],
      ]);
    });

    it('marks a successful post as posted at the current time', async () => {
      const post = await seedPost(fixture);
      const postContent = vi.fn<Publisher['postContent']>().mockResolvedValue({ success: true, postId: 'li-42' });
      const scheduler = createScheduler({ linkedin: publisherFor('linkedin', postContent) });

      await scheduler.checkPendingPosts();
      current = addMinutes(current, 5);
      await scheduler.checkPendingPosts();

      const stored = await getPostById(fixture.db, post.id);
      expect(stored?.status).toBe('posted');
      expect(stored?.postedAt).toBe(T0);
      expect(stored?.platformPostId).toBe('li-42');
      expect(postContent).toHaveBeenCalledTimes(1);
    });

    it('keeps processing siblings when one post fails', async () => {
      const failing = await seedPost(fixture, { platform: 'linkedin' }, new Date('2026-03-01T08:00:00.000Z'));
      const succeeding = await seedPost(fixture, { platform: 'facebook' }, new Date('2026-03-01T08:01:00.000Z'));
      const scheduler = createScheduler({
        linkedin: publisherFor('linkedin', vi.fn<Publisher['postContent']>().mockRejectedValue(new Error('LinkedIn down'))),
        facebook: publisherFor('facebook', vi.fn<Publisher['postContent']>().mockResolvedValue({ success: true })),
      });

      const summary = await scheduler.checkPendingPosts();

      expect(summary).toEqual({ processed: 2, posted: 1, retried: 1, failed: 0, skipped: 0 });
      expect((await getPostById(fixture.db, succeeding.id))?.status).toBe('posted');
      const retried = await getPostById(fixture.db, failing.id);
      expect(retried?.status).toBe('pending');
      expect(retried?.lastError).toBe('LinkedIn down');
    });

    it('walks the backoff sequence 1, 2, 4, 8 minutes before failing', async () => {
      const post = await seedPost(fixture);
      const postContent = vi.fn<Publisher['postContent']>().mockRejectedValue(new TypeError('socket hang up'));
      const scheduler = createScheduler(
        { linkedin: publisherFor('linkedin', postContent) },
        { maxRetryAttempts: 5 },
      );

      for (const delay of [1, 2, 4, 8]) {
        await scheduler.checkPendingPosts();
        const stored = await getPostById(fixture.db, post.id);
        expect(stored?.status).toBe('pending');
        expect(stored?.scheduledTime).toBe(addMinutes(current, delay).toISOString());
        current = addMinutes(current, delay);
      }

      await scheduler.checkPendingPosts();
      const stored = await getPostById(fixture.db, post.id);
      expect(stored?.status).toBe('failed');
      expect(stored?.retryCount).toBe(5);
      expect(stored?.scheduledTime).toBe(current.toISOString());

      const logs = await listErrorLogs(fixture.db, post.id);
      expect(logs.map((log) => log.attemptNumber)).toEqual([1, 2, 3, 4, 5]);
      expect(logs.every((log) => log.errorType === 'TypeError')).toBe(true);
    });

    it('succeeds on the third attempt after two retries', async () => {
      const post = await seedPost(fixture);
      const postContent = vi
        .fn<Publisher['postContent']>()
        .mockResolvedValueOnce({ success: false, message: 'Rate limited' })
        .mockResolvedValueOnce({ success: false, message: 'Rate limited' })
        .mockResolvedValueOnce({ success: true, postId: 'li-123' });
      const scheduler = createScheduler(
        { linkedin: publisherFor('linkedin', postContent) },
        { maxRetryAttempts: 3 },
      );

      expect(await scheduler.checkPendingPosts()).toEqual({ processed: 1, posted: 0, retried: 1, failed: 0, skipped: 0 });
      expect((await getPostById(fixture.db, post.id))?.scheduledTime).toBe('2026-03-01T09:01:00.000Z');

      current = new Date('2026-03-01T09:00:30.000Z');
      expect((await scheduler.checkPendingPosts()).processed).toBe(0);

      current = new Date('2026-03-01T09:01:00.000Z');
      await scheduler.checkPendingPosts();
      expect((await getPostById(fixture.db, post.id))?.scheduledTime).toBe('2026-03-01T09:03:00.000Z');

      current = new Date('2026-03-01T09:03:00.000Z');
      expect(await scheduler.checkPendingPosts()).toEqual({ processed: 1, posted: 1, retried: 0, failed: 0, skipped: 0 });

      const stored = await getPostById(fixture.db, post.id);
      expect(stored?.status).toBe('posted');
      expect(stored?.postedAt).toBe('2026-03-01T09:03:00.000Z');
      expect(stored?.retryCount).toBe(2);

      const logs = await listErrorLogs(fixture.db, post.id);
      expect(logs.map((log) => [log.attemptNumber, log.errorMessage, log.errorType])).toEqual([
        [1, 'Rate limited', PUBLISH_REJECTED],
        [2, 'Rate limited', PUBLISH_REJECTED],
      ]);
    });

    it('fails permanently once the retry budget is spent', async () => {
      const post = await seedPost(fixture);
      const postContent = vi.fn<Publisher['postContent']>().mockResolvedValue({ success: false });
      const scheduler = createScheduler(
        { linkedin: publisherFor('linkedin', postContent) },
        { maxRetryAttempts: 2 },
      );

      await scheduler.checkPendingPosts();
      current = new Date('2026-03-01T09:01:00.000Z');
      expect(await scheduler.checkPendingPosts()).toEqual({ processed: 1, posted: 0, retried: 0, failed: 1, skipped: 0 });
      current = new Date('2026-03-01T09:30:00.000Z');
      expect((await scheduler.checkPendingPosts()).processed).toBe(0);

      const stored = await getPostById(fixture.db, post.id);
      expect(stored?.status).toBe('failed');
      expect(stored?.retryCount).toBe(2);
      expect(stored?.lastError).toBe('Unknown error');
      expect(stored?.scheduledTime).toBe('2026-03-01T09:01:00.000Z');
      expect(await listErrorLogs(fixture.db, post.id)).toHaveLength(2);
      expect(postContent).toHaveBeenCalledTimes(2);
    });

    it('records a vanished user as a failure of that post', async () => {
      const post = await seedPost(fixture);
      await fixture.db.execute('PRAGMA foreign_keys = OFF');
      await fixture.db.execute('DELETE FROM users');
      const postContent = vi.fn<Publisher['postContent']>();
      const scheduler = createScheduler({ linkedin: publisherFor('linkedin', postContent) });

      await scheduler.checkPendingPosts();

      const [log] = await listErrorLogs(fixture.db, post.id);
      expect(log.errorMessage).toBe(`user not found: ${fixture.user.id}`);
      expect(log.errorType).toBe('NotFoundError');
      expect(postContent).not.toHaveBeenCalled();
    });

    it('fails posts whose platform has no publisher', async () => {
      const post = await seedPost(fixture, { platform: 'instagram' });
      const scheduler = createScheduler({});

      await scheduler.checkPendingPosts();

      const [log] = await listErrorLogs(fixture.db, post.id);
      expect(log.errorMessage).toBe('Unsupported platform');
      expect(log.errorType).toBe(PUBLISH_REJECTED);
    });

    it('logs a persistence error and moves on to the next post', async () => {
      const first = await seedPost(fixture, {}, new Date('2026-03-01T08:00:00.000Z'));
      const second = await seedPost(fixture, {}, new Date('2026-03-01T08:01:00.000Z'));
      const logger = createRecordingLogger();
      const scheduler = createScheduler(
        { linkedin: publisherFor('linkedin', vi.fn<Publisher['postContent']>().mockResolvedValue({ success: true })) },
        {},
        logger,
      );
      vi.spyOn(fixture.db, 'transaction').mockRejectedValueOnce(new Error('database is locked'));

      const summary = await scheduler.checkPendingPosts();

      expect(summary).toEqual({ processed: 2, posted: 1, retried: 0, failed: 0, skipped: 0 });
      expect(logger.error).toHaveBeenCalledWith(`Failed to record outcome for post ${first.id}: database is locked`);
      expect((await getPostById(fixture.db, first.id))?.status).toBe('pending');
      expect((await getPostById(fixture.db, second.id))?.status).toBe('posted');
    });

    it('returns an empty summary when due posts cannot be loaded', async () => {
      const logger = createRecordingLogger();
      const scheduler = createScheduler({}, {}, logger);
      vi.spyOn(fixture.db, 'query').mockRejectedValueOnce(new Error('connection refused'));

      expect(await scheduler.checkPendingPosts()).toEqual({ processed: 0, posted: 0, retried: 0, failed: 0, skipped: 0 });
      expect(logger.error).toHaveBeenCalledWith('Failed to load due posts: connection refused');
    });

    it('skips a tick that starts while another is still running', async () => {
      await seedPost(fixture);
      let release: (result: PublishResult) => void = () => undefined;
      const postContent = vi.fn<Publisher['postContent']>(
        () =>
          new Promise<PublishResult>((resolve) => {
            release = resolve;
          }),
      );
      const scheduler = createScheduler({ linkedin: publisherFor('linkedin', postContent) });

      const first = scheduler.checkPendingPosts();
      expect(await scheduler.checkPendingPosts()).toEqual({ processed: 0, posted: 0, retried: 0, failed: 0, skipped: 0 });

      await vi.waitFor(() => expect(postContent).toHaveBeenCalledTimes(1));
      release({ success: true });
      expect(await first).toEqual({ processed: 1, posted: 1, retried: 0, failed: 0, skipped: 0 });
    });

    describe('when the owner cancels a post while it is being published', () => {
      const startHeldPublish = () => {
        let release: (result: PublishResult) => void = () => undefined;
        const postContent = vi.fn<Publisher['postContent']>(
          () =>
            new Promise<PublishResult>((resolve) => {
              release = resolve;
            }),
        );
        return { postContent, release: (result: PublishResult) => release(result) };
      };

      it('drops a failed attempt without touching the retry budget', async () => {
        const post = await seedPost(fixture);
        const held = startHeldPublish();
        const logger = createRecordingLogger();
        const scheduler = createScheduler({ linkedin: publisherFor('linkedin', held.postContent) }, {}, logger);

        const tick = scheduler.checkPendingPosts();
        await vi.waitFor(() => expect(held.postContent).toHaveBeenCalledTimes(1));
        await cancelPost(fixture.db, fixture.user.id, post.id);
        held.release({ success: false, message: 'rate limited' });

        expect(await tick).toEqual({ processed: 1, posted: 0, retried: 0, failed: 0, skipped: 1 });
        const stored = await getPostById(fixture.db, post.id);
        expect(stored?.status).toBe('draft');
        expect(stored?.retryCount).toBe(0);
        expect(await listErrorLogs(fixture.db, post.id)).toEqual([]);
        expect(logger.warn).toHaveBeenCalledWith(`Post ${post.id} is no longer pending; dropping failure: rate limited`);
      });

      it('does not count a success the post no longer reflects', async () => {
        const post = await seedPost(fixture);
        const held = startHeldPublish();
        const logger = createRecordingLogger();
        const scheduler = createScheduler({ linkedin: publisherFor('linkedin', held.postContent) }, {}, logger);

        const tick = scheduler.checkPendingPosts();
        await vi.waitFor(() => expect(held.postContent).toHaveBeenCalledTimes(1));
        await cancelPost(fixture.db, fixture.user.id, post.id);
        held.release({ success: true, postId: 'li-9' });

        expect(await tick).toEqual({ processed: 1, posted: 0, retried: 0, failed: 0, skipped: 1 });
        const stored = await getPostById(fixture.db, post.id);
        expect(stored?.status).toBe('draft');
        expect(stored?.postedAt).toBeNull();
        expect(logger.warn).toHaveBeenCalledWith(`Post ${post.id} was published as li-9 but is no longer pending`);
      });
    });

    it('publishes once when a tick runs inside an approve of the same post', async () => {
      const post = await seedPost(fixture);
      const postContent = vi.fn<Publisher['postContent']>().mockResolvedValue({ success: true, postId: 'li-1' });
      const scheduler = createScheduler({ linkedin: publisherFor('linkedin', postContent) });
      const tickMidway = interleaveAfterFirstQuery(fixture.db, () => scheduler.checkPendingPosts());

      await expect(approvePost(tickMidway, fixture.user.id, post.id)).rejects.toThrow('Post already published');
      expect(await scheduler.checkPendingPosts()).toEqual({ processed: 0, posted: 0, retried: 0, failed: 0, skipped: 0 });

      const stored = await getPostById(fixture.db, post.id);
      expect(stored?.status).toBe('posted');
      expect(stored?.platformPostId).toBe('li-1');
      expect(postContent).toHaveBeenCalledTimes(1);
    });
  });

  describe('lifecycle', () => {
    it('registers a single timer however often start is called', () => {
      vi.useFakeTimers();
      const logger = createRecordingLogger();
      const scheduler = createScheduler({}, { checkIntervalSeconds: 60 }, logger);
      const tick = vi
        .spyOn(scheduler, 'checkPendingPosts')
        .mockResolvedValue({ processed: 0, posted: 0, retried: 0, failed: 0, skipped: 0 });

      scheduler.start();
      scheduler.start();
      expect(logger.warn).toHaveBeenCalledWith('Scheduler already running');

      vi.advanceTimersByTime(60_000);
      expect(tick).toHaveBeenCalledTimes(1);
      vi.advanceTimersByTime(60_000);
      expect(tick).toHaveBeenCalledTimes(2);

      scheduler.stop();
      vi.advanceTimersByTime(180_000);
      expect(tick).toHaveBeenCalledTimes(2);
      expect(scheduler.isRunning()).toBe(false);
    });

    it('runs a tick immediately when runOnStart is set', () => {
      vi.useFakeTimers();
      const scheduler = createScheduler({}, { runOnStart: true });
      const tick = vi
        .spyOn(scheduler, 'checkPendingPosts')
        .mockResolvedValue({ processed: 0, posted: 0, retried: 0, failed: 0, skipped: 0 });

      scheduler.start();

      expect(tick).toHaveBeenCalledTimes(1);
      scheduler.stop();
    });

    it('reports its configuration in the status', () => {
      vi.useFakeTimers();
      const scheduler = createScheduler({}, { checkIntervalSeconds: 15, maxRetryAttempts: 4 });

      expect(scheduler.getStatus()).toEqual({ running: false, intervalSeconds: 15, maxRetryAttempts: 4 });
      scheduler.start();
      expect(scheduler.getStatus().running).toBe(true);
      scheduler.stop();
      scheduler.stop();
      expect(scheduler.isRunning()).toBe(false);
    });
  });
});
