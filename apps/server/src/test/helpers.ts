import type { Post, Topic, User } from '@socialdraft/shared';
import type { QueryResultRow } from 'pg';
import { initDatabase, type DatabaseClient, type SqlExecutor } from '../db';
import { insertPost, type NewPostInput } from '../services/posts/store';
import { createTopic } from '../services/posts/topics';
import { createUser } from '../services/users/store';

export interface Fixture {
  db: DatabaseClient;
  user: User;
  topic: Topic;
}

export function createTestDatabase(): Promise<DatabaseClient> {
  return initDatabase('file::memory:');
}

export async function createFixture(email = 'writer@example.com'): Promise<Fixture> {
  const db = await createTestDatabase();
  const user = await createUser(db, { email, fullName: 'Test Writer' });
  const topic = await createTopic(db, { userId: user.id, name: 'Spring launch', tone: 'professional' });
  return { db, user, topic };
}

export function seedPost(
  fixture: Fixture,
  overrides: Partial<Omit<NewPostInput, 'userId' | 'topicId'>> = {},
  createdAt = new Date(),
): Promise<Post> {
  return insertPost(
    fixture.db,
    {
      userId: fixture.user.id,
      topicId: fixture.topic.id,
      platform: 'linkedin',
      content: 'Shipping the new release today.',
      hashtags: ['#release'],
      tone: 'professional',
      status: 'pending',
      scheduledTime: null,
      ...overrides,
    },
    createdAt,
  );
}

// Runs `between` right after the first query made through the returned executor,
// so a concurrent writer can change a row an operation has just read.
export function interleaveAfterFirstQuery(db: DatabaseClient, between: () => Promise<unknown>): SqlExecutor {
  let interleaved = false;
  return {
    dialect: db.dialect,
    execute: (sql, params) => db.execute(sql, params),
    query: async <T extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]) => {
      const rows = await db.query<T>(sql, params);
      if (!interleaved) {
        interleaved = true;
        await between();
      }
      return rows;
    },
  };
}
