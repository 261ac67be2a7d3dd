import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createTestDatabase } from '../test/helpers';
import { createUser } from '../services/users/store';
import type { DatabaseClient } from './index';

describe('sqlite DatabaseClient', () => {
  let db: DatabaseClient;

  beforeEach(async () => {
    db = await createTestDatabase();
  });

  afterEach(async () => {
    await db.close();
  });

  it('resolves execute with the number of changed rows', async () => {
    await createUser(db, { email: 'first@example.com' });
    await createUser(db, { email: 'second@example.com' });

    expect(await db.execute('UPDATE users SET full_name = ?', ['Renamed'])).toBe(2);
    expect(await db.execute('UPDATE users SET full_name = ? WHERE email = ?', ['Renamed', 'nobody@example.com'])).toBe(0);
  });

  it('keeps a plain write out of a transaction that rolls back', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const aborted = db.transaction(async (tx) => {
      await createUser(tx, { email: 'inside@example.com' });
      await gate;
      throw new Error('abort');
    });
    const outside = createUser(db, { email: 'outside@example.com' });
    release();

    await expect(aborted).rejects.toThrow('abort');
    await outside;
    const rows = await db.query<{ email: string }>('SELECT email FROM users ORDER BY email');
    expect(rows).toEqual([{ email: 'outside@example.com' }]);
  });
});
