export type SqlDialect = 'sqlite' | 'postgres';

export interface MigrationStep {
  id: string;
  description: string;
  sql: Record<SqlDialect, string>;
}

const JSON_SQL_TYPE: Record<SqlDialect, string> = {
  sqlite: 'TEXT',
  postgres: 'JSONB',
};

const TIMESTAMP_SQL_TYPE: Record<SqlDialect, string> = {
  sqlite: 'TEXT',
  postgres: 'TIMESTAMPTZ',
};

export const migrationPlan: MigrationStep[] = [
  {
    id: '001_users',
    description: 'Accounts owning topics, posts and API keys',
    sql: {
      sqlite: `
CREATE TABLE IF NOT EXISTS users (
  id TEXT PRIMARY KEY,
  email TEXT NOT NULL UNIQUE,
  full_name TEXT,
  is_active INTEGER NOT NULL DEFAULT 1,
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);`,
      postgres: `
CREATE TABLE IF NOT EXISTS users (
  id TEXT PRIMARY KEY,
  email TEXT NOT NULL UNIQUE,
  full_name TEXT,
  is_active BOOLEAN NOT NULL DEFAULT TRUE,
  created_at ${TIMESTAMP_SQL_TYPE.postgres} NOT NULL DEFAULT NOW()
);`,
    },
  },
  {
    id: '002_user_api_keys',
    description: 'Encrypted per-user LLM and platform keys',
    sql: {
      sqlite: `
CREATE TABLE IF NOT EXISTS user_api_keys (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL,
  key_type TEXT NOT NULL,
  encrypted_key TEXT NOT NULL,
  encrypted_credentials TEXT,
  key_name TEXT,
  is_valid INTEGER NOT NULL DEFAULT 1,
  last_used TEXT,
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE,
  UNIQUE (user_id, key_type)
);`,
      postgres: `
CREATE TABLE IF NOT EXISTS user_api_keys (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  key_type TEXT NOT NULL,
  encrypted_key TEXT NOT NULL,
  encrypted_credentials TEXT,
  key_name TEXT,
  is_valid BOOLEAN NOT NULL DEFAULT TRUE,
  last_used ${TIMESTAMP_SQL_TYPE.postgres},
  created_at ${TIMESTAMP_SQL_TYPE.postgres} NOT NULL DEFAULT NOW(),
  updated_at ${TIMESTAMP_SQL_TYPE.postgres} NOT NULL DEFAULT NOW(),
  UNIQUE (user_id, key_type)
);`,
    },
  },
  {
    id: '003_topics',
    description: 'Generation requests grouping platform posts',
    sql: {
      sqlite: `
CREATE TABLE IF NOT EXISTS topics (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL,
  name TEXT NOT NULL,
  description TEXT,
  tone TEXT NOT NULL,
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
);`,
      postgres: `
CREATE TABLE IF NOT EXISTS topics (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  name TEXT NOT NULL,
  description TEXT,
  tone TEXT NOT NULL,
  created_at ${TIMESTAMP_SQL_TYPE.postgres} NOT NULL DEFAULT NOW()
);`,
    },
  },
  {
    id: '004_posts',
    description: 'Per-platform posts and their publishing state',
    sql: {
      sqlite: `
CREATE TABLE IF NOT EXISTS posts (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL,
  topic_id TEXT NOT NULL,
  platform TEXT NOT NULL,
  content TEXT NOT NULL,
  hashtags TEXT NOT NULL,
  tone TEXT NOT NULL,
  status TEXT NOT NULL,
  scheduled_time TEXT,
  posted_at TEXT,
  platform_post_id TEXT,
  retry_count INTEGER NOT NULL DEFAULT 0,
  last_error TEXT,
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE,
  FOREIGN KEY (topic_id) REFERENCES topics(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_posts_status_scheduled_time ON posts(status, scheduled_time);`,
      postgres: `
CREATE TABLE IF NOT EXISTS posts (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  topic_id TEXT NOT NULL REFERENCES topics(id) ON DELETE CASCADE,
  platform TEXT NOT NULL,
  content TEXT NOT NULL,
  hashtags ${JSON_SQL_TYPE.postgres} NOT NULL,
  tone TEXT NOT NULL,
  status TEXT NOT NULL,
  scheduled_time ${TIMESTAMP_SQL_TYPE.postgres},
  posted_at ${TIMESTAMP_SQL_TYPE.postgres},
  platform_post_id TEXT,
  retry_count INTEGER NOT NULL DEFAULT 0,
  last_error TEXT,
  created_at ${TIMESTAMP_SQL_TYPE.postgres} NOT NULL DEFAULT NOW(),
  updated_at ${TIMESTAMP_SQL_TYPE.postgres} NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_posts_status_scheduled_time ON posts(status, scheduled_time);`,
    },
  },
  {
    id: '005_error_logs',
    description: 'One row per failed publish attempt',
    sql: {
      sqlite: `
CREATE TABLE IF NOT EXISTS error_logs (
  id TEXT PRIMARY KEY,
  post_id TEXT NOT NULL,
  error_message TEXT NOT NULL,
  error_type TEXT,
  attempt_number INTEGER NOT NULL,
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  FOREIGN KEY (post_id) REFERENCES posts(id) ON DELETE CASCADE
);`,
      postgres: `
CREATE TABLE IF NOT EXISTS error_logs (
  id TEXT PRIMARY KEY,
  post_id TEXT NOT NULL REFERENCES posts(id) ON DELETE CASCADE,
  error_message TEXT NOT NULL,
  error_type TEXT,
  attempt_number INTEGER NOT NULL,
  created_at ${TIMESTAMP_SQL_TYPE.postgres} NOT NULL DEFAULT NOW()
);`,
    },
  },
];

export function getMigrationSql(dialect: SqlDialect): string[] {
  return migrationPlan.map((step) => step.sql[dialect].trim());
}
