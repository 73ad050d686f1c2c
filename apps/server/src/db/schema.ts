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
    id: '001_posts',
    description: 'Original content submitted by users',
    sql: {
      sqlite: `
CREATE TABLE IF NOT EXISTS posts (
  id TEXT PRIMARY KEY,
  owner_id TEXT,
  title TEXT NOT NULL,
  content TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'draft',
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS idx_posts_status ON posts(status);`,
      postgres: `
CREATE TABLE IF NOT EXISTS posts (
  id TEXT PRIMARY KEY,
  owner_id TEXT,
  title TEXT NOT NULL,
  content TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'draft',
  created_at ${TIMESTAMP_SQL_TYPE.postgres} NOT NULL DEFAULT NOW(),
  updated_at ${TIMESTAMP_SQL_TYPE.postgres} NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_posts_status ON posts(status);`,
    },
  },
  {
    id: '002_publications',
    description: 'Per-network adapted copies and their publishing status',
    sql: {
      sqlite: `
CREATE TABLE IF NOT EXISTS publications (
  id TEXT PRIMARY KEY,
  post_id TEXT NOT NULL,
  network TEXT NOT NULL,
  adapted_content TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'pending',
  published_at ${TIMESTAMP_SQL_TYPE.sqlite},
  error_message TEXT,
  extra_data ${JSON_SQL_TYPE.sqlite} NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  FOREIGN KEY (post_id) REFERENCES posts(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_publications_post_id ON publications(post_id);
CREATE INDEX IF NOT EXISTS idx_publications_status ON publications(status);`,
      postgres: `
CREATE TABLE IF NOT EXISTS publications (
  id TEXT PRIMARY KEY,
  post_id TEXT NOT NULL REFERENCES posts(id) ON DELETE CASCADE,
  network TEXT NOT NULL,
  adapted_content TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'pending',
  published_at ${TIMESTAMP_SQL_TYPE.postgres},
  error_message TEXT,
  extra_data ${JSON_SQL_TYPE.postgres} NOT NULL DEFAULT '{}'::jsonb,
  created_at ${TIMESTAMP_SQL_TYPE.postgres} NOT NULL DEFAULT NOW(),
  updated_at ${TIMESTAMP_SQL_TYPE.postgres} NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_publications_post_id ON publications(post_id);
CREATE INDEX IF NOT EXISTS idx_publications_status ON publications(status);`,
    },
  },
];
