import {
  boolean,
  char,
  mysqlTable,
  text,
  timestamp,
  varchar,
} from 'drizzle-orm/mysql-core';

export const userTable = mysqlTable('user', {
  id: varchar('id', { length: 255 }).primaryKey(),
  identifier: varchar('identifier', { length: 255 }).notNull().unique(),
  passwordHash: text('password_hash').notNull(),
  createdAt: timestamp('created_at', { mode: 'date', fsp: 3 })
    .notNull()
    .defaultNow(),
});

// Sessions are keyed by the hex SHA-256 of the token; the token itself is never stored.
export const sessionTable = mysqlTable('session', {
  tokenHash: char('token_hash', { length: 64 }).primaryKey(),
  userId: varchar('user_id', { length: 255 })
    .notNull()
    .references(() => userTable.id, { onDelete: 'cascade' }),
  createdAt: timestamp('created_at', { mode: 'date', fsp: 3 }).notNull(),
  expiresAt: timestamp('expires_at', { mode: 'date', fsp: 3 }).notNull(),
  revoked: boolean('revoked').notNull().default(false),
});
