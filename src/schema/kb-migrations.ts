import { pgTable, text, timestamp } from 'drizzle-orm/pg-core';

export const kbMigrations = pgTable('kb_migrations', {
  name: text('name').primaryKey(),
  applied_at: timestamp('applied_at', { withTimezone: true }).notNull().defaultNow(),
});
