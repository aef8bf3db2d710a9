import { sql } from 'drizzle-orm';
import {
  check,
  date,
  index,
  integer,
  numeric,
  pgTable,
  serial,
  smallint,
  text,
  timestamp,
  unique,
  varchar,
} from 'drizzle-orm/pg-core';

import { EVENT_TYPES, GENDERS, PAYMENT_MODES, REPEAT_PATTERNS } from './enums';

export const users = pgTable('users', {
  id: serial('id').primaryKey(),
  googleUserId: varchar('google_user_id', { length: 255 }).notNull().unique(),
  email: varchar('email', { length: 320 }).notNull().unique(),
  fullName: varchar('full_name', { length: 255 }).notNull(),
  profilePicUrl: text('profile_pic_url'),
  lastLoginAt: timestamp('last_login_at', { withTimezone: true }),
  refreshTokenHash: text('refresh_token_hash'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

export const pupils = pgTable(
  'pupils',
  {
    id: serial('id').primaryKey(),
    fullName: varchar('full_name', { length: 255 }).notNull(),
    email: varchar('email', { length: 320 }).unique(),
    mobile: varchar('mobile', { length: 15 }).notNull(),
    fatherName: varchar('father_name', { length: 255 }).notNull(),
    motherName: varchar('mother_name', { length: 255 }).notNull(),
    dateOfBirth: date('date_of_birth').notNull(),
    gender: varchar('gender', { length: 10, enum: GENDERS }).notNull(),
    enrolledOn: date('enrolled_on').notNull(),
    ownerId: integer('owner_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => [index('pupils_owner_id_idx').on(t.ownerId)],
);

export const groups = pgTable(
  'groups',
  {
    id: serial('id').primaryKey(),
    name: varchar('name', { length: 255 }).notNull(),
    description: text('description'),
    ownerId: integer('owner_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => [index('groups_owner_id_idx').on(t.ownerId)],
);

export const pupilGroupMemberships = pgTable(
  'pupil_group_memberships',
  {
    id: serial('id').primaryKey(),
    pupilId: integer('pupil_id')
      .notNull()
      .references(() => pupils.id, { onDelete: 'cascade' }),
    groupId: integer('group_id')
      .notNull()
      .references(() => groups.id, { onDelete: 'cascade' }),
    joinedAt: timestamp('joined_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => [unique('pupil_group_memberships_pupil_group_unique').on(t.pupilId, t.groupId)],
);

export const events = pgTable(
  'events',
  {
    id: serial('id').primaryKey(),
    title: varchar('title', { length: 255 }).notNull(),
    description: text('description'),
    eventType: varchar('event_type', { length: 10, enum: EVENT_TYPES }).notNull(),
    startTime: timestamp('start_time', { withTimezone: true }).notNull(),
    endTime: timestamp('end_time', { withTimezone: true }).notNull(),
    repeatPattern: varchar('repeat_pattern', { length: 20, enum: REPEAT_PATTERNS }),
    repeatUntil: date('repeat_until'),
    ownerId: integer('owner_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => [
    index('events_owner_start_idx').on(t.ownerId, t.startTime),
    check('events_time_order_check', sql`${t.startTime} < ${t.endTime}`),
  ],
);

export const eventRepeatDays = pgTable(
  'event_repeat_days',
  {
    id: serial('id').primaryKey(),
    eventId: integer('event_id')
      .notNull()
      .references(() => events.id, { onDelete: 'cascade' }),
    dayOfWeek: smallint('day_of_week').notNull(),
  },
  (t) => [
    unique('event_repeat_days_event_day_unique').on(t.eventId, t.dayOfWeek),
    check('event_repeat_days_day_check', sql`${t.dayOfWeek} BETWEEN 0 AND 6`),
  ],
);

export const eventPupils = pgTable(
  'event_pupils',
  {
    id: serial('id').primaryKey(),
    eventId: integer('event_id')
      .notNull()
      .references(() => events.id, { onDelete: 'cascade' }),
    pupilId: integer('pupil_id')
      .notNull()
      .references(() => pupils.id, { onDelete: 'cascade' }),
    addedAt: timestamp('added_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => [unique('event_pupils_event_pupil_unique').on(t.eventId, t.pupilId)],
);

export const payments = pgTable(
  'payments',
  {
    id: serial('id').primaryKey(),
    pupilId: integer('pupil_id')
      .notNull()
      .references(() => pupils.id, { onDelete: 'cascade' }),
    amount: numeric('amount', { precision: 10, scale: 2 }).notNull(),
    month: smallint('month').notNull(),
    year: integer('year').notNull(),
    paymentDate: date('payment_date').notNull(),
    paymentMode: varchar('payment_mode', { length: 20, enum: PAYMENT_MODES }).notNull(),
    notes: text('notes'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => [
    index('payments_pupil_period_idx').on(t.pupilId, t.year, t.month),
    check('payments_month_check', sql`${t.month} BETWEEN 1 AND 12`),
    check('payments_year_check', sql`${t.year} >= 1900`),
  ],
);

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
export type Pupil = typeof pupils.$inferSelect;
export type NewPupil = typeof pupils.$inferInsert;
export type Group = typeof groups.$inferSelect;
export type PupilGroupMembership = typeof pupilGroupMemberships.$inferSelect;
export type EventRecord = typeof events.$inferSelect;
export type NewEventRecord = typeof events.$inferInsert;
export type EventRepeatDay = typeof eventRepeatDays.$inferSelect;
export type EventPupil = typeof eventPupils.$inferSelect;
export type Payment = typeof payments.$inferSelect;
export type NewPayment = typeof payments.$inferInsert;
