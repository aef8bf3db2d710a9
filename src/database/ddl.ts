/**
 * Statements that bring an empty database up to the shape declared in `schema.ts`.
 * Each one is idempotent and runs on its own, so the list can be replayed on every start.
 */
export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS "users" (
    "id" SERIAL PRIMARY KEY,
    "google_user_id" VARCHAR(255) NOT NULL,
    "email" VARCHAR(320) NOT NULL,
    "full_name" VARCHAR(255) NOT NULL,
    "profile_pic_url" TEXT,
    "last_login_at" TIMESTAMPTZ,
    "refresh_token_hash" TEXT,
    "created_at" TIMESTAMPTZ NOT NULL DEFAULT now(),
    CONSTRAINT "users_google_user_id_unique" UNIQUE ("google_user_id"),
    CONSTRAINT "users_email_unique" UNIQUE ("email")
  )`,
  `CREATE TABLE IF NOT EXISTS "pupils" (
    "id" SERIAL PRIMARY KEY,
    "full_name" VARCHAR(255) NOT NULL,
    "email" VARCHAR(320),
    "mobile" VARCHAR(15) NOT NULL,
    "father_name" VARCHAR(255) NOT NULL,
    "mother_name" VARCHAR(255) NOT NULL,
    "date_of_birth" DATE NOT NULL,
    "gender" VARCHAR(10) NOT NULL CHECK ("gender" IN ('M', 'F', 'Other')),
    "enrolled_on" DATE NOT NULL,
    "owner_id" INTEGER NOT NULL REFERENCES "users" ("id") ON DELETE CASCADE,
    "created_at" TIMESTAMPTZ NOT NULL DEFAULT now(),
    "updated_at" TIMESTAMPTZ NOT NULL DEFAULT now(),
    CONSTRAINT "pupils_email_unique" UNIQUE ("email")
  )`,
  `CREATE INDEX IF NOT EXISTS "pupils_owner_id_idx" ON "pupils" ("owner_id")`,
  `CREATE TABLE IF NOT EXISTS "groups" (
    "id" SERIAL PRIMARY KEY,
    "name" VARCHAR(255) NOT NULL,
    "description" TEXT,
    "owner_id" INTEGER NOT NULL REFERENCES "users" ("id") ON DELETE CASCADE,
    "created_at" TIMESTAMPTZ NOT NULL DEFAULT now()
  )`,
  `CREATE INDEX IF NOT EXISTS "groups_owner_id_idx" ON "groups" ("owner_id")`,
  `CREATE TABLE IF NOT EXISTS "pupil_group_memberships" (
    "id" SERIAL PRIMARY KEY,
    "pupil_id" INTEGER NOT NULL REFERENCES "pupils" ("id") ON DELETE CASCADE,
    "group_id" INTEGER NOT NULL REFERENCES "groups" ("id") ON DELETE CASCADE,
    "joined_at" TIMESTAMPTZ NOT NULL DEFAULT now(),
    CONSTRAINT "pupil_group_memberships_pupil_group_unique" UNIQUE ("pupil_id", "group_id")
  )`,
  `CREATE TABLE IF NOT EXISTS "events" (
    "id" SERIAL PRIMARY KEY,
    "title" VARCHAR(255) NOT NULL,
    "description" TEXT,
    "event_type" VARCHAR(10) NOT NULL CHECK ("event_type" IN ('once', 'repeat')),
    "start_time" TIMESTAMPTZ NOT NULL,
    "end_time" TIMESTAMPTZ NOT NULL,
    "repeat_pattern" VARCHAR(20) CHECK ("repeat_pattern" IN ('weekly', 'monthly', 'custom_days')),
    "repeat_until" DATE,
    "owner_id" INTEGER NOT NULL REFERENCES "users" ("id") ON DELETE CASCADE,
    "created_at" TIMESTAMPTZ NOT NULL DEFAULT now(),
    "updated_at" TIMESTAMPTZ NOT NULL DEFAULT now(),
    CONSTRAINT "events_time_order_check" CHECK ("start_time" < "end_time")
  )`,
  `CREATE INDEX IF NOT EXISTS "events_owner_start_idx" ON "events" ("owner_id", "start_time")`,
  `CREATE TABLE IF NOT EXISTS "event_repeat_days" (
    "id" SERIAL PRIMARY KEY,
    "event_id" INTEGER NOT NULL REFERENCES "events" ("id") ON DELETE CASCADE,
    "day_of_week" SMALLINT NOT NULL,
    CONSTRAINT "event_repeat_days_event_day_unique" UNIQUE ("event_id", "day_of_week"),
    CONSTRAINT "event_repeat_days_day_check" CHECK ("day_of_week" BETWEEN 0 AND 6)
  )`,
  `CREATE TABLE IF NOT EXISTS "event_pupils" (
    "id" SERIAL PRIMARY KEY,
    "event_id" INTEGER NOT NULL REFERENCES "events" ("id") ON DELETE CASCADE,
    "pupil_id" INTEGER NOT NULL REFERENCES "pupils" ("id") ON DELETE CASCADE,
    "added_at" TIMESTAMPTZ NOT NULL DEFAULT now(),
    CONSTRAINT "event_pupils_event_pupil_unique" UNIQUE ("event_id", "pupil_id")
  )`,
  `CREATE TABLE IF NOT EXISTS "payments" (
    "id" SERIAL PRIMARY KEY,
    "pupil_id" INTEGER NOT NULL REFERENCES "pupils" ("id") ON DELETE CASCADE,
    "amount" NUMERIC(10, 2) NOT NULL,
    "month" SMALLINT NOT NULL,
    "year" INTEGER NOT NULL,
    "payment_date" DATE NOT NULL,
    "payment_mode" VARCHAR(20) NOT NULL
      CHECK ("payment_mode" IN ('cash', 'upi', 'bank_transfer', 'card', 'cheque')),
    "notes" TEXT,
    "created_at" TIMESTAMPTZ NOT NULL DEFAULT now(),
    CONSTRAINT "payments_month_check" CHECK ("month" BETWEEN 1 AND 12),
    CONSTRAINT "payments_year_check" CHECK ("year" >= 1900)
  )`,
  `CREATE INDEX IF NOT EXISTS "payments_pupil_period_idx"
    ON "payments" ("pupil_id", "year", "month")`,
];
