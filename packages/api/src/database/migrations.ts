// Idempotent schema applied on start-up; must stay in step with schema.ts.
export const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS users (
  id TEXT PRIMARY KEY,
  email TEXT NOT NULL UNIQUE,
  password TEXT NOT NULL,
  name TEXT,
  timezone TEXT NOT NULL DEFAULT 'UTC',
  diabetes_type TEXT,
  uses_glp1 INTEGER NOT NULL DEFAULT 0,
  created_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS refresh_tokens (
  id TEXT PRIMARY KEY,
  token TEXT NOT NULL UNIQUE,
  user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  expires_at INTEGER NOT NULL,
  created_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS push_subscriptions (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  endpoint TEXT NOT NULL UNIQUE,
  p256dh TEXT NOT NULL,
  auth TEXT NOT NULL,
  created_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS medications (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  name TEXT NOT NULL,
  dosage TEXT NOT NULL,
  frequency TEXT NOT NULL,
  medication_type TEXT NOT NULL,
  prescribed_by TEXT,
  start_date INTEGER NOT NULL,
  end_date INTEGER,
  instructions TEXT,
  side_effects TEXT NOT NULL,
  is_active INTEGER NOT NULL DEFAULT 1,
  reminder_enabled INTEGER NOT NULL DEFAULT 1,
  reminder_times TEXT NOT NULL,
  color TEXT NOT NULL,
  shape TEXT NOT NULL,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS medications_user_idx ON medications(user_id);

CREATE TABLE IF NOT EXISTS medication_doses (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  medication_id TEXT NOT NULL REFERENCES medications(id) ON DELETE CASCADE,
  scheduled_time INTEGER NOT NULL,
  actual_time INTEGER,
  status TEXT NOT NULL DEFAULT 'Pending',
  notes TEXT,
  side_effects_experienced TEXT NOT NULL,
  skipped_reason TEXT
);
CREATE UNIQUE INDEX IF NOT EXISTS doses_medication_slot_idx ON medication_doses(medication_id, scheduled_time);
CREATE INDEX IF NOT EXISTS doses_user_time_idx ON medication_doses(user_id, scheduled_time);

CREATE TABLE IF NOT EXISTS notification_requests (
  identifier TEXT PRIMARY KEY,
  user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  medication_id TEXT NOT NULL REFERENCES medications(id) ON DELETE CASCADE,
  dose_id TEXT REFERENCES medication_doses(id) ON DELETE SET NULL,
  kind TEXT NOT NULL,
  title TEXT NOT NULL,
  body TEXT NOT NULL,
  category TEXT NOT NULL,
  fire_at INTEGER NOT NULL,
  delivered_at INTEGER,
  created_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS notifications_due_idx ON notification_requests(delivered_at, fire_at);

CREATE TABLE IF NOT EXISTS meals (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  name TEXT NOT NULL,
  type TEXT NOT NULL,
  carbs REAL NOT NULL DEFAULT 0,
  protein REAL NOT NULL DEFAULT 0,
  fat REAL NOT NULL DEFAULT 0,
  calories INTEGER NOT NULL DEFAULT 0,
  fiber REAL NOT NULL DEFAULT 0,
  sugar REAL NOT NULL DEFAULT 0,
  sodium REAL NOT NULL DEFAULT 0,
  timestamp INTEGER NOT NULL,
  notes TEXT,
  ingredients TEXT NOT NULL,
  created_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS meals_user_time_idx ON meals(user_id, timestamp);

CREATE TABLE IF NOT EXISTS meal_analyses (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  image_hash TEXT NOT NULL,
  result TEXT NOT NULL,
  size_bytes INTEGER NOT NULL,
  model TEXT NOT NULL,
  tokens_used INTEGER NOT NULL DEFAULT 0,
  confidence REAL NOT NULL,
  primary_dish TEXT NOT NULL,
  total_calories INTEGER NOT NULL,
  user_rating INTEGER,
  user_notes TEXT,
  is_favorite INTEGER NOT NULL DEFAULT 0,
  created_at INTEGER NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS meal_analyses_user_hash_idx ON meal_analyses(user_id, image_hash);

CREATE TABLE IF NOT EXISTS analysis_usage (
  user_id TEXT PRIMARY KEY REFERENCES users(id) ON DELETE CASCADE,
  total_analyses INTEGER NOT NULL DEFAULT 0,
  total_tokens_used INTEGER NOT NULL DEFAULT 0,
  average_confidence REAL NOT NULL DEFAULT 0,
  last_analysis_date INTEGER
);

CREATE TABLE IF NOT EXISTS planned_meals (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  date TEXT NOT NULL,
  meal_type TEXT NOT NULL,
  time TEXT NOT NULL,
  name TEXT NOT NULL,
  description TEXT,
  carbs REAL NOT NULL DEFAULT 0,
  protein REAL NOT NULL DEFAULT 0,
  calories INTEGER NOT NULL DEFAULT 0,
  created_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS planned_meals_user_date_idx ON planned_meals(user_id, date);

CREATE TABLE IF NOT EXISTS glucose_readings (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  level INTEGER NOT NULL,
  timestamp INTEGER NOT NULL,
  notes TEXT,
  created_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS glucose_user_time_idx ON glucose_readings(user_id, timestamp);

CREATE TABLE IF NOT EXISTS glucose_alerts (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  reading_id TEXT NOT NULL REFERENCES glucose_readings(id) ON DELETE CASCADE,
  type TEXT NOT NULL,
  level INTEGER NOT NULL,
  timestamp INTEGER NOT NULL,
  acknowledged INTEGER NOT NULL DEFAULT 0,
  notes TEXT
);

CREATE TABLE IF NOT EXISTS workouts (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  type TEXT NOT NULL,
  duration INTEGER NOT NULL,
  intensity TEXT NOT NULL,
  calories INTEGER NOT NULL DEFAULT 0,
  distance REAL,
  timestamp INTEGER NOT NULL,
  notes TEXT,
  created_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS workouts_user_time_idx ON workouts(user_id, timestamp);

CREATE TABLE IF NOT EXISTS exercise_goals (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  type TEXT NOT NULL,
  period TEXT NOT NULL,
  target REAL NOT NULL,
  is_active INTEGER NOT NULL DEFAULT 1,
  created_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS health_metrics (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  type TEXT NOT NULL,
  value REAL NOT NULL,
  unit TEXT NOT NULL,
  timestamp INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS health_metrics_user_type_idx ON health_metrics(user_id, type, timestamp);

CREATE TABLE IF NOT EXISTS health_goals (
  id TEXT PRIMARY KEY,
  user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  metric_type TEXT NOT NULL,
  target_value REAL NOT NULL,
  unit TEXT NOT NULL,
  deadline INTEGER,
  created_at INTEGER NOT NULL
);
`;
