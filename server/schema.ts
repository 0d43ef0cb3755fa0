import { withConnection, type Connection, type ConnectionFactory } from './db'
import { logger } from './lib/logger'

const tables = [
  `CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT UNIQUE NOT NULL,
    email TEXT UNIQUE NOT NULL,
    full_name TEXT,
    is_admin INTEGER NOT NULL DEFAULT 0,
    last_login TEXT,
    created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
  )`,
  `CREATE TABLE IF NOT EXISTS bills (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    bill_name TEXT NOT NULL,
    amount REAL NOT NULL,
    due_day INTEGER NOT NULL CHECK (due_day BETWEEN 1 AND 31),
    category TEXT NOT NULL DEFAULT 'Other',
    is_recurring INTEGER NOT NULL DEFAULT 0,
    recurrence_pattern TEXT NOT NULL DEFAULT 'none',
    is_paid INTEGER NOT NULL DEFAULT 0,
    paid_date TEXT,
    paid_by INTEGER REFERENCES users (id),
    added_by INTEGER NOT NULL REFERENCES users (id),
    created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
    CHECK (
      (is_paid = 1 AND paid_date IS NOT NULL AND paid_by IS NOT NULL)
      OR (is_paid = 0 AND paid_date IS NULL AND paid_by IS NULL)
    )
  )`,
  `CREATE TABLE IF NOT EXISTS bill_payments (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    bill_id INTEGER NOT NULL REFERENCES bills (id),
    amount REAL NOT NULL,
    payment_date TEXT NOT NULL,
    paid_by INTEGER NOT NULL REFERENCES users (id),
    notes TEXT,
    created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
  )`,
  `CREATE TABLE IF NOT EXISTS budget_categories (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT UNIQUE NOT NULL,
    monthly_limit REAL,
    color TEXT NOT NULL DEFAULT '#6c757d'
  )`,
  `CREATE TABLE IF NOT EXISTS user_feature_visibility (
    user_id INTEGER NOT NULL REFERENCES users (id),
    feature_name TEXT NOT NULL,
    is_visible INTEGER NOT NULL DEFAULT 1,
    updated_by INTEGER REFERENCES users (id),
    updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
    PRIMARY KEY (user_id, feature_name)
  )`,
]

const indexes = [
  'CREATE INDEX IF NOT EXISTS idx_bills_recurring_paid ON bills (is_recurring, is_paid)',
  'CREATE INDEX IF NOT EXISTS idx_bills_successor_key ON bills (bill_name, added_by, category, is_paid)',
  'CREATE INDEX IF NOT EXISTS idx_bills_paid_date ON bills (paid_date)',
  'CREATE INDEX IF NOT EXISTS idx_bill_payments_bill ON bill_payments (bill_id, payment_date)',
]

const applySchema = (conn: Connection) => {
  for (const statement of [...tables, ...indexes]) {
    conn.exec(statement)
  }
}

export const initSchema = (connect: ConnectionFactory) => {
  withConnection(connect, (conn) => {
    conn.transaction(() => applySchema(conn))()
  })
  logger.info('Database schema ready')
}
