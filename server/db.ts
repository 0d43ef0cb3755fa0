import { mkdirSync } from 'node:fs'
import path from 'node:path'
import Database from 'better-sqlite3'

export type DatabaseConfig = {
  path: string
}

export type Connection = Database.Database

export type ConnectionFactory = () => Connection

export const createConnectionFactory = (config: DatabaseConfig): ConnectionFactory => {
  mkdirSync(path.dirname(path.resolve(config.path)), { recursive: true })

  return () => {
    const conn = new Database(config.path)
    conn.pragma('journal_mode = WAL')
    conn.pragma('busy_timeout = 5000')
    conn.pragma('foreign_keys = ON')
    return conn
  }
}

/**
 * Opens a connection for the duration of `run` and always closes it afterwards.
 */
export const withConnection = <T>(connect: ConnectionFactory, run: (conn: Connection) => T): T => {
  const conn = connect()
  try {
    return run(conn)
  } finally {
    conn.close()
  }
}

export const toSqlBoolean = (value: boolean) => (value ? 1 : 0)
