// ============================================================
// 数据库连接 (better-sqlite3 + Drizzle ORM)
// 由启动流程显式打开并注入，不提供模块级单例
// ============================================================

import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema';
import { BOOTSTRAP_SQL } from './bootstrap';

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export type DatabaseHandle = {
  path: string;
  sqlite: Database.Database;
  db: AppDatabase;
  close: () => void;
};

const IN_MEMORY_PATH = ':memory:';
const BUSY_TIMEOUT_MS = 5_000;

export function openDatabase(dbPath: string): DatabaseHandle {
  if (dbPath !== IN_MEMORY_PATH) {
    // 确保数据目录存在
    const dbDir = path.dirname(dbPath);
    if (!fs.existsSync(dbDir)) {
      fs.mkdirSync(dbDir, { recursive: true });
    }
  }

  const sqlite = new Database(dbPath);

  // 开启 WAL 模式，提升并发读取性能
  if (dbPath !== IN_MEMORY_PATH) {
    sqlite.pragma('journal_mode = WAL');
  }
  // 其他进程持有写锁时等待而不是立即报 SQLITE_BUSY
  sqlite.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
  sqlite.exec(BOOTSTRAP_SQL);

  return {
    path: dbPath,
    sqlite,
    db: drizzle(sqlite, { schema }),
    close: () => {
      if (sqlite.open) sqlite.close();
    },
  };
}

export { schema };
