import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export const IN_MEMORY = ':memory:';

/**
 * Database connection manager
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  /**
   * Relative paths resolve under `<cwd>/data`; `:memory:` keeps everything
   * in process
   */
  constructor(dbPath: string = 'talus-master.db') {
    this.dbPath = dbPath === IN_MEMORY ? IN_MEMORY : path.resolve(process.cwd(), 'data', dbPath);

    if (this.dbPath !== IN_MEMORY) {
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    // Enable WAL mode for better concurrency
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS jobs (
        id TEXT PRIMARY KEY,
        state TEXT NOT NULL,
        payload TEXT NOT NULL,
        worker_id TEXT,
        attempts INTEGER NOT NULL DEFAULT 0,
        progress INTEGER DEFAULT 0,
        submitted_at TEXT NOT NULL,
        assigned_at TEXT,
        started_at TEXT,
        finished_at TEXT,
        result TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_job_state ON jobs(state);
      CREATE INDEX IF NOT EXISTS idx_job_submitted ON jobs(submitted_at);

      CREATE TABLE IF NOT EXISTS job_progress (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        job_id TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        message TEXT NOT NULL,
        percentage INTEGER,
        FOREIGN KEY (job_id) REFERENCES jobs(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_job_progress_id ON job_progress(job_id);

      CREATE TABLE IF NOT EXISTS workers (
        id TEXT PRIMARY KEY,
        capacity INTEGER NOT NULL,
        liveness TEXT NOT NULL,
        registered_at TEXT NOT NULL,
        last_heartbeat TEXT NOT NULL,
        offline_reason TEXT
      );
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  getDatabasePath(): string {
    return this.dbPath;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  getStatistics(): {
    totalJobs: number;
    totalWorkers: number;
    databaseSize: number;
    jobStates: Record<string, number>;
  } {
    const count = (sql: string): number => {
      const row: unknown = this.db.prepare(sql).get();
      return isCountRow(row) ? row.count : 0;
    };

    const jobStates: Record<string, number> = {};
    const rows: unknown[] = this.db
      .prepare('SELECT state, COUNT(*) as count FROM jobs GROUP BY state')
      .all();
    for (const row of rows) {
      if (isCountRow(row) && 'state' in row && typeof row.state === 'string') {
        jobStates[row.state] = row.count;
      }
    }

    let databaseSize = 0;
    if (this.dbPath !== IN_MEMORY && fs.existsSync(this.dbPath)) {
      databaseSize = fs.statSync(this.dbPath).size;
    }

    return {
      totalJobs: count('SELECT COUNT(*) as count FROM jobs'),
      totalWorkers: count('SELECT COUNT(*) as count FROM workers'),
      databaseSize,
      jobStates,
    };
  }
}

function isCountRow(row: unknown): row is { count: number } {
  return typeof row === 'object' && row !== null && 'count' in row && typeof row.count === 'number';
}
