/**
 * SQLite Database Wrapper for the memory system
 *
 * Provides the connection used by every tier:
 * - Busy retry logic for file-locking contention
 * - WAL journal and busy timeout pragmas
 * - Automatic schema initialization
 * - ':memory:' support for in-process stores
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { CREATE_TABLES_SQL } from './schema.js';
import { StoreUnavailableError } from './errors.js';
import { createLogger } from './logger.js';

const IN_MEMORY = ':memory:';
const BUSY_TIMEOUT_MS = 5000;
const MAX_RETRY_ATTEMPTS = 3;
const RETRY_DELAY_MS = 100;

const log = createLogger('Memory');

/**
 * Sleep utility for retry logic
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function isBusyError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = 'code' in error ? error.code : undefined;
  return code === 'SQLITE_BUSY' ||
    error.message.includes('SQLITE_BUSY') ||
    error.message.includes('database is locked') ||
    error.message.includes('EBUSY');
}

export class MemoryDatabase {
  private db: Database.Database | null = null;
  private readonly dbPath: string;
  private initialized = false;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  /**
   * Initialize the database connection and schema
   */
  async init(): Promise<void> {
    if (this.initialized) return;

    if (this.dbPath !== IN_MEMORY) {
      const dir = path.dirname(this.dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = await this.openWithRetry();

    if (this.dbPath !== IN_MEMORY) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('busy_timeout = ' + BUSY_TIMEOUT_MS);
    this.db.pragma('synchronous = NORMAL');

    this.db.exec(CREATE_TABLES_SQL);

    this.initialized = true;
    log.info(`Database initialized at: ${this.dbPath}`);
  }

  /**
   * Open database with retry logic for file-locking
   */
  private async openWithRetry(): Promise<Database.Database> {
    for (let attempt = 1; ; attempt++) {
      try {
        return new Database(this.dbPath);
      } catch (error) {
        if (isBusyError(error) && attempt < MAX_RETRY_ATTEMPTS) {
          log.info(`Database busy, retrying (attempt ${attempt}/${MAX_RETRY_ATTEMPTS})...`);
          await sleep(RETRY_DELAY_MS * attempt);
        } else {
          throw new StoreUnavailableError(`Failed to open memory database at ${this.dbPath}`, { cause: error });
        }
      }
    }
  }

  /**
   * Execute a write operation with retry logic
   */
  async writeWithRetry<T>(operation: () => T): Promise<T> {
    this.connection();

    for (let attempt = 1; ; attempt++) {
      try {
        return operation();
      } catch (error) {
        if (isBusyError(error) && attempt < MAX_RETRY_ATTEMPTS) {
          log.info(`Write busy, retrying (attempt ${attempt}/${MAX_RETRY_ATTEMPTS})...`);
          await sleep(RETRY_DELAY_MS * attempt);
        } else {
          throw error;
        }
      }
    }
  }

  /**
   * The open connection, or StoreUnavailableError
   */
  private connection(): Database.Database {
    if (!this.initialized || !this.db) {
      throw new StoreUnavailableError();
    }
    return this.db;
  }

  /**
   * Prepare a statement with typed bind parameters and result rows
   */
  prepare<Params extends unknown[] = unknown[], Row = unknown>(sql: string) {
    return this.connection().prepare<Params, Row>(sql);
  }

  /**
   * Run a function inside a transaction
   */
  transaction<T>(fn: () => T): T {
    return this.connection().transaction(fn)();
  }

  /**
   * Close the database connection
   */
  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      this.initialized = false;
      log.info('Database connection closed');
    }
  }

  isInitialized(): boolean {
    return this.initialized;
  }
}
