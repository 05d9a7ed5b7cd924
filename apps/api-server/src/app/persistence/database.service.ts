import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { CleanupError, describeError } from '../common/errors';
import { PersistenceSession } from './persistence-session';
import { SCHEMA_SQL } from './schema';

/**
 * Owns the SQLite database file.
 *
 * Holds one shared connection for reads and probes, and hands out a
 * dedicated connection per batch through {@link openSession}.
 */
@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);

  /** Shared connection for read-only lookups and health probes */
  private shared: Database.Database | null = null;

  private sessionCounter = 0;

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  onModuleInit(): void {
    this.open();
  }

  onModuleDestroy(): void {
    this.close();
  }

  /**
   * Open the shared connection and create tables if needed.
   */
  open(): void {
    if (this.shared) return;

    fs.mkdirSync(path.dirname(this.config.database.path), { recursive: true });
    const db = this.connect();
    db.exec(SCHEMA_SQL);
    this.shared = db;

    this.logger.log(`Database ready at ${this.config.database.path}`);
  }

  close(): void {
    if (!this.shared) return;
    this.shared.close();
    this.shared = null;
    this.logger.log('Database closed');
  }

  /** Shared connection for reads outside a batch */
  reader(): Database.Database {
    if (!this.shared) {
      throw new Error('Database is not open');
    }
    return this.shared;
  }

  /**
   * Open a session backed by its own connection.
   * The caller is responsible for releasing it; prefer {@link withSession}.
   */
  openSession(): PersistenceSession {
    const id = `SES-${++this.sessionCounter}`;
    const session = new PersistenceSession(id, this.connect());
    this.logger.debug(`Session ${id} opened`);
    return session;
  }

  /**
   * Run `work` with a fresh session and release it on every exit path.
   * A failed release is logged and never replaces the work's own outcome.
   */
  async withSession<T>(
    work: (session: PersistenceSession) => Promise<T>
  ): Promise<T> {
    const session = this.openSession();
    try {
      return await work(session);
    } finally {
      try {
        session.release();
        this.logger.debug(`Session ${session.id} released`);
      } catch (err) {
        this.logger.warn(new CleanupError(`session ${session.id}`, err).message);
      }
    }
  }

  /** Store liveness: true when a trivial query succeeds */
  ping(): boolean {
    if (!this.shared) return false;
    try {
      this.shared.prepare('SELECT 1').get();
      return true;
    } catch (err) {
      this.logger.warn(`Database ping failed: ${describeError(err)}`);
      return false;
    }
  }

  private connect(): Database.Database {
    const db = new Database(this.config.database.path, {
      timeout: this.config.database.busyTimeoutMs,
    });
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    return db;
  }
}
