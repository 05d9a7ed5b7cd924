import Database from 'better-sqlite3';

/**
 * One database connection owned by a single batch.
 *
 * Each unit of work is bracketed explicitly with begin/commit, and a failed
 * unit is undone with rollback without touching earlier commits.
 * A session is never shared between pipeline runs.
 */
export class PersistenceSession {
  private released = false;

  constructor(
    readonly id: string,
    private readonly db: Database.Database
  ) {}

  /** Underlying connection; throws once the session has been released */
  get connection(): Database.Database {
    if (this.released) {
      throw new Error(`Session ${this.id} has been released`);
    }
    return this.db;
  }

  get inTransaction(): boolean {
    return !this.released && this.db.inTransaction;
  }

  get isReleased(): boolean {
    return this.released;
  }

  begin(): void {
    if (this.connection.inTransaction) {
      throw new Error(`Session ${this.id} already has an open transaction`);
    }
    // IMMEDIATE takes the write lock up front so a competing session waits
    // at BEGIN rather than failing halfway through the unit of work.
    this.connection.exec('BEGIN IMMEDIATE');
  }

  commit(): void {
    if (!this.connection.inTransaction) {
      throw new Error(`Session ${this.id} has no open transaction to commit`);
    }
    this.connection.exec('COMMIT');
  }

  /** Undo the open unit of work. No-op when nothing is open. */
  rollback(): void {
    if (this.inTransaction) {
      this.db.exec('ROLLBACK');
    }
  }

  /**
   * Roll back anything still open and close the connection.
   * Safe to call more than once.
   */
  release(): void {
    if (this.released) return;
    this.released = true;
    try {
      if (this.db.inTransaction) {
        this.db.exec('ROLLBACK');
      }
    } finally {
      this.db.close();
    }
  }
}
