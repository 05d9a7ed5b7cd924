import { createTestWorkspace, TestWorkspace } from '../../testing/test-config';
import { DatabaseService } from './database.service';

describe('DatabaseService', () => {
  let workspace: TestWorkspace;
  let database: DatabaseService;

  beforeEach(() => {
    workspace = createTestWorkspace();
    database = new DatabaseService(workspace.config);
    database.open();
  });

  afterEach(() => {
    database.close();
    workspace.cleanup();
  });

  it('answers the liveness probe only while open', () => {
    expect(database.ping()).toBe(true);
    database.close();
    expect(database.ping()).toBe(false);
  });

  it('releases the session after the work completes', async () => {
    let captured: { isReleased: boolean } | undefined;

    const result = await database.withSession(async (session) => {
      captured = session;
      return 'done';
    });

    expect(result).toBe('done');
    expect(captured?.isReleased).toBe(true);
  });

  it('releases the session when the work throws', async () => {
    let captured: { isReleased: boolean } | undefined;

    await expect(
      database.withSession(async (session) => {
        captured = session;
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(captured?.isReleased).toBe(true);
  });

  it('does not let a failed release mask the result', async () => {
    const session = database.openSession();
    jest.spyOn(database, 'openSession').mockReturnValue(session);
    jest.spyOn(session, 'release').mockImplementation(() => {
      throw new Error('close failed');
    });

    await expect(database.withSession(async () => 42)).resolves.toBe(42);

    jest.restoreAllMocks();
    session.release();
  });

  it('rolls back an open transaction on release', () => {
    const writer = database.openSession();
    writer.begin();
    writer.connection
      .prepare(
        "INSERT INTO companies (symbol, name, created_at, updated_at) VALUES ('TMP', 'Temp', 'now', 'now')"
      )
      .run();
    writer.release();

    const row = database
      .reader()
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM companies')
      .get();
    expect(row?.count).toBe(0);
  });
});
