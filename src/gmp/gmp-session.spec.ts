import { AuthError, ConnectionError, RemoteObjectError, TimeoutError } from '@common/utils/error-handler';
import { FakeGmpEngine, openTestSession } from '@test/utils/fake-gmp-engine';
import { GmpSession } from './gmp-session';

describe('GmpSession', () => {
  let engine: FakeGmpEngine;

  beforeEach(() => {
    engine = new FakeGmpEngine();
  });

  it('negotiates the version and authenticates', async () => {
    const session = await openTestSession(engine);

    expect(session.version).toBe('22.4');
    expect(session.currentState).toBe('authenticated');
    expect(engine.commandLog).toEqual(['get_version', 'authenticate']);
  });

  it('turns rejected credentials into an AuthError and invalidates the session', async () => {
    const transport = engine.createTransport();
    await transport.connect();
    const session = new GmpSession(transport, 500);
    await session.negotiateVersion();

    await expect(session.authenticate({ username: 'admin', password: 'wrong' })).rejects.toBeInstanceOf(AuthError);
    expect(session.currentState).toBe('invalidated');
    expect(transport.isOpen).toBe(false);
  });

  it('refuses commands before authentication without contacting the engine', async () => {
    const transport = engine.createTransport();
    await transport.connect();
    const session = new GmpSession(transport, 500);

    await expect(session.getTargets()).rejects.toBeInstanceOf(AuthError);
    expect(engine.count('get_targets')).toBe(0);
  });

  it('creates and lists targets', async () => {
    const session = await openTestSession(engine);

    const id = await session.createTarget({
      name: 'example_scan',
      hosts: ['192.168.1.1', '10.0.0.0/24'],
      portListId: 'port-list-1',
      comment: 'scan-broker-request:token-1',
    });

    expect(id).toBe('target-1');
    expect(await session.getTargets()).toEqual([
      {
        id: 'target-1',
        name: 'example_scan',
        hosts: ['192.168.1.1', '10.0.0.0/24'],
        comment: 'scan-broker-request:token-1',
      },
    ]);
    expect(engine.targets.get('target-1')?.portListId).toBe('port-list-1');
  });

  it('reports a failed command as RemoteObjectError and stays usable', async () => {
    const session = await openTestSession(engine);
    engine.addTarget('example_scan', '192.168.1.1');

    await expect(
      session.createTarget({ name: 'example_scan', hosts: ['192.168.1.1'], portListId: 'port-list-1' }),
    ).rejects.toMatchObject({ name: 'RemoteObjectError', status: '400', retryable: false });
    expect(session.isUsable).toBe(true);
    expect(await session.getTargets()).toHaveLength(1);
  });

  it('invalidates the session on a transport failure', async () => {
    const session = await openTestSession(engine);
    engine.failNext('get_targets', 'disconnect');

    await expect(session.getTargets()).rejects.toBeInstanceOf(ConnectionError);
    expect(session.currentState).toBe('invalidated');
    await expect(session.getTasks()).rejects.toThrow(`GMP session ${session.id} is invalidated`);
    expect(engine.count('get_tasks')).toBe(0);
  });

  it('surfaces timeouts', async () => {
    const session = await openTestSession(engine);
    engine.failNext('get_tasks', 'timeout');

    await expect(session.getTasks()).rejects.toBeInstanceOf(TimeoutError);
    expect(session.isUsable).toBe(false);
  });

  it('runs the task lifecycle', async () => {
    const session = await openTestSession(engine);
    const targetId = await session.createTarget({ name: 'example_scan', hosts: ['192.168.1.1'], portListId: 'pl' });
    const taskId = await session.createTask({
      name: 'example_scan',
      targetId,
      configId: 'config-full-and-fast',
      scannerId: 'scanner-openvas',
      comment: 'scan-broker-request:token-1',
    });

    expect(await session.getTask(taskId)).toEqual({
      id: 'task-2',
      name: 'example_scan',
      comment: 'scan-broker-request:token-1',
      status: 'New',
      progress: -1,
      targetId: 'target-1',
      currentReportId: undefined,
      lastReportId: undefined,
    });

    const reportId = await session.startTask(taskId);
    expect(reportId).toBe('report-3');
    expect(await session.getTask(taskId)).toMatchObject({ status: 'Requested', progress: 0, currentReportId: 'report-3' });
  });

  it('fails for a task the engine does not know', async () => {
    const session = await openTestSession(engine);

    const error = await session.getTask('task-missing').catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(RemoteObjectError);
    expect(error).toMatchObject({ command: 'get_tasks', status: '404' });
  });

  it('closes the transport', async () => {
    const session = await openTestSession(engine);
    session.close();

    expect(session.currentState).toBe('closed');
    expect(engine.openConnections).toBe(0);
  });
});
