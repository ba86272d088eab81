import { DEFAULT_PORT_LIST_ID } from '@common/constants/gmp';
import { RemoteObjectError, ValidationError } from '@common/utils/error-handler';
import { GmpSession } from '@gmp/gmp-session';
import { FakeGmpEngine, openTestSession } from '@test/utils/fake-gmp-engine';
import { createTestConfig } from '@test/utils/fixtures';
import { TargetTaskBuilderService, requestMarker } from './target-task-builder.service';

describe('TargetTaskBuilderService', () => {
  let engine: FakeGmpEngine;
  let session: GmpSession;
  let builder: TargetTaskBuilderService;

  beforeEach(async () => {
    engine = new FakeGmpEngine();
    session = await openTestSession(engine);
    builder = new TargetTaskBuilderService(createTestConfig());
  });

  afterEach(() => {
    session.close();
  });

  describe('createTarget', () => {
    it('rejects malformed hosts before contacting the engine', async () => {
      await expect(
        builder.createTarget(session, 'example_scan', ['bad_host'], { requestToken: 'token-1' }),
      ).rejects.toBeInstanceOf(ValidationError);
      await expect(builder.createTarget(session, '  ', ['192.168.1.1'], { requestToken: 'token-1' })).rejects.toThrow(
        'Target name must not be empty',
      );

      expect(engine.count('get_targets')).toBe(0);
      expect(engine.count('create_target')).toBe(0);
    });

    it('creates a target stamped with the request marker', async () => {
      const outcome = await builder.createTarget(session, 'example_scan', ['192.168.1.1'], { requestToken: 'token-1' });

      expect(outcome).toEqual({ kind: 'Created', id: 'target-1' });
      expect(engine.targets.get('target-1')).toEqual({
        id: 'target-1',
        name: 'example_scan token-1',
        hosts: '192.168.1.1',
        comment: 'scan-broker-request:token-1',
        portListId: DEFAULT_PORT_LIST_ID,
      });
    });

    it('uses a requested port list', async () => {
      await builder.createTarget(session, 'example_scan', ['192.168.1.1'], {
        requestToken: 'token-1',
        portListId: 'port-list-web',
      });

      expect(engine.targets.get('target-1')?.portListId).toBe('port-list-web');
    });

    it('finds the target an earlier attempt of the same request created', async () => {
      await builder.createTarget(session, 'example_scan', ['192.168.1.1'], { requestToken: 'token-1' });

      const again = await builder.createTarget(session, 'example_scan', ['192.168.1.1'], { requestToken: 'token-1' });

      expect(again).toEqual({ kind: 'AlreadyExists', id: 'target-1' });
      expect(engine.count('create_target')).toBe(1);
    });

    it('leaves targets of earlier scans with the same name in place', async () => {
      const earlier = await builder.createTarget(session, 'example_scan', ['10.0.0.1'], { requestToken: 'token-1' });

      const outcome = await builder.createTarget(session, 'example_scan', ['192.168.1.1'], { requestToken: 'token-2' });

      expect(earlier).toEqual({ kind: 'Created', id: 'target-1' });
      expect(outcome).toEqual({ kind: 'Created', id: 'target-2' });
      expect([...engine.targets.values()].map(target => target.name)).toEqual([
        'example_scan token-1',
        'example_scan token-2',
      ]);
    });

    it('does not take over a same-name target carrying another marker', async () => {
      engine.addTarget('example_scan token-1', '10.0.0.1', 'created by hand');

      await expect(
        builder.createTarget(session, 'example_scan', ['192.168.1.1'], { requestToken: 'token-1' }),
      ).rejects.toMatchObject({ name: 'RemoteObjectError', status: '400' });
      expect(engine.targets.get('target-1')?.hosts).toBe('10.0.0.1');
    });
  });

  describe('createTask', () => {
    it('resolves the default scan config and scanner by name', async () => {
      const outcome = await builder.createTask(session, 'target-9', undefined, {
        name: 'example_scan',
        requestToken: 'token-1',
      });

      expect(outcome).toEqual({ kind: 'Created', id: 'task-1' });
      expect(engine.tasks.get('task-1')).toMatchObject({
        name: 'example_scan',
        comment: requestMarker('token-1'),
        targetId: 'target-9',
        configId: 'config-full-and-fast',
        scannerId: 'scanner-openvas',
      });
    });

    it('uses an explicit scan config without looking it up', async () => {
      await builder.createTask(session, 'target-9', 'config-discovery', { name: 'example_scan', requestToken: 'token-1' });

      expect(engine.count('get_configs')).toBe(0);
      expect(engine.tasks.get('task-1')?.configId).toBe('config-discovery');
    });

    it('takes configured ids over name lookups', async () => {
      const configured = new TargetTaskBuilderService(
        createTestConfig({ GMP_SCAN_CONFIG_ID: 'config-custom', GMP_SCANNER_ID: 'scanner-custom' }),
      );

      await configured.createTask(session, 'target-9', undefined, { name: 'example_scan', requestToken: 'token-1' });

      expect(engine.count('get_configs')).toBe(0);
      expect(engine.count('get_scanners')).toBe(0);
      expect(engine.tasks.get('task-1')).toMatchObject({ configId: 'config-custom', scannerId: 'scanner-custom' });
    });

    it('fails when the default scan config is missing', async () => {
      const misconfigured = new TargetTaskBuilderService(createTestConfig({ GMP_SCAN_CONFIG_NAME: 'Nonexistent' }));

      const error = await misconfigured
        .createTask(session, 'target-9', undefined, { name: 'example_scan', requestToken: 'token-1' })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RemoteObjectError);
      expect(error).toMatchObject({ message: 'Default scan config "Nonexistent" not found', status: '404' });
      expect(engine.count('create_task')).toBe(0);
    });

    it('reuses the task an earlier attempt created when asked to check', async () => {
      await builder.createTask(session, 'target-9', undefined, { name: 'example_scan', requestToken: 'token-1' });

      const again = await builder.createTask(session, 'target-9', undefined, {
        name: 'example_scan',
        requestToken: 'token-1',
        checkExisting: true,
      });

      expect(again).toEqual({ kind: 'AlreadyExists', id: 'task-1' });
      expect(engine.count('create_task')).toBe(1);
    });

    it('ignores tasks of other requests', async () => {
      await builder.createTask(session, 'target-9', undefined, { name: 'example_scan', requestToken: 'token-1' });

      const other = await builder.createTask(session, 'target-9', undefined, {
        name: 'example_scan',
        requestToken: 'token-2',
        checkExisting: true,
      });

      expect(other).toEqual({ kind: 'Created', id: 'task-2' });
    });
  });
});
