import { AuthError, NotFoundError, ValidationError } from '@common/utils/error-handler';
import { ConfigService } from '@config/config.service';
import { GMP_TRANSPORT_FACTORY, SessionManagerService } from '@gmp/session-manager.service';
import { Test } from '@nestjs/testing';
import { FakeGmpEngine } from '@test/utils/fake-gmp-engine';
import { createTestConfig, loadFixture } from '@test/utils/fixtures';
import { ReportPollerService } from './report-poller.service';
import { ScanLauncherService } from './scan-launcher.service';
import { ScanRegistryService } from './scan-registry.service';
import { ScansService } from './scans.service';
import { TargetTaskBuilderService } from './target-task-builder.service';

describe('ScansService', () => {
  let engine: FakeGmpEngine;
  let service: ScansService;
  let registry: ScanRegistryService;
  let sessionManager: SessionManagerService;

  async function createService(overrides: Record<string, string> = {}): Promise<void> {
    const moduleRef = await Test.createTestingModule({
      providers: [
        { provide: ConfigService, useValue: createTestConfig(overrides) },
        { provide: GMP_TRANSPORT_FACTORY, useValue: () => engine.createTransport() },
        SessionManagerService,
        ScanRegistryService,
        TargetTaskBuilderService,
        ScanLauncherService,
        ReportPollerService,
        ScansService,
      ],
    }).compile();

    service = moduleRef.get(ScansService);
    registry = moduleRef.get(ScanRegistryService);
    sessionManager = moduleRef.get(SessionManagerService);
  }

  beforeEach(async () => {
    engine = new FakeGmpEngine();
    await createService();
  });

  describe('triggerScan', () => {
    it('starts a scan and registers it as pending', async () => {
      const response = await service.triggerScan({ scan_name: 'example_scan', targets: '192.168.1.1' });

      expect(response).toEqual({
        message: 'Scan started',
        scan_name: 'example_scan',
        targets: '192.168.1.1',
        scan_id: 'report-3',
      });
      expect(registry.get('report-3')).toMatchObject({
        taskId: 'task-2',
        targetId: 'target-1',
        reportId: 'report-3',
        targets: ['192.168.1.1'],
        status: 'Pending',
        progress: 0,
      });
      expect(engine.commandLog).toEqual([
        'get_version',
        'authenticate',
        'get_targets',
        'create_target',
        'get_configs',
        'get_scanners',
        'create_task',
        'get_tasks',
        'start_task',
      ]);
      expect(sessionManager.activeSessionCount).toBe(0);
      expect(engine.openConnections).toBe(0);
    });

    it('joins list targets in the response', async () => {
      const response = await service.triggerScan({ scan_name: 'example_scan', targets: ['192.168.1.1', '10.0.0.0/24'] });

      expect(response.targets).toBe('192.168.1.1,10.0.0.0/24');
      expect(engine.targets.get('target-1')?.hosts).toBe('192.168.1.1,10.0.0.0/24');
    });

    it('passes scan config and port list overrides through', async () => {
      await service.triggerScan({
        scan_name: 'example_scan',
        targets: '192.168.1.1',
        config_id: 'config-discovery',
        port_list_id: 'port-list-web',
      });

      expect(engine.targets.get('target-1')?.portListId).toBe('port-list-web');
      expect(engine.tasks.get('task-2')?.configId).toBe('config-discovery');
      expect(engine.count('get_configs')).toBe(0);
    });

    it.each([
      [{ targets: '192.168.1.1' }, 'scan_name is required'],
      [{ scan_name: '   ', targets: '192.168.1.1' }, 'scan_name is required'],
      [{ scan_name: 'example_scan' }, 'targets is required'],
      [{ scan_name: 'example_scan', targets: '' }, 'targets is required'],
      [{ scan_name: 'example_scan', targets: '999.1.1.1' }, 'Invalid target entries: 999.1.1.1'],
      [{ scan_name: 'example_scan', targets: '192.168.1.1', config_id: '' }, 'config_id must be a non-empty string'],
    ])('rejects %j without contacting the engine', async (body, message) => {
      const error = await service.triggerScan(body).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ message });
      expect(engine.connectionAttempts).toBe(0);
    });

    it('fails with AuthError when the engine rejects the credentials', async () => {
      await createService({ GMP_PASSWORD: 'wrong' });

      await expect(service.triggerScan({ scan_name: 'example_scan', targets: '192.168.1.1' })).rejects.toBeInstanceOf(
        AuthError,
      );
      expect(registry.size).toBe(0);
    });

    it('creates nothing twice when the target reply is lost', async () => {
      engine.failNext('create_target', 'timeout', true);

      const response = await service.triggerScan({ scan_name: 'example_scan', targets: '192.168.1.1' });

      expect(response.scan_id).toBe('report-3');
      expect(engine.count('create_target')).toBe(1);
      expect(engine.targets.size).toBe(1);
      expect(engine.tasks.size).toBe(1);
    });

    it('recovers the scan id when the start reply is lost', async () => {
      engine.failNext('start_task', 'disconnect', true);

      const response = await service.triggerScan({ scan_name: 'example_scan', targets: '192.168.1.1' });

      expect(response.scan_id).toBe('report-3');
      expect(engine.count('create_target')).toBe(1);
      expect(engine.count('create_task')).toBe(1);
      expect(engine.count('start_task')).toBe(1);
      expect(engine.taskForReport('report-3').reports).toEqual(['report-3']);
      expect(registry.size).toBe(1);
    });

    it('retries a task creation that never reached the engine', async () => {
      engine.failNext('create_task', 'disconnect');

      const response = await service.triggerScan({ scan_name: 'example_scan', targets: '192.168.1.1' });

      expect(response.scan_id).toBe('report-3');
      expect(engine.count('create_task')).toBe(2);
      expect(engine.tasks.size).toBe(1);
    });

    it('starts a second scan under a name used before', async () => {
      const first = await service.triggerScan({ scan_name: 'weekly', targets: '192.168.1.1' });
      engine.setTaskStatus(engine.taskForReport(first.scan_id).id, 'Done', 100);

      const second = await service.triggerScan({ scan_name: 'weekly', targets: '192.168.1.2' });

      expect(first.scan_id).toBe('report-3');
      expect(second.scan_id).toBe('report-6');
      expect(engine.targets.size).toBe(2);
      expect([...engine.tasks.values()].map(task => task.name)).toEqual(['weekly', 'weekly']);
      expect(registry.get('report-6')).toMatchObject({ name: 'weekly', targets: ['192.168.1.2'], targetId: 'target-4' });
      expect(registry.get('report-3')).toMatchObject({ name: 'weekly', targets: ['192.168.1.1'], targetId: 'target-1' });
    });

    it('starts concurrent scans that share a name', async () => {
      const responses = await Promise.all([
        service.triggerScan({ scan_name: 'nightly', targets: '192.168.1.1' }),
        service.triggerScan({ scan_name: 'nightly', targets: '192.168.1.2' }),
      ]);

      const scanIds = responses.map(response => response.scan_id);
      expect(new Set(scanIds).size).toBe(2);
      expect(engine.targets.size).toBe(2);
      expect(engine.tasks.size).toBe(2);
      expect(registry.size).toBe(2);
      expect(scanIds.map(scanId => registry.get(scanId).name)).toEqual(['nightly', 'nightly']);
      expect(engine.openConnections).toBe(0);
    });
  });

  describe('getResults', () => {
    let scanId: string;

    beforeEach(async () => {
      ({ scan_id: scanId } = await service.triggerScan({ scan_name: 'example_scan', targets: '192.168.1.1' }));
    });

    it('returns empty results while the scan is pending', async () => {
      expect(await service.getResults(scanId)).toEqual({
        scan_name: 'example_scan',
        targets: ['192.168.1.1'],
        status: 'Pending',
        progress: 0,
        result_details: [],
        result_summary: [],
      });
    });

    it('reports progress while the scan runs', async () => {
      engine.setTaskStatus(engine.taskForReport(scanId).id, 'Running', 40);

      expect(await service.getResults(scanId)).toMatchObject({ status: 'Running', progress: 40, result_details: [] });
    });

    it('returns the translated report once the scan is done', async () => {
      engine.setTaskStatus(engine.taskForReport(scanId).id, 'Done', 100);
      engine.setReport(scanId, loadFixture('report-done.xml'));

      const results = await service.getResults(scanId);

      expect(results.status).toBe('Done');
      expect(results.progress).toBe(100);
      expect(results.result_details.map(detail => detail.id)).toEqual(['res-1', 'res-2', 'res-3', 'res-4']);
      expect(results.result_summary).toEqual([
        { category: 'High', count: 1 },
        { category: 'Medium', count: 1 },
        { category: 'Low', count: 1 },
        { category: 'Log', count: 1 },
        { category: 'Total', count: 4 },
      ]);
    });

    it('fetches the report only once for concurrent and repeated calls', async () => {
      engine.setTaskStatus(engine.taskForReport(scanId).id, 'Done', 100);
      engine.setReport(scanId, loadFixture('report-done.xml'));

      const [first, second] = await Promise.all([service.getResults(scanId), service.getResults(scanId)]);
      const third = await service.getResults(scanId);

      expect(second).toEqual(first);
      expect(third).toEqual(first);
      expect(engine.count('get_reports')).toBe(1);
    });

    it('shows a failed scan with empty results', async () => {
      engine.setTaskStatus(engine.taskForReport(scanId).id, 'Stopped', 35);

      expect(await service.getResults(scanId)).toMatchObject({
        status: 'Failed',
        result_details: [],
        result_summary: [],
      });
      expect(engine.count('get_reports')).toBe(0);
    });

    it('reports Unknown and keeps the stored status when the engine is unreachable', async () => {
      engine.failNext('get_tasks', 'disconnect');
      engine.failNext('get_tasks', 'disconnect');
      engine.failNext('get_tasks', 'disconnect');

      expect(await service.getResults(scanId)).toMatchObject({ status: 'Unknown', progress: 0, result_details: [] });
      expect(registry.get(scanId).status).toBe('Pending');
      expect(engine.openConnections).toBe(0);
    });

    it('fails for an unknown scan id without contacting the engine', async () => {
      const attempts = engine.connectionAttempts;

      await expect(service.getResults('nonexistent')).rejects.toBeInstanceOf(NotFoundError);
      expect(engine.connectionAttempts).toBe(attempts);
    });
  });

  describe('listScans', () => {
    it('lists tracked scans', async () => {
      await service.triggerScan({ scan_name: 'example_scan', targets: '192.168.1.1' });

      expect(service.listScans()).toEqual([
        {
          scan_id: 'report-3',
          scan_name: 'example_scan',
          targets: ['192.168.1.1'],
          status: 'Pending',
          progress: 0,
          created_at: expect.any(String),
          last_polled_at: null,
        },
      ]);
    });
  });

  describe('refreshStatus', () => {
    it('polls one scan', async () => {
      const { scan_id: scanId } = await service.triggerScan({ scan_name: 'example_scan', targets: '192.168.1.1' });
      engine.setTaskStatus(engine.taskForReport(scanId).id, 'Running', 55);

      expect(await service.refreshStatus(scanId)).toEqual({
        scanId,
        status: 'Running',
        progress: 55,
        authoritative: true,
      });
    });
  });
});
