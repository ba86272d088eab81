import {
  AppError,
  AuthError,
  ConnectionError,
  RemoteObjectError,
  describeError,
} from '@common/utils/error-handler';
import { attr, buildCommand, child, isXmlNode, list, parseXml, text } from '@gmp/gmp-xml';
import { Logger } from '@nestjs/common';
import {
  CreateTargetCommand,
  CreateTaskCommand,
  GetReportOptions,
  GmpCredentials,
  GmpNamedObject,
  GmpResponse,
  GmpTargetInfo,
  GmpTaskInfo,
  GmpTransport,
  SessionState,
  XmlNode,
} from '@types';
import { randomUUID } from 'crypto';

/**
 * One authenticated GMP conversation with gvmd.
 *
 * A session is owned by exactly one operation. Any transport fault, timeout,
 * unreadable response or authentication failure invalidates it for good; the
 * caller has to acquire a fresh one.
 */
export class GmpSession {
  private readonly logger = new Logger(GmpSession.name);
  readonly id = randomUUID();
  private state: SessionState = 'connected';
  private protocolVersion: string | null = null;

  constructor(
    private readonly transport: GmpTransport,
    private readonly timeoutMs: number,
  ) {}

  get currentState(): SessionState {
    return this.state;
  }

  get isAuthenticated(): boolean {
    return this.state === 'authenticated';
  }

  get isUsable(): boolean {
    return this.state === 'connected' || this.state === 'authenticated';
  }

  /**
   * Protocol version reported by get_version, once negotiated
   */
  get version(): string | null {
    return this.protocolVersion;
  }

  async negotiateVersion(): Promise<string> {
    const response = await this.execute('get_version', {}, false);
    const version = text(response.body, 'version');
    if (!version) {
      this.invalidate('get_version response carried no version');
      throw new ConnectionError('Manager did not report a protocol version');
    }
    this.protocolVersion = version;
    return version;
  }

  async authenticate(credentials: GmpCredentials): Promise<void> {
    try {
      await this.execute(
        'authenticate',
        { credentials: { username: credentials.username, password: credentials.password } },
        false,
      );
    } catch (error) {
      if (error instanceof RemoteObjectError) {
        this.invalidate('authentication rejected');
        throw new AuthError(`Authentication as ${credentials.username} failed: ${error.message}`, {
          username: credentials.username,
        });
      }
      throw error;
    }

    this.state = 'authenticated';
    this.logger.debug(`Session ${this.id} authenticated as ${credentials.username}`);
  }

  async getTargets(filter = 'rows=-1'): Promise<GmpTargetInfo[]> {
    const response = await this.execute('get_targets', { '@_filter': filter });
    return list(response.body, 'target').map(node => this.toTargetInfo(node));
  }

  async createTarget(command: CreateTargetCommand): Promise<string> {
    const response = await this.execute('create_target', {
      name: command.name,
      hosts: command.hosts.join(','),
      port_list: { '@_id': command.portListId },
      ...(command.comment ? { comment: command.comment } : {}),
    });
    return this.requireId(response);
  }

  async getScanConfigs(): Promise<GmpNamedObject[]> {
    const response = await this.execute('get_configs', { '@_filter': 'rows=-1' });
    return list(response.body, 'config').map(node => this.toNamedObject(node));
  }

  async getScanners(): Promise<GmpNamedObject[]> {
    const response = await this.execute('get_scanners', { '@_filter': 'rows=-1' });
    return list(response.body, 'scanner').map(node => this.toNamedObject(node));
  }

  async createTask(command: CreateTaskCommand): Promise<string> {
    const response = await this.execute('create_task', {
      name: command.name,
      ...(command.comment ? { comment: command.comment } : {}),
      config: { '@_id': command.configId },
      target: { '@_id': command.targetId },
      scanner: { '@_id': command.scannerId },
    });
    return this.requireId(response);
  }

  async getTasks(filter = 'rows=-1'): Promise<GmpTaskInfo[]> {
    const response = await this.execute('get_tasks', { '@_filter': filter });
    return list(response.body, 'task').map(node => this.toTaskInfo(node));
  }

  async getTask(taskId: string): Promise<GmpTaskInfo> {
    const response = await this.execute('get_tasks', { '@_task_id': taskId });
    const [task] = list(response.body, 'task');
    if (!task) {
      throw new RemoteObjectError(`Task ${taskId} not found`, 'get_tasks', '404');
    }
    return this.toTaskInfo(task);
  }

  /**
   * Start a task and return the id of the report it produces
   */
  async startTask(taskId: string): Promise<string> {
    const response = await this.execute('start_task', { '@_task_id': taskId });
    const reportId = text(response.body, 'report_id');
    if (!reportId) {
      throw new RemoteObjectError(`start_task for ${taskId} returned no report id`, 'start_task', response.status);
    }
    return reportId;
  }

  /**
   * Fetch a report; returns the whole get_reports_response element
   */
  async getReport(reportId: string, options: GetReportOptions): Promise<XmlNode> {
    const response = await this.execute('get_reports', {
      '@_report_id': reportId,
      '@_details': options.details ? '1' : '0',
      '@_filter': options.filter,
    });
    return response.body;
  }

  invalidate(reason: string): void {
    if (this.state === 'closed' || this.state === 'invalidated') return;
    this.logger.warn(`Invalidating GMP session ${this.id}: ${reason}`);
    this.state = 'invalidated';
    this.transport.close();
  }

  close(): void {
    if (this.state === 'closed') return;
    this.state = 'closed';
    this.transport.close();
  }

  private async execute(command: string, content: XmlNode, requireAuth = true): Promise<GmpResponse> {
    if (!this.isUsable) {
      throw new ConnectionError(`GMP session ${this.id} is ${this.state}`, { command });
    }
    if (requireAuth && !this.isAuthenticated) {
      throw new AuthError(`GMP session ${this.id} is not authenticated`, { command });
    }

    let raw: string;
    try {
      raw = await this.transport.request(buildCommand(command, content), this.timeoutMs);
    } catch (error) {
      this.invalidate(`${command} failed: ${describeError(error)}`);
      if (error instanceof AppError) throw error;
      throw new ConnectionError(`${command} failed: ${describeError(error)}`, { command });
    }

    let body: XmlNode | undefined;
    try {
      body = child(parseXml(raw), `${command}_response`);
    } catch (error) {
      this.invalidate(`unreadable ${command} response`);
      throw new ConnectionError(`Malformed ${command} response: ${describeError(error)}`, { command });
    }
    if (!isXmlNode(body)) {
      this.invalidate(`unexpected reply to ${command}`);
      throw new ConnectionError(`Expected <${command}_response> from the manager`, { command });
    }

    const status = attr(body, 'status') ?? '';
    const statusText = attr(body, 'status_text') ?? '';

    if (status === '401') {
      this.invalidate('authentication expired');
      throw new AuthError(`${command} rejected: ${statusText || 'authenticate first'}`, { command, status });
    }
    if (!status.startsWith('2')) {
      throw new RemoteObjectError(`${command} failed with status ${status || 'missing'}: ${statusText}`, command, status);
    }

    return { command, status, statusText, body };
  }

  private requireId(response: GmpResponse): string {
    const id = attr(response.body, 'id') ?? text(response.body, 'id');
    if (!id) {
      throw new RemoteObjectError(`${response.command} returned no id`, response.command, response.status);
    }
    return id;
  }

  private toNamedObject(node: XmlNode): GmpNamedObject {
    return { id: attr(node, 'id') ?? '', name: text(node, 'name') ?? '' };
  }

  private toTargetInfo(node: XmlNode): GmpTargetInfo {
    const hosts = text(node, 'hosts') ?? '';
    return {
      id: attr(node, 'id') ?? '',
      name: text(node, 'name') ?? '',
      hosts: hosts
        .split(',')
        .map(host => host.trim())
        .filter(Boolean),
      comment: text(node, 'comment') ?? '',
    };
  }

  private toTaskInfo(node: XmlNode): GmpTaskInfo {
    const progress = Number(text(node, 'progress') ?? '0');
    return {
      id: attr(node, 'id') ?? '',
      name: text(node, 'name') ?? '',
      comment: text(node, 'comment') ?? '',
      status: text(node, 'status') ?? '',
      progress: Number.isFinite(progress) ? progress : 0,
      targetId: attr(child(node, 'target'), 'id'),
      currentReportId: attr(child(child(node, 'current_report'), 'report'), 'id'),
      lastReportId: attr(child(child(node, 'last_report'), 'report'), 'id'),
    };
  }
}
