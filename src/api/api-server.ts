/**
 * Express admin API over the command service
 */

import express, { NextFunction, Request, Response } from 'express';
import { Server, createServer } from 'http';
import { AddressInfo } from 'net';
import { Logger } from '../types';
import {
  AlreadyRegisteredError,
  CapacityExceededError,
  ErrorHandler,
  NotFoundError,
  PermissionDeniedError,
  ValidationError,
  WatchdogError
} from '../error-handling';
import { CommandContext, CommandResult, CommandService, ServerView } from '../commands/command-service';
import { ScheduleLoop } from '../monitoring/schedule-loop';
import { VERSION } from '../version';

export interface APIResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  warning?: string;
  error?: string;
  details?: unknown;
  timestamp: Date;
}

export interface APIServerConfig {
  port: number;
  host: string;
  apiToken?: string | null;
}

export const TENANT_HEADER = 'x-tenant-id';
export const ACTOR_HEADER = 'x-actor';

type Handler = (req: Request, res: Response) => Promise<void> | void;

const SETTINGS = ['name', 'address', 'interval', 'timeout', 'attempts', 'channel', 'role'] as const;
type Setting = (typeof SETTINGS)[number];

export class ApiServer {
  private app: express.Application;
  private server: Server | null = null;
  private startTime = new Date();

  constructor(
    private readonly commands: CommandService,
    private readonly logger: Logger,
    private readonly config: APIServerConfig,
    private readonly loop?: ScheduleLoop,
    private readonly errorHandler?: ErrorHandler
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  getApp(): express.Application {
    return this.app;
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = createServer(this.app);
      server.once('error', (error: Error) => {
        this.logger.error('API server error:', error);
        reject(error);
      });
      server.listen(this.config.port, this.config.host, () => {
        const address = server.address();
        const port = isAddressInfo(address) ? address.port : this.config.port;
        this.logger.info(`API server started on ${this.config.host}:${port}`);
        resolve();
      });
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close(error => {
        if (error) {
          reject(error);
          return;
        }
        this.logger.info('API server stopped');
        this.server = null;
        resolve();
      });
    });
  }

  private setupMiddleware(): void {
    this.app.use(express.json({ limit: '100kb' }));

    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      this.logger.debug(`${req.method} ${req.path} - ${req.ip ?? 'unknown'}`);
      next();
    });

    this.app.use('/api', (req: Request, res: Response, next: NextFunction) => {
      const token = this.config.apiToken;
      if (!token || req.path === '/health') {
        next();
        return;
      }
      if (req.get('authorization') !== `Bearer ${token}`) {
        this.sendJson(res, 401, { success: false, error: 'Unauthorized', timestamp: new Date() });
        return;
      }
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get('/api/health', this.route(this.handleHealthCheck));
    this.app.get('/api/status', this.route(this.handleStatus));
    this.app.get('/api/info', this.route(() => this.commands.info()));

    this.app.post('/api/servers', this.route(this.handleRegister));
    this.app.get('/api/servers', this.route(req => this.commands.listServers(this.context(req))));
    this.app.put('/api/servers/limit', this.route(req => this.commands.setLimit(this.context(req), numberField(req.body, 'limit'))));
    this.app.delete('/api/servers', this.route(req => this.commands.removeAllServers(this.context(req))));
    this.app.delete('/api/servers/:id', this.route(req => this.commands.removeServer(this.context(req), req.params.id ?? '')));

    this.app.get('/api/config', this.route(req => this.commands.getServer(this.context(req))));
    this.app.post('/api/config/reset', this.route(req => this.commands.reset(this.context(req))));
    this.app.put(
      '/api/config/tick-interval',
      this.route(req => this.commands.setTickInterval(this.context(req), numberField(req.body, 'seconds')))
    );
    this.app.put('/api/config/message/:status', this.route(this.handleSetMessage));
    this.app.put('/api/config/:setting', this.route(this.handleSetting));

    this.app.get('/api/debug/data', this.route(req => this.commands.debugData(this.context(req))));

    this.app.use('/api', (_req: Request, res: Response) => {
      this.sendJson(res, 404, { success: false, error: 'API endpoint not found', timestamp: new Date() });
    });
  }

  private setupErrorHandling(): void {
    // Body parser failures land here
    this.app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(err);
        return;
      }
      if (err instanceof SyntaxError) {
        this.sendJson(res, 400, { success: false, error: 'Malformed JSON body', timestamp: new Date() });
        return;
      }
      this.sendError(res, err);
    });
  }

  private handleHealthCheck: Handler = (_req, res) => {
    const health = this.errorHandler?.getSystemHealth();
    this.sendJson(res, 200, {
      success: true,
      data: {
        status: health ? health.overall_status : 'healthy',
        uptime: Math.floor((Date.now() - this.startTime.getTime()) / 1000),
        version: VERSION,
        components: health ? health.component_health : []
      },
      timestamp: new Date()
    });
  };

  private handleStatus: Handler = (req, res) => {
    const tenantId = req.get(TENANT_HEADER) ?? null;
    let server: ServerView | null = null;
    if (tenantId !== null) {
      try {
        server = this.commands.getServer(this.context(req)).data ?? null;
      } catch (error) {
        if (!(error instanceof NotFoundError)) {
          throw error;
        }
      }
    }

    this.sendJson(res, 200, {
      success: true,
      data: { loop: this.loop ? this.loop.getStatus() : null, server },
      timestamp: new Date()
    });
  };

  private handleRegister: Handler = async (req, res) => {
    const name = optionalStringField(req.body, 'name');
    const result = await this.commands.register(this.context(req), name);
    this.sendResult(res, result, 201);
  };

  private handleSetMessage: Handler = async (req, res) => {
    const status = req.params.status;
    if (status !== 'up' && status !== 'down') {
      throw new ValidationError(`Unknown message status ${String(status)}`, [
        { field: 'status', message: 'status must be up or down', value: status }
      ]);
    }
    const result = await this.commands.setMessage(this.context(req), status, stringField(req.body, 'message'));
    this.sendResult(res, result);
  };

  private handleSetting: Handler = async (req, res) => {
    const setting = req.params.setting;
    if (!isSetting(setting)) {
      throw new ValidationError(`Unknown setting ${String(setting)}`, [
        { field: 'setting', message: `setting must be one of ${SETTINGS.join(', ')}`, value: setting }
      ]);
    }

    const result = await this.applySetting(this.context(req), setting, req.body);
    this.sendResult(res, result);
  };

  private async applySetting(ctx: CommandContext, setting: Setting, body: unknown): Promise<CommandResult> {
    switch (setting) {
      case 'name':
        return this.commands.setName(ctx, stringField(body, 'value'));
      case 'address':
        return this.commands.setAddress(ctx, stringField(body, 'value'));
      case 'interval':
        return this.commands.setInterval(ctx, numberField(body, 'value'));
      case 'timeout':
        return this.commands.setTimeout(ctx, numberField(body, 'value'));
      case 'attempts':
        return this.commands.setAttempts(ctx, numberField(body, 'value'));
      case 'channel':
        return this.commands.setChannel(ctx, stringField(body, 'value'));
      case 'role':
        return this.commands.setRole(ctx, nullableStringField(body, 'value'));
    }
  }

  /**
   * Wrap a handler so thrown errors and command results become envelopes
   */
  private route(handler: (req: Request, res: Response) => unknown): (req: Request, res: Response) => void {
    return (req, res) => {
      void Promise.resolve()
        .then(() => handler.call(this, req, res))
        .then(result => {
          if (!res.headersSent && isCommandResult(result)) {
            this.sendResult(res, result);
          }
        })
        .catch(error => this.sendError(res, error));
    };
  }

  private context(req: Request): CommandContext {
    return {
      tenantId: req.get(TENANT_HEADER) ?? null,
      actor: req.get(ACTOR_HEADER) ?? 'api'
    };
  }

  private sendResult(res: Response, result: CommandResult<unknown>, status = 200): void {
    this.sendJson(res, status, {
      success: true,
      message: result.message,
      ...(result.data !== undefined && { data: result.data }),
      ...(result.warning !== undefined && { warning: result.warning }),
      timestamp: new Date()
    });
  }

  private sendError(res: Response, error: unknown): void {
    if (res.headersSent) {
      this.logger.error('API error after response was sent:', error);
      return;
    }
    const status = statusFor(error);
    if (status >= 500) {
      this.logger.error('API error:', error);
      if (!(error instanceof WatchdogError)) {
        this.errorHandler?.report(error, { component: 'ApiServer' });
      }
    } else {
      this.logger.debug(`Request rejected with ${status}: ${error instanceof Error ? error.message : String(error)}`);
    }

    this.sendJson(res, status, {
      success: false,
      error: status === 500 && !(error instanceof WatchdogError) ? 'Internal server error' : messageOf(error),
      ...(error instanceof ValidationError && error.fields.length > 0 && { details: error.fields }),
      timestamp: new Date()
    });
  }

  private sendJson(res: Response, status: number, body: APIResponse): void {
    res.status(status).json(body);
  }
}

export function statusFor(error: unknown): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof PermissionDeniedError) return 403;
  if (error instanceof NotFoundError) return 404;
  if (error instanceof AlreadyRegisteredError) return 409;
  if (error instanceof CapacityExceededError) return 507;
  return 500;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isSetting(value: unknown): value is Setting {
  return typeof value === 'string' && SETTINGS.some(setting => setting === value);
}

function isCommandResult(value: unknown): value is CommandResult<unknown> {
  return typeof value === 'object' && value !== null && 'message' in value && typeof value.message === 'string';
}

function isAddressInfo(value: unknown): value is AddressInfo {
  return typeof value === 'object' && value !== null && 'port' in value;
}

function field(body: unknown, key: string): unknown {
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }
  return new Map<string, unknown>(Object.entries(body)).get(key);
}

function numberField(body: unknown, key: string): number {
  const value = field(body, key);
  if (typeof value !== 'number') {
    throw new ValidationError(`${key} must be a number`, [{ field: key, message: 'must be a number', value }]);
  }
  return value;
}

function stringField(body: unknown, key: string): string {
  const value = field(body, key);
  if (typeof value !== 'string') {
    throw new ValidationError(`${key} must be a string`, [{ field: key, message: 'must be a string', value }]);
  }
  return value;
}

function optionalStringField(body: unknown, key: string): string | undefined {
  return field(body, key) === undefined ? undefined : stringField(body, key);
}

function nullableStringField(body: unknown, key: string): string | null {
  return field(body, key) === null ? null : stringField(body, key);
}
