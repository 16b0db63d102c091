import express from 'express';
import cors from 'cors';
import http from 'http';
import { randomBytes } from 'crypto';
import {
  JSONRPCServer, JSONRPCErrorException, JSONRPCErrorCode, JSONRPCRequest, JSONRPCResponse
} from 'json-rpc-2.0';
import { AbusePreventionEngine } from '../core/AbusePreventionEngine';
import { AuditLog, AuditKind } from '../audit/AuditLog';
import { ServeOptions, Vector3 } from '../types';
import { isObject, log, logError } from '../utils';

const TAG = 'server';
const AUDIT_KINDS: readonly AuditKind[] = ['anomaly', 'violation', 'eviction'];

type Params = Record<string, unknown>;

function invalidParams(message: string): JSONRPCErrorException {
  return new JSONRPCErrorException(message, JSONRPCErrorCode.InvalidParams);
}

function asParams(params: unknown): Params {
  if (!isObject(params)) {
    throw invalidParams('Params must be an object');
  }
  return params;
}

function requireString(params: Params, key: string): string {
  const value = params[key];
  if (typeof value !== 'string' || !value.trim()) {
    throw invalidParams(`Missing required param: ${key} (string)`);
  }
  return value;
}

function optionalBoolean(params: Params, key: string): boolean | undefined {
  const value = params[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') throw invalidParams(`Param ${key} must be a boolean`);
  return value;
}

function optionalRecord(params: Params, key: string): Record<string, unknown> | undefined {
  const value = params[key];
  if (value === undefined) return undefined;
  if (!isObject(value)) {
    throw invalidParams(`Param ${key} must be an object`);
  }
  return value;
}

function requireVector(params: Params, key: string): Vector3 {
  const value = params[key];
  if (isObject(value)) {
    const { x, y, z } = value;
    if (typeof x === 'number' && typeof y === 'number' && typeof z === 'number' &&
      [x, y, z].every(Number.isFinite)) {
      return { x, y, z };
    }
  }
  throw invalidParams(`Missing required param: ${key} ({ x, y, z } numbers)`);
}

function isAuditKind(value: unknown): value is AuditKind {
  return typeof value === 'string' && AUDIT_KINDS.some(k => k === value);
}

/**
 * HTTP front for the engine: JSON-RPC on POST /, a plain gate on POST /gate
 * (429 on denial), and an unauthenticated /health.
 */
export class GuardServer {
  private app = express();
  private rpcServer: JSONRPCServer;
  private httpServer: http.Server | null = null;
  private engine: AbusePreventionEngine;
  private audit: AuditLog | null;
  private port: number;
  private host: string;
  private apiKey?: string;
  private startedAt = Date.now();

  constructor(engine: AbusePreventionEngine, options: ServeOptions = {}, audit: AuditLog | null = null) {
    this.engine = engine;
    this.audit = audit;
    this.port = options.port ?? 3480;
    this.host = options.host || 'localhost';

    // A public bind without an API key gets one generated and printed once.
    const isPublic = this.host !== 'localhost' && this.host !== '127.0.0.1';
    if (options.apiKey) {
      this.apiKey = options.apiKey;
    } else if (isPublic) {
      this.apiKey = randomBytes(24).toString('base64url');
      log(TAG, `PUBLIC BIND DETECTED (${this.host}). Auto-generated API key:`);
      log(TAG, `   ${this.apiKey}`);
      log(TAG, '   Send it as Authorization: Bearer <api-key>, or pass --api-key <key> to set your own.');
    }

    this.rpcServer = new JSONRPCServer();
    this.configureMiddleware(options.cors !== false);
    this.registerMethods();
    this.setupRoutes();
  }

  /** Base URL; reflects the bound port once started (port 0 picks a free one). */
  getUrl(): string {
    return `http://${this.host}:${this.port}`;
  }

  /**
   * Dispatch one JSON-RPC request (what POST / does, minus HTTP).
   */
  handle(request: JSONRPCRequest): PromiseLike<JSONRPCResponse | null> {
    return this.rpcServer.receive(request);
  }

  async start(): Promise<void> {
    return new Promise((resolve) => {
      this.httpServer = this.app.listen(this.port, this.host, () => {
        const address = this.httpServer?.address();
        if (address && typeof address === 'object') this.port = address.port;
        const base = this.getUrl();
        log(TAG, `PlayGuard running on ${base}`);
        log(TAG, `  Health:   ${base}/health`);
        log(TAG, `  Gate:     POST ${base}/gate`);
        log(TAG, `  JSON-RPC: POST ${base}/`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.httpServer) {
        resolve();
        return;
      }
      log(TAG, 'Shutting down...');
      this.httpServer.close((err) => {
        if (err) reject(err);
        else resolve();
      });
      this.httpServer.closeIdleConnections();
      this.httpServer = null;
    });
  }

  private configureMiddleware(enableCors: boolean): void {
    if (enableCors) {
      this.app.use(cors());
    }
    this.app.use(express.json({ limit: '64kb' }));
    this.app.use(this.authMiddleware.bind(this));
  }

  /**
   * A caller's privilege claim counts only when requests are authenticated.
   * Without an API key the Authorizer decides.
   */
  private callerPrivilege(claimed: boolean | undefined): boolean | undefined {
    return this.apiKey ? claimed : undefined;
  }

  private authMiddleware(req: express.Request, res: express.Response, next: express.NextFunction): void {
    if (req.path === '/health' || !this.apiKey) {
      next();
      return;
    }

    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Authentication required. Use Authorization: Bearer <api-key>' });
      return;
    }
    if (authHeader.substring(7) !== this.apiKey) {
      res.status(403).json({ error: 'Invalid API key' });
      return;
    }
    next();
  }

  private setupRoutes(): void {
    this.app.post('/', async (req: express.Request, res: express.Response) => {
      try {
        const jsonRPCResponse = await this.rpcServer.receive(req.body);
        if (jsonRPCResponse) {
          res.json(jsonRPCResponse);
        } else {
          // Notification request (no response expected)
          res.status(204).end();
        }
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        logError(TAG, 'JSON-RPC error:', errorMessage);
        res.status(500).json({
          jsonrpc: '2.0',
          error: { code: JSONRPCErrorCode.InternalError, message: 'Internal server error', data: errorMessage },
          id: req.body?.id ?? null
        });
      }
    });

    // Plain HTTP gate for callers that don't speak JSON-RPC.
    this.app.post('/gate', (req: express.Request, res: express.Response) => {
      const body: unknown = req.body;
      const params: Params = isObject(body) ? body : {};
      const subjectId = typeof params.subjectId === 'string' ? params.subjectId : '';
      const endpoint = typeof params.endpoint === 'string' ? params.endpoint : '';
      const privileged = this.callerPrivilege(typeof params.privileged === 'boolean' ? params.privileged : undefined);

      const decision = this.engine.checkAndRecord(subjectId, endpoint, privileged);
      if (decision.allowed) {
        res.json(decision);
      } else {
        res.status(decision.code === 'invalid_input' ? 400 : 429).json(decision);
      }
    });

    this.app.get('/health', (req: express.Request, res: express.Response) => {
      const stats = this.engine.getStats();
      res.json({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        subjects: stats.subjects,
        escalatedSubjects: stats.escalatedSubjects,
        server: {
          host: this.host,
          port: this.port,
          uptime: (Date.now() - this.startedAt) / 1000
        }
      });
    });
  }

  private registerMethods(): void {
    this.rpcServer.addMethod('ping', () => {
      return { status: 'pong', timestamp: new Date().toISOString() };
    });

    this.rpcServer.addMethod('checkAndRecord', (raw: unknown) => {
      const params = asParams(raw);
      return this.engine.checkAndRecord(
        requireString(params, 'subjectId'),
        requireString(params, 'endpoint'),
        this.callerPrivilege(optionalBoolean(params, 'privileged'))
      );
    });

    this.rpcServer.addMethod('recordAction', (raw: unknown) => {
      const params = asParams(raw);
      const recorded = this.engine.recordAction(
        requireString(params, 'subjectId'),
        requireString(params, 'actionType'),
        optionalRecord(params, 'actionData')
      );
      return { recorded };
    });

    this.rpcServer.addMethod('recordMovement', (raw: unknown) => {
      const params = asParams(raw);
      const recorded = this.engine.recordMovement(
        requireString(params, 'subjectId'),
        requireVector(params, 'position'),
        requireVector(params, 'velocity')
      );
      return { recorded };
    });

    this.rpcServer.addMethod('getAnalysis', (raw: unknown) => {
      return this.engine.getAnalysis(requireString(asParams(raw), 'subjectId'));
    });

    this.rpcServer.addMethod('getSubjectState', (raw: unknown) => {
      return this.engine.getSubjectState(requireString(asParams(raw), 'subjectId'));
    });

    this.rpcServer.addMethod('disconnect', (raw: unknown) => {
      return { evicted: this.engine.disconnect(requireString(asParams(raw), 'subjectId')) };
    });

    this.rpcServer.addMethod('getStats', () => {
      return this.engine.getStats();
    });

    this.rpcServer.addMethod('listEndpoints', () => {
      return this.engine.getPolicyTable().listEndpoints();
    });

    this.rpcServer.addMethod('listAuditEvents', (raw: unknown) => {
      if (!this.audit) return { events: [], total: 0 };
      const params = raw === undefined ? {} : asParams(raw);
      const limit = params.limit === undefined ? 20 : params.limit;
      if (typeof limit !== 'number' || !Number.isInteger(limit)) {
        throw invalidParams('Param limit must be an integer');
      }
      if (params.kind !== undefined && !isAuditKind(params.kind)) {
        throw invalidParams(`Param kind must be one of ${AUDIT_KINDS.join(', ')}`);
      }
      const events = this.audit.list(limit, isAuditKind(params.kind) ? params.kind : undefined);
      return { events, total: events.length };
    });
  }
}
