import Joi from 'joi';
import { Agent, fetch } from 'undici';
import {
  ApiError,
  AuthError,
  CraftyError,
  CraftySettings,
  ErrorCode,
  ServerAction,
  ServerDescriptor,
  ServerPublicStatus,
  ServerStats,
  TransportError
} from '../models';
import { LogContext, logger } from '../utils/logger';
import { RawServerEntry, ValidationSchemas, ValidationUtils } from '../utils/validation';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Raw HTTP exchange, body already read
 */
interface RawResponse {
  status: number;
  text: string;
}

export interface CraftyRequestMetrics {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  relogins: number;
}

const SLOW_REQUEST_THRESHOLD_MS = 2000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Pull the session token out of a login response.
 * Crafty versions disagree on where it lives: data.token, token, or data itself.
 */
export function extractLoginToken(body: unknown): string | undefined {
  if (!isRecord(body)) {
    return undefined;
  }

  const data = body['data'];
  const candidates = [
    isRecord(data) ? data['token'] : undefined,
    body['token'],
    data
  ];

  for (const candidate of candidates) {
    if (typeof candidate === 'string' && candidate.length > 0) {
      return candidate;
    }
  }

  return undefined;
}

/**
 * Client for the Crafty Controller REST API.
 * Holds the session token, re-authenticates once on a 401 and surfaces
 * transport failures to the caller without retrying them.
 */
export class CraftyClient {
  private readonly settings: CraftySettings;
  private token: string | null;
  private agent: Agent | null = null;
  private readonly requestMetrics: CraftyRequestMetrics = {
    totalRequests: 0,
    successfulRequests: 0,
    failedRequests: 0,
    relogins: 0
  };

  constructor(settings: CraftySettings) {
    if (!settings.baseUrl) {
      throw new Error('Crafty base URL is required');
    }

    this.settings = settings;
    this.token = this.staticToken();
  }

  private staticToken(): string | null {
    const { credentials } = this.settings;
    return credentials.type === 'bearer' ? credentials.token : null;
  }

  /**
   * Connection pool shared by every request; recreated after close()
   */
  private getAgent(): Agent {
    if (!this.agent) {
      this.agent = new Agent({
        connect: { rejectUnauthorized: this.settings.verifySsl }
      });
    }
    return this.agent;
  }

  /**
   * Release the connection pool and forget the session token
   */
  async close(): Promise<void> {
    const agent = this.agent;
    this.agent = null;
    this.token = this.staticToken();

    if (agent) {
      await agent.close();
    }
  }

  /**
   * Obtain a session token. A static bearer token is returned as is.
   */
  async login(): Promise<string> {
    const { credentials } = this.settings;
    const context: LogContext = {
      component: 'CraftyClient',
      operation: 'login'
    };

    if (credentials.type === 'bearer') {
      this.token = credentials.token;
      logger.info('Using static bearer token', context);
      return credentials.token;
    }

    const response = await this.send('POST', '/auth/login', {
      username: credentials.username,
      password: credentials.password
    }, false);

    if (response.status >= 400) {
      logger.warn('Crafty login rejected', {
        ...context,
        metadata: { status: response.status }
      });
      throw new AuthError(`Login failed ${response.status}: ${response.text}`, response.status);
    }

    let body: unknown;
    try {
      body = JSON.parse(response.text);
    } catch (error) {
      throw new AuthError('Login response is not valid JSON', response.status, error);
    }

    const token = extractLoginToken(body);
    if (!token) {
      throw new AuthError(`No token found in login response: ${response.text}`, response.status);
    }

    this.token = token;
    logger.info('Logged in to Crafty API with username/password', context);
    return token;
  }

  /**
   * Issue an authorized request and return the decoded JSON body
   */
  async request(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    return this.performRequest(method, path, body, true);
  }

  private async performRequest(
    method: HttpMethod,
    path: string,
    body: unknown,
    allowRelogin: boolean
  ): Promise<unknown> {
    const context: LogContext = {
      component: 'CraftyClient',
      operation: 'api_request',
      metadata: { method, endpoint: path }
    };

    const response = await this.send(method, path, body, true);

    if (response.status === 401 && allowRelogin && this.settings.credentials.type === 'password') {
      logger.info('Crafty session expired, logging in again', context);
      this.requestMetrics.relogins++;
      await this.login();
      return this.performRequest(method, path, body, false);
    }

    if (response.status >= 400) {
      this.requestMetrics.failedRequests++;
      const error = new ApiError(response.status, response.text);

      logger.error('Crafty API error response', {
        ...context,
        metadata: { ...context.metadata, status: response.status }
      }, error);

      throw error;
    }

    this.requestMetrics.successfulRequests++;

    if (response.text.length === 0) {
      return null;
    }

    try {
      return JSON.parse(response.text);
    } catch {
      throw new ApiError(response.status, response.text, `Crafty returned invalid JSON for ${method} ${path}`);
    }
  }

  /**
   * Single HTTP exchange bounded by the request timeout
   */
  private async send(
    method: HttpMethod,
    path: string,
    body: unknown,
    withAuth: boolean
  ): Promise<RawResponse> {
    const url = `${this.settings.baseUrl}${this.settings.apiPrefix}${path}`;
    const context: LogContext = {
      component: 'CraftyClient',
      operation: 'http_request',
      metadata: { method, endpoint: path }
    };

    const headers: Record<string, string> = {
      'Accept': 'application/json',
      'User-Agent': 'CraftyStatusBot (crafty-status-bot, 1.0.0)'
    };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (withAuth && this.token) {
      headers['Authorization'] = `Bearer ${this.token}`;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.settings.requestTimeout * 1000);
    const startTime = Date.now();
    this.requestMetrics.totalRequests++;

    logger.craftyApiRequest(method, path, context);

    try {
      const response = await fetch(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
        dispatcher: this.getAgent()
      });
      const text = await response.text();
      const responseTime = Date.now() - startTime;

      logger.craftyApiResponse(path, response.status, responseTime, context);

      if (responseTime > SLOW_REQUEST_THRESHOLD_MS) {
        logger.performance('slow_crafty_api_request', responseTime, {
          ...context,
          metadata: { ...context.metadata, threshold: SLOW_REQUEST_THRESHOLD_MS }
        });
      }

      return { status: response.status, text };
    } catch (error) {
      this.requestMetrics.failedRequests++;

      const timedOut = controller.signal.aborted || (error instanceof Error && error.name === 'AbortError');
      const message = timedOut
        ? 'Crafty request timed out, will retry later'
        : `Crafty not reachable (${error instanceof Error ? error.message : String(error)}), will retry later`;

      logger.warn(message, {
        ...context,
        metadata: { ...context.metadata, timeout: timedOut }
      });

      throw new TransportError(message, timedOut, error);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private unwrap<T>(payload: unknown, schema: Joi.Schema<{ data: T }>, endpoint: string): T {
    const result = ValidationUtils.validate(payload, schema, {
      component: 'CraftyClient',
      operation: 'validate_response',
      metadata: { endpoint }
    });

    if (!result.isValid || !result.data) {
      throw new CraftyError(ErrorCode.INVALID_FIELD_VALUE, `Unexpected Crafty response for ${endpoint}`);
    }

    return result.data.data;
  }

  /**
   * GET /servers
   */
  async listServers(): Promise<ServerDescriptor[]> {
    const payload = await this.request('GET', '/servers');
    const entries = this.unwrap<RawServerEntry[]>(payload, ValidationSchemas.serverList, '/servers');

    return entries.map(entry => ({
      id: String(entry.server_id),
      name: entry.server_name,
      running: entry.running,
      online: entry.online,
      max: entry.max
    }));
  }

  /**
   * POST /servers/{id}/action/{action}
   */
  async performAction(serverId: string, action: ServerAction): Promise<unknown> {
    return this.request('POST', `/servers/${encodeURIComponent(serverId)}/action/${action}`);
  }

  /**
   * GET /servers/{id}/public
   */
  async getPublicStatus(serverId: string): Promise<ServerPublicStatus> {
    const endpoint = `/servers/${encodeURIComponent(serverId)}/public`;
    return this.unwrap<ServerPublicStatus>(await this.request('GET', endpoint), ValidationSchemas.publicStatus, endpoint);
  }

  /**
   * GET /servers/{id}/stats
   */
  async getStats(serverId: string): Promise<ServerStats> {
    const endpoint = `/servers/${encodeURIComponent(serverId)}/stats`;
    return this.unwrap<ServerStats>(await this.request('GET', endpoint), ValidationSchemas.stats, endpoint);
  }

  getMetrics(): CraftyRequestMetrics {
    return { ...this.requestMetrics };
  }
}
