import axios, { isAxiosError, type AxiosInstance, type AxiosResponse, type CreateAxiosDefaults } from 'axios';
import * as https from 'https';
import { createChildLogger } from '../utils/logger.js';
import { TransportError, type TransportResponse, type VendorTransport } from './vendor-transport.js';
import type { RouterAddress } from '../types/router.js';
import { VendorOperations, type OperationName, type SessionTokens, type VendorOperation } from '../types/vendor.js';

const logger = createChildLogger('http-transport');

const SESSION_COOKIE = 'SessionID_R3';
const LOGIN_PAGE = 'html/index.html';
const DEFAULT_TIMEOUT_MS = 5000;

export interface OperationRoute {
  method: 'GET' | 'POST';
  path: string;
  /** An answer failing this check means the session lost its rights. */
  authorized?: ((data: unknown) => boolean) | undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const DEFAULT_ROUTES: Record<OperationName, OperationRoute> = {
  [VendorOperations.login]: { method: 'POST', path: 'api/system/user_login' },
  [VendorOperations.logout]: { method: 'POST', path: 'api/system/user_logout' },
  [VendorOperations.deviceInfo]: {
    method: 'GET',
    path: 'api/system/deviceinfo',
    authorized: (data) => !(isRecord(data) && data['EmuiVersion'] === '-'),
  },
  [VendorOperations.hostInfo]: { method: 'GET', path: 'api/system/HostInfo' },
  [VendorOperations.wanDetect]: { method: 'GET', path: 'api/ntwk/wandetect' },
  [VendorOperations.wanInfo]: { method: 'GET', path: 'api/ntwk/wan' },
  [VendorOperations.nfcSwitch]: { method: 'GET', path: 'api/bsp/nfc_switch' },
  [VendorOperations.wlanBasic]: { method: 'GET', path: 'api/ntwk/WlanBasic' },
  [VendorOperations.wlanFilter]: { method: 'GET', path: 'api/ntwk/wlanfilterenhance' },
  [VendorOperations.guestNetwork]: { method: 'GET', path: 'api/ntwk/guest_network' },
  [VendorOperations.urlFilter]: { method: 'GET', path: 'api/ntwk/urlfilter' },
  [VendorOperations.portMapping]: { method: 'GET', path: 'api/ntwk/portmapping' },
  [VendorOperations.timeControl]: { method: 'GET', path: 'api/ntwk/timecontrol' },
  [VendorOperations.setNfcSwitch]: { method: 'POST', path: 'api/bsp/nfc_switch' },
  [VendorOperations.setWlanBasic]: { method: 'POST', path: 'api/ntwk/WlanGuideBasic?type=notshowpassall' },
  [VendorOperations.setWlanFilter]: { method: 'POST', path: 'api/ntwk/wlanfilterenhance' },
  [VendorOperations.reboot]: { method: 'POST', path: 'api/service/reboot.cgi' },
};

export interface HttpVendorTransportOptions {
  timeoutMs?: number | undefined;
  routes?: Partial<Record<OperationName, OperationRoute>> | undefined;
  /** Merged into every axios instance; tests pass an adapter here. */
  axiosDefaults?: CreateAxiosDefaults | undefined;
}

/**
 * JSON-over-HTTP transport for the router's web API. Credentials are sent as
 * given; any vendor-specific password proof belongs in a custom transport.
 */
export class HttpVendorTransport implements VendorTransport {
  private readonly clients = new Map<string, AxiosInstance>();
  private readonly routes: Record<OperationName, OperationRoute>;
  private readonly timeoutMs: number;
  private readonly axiosDefaults: CreateAxiosDefaults;

  constructor(options: HttpVendorTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.routes = { ...DEFAULT_ROUTES, ...options.routes };
    this.axiosDefaults = options.axiosDefaults ?? {};
  }

  async invoke(
    address: RouterAddress,
    session: SessionTokens | null,
    operation: VendorOperation
  ): Promise<TransportResponse> {
    const http = this.clientFor(address);

    if (operation.name === VendorOperations.login) {
      return this.login(http, operation);
    }
    if (!session) {
      throw new TransportError('sessionExpired', `'${operation.name}' needs a session`);
    }

    const route = this.routes[operation.name];
    const response = await this.send(http, route, session, operation.params, operation.envelope);
    const data = this.parseBody(response, operation.name);

    if (route.authorized && !route.authorized(data)) {
      throw new TransportError('sessionExpired', `'${operation.name}' answered without rights`);
    }

    return { data, session: this.rotate(session, response, data) };
  }

  private async login(http: AxiosInstance, operation: VendorOperation): Promise<TransportResponse> {
    const page = await this.request(http, { method: 'GET', url: LOGIN_PAGE });
    const pageBody = typeof page.data === 'string' ? page.data : '';
    const csrfParam = readMeta(pageBody, 'csrf_param');
    const csrfToken = readMeta(pageBody, 'csrf_token');
    if (!csrfParam || !csrfToken) {
      throw new TransportError('malformed', 'Login page carries no CSRF token');
    }

    const pageSession: SessionTokens = {
      sessionToken: readSessionCookie(page) ?? '',
      csrfToken,
      csrfParam,
    };
    const params = operation.params ?? {};
    const route = this.routes[VendorOperations.login];
    const response = await this.send(http, route, pageSession, {
      UserName: params['username'],
      Password: params['password'],
    });
    const data = this.parseBody(response, operation.name);
    const session = this.rotate(pageSession, response, data);

    if (!session.sessionToken) {
      throw new TransportError('malformed', 'Login answered without a session cookie');
    }
    logger.debug({ path: route.path }, 'Login accepted');
    return { data, session };
  }

  private send(
    http: AxiosInstance,
    route: OperationRoute,
    session: SessionTokens,
    params: Record<string, unknown> | undefined,
    envelope?: Record<string, unknown>
  ): Promise<AxiosResponse<unknown>> {
    const headers: Record<string, string> = {};
    if (session.sessionToken) {
      headers['Cookie'] = `${SESSION_COOKIE}=${session.sessionToken}`;
    }

    if (route.method === 'GET') {
      return this.request(http, { method: 'GET', url: route.path, headers });
    }

    return this.request(http, {
      method: 'POST',
      url: route.path,
      headers: { ...headers, 'Content-Type': 'application/json' },
      data: JSON.stringify({
        ...envelope,
        csrf: { csrf_param: session.csrfParam ?? '', csrf_token: session.csrfToken },
        data: params ?? {},
      }),
    });
  }

  private async request(
    http: AxiosInstance,
    config: { method: 'GET' | 'POST'; url: string; headers?: Record<string, string>; data?: string }
  ): Promise<AxiosResponse<unknown>> {
    let response: AxiosResponse<unknown>;
    try {
      response = await http.request<unknown>(config);
    } catch (err) {
      throw toNetworkError(err, config.url);
    }

    if (response.status === 404) {
      throw new TransportError('unsupported', `${config.url} not found`, { status: 404 });
    }
    if (response.status === 401 || response.status === 403) {
      throw new TransportError('sessionExpired', `${config.url} refused with ${response.status}`, {
        status: response.status,
      });
    }
    if (response.status >= 400) {
      throw new TransportError('network', `${config.url} failed with ${response.status}`, {
        status: response.status,
      });
    }
    return response;
  }

  private parseBody(response: AxiosResponse<unknown>, operation: OperationName): unknown {
    const raw = typeof response.data === 'string' ? response.data : '';
    let data: unknown;
    try {
      data = JSON.parse(stripSecureWrapper(raw));
    } catch (err) {
      throw new TransportError('malformed', `'${operation}' answered with invalid JSON`, {
        reason: err instanceof Error ? err.message : String(err),
      });
    }

    if (isRecord(data)) {
      const errcode = data['errcode'];
      if (typeof errcode === 'number' && errcode !== 0) {
        throw categorize(data, operation);
      }
    }
    return data;
  }

  private rotate(session: SessionTokens, response: AxiosResponse<unknown>, data: unknown): SessionTokens {
    const body = isRecord(data) ? data : {};
    const csrfToken = typeof body['csrf_token'] === 'string' ? body['csrf_token'] : session.csrfToken;
    const csrfParam = typeof body['csrf_param'] === 'string' ? body['csrf_param'] : session.csrfParam;
    return {
      sessionToken: readSessionCookie(response) ?? session.sessionToken,
      csrfToken,
      csrfParam,
    };
  }

  private clientFor(address: RouterAddress): AxiosInstance {
    const protocol = address.useSsl ? 'https' : 'http';
    const baseURL = `${protocol}://${address.host}:${address.port}/`;
    const existing = this.clients.get(baseURL);
    if (existing) return existing;

    const created = axios.create({
      timeout: this.timeoutMs,
      headers: { Accept: 'application/json, text/html' },
      ...this.axiosDefaults,
      baseURL,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
      ...(address.useSsl ? { httpsAgent: new https.Agent({ rejectUnauthorized: address.verifySsl }) } : {}),
    });
    this.clients.set(baseURL, created);
    return created;
  }
}

function toNetworkError(err: unknown, url: string): TransportError {
  if (isAxiosError(err)) {
    const timedOut = err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT';
    return new TransportError(timedOut ? 'timeout' : 'network', `${url}: ${err.message}`, { code: err.code });
  }
  return new TransportError('network', `${url}: ${err instanceof Error ? err.message : String(err)}`);
}

function categorize(body: Record<string, unknown>, operation: OperationName): TransportError {
  const category = typeof body['errorCategory'] === 'string' ? body['errorCategory'] : '';
  const details = { errcode: body['errcode'], errorCategory: category };

  switch (category) {
    case 'user_pass_err':
      return new TransportError('badCredentials', 'Username or password rejected', details);
    case 'csrf_error':
    case 'Menu.csrf_err':
      return new TransportError('csrfMismatch', `CSRF token rejected on '${operation}'`, details);
    case 'Too_Many_user':
      return new TransportError('tooManySessions', 'Too many sessions open', details);
    default:
      return new TransportError('malformed', `'${operation}' failed with errcode ${String(body['errcode'])}`, details);
  }
}

function readMeta(html: string, name: string): string | null {
  const match = new RegExp(`<meta\\s+name="${name}"\\s+content="([^"]*)"`, 'i').exec(html);
  return match?.[1] ?? null;
}

function readSessionCookie(response: AxiosResponse<unknown>): string | null {
  const header: unknown = response.headers['set-cookie'];
  const cookies: unknown[] = Array.isArray(header) ? header : typeof header === 'string' ? [header] : [];
  for (const cookie of cookies) {
    if (typeof cookie !== 'string') continue;
    const match = new RegExp(`${SESSION_COOKIE}=([^;]*)`).exec(cookie);
    if (match?.[1]) return match[1];
  }
  return null;
}

// Some firmware wraps JSON answers in /*-secure- ... */
function stripSecureWrapper(body: string): string {
  const trimmed = body.trim();
  const match = /^\/\*-secure-\s*([\s\S]*?)\s*\*\/$/.exec(trimmed);
  return match?.[1] ?? trimmed;
}
