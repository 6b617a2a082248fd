import { EventEmitter } from 'eventemitter3';
import { createChildLogger } from '../utils/logger.js';
import { withTimeout, Semaphore, TimeoutError } from '../utils/async-helpers.js';
import { metrics } from '../utils/metrics.js';
import {
  AuthenticationFailedError,
  CsrfMismatchError,
  MalformedResponseError,
  MeshError,
  OperationTimeoutError,
  OperationUnsupportedError,
  RouterUnreachableError,
  SessionExpiredError,
  TooManySessionsError,
} from '../utils/errors.js';
import { TransportError, type TransportErrorKind, type TransportResponse, type VendorTransport } from './vendor-transport.js';
import type { RouterAddress, RouterCredentials } from '../types/router.js';
import { VendorOperations, type SessionTokens, type VendorOperation } from '../types/vendor.js';

const logger = createChildLogger('session-client');

export type SessionState =
  | 'unauthenticated'
  | 'authenticating'
  | 'authenticated'
  | 'reauthenticating'
  | 'unreachable'
  | 'authFailed';

export interface SessionClientEvents {
  stateChanged: (state: SessionState, previous: SessionState) => void;
  authFailed: (error: AuthenticationFailedError) => void;
  cooldown: (retryAfterMs: number) => void;
}

export interface SessionClientOptions {
  routerId: string;
  address: RouterAddress;
  credentials: RouterCredentials;
  transport: VendorTransport;
  requestTimeoutMs: number;
  /** Back-off after the router refuses a session for having too many open. */
  cooldownMs: number;
  now?: (() => number) | undefined;
}

// Answered with one fresh login and one retry of the failed call.
const RENEWABLE_FAILURES: ReadonlySet<TransportErrorKind> = new Set<TransportErrorKind>([
  'sessionExpired',
  'csrfMismatch',
]);

/**
 * One authenticated session to one router. Calls are serialized; the session
 * survives across cycles until the router rejects it.
 */
export class SessionClient extends EventEmitter<SessionClientEvents> {
  readonly routerId: string;
  readonly address: RouterAddress;
  private credentials: RouterCredentials;
  private readonly transport: VendorTransport;
  private readonly requestTimeoutMs: number;
  private readonly cooldownMs: number;
  private readonly now: () => number;
  private readonly callLock = new Semaphore(1);

  private state: SessionState = 'unauthenticated';
  private tokens: SessionTokens | null = null;
  private cooldownUntil = 0;
  private authError: AuthenticationFailedError | null = null;
  private unreachableReason: string | null = null;

  constructor(options: SessionClientOptions) {
    super();
    this.routerId = options.routerId;
    this.address = { ...options.address };
    this.credentials = { ...options.credentials };
    this.transport = options.transport;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.cooldownMs = options.cooldownMs;
    this.now = options.now ?? Date.now;
  }

  getState(): SessionState {
    return this.state;
  }

  hasSession(): boolean {
    return this.tokens !== null;
  }

  getCooldownRemainingMs(): number {
    return Math.max(0, this.cooldownUntil - this.now());
  }

  getAuthError(): AuthenticationFailedError | null {
    return this.authError;
  }

  /**
   * Start of a poll cycle: an unreachable router gets a fresh attempt.
   * Auth failures and session cooldowns carry over.
   */
  beginCycle(): void {
    if (this.state === 'unreachable') {
      this.tokens = null;
      this.unreachableReason = null;
      this.setState('unauthenticated');
    }
  }

  updateCredentials(credentials: RouterCredentials): void {
    this.credentials = { ...credentials };
    this.authError = null;
    this.tokens = null;
    this.unreachableReason = null;
    this.setState('unauthenticated');
    logger.info({ routerId: this.routerId }, 'Credentials replaced');
  }

  execute(operation: VendorOperation): Promise<unknown> {
    return this.callLock.withLock(() => this.executeExclusive(operation));
  }

  /** Logs out once the in-flight call, if any, has finished. */
  async close(): Promise<void> {
    await this.callLock.withLock(async () => {
      const tokens = this.tokens;
      if (!tokens) return;

      this.tokens = null;
      this.setState('unauthenticated');
      try {
        await this.call(tokens, { name: VendorOperations.logout });
        logger.debug({ routerId: this.routerId }, 'Logged out');
      } catch (err) {
        logger.debug({ routerId: this.routerId, err }, 'Logout failed, session left to expire');
      }
    });
  }

  private async executeExclusive(operation: VendorOperation): Promise<unknown> {
    this.assertCallable();

    if (!this.tokens) {
      await this.login('authenticating');
    }

    try {
      return await this.invoke(operation);
    } catch (err) {
      if (!(err instanceof TransportError) || !RENEWABLE_FAILURES.has(err.kind)) {
        throw this.translate(err, operation);
      }

      logger.info(
        { routerId: this.routerId, operation: operation.name, kind: err.kind },
        'Session rejected, logging in again'
      );
      this.tokens = null;
      await this.login('reauthenticating');

      try {
        return await this.invoke(operation);
      } catch (retryErr) {
        throw this.translate(retryErr, operation);
      }
    }
  }

  private assertCallable(): void {
    if (this.state === 'authFailed') {
      throw this.authError ?? new AuthenticationFailedError(this.routerId);
    }

    const cooldownRemaining = this.getCooldownRemainingMs();
    if (cooldownRemaining > 0) {
      throw new TooManySessionsError(this.routerId, cooldownRemaining);
    }

    if (this.state === 'unreachable') {
      throw new RouterUnreachableError(this.routerId, this.unreachableReason ?? 'unreachable earlier in this cycle');
    }
  }

  private async login(state: 'authenticating' | 'reauthenticating'): Promise<void> {
    const operation: VendorOperation = {
      name: VendorOperations.login,
      params: { username: this.credentials.username, password: this.credentials.password },
    };

    this.setState(state);
    metrics.logins.inc();

    let response: TransportResponse;
    try {
      response = await this.call(null, operation);
    } catch (err) {
      const error = this.translate(err, operation);
      if (error instanceof OperationUnsupportedError || error instanceof MalformedResponseError) {
        throw this.markUnreachable(`login failed: ${error.message}`, error);
      }
      if (this.state === state) {
        this.setState('unauthenticated');
      }
      throw error;
    }

    if (!response.session) {
      throw this.markUnreachable('login response carried no session');
    }

    this.tokens = response.session;
    this.setState('authenticated');
    logger.debug({ routerId: this.routerId }, 'Session established');
  }

  private async invoke(operation: VendorOperation): Promise<unknown> {
    const tokens = this.tokens;
    if (!tokens) {
      throw new TransportError('sessionExpired', 'No session held');
    }

    const response = await this.call(tokens, operation);
    if (response.session) {
      this.tokens = response.session;
    }
    return response.data;
  }

  private async call(tokens: SessionTokens | null, operation: VendorOperation): Promise<TransportResponse> {
    const startTime = Date.now();
    try {
      const response = await withTimeout(
        this.transport.invoke(this.address, tokens, operation),
        this.requestTimeoutMs,
        `'${operation.name}' on router '${this.routerId}' timed out after ${this.requestTimeoutMs}ms`
      );
      metrics.recordVendorCall(operation.name, Date.now() - startTime, true);
      return response;
    } catch (err) {
      metrics.recordVendorCall(operation.name, Date.now() - startTime, false);
      if (err instanceof TimeoutError) {
        throw new TransportError('timeout', err.message, { timeoutMs: err.timeoutMs });
      }
      throw err;
    }
  }

  private translate(err: unknown, operation: VendorOperation): MeshError {
    if (!(err instanceof TransportError)) {
      return MeshError.fromError(err);
    }

    switch (err.kind) {
      case 'network':
        return this.markUnreachable(err.message, err);

      case 'timeout': {
        const timeoutMs = typeof err.details['timeoutMs'] === 'number' ? err.details['timeoutMs'] : this.requestTimeoutMs;
        return this.markUnreachable(err.message, new OperationTimeoutError(operation.name, timeoutMs, { cause: err }));
      }

      case 'sessionExpired':
        return this.markUnreachable(err.message, new SessionExpiredError(this.routerId, { cause: err }));
      case 'csrfMismatch':
        return this.markUnreachable(err.message, new CsrfMismatchError(this.routerId, { cause: err }));

      case 'tooManySessions': {
        this.tokens = null;
        this.cooldownUntil = this.now() + this.cooldownMs;
        this.setState('unauthenticated');
        logger.warn({ routerId: this.routerId, cooldownMs: this.cooldownMs }, 'Too many sessions, backing off');
        this.emit('cooldown', this.cooldownMs);
        return new TooManySessionsError(this.routerId, this.cooldownMs, { cause: err });
      }

      case 'badCredentials': {
        const authError = new AuthenticationFailedError(this.routerId, { cause: err });
        this.authError = authError;
        this.tokens = null;
        this.setState('authFailed');
        logger.error({ routerId: this.routerId }, 'Router rejected the credentials');
        this.emit('authFailed', authError);
        return authError;
      }

      case 'unsupported':
        return new OperationUnsupportedError(this.routerId, operation.name, { cause: err });

      case 'malformed':
        return new MalformedResponseError(
          `Malformed response to '${operation.name}' from router '${this.routerId}'`,
          { cause: err, context: { routerId: this.routerId, operation: operation.name, ...err.details } }
        );
    }
  }

  private markUnreachable(reason: string, cause?: Error): RouterUnreachableError {
    this.tokens = null;
    this.unreachableReason = reason;
    this.setState('unreachable');
    logger.warn({ routerId: this.routerId, reason }, 'Router unreachable for this cycle');
    return new RouterUnreachableError(this.routerId, reason, { cause });
  }

  private setState(state: SessionState): void {
    const previous = this.state;
    if (previous === state) return;
    this.state = state;
    this.emit('stateChanged', state, previous);
  }
}
