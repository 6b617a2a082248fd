import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SessionClient } from '../../src/infra/session-client.js';
import {
  AuthenticationFailedError,
  CsrfMismatchError,
  OperationTimeoutError,
  OperationUnsupportedError,
  RouterUnreachableError,
  SessionExpiredError,
  TooManySessionsError,
} from '../../src/utils/errors.js';
import { VendorOperations } from '../../src/types/vendor.js';
import { FakeMeshTransport, TEST_PASSWORD, basicRouter, testAddress } from '../support/fake-mesh.js';

const HOST = '192.168.3.1';

describe('SessionClient', () => {
  let transport: FakeMeshTransport;
  let clock: number;

  const createClient = (overrides: { password?: string; requestTimeoutMs?: number } = {}) =>
    new SessionClient({
      routerId: 'primary',
      address: testAddress(HOST),
      credentials: { username: 'admin', password: overrides.password ?? TEST_PASSWORD },
      transport,
      requestTimeoutMs: overrides.requestTimeoutMs ?? 1000,
      cooldownMs: 60000,
      now: () => clock,
    });

  beforeEach(() => {
    transport = new FakeMeshTransport();
    transport.addRouter(HOST, basicRouter('Living room', []));
    clock = 1000;
  });

  describe('login', () => {
    it('should log in on the first call and reuse the session', async () => {
      const client = createClient();

      await client.execute({ name: VendorOperations.deviceInfo });
      await client.execute({ name: VendorOperations.hostInfo });

      expect(transport.callsTo(HOST, VendorOperations.login)).toHaveLength(1);
      expect(client.getState()).toBe('authenticated');
      expect(client.hasSession()).toBe(true);
    });

    it('should send the session token with every call', async () => {
      const client = createClient();
      await client.execute({ name: VendorOperations.deviceInfo });

      const [call] = transport.callsTo(HOST, VendorOperations.deviceInfo);
      expect(call?.session?.sessionToken).toBe(`${HOST}-session-1`);
    });

    it('should go unreachable when login is not understood', async () => {
      const client = createClient();
      transport.failNext(HOST, VendorOperations.login, 'unsupported');

      await expect(client.execute({ name: VendorOperations.deviceInfo })).rejects.toThrow(RouterUnreachableError);
      expect(client.getState()).toBe('unreachable');
    });
  });

  describe('session renewal', () => {
    it('should log in again and retry once when the session expired', async () => {
      const client = createClient();
      await client.execute({ name: VendorOperations.deviceInfo });
      transport.failNext(HOST, VendorOperations.hostInfo, 'sessionExpired');

      await expect(client.execute({ name: VendorOperations.hostInfo })).resolves.toEqual([]);

      expect(transport.callsTo(HOST, VendorOperations.login)).toHaveLength(2);
      expect(transport.callsTo(HOST, VendorOperations.hostInfo)).toHaveLength(2);
      expect(client.getState()).toBe('authenticated');
    });

    it('should renew after a CSRF mismatch', async () => {
      const client = createClient();
      transport.failNext(HOST, VendorOperations.deviceInfo, 'csrfMismatch');

      const info = await client.execute({ name: VendorOperations.deviceInfo });

      expect(info).toMatchObject({ FriendlyName: 'Living room' });
      expect(transport.callsTo(HOST, VendorOperations.login)).toHaveLength(2);
    });

    it('should mark the router unreachable when the retry fails too', async () => {
      const client = createClient();
      transport.failNext(HOST, VendorOperations.deviceInfo, 'sessionExpired', 'sessionExpired');

      const error = await client.execute({ name: VendorOperations.deviceInfo }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RouterUnreachableError);
      expect(error instanceof RouterUnreachableError && error.cause).toBeInstanceOf(SessionExpiredError);
      expect(client.getState()).toBe('unreachable');
      expect(client.hasSession()).toBe(false);
    });

    it('should keep the CSRF rejection as the cause when the renewed session is refused', async () => {
      const client = createClient();
      transport.failNext(HOST, VendorOperations.deviceInfo, 'csrfMismatch', 'csrfMismatch');

      const error = await client.execute({ name: VendorOperations.deviceInfo }).catch((err: unknown) => err);

      expect(error instanceof RouterUnreachableError && error.cause).toBeInstanceOf(CsrfMismatchError);
      expect(transport.callsTo(HOST, VendorOperations.login)).toHaveLength(2);
    });

    it('should fail fast while unreachable until the next cycle begins', async () => {
      const client = createClient();
      transport.router(HOST).unreachable = true;
      await expect(client.execute({ name: VendorOperations.deviceInfo })).rejects.toThrow(RouterUnreachableError);
      const callsBefore = transport.calls.length;

      await expect(client.execute({ name: VendorOperations.hostInfo })).rejects.toThrow(RouterUnreachableError);
      expect(transport.calls.length).toBe(callsBefore);

      transport.router(HOST).unreachable = false;
      client.beginCycle();
      expect(client.getState()).toBe('unauthenticated');
      await expect(client.execute({ name: VendorOperations.hostInfo })).resolves.toEqual([]);
    });
  });

  describe('bad credentials', () => {
    it('should stay in authFailed until the credentials change', async () => {
      const client = createClient({ password: 'wrong-secret' });
      const onAuthFailed = vi.fn();
      client.on('authFailed', onAuthFailed);

      await expect(client.execute({ name: VendorOperations.deviceInfo })).rejects.toThrow(AuthenticationFailedError);
      expect(client.getState()).toBe('authFailed');
      expect(onAuthFailed).toHaveBeenCalledTimes(1);

      client.beginCycle();
      await expect(client.execute({ name: VendorOperations.deviceInfo })).rejects.toThrow(AuthenticationFailedError);
      expect(transport.callsTo(HOST, VendorOperations.login)).toHaveLength(1);

      client.updateCredentials({ username: 'admin', password: TEST_PASSWORD });
      expect(client.getAuthError()).toBeNull();
      await expect(client.execute({ name: VendorOperations.deviceInfo })).resolves.toMatchObject({
        FriendlyName: 'Living room',
      });
    });
  });

  describe('too many sessions', () => {
    it('should back off for the cooldown period', async () => {
      const client = createClient();
      const onCooldown = vi.fn();
      client.on('cooldown', onCooldown);
      transport.failNext(HOST, VendorOperations.login, 'tooManySessions');

      await expect(client.execute({ name: VendorOperations.deviceInfo })).rejects.toMatchObject({
        name: 'TooManySessionsError',
        retryAfterMs: 60000,
      });
      expect(onCooldown).toHaveBeenCalledWith(60000);
      expect(client.getState()).toBe('unauthenticated');

      clock += 30000;
      const error = await client.execute({ name: VendorOperations.deviceInfo }).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(TooManySessionsError);
      expect(error).toMatchObject({ retryAfterMs: 30000 });
      expect(transport.callsTo(HOST, VendorOperations.login)).toHaveLength(1);

      clock += 30000;
      await expect(client.execute({ name: VendorOperations.deviceInfo })).resolves.toBeDefined();
      expect(client.getCooldownRemainingMs()).toBe(0);
    });
  });

  describe('other failures', () => {
    it('should keep the session when an operation is unsupported', async () => {
      const client = createClient();

      await expect(client.execute({ name: VendorOperations.nfcSwitch })).rejects.toThrow(OperationUnsupportedError);
      expect(client.getState()).toBe('authenticated');
      expect(client.hasSession()).toBe(true);
    });

    it('should treat a slow router as unreachable', async () => {
      const client = createClient({ requestTimeoutMs: 20 });
      transport.router(HOST).delayMs = 100;

      const error = await client.execute({ name: VendorOperations.deviceInfo }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RouterUnreachableError);
      const cause = error instanceof RouterUnreachableError ? error.cause : undefined;
      expect(cause).toBeInstanceOf(OperationTimeoutError);
      expect(cause?.message).toBe("Operation 'session.login' timed out after 20ms");
      expect(client.getState()).toBe('unreachable');
    });

    it('should serialize concurrent calls', async () => {
      const client = createClient();
      transport.router(HOST).delayMs = 10;

      await Promise.all([
        client.execute({ name: VendorOperations.deviceInfo }),
        client.execute({ name: VendorOperations.hostInfo }),
        client.execute({ name: VendorOperations.deviceInfo }),
      ]);

      expect(transport.maxInFlight).toBe(1);
      expect(transport.callsTo(HOST, VendorOperations.login)).toHaveLength(1);
    });
  });

  describe('close', () => {
    it('should log out and drop the session', async () => {
      const client = createClient();
      await client.execute({ name: VendorOperations.deviceInfo });

      await client.close();

      expect(transport.callsTo(HOST, VendorOperations.logout)).toHaveLength(1);
      expect(transport.router(HOST).activeSession).toBeNull();
      expect(client.hasSession()).toBe(false);
    });

    it('should do nothing without a session', async () => {
      const client = createClient();
      await client.close();
      expect(transport.calls).toHaveLength(0);
    });
  });
});
