import type { RouterAddress } from '../types/router.js';
import type { SessionTokens, VendorOperation } from '../types/vendor.js';

export type TransportErrorKind =
  | 'network'
  | 'timeout'
  | 'badCredentials'
  | 'sessionExpired'
  | 'csrfMismatch'
  | 'tooManySessions'
  | 'unsupported'
  | 'malformed';

export class TransportError extends Error {
  constructor(
    public readonly kind: TransportErrorKind,
    message: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

export interface TransportResponse {
  data: unknown;
  /**
   * Present on login, and whenever the router rotated the session or CSRF
   * token while answering.
   */
  session?: SessionTokens | undefined;
}

/**
 * Black-box RPC to one router. `session` is null only for the login operation.
 * Failures are thrown as TransportError.
 */
export interface VendorTransport {
  invoke(
    address: RouterAddress,
    session: SessionTokens | null,
    operation: VendorOperation
  ): Promise<TransportResponse>;
}
