import { OperationCancelledError, RegistrationError } from '../errors';
import { Logger, logger as rootLogger } from '../logger';
import { storedAccountSchema } from './account-synchronizer';
import { systemClock } from './clock';
import type { AccountRecord, Clock } from './types';

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface AcmeDnsClientOptions {
  /** Base URL of the acme-dns HTTP API, without the /register path */
  baseUrl: string;
  maxAttempts?: number;
  /** First retry delay; later retries wait retryDelayMs * attempt */
  retryDelayMs?: number;
  requestTimeoutMs?: number;
  fetchFn?: FetchFn;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Client for the acme-dns registration API.
 */
export class AcmeDnsClient {
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly requestTimeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(private readonly options: AcmeDnsClientOptions) {
    this.maxAttempts = options.maxAttempts ?? 5;
    this.retryDelayMs = options.retryDelayMs ?? 2_000;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? rootLogger).child({ module: 'acme-dns-client' });
  }

  /**
   * Register a new account. Transport failures are retried with a linearly
   * growing delay; any HTTP answer other than 201 fails immediately.
   */
  async register(allowFrom?: string[], signal?: AbortSignal): Promise<AccountRecord> {
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}/register`;
    const body = JSON.stringify(allowFrom && allowFrom.length > 0 ? { allowfrom: allowFrom } : {});

    let response: Response | undefined;
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      if (signal?.aborted) {
        throw new OperationCancelledError('ACME-DNS registration', signal.reason);
      }
      try {
        response = await this.fetchFn(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body,
          signal: this.requestSignal(signal)
        });
        break;
      } catch (error) {
        lastError = error;
        this.log.warn('Registration request failed, retrying', {
          attempt,
          maxAttempts: this.maxAttempts,
          error: error instanceof Error ? error.message : String(error)
        });
        if (attempt < this.maxAttempts) {
          await this.clock.sleep(this.retryDelayMs * attempt, signal);
        }
      }
    }

    if (!response) {
      if (signal?.aborted) {
        throw new OperationCancelledError('ACME-DNS registration', signal.reason);
      }
      const reason = lastError instanceof Error ? lastError.message : String(lastError);
      throw new RegistrationError(`Registration request failed after ${this.maxAttempts} attempts: ${reason}`, {
        cause: lastError
      });
    }

    const text = await response.text();
    if (response.status !== 201) {
      throw new RegistrationError(`Registration failed with status ${response.status}: ${text}`, {
        status: response.status
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new RegistrationError('Registration response is not valid JSON', { status: response.status, cause: error });
    }
    const { error, value } = storedAccountSchema.validate(parsed);
    if (error) {
      throw new RegistrationError(`Registration response is invalid: ${error.message}`, {
        status: response.status,
        cause: error
      });
    }

    this.log.info('Registered ACME-DNS account', { subdomain: value.subdomain, fullDomain: value.fulldomain });
    const account: AccountRecord = {
      username: value.username,
      password: value.password,
      fullDomain: value.fulldomain,
      subdomain: value.subdomain
    };
    if (value.allowfrom && value.allowfrom.length > 0) {
      account.allowFrom = value.allowfrom;
    }
    return account;
  }

  private requestSignal(signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.requestTimeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  }
}
