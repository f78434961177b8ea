import Joi from 'joi';
import type { ResourceObject, ResourceRef } from '../types';
import {
  MalformedInputError,
  ResourceAlreadyExistsError,
  ResourceConflictError,
  StoreOperationError
} from '../errors';
import { Logger, logger as rootLogger } from '../logger';
import type { ResourceStore } from '../store/types';
import { encodeSecretData, readSecretData, toStringMap } from '../store/fields';
import type { AccountCredentialStore, AccountRecord, StoredAccount } from './types';

export const ACCOUNT_STORE_KEY = 'acmedns.json';
export const DEFAULT_SYNC_ATTEMPTS = 5;

export const storedAccountSchema = Joi.object<StoredAccount>({
  username: Joi.string().required(),
  password: Joi.string().required(),
  fulldomain: Joi.string().required(),
  subdomain: Joi.string().required(),
  allowfrom: Joi.array().items(Joi.string()).allow(null)
}).unknown(true);

const accountStoreSchema = Joi.object<AccountCredentialStore>().pattern(Joi.string(), storedAccountSchema);

/**
 * Parse the account store document. An absent or empty document is an
 * empty store.
 */
export function parseAccountStore(raw: string | Buffer | undefined): AccountCredentialStore {
  const text = raw === undefined ? '' : raw.toString().trim();
  if (text === '') {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new MalformedInputError('Account store is not valid JSON', error);
  }

  const { error, value } = accountStoreSchema.validate(parsed, { convert: false });
  if (error) {
    throw new MalformedInputError(`Account store is invalid: ${error.message}`, error);
  }
  return value;
}

export function serializeAccountStore(store: AccountCredentialStore): string {
  return JSON.stringify(store);
}

/**
 * Return a new store with `account` under `domain`. Entries for other
 * domains are carried over untouched; an existing entry for `domain` is
 * replaced as a whole.
 */
export function mergeAccount(
  store: AccountCredentialStore,
  domain: string,
  account: AccountRecord
): AccountCredentialStore {
  return { ...store, [domain]: toStoredAccount(account) };
}

export function accountFor(store: AccountCredentialStore, domain: string): AccountRecord | undefined {
  const stored = store[domain];
  if (!stored) {
    return undefined;
  }
  const account: AccountRecord = {
    username: stored.username,
    password: stored.password,
    fullDomain: stored.fulldomain,
    subdomain: stored.subdomain
  };
  if (stored.allowfrom) {
    account.allowFrom = stored.allowfrom;
  }
  return account;
}

function toStoredAccount(account: AccountRecord): StoredAccount {
  const stored: StoredAccount = {
    username: account.username,
    password: account.password,
    fulldomain: account.fullDomain,
    subdomain: account.subdomain
  };
  if (account.allowFrom && account.allowFrom.length > 0) {
    stored.allowfrom = account.allowFrom;
  }
  return stored;
}

export interface AccountSecretSynchronizerOptions {
  namespace: string;
  name: string;
  key?: string;
  labels?: Record<string, string>;
  maxAttempts?: number;
  logger?: Logger;
}

/**
 * Keeps the account store Secret in sync, one domain at a time.
 *
 * Writes are read-modify-write of the whole document. Updates carry the
 * resourceVersion that was read, so a concurrent writer causes a conflict
 * and the merge is redone against the fresh document.
 */
export class AccountSecretSynchronizer {
  private readonly ref: ResourceRef;
  private readonly key: string;
  private readonly maxAttempts: number;
  private readonly log: Logger;

  constructor(private readonly store: ResourceStore, private readonly options: AccountSecretSynchronizerOptions) {
    this.ref = { apiVersion: 'v1', kind: 'Secret', namespace: options.namespace, name: options.name };
    this.key = options.key ?? ACCOUNT_STORE_KEY;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_SYNC_ATTEMPTS;
    this.log = (options.logger ?? rootLogger).child({ module: 'account-synchronizer', secret: options.name });
  }

  async read(): Promise<AccountCredentialStore> {
    const secret = await this.store.get(this.ref);
    return secret ? parseAccountStore(readSecretData(secret, this.key)) : {};
  }

  async lookup(domain: string): Promise<AccountRecord | undefined> {
    return accountFor(await this.read(), domain);
  }

  async sync(domain: string, account: AccountRecord): Promise<void> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const secret = await this.store.get(this.ref);
      try {
        if (secret) {
          const merged = mergeAccount(parseAccountStore(readSecretData(secret, this.key)), domain, account);
          await this.store.update(this.withDocument(secret, merged));
        } else {
          await this.store.create(this.withDocument(this.emptySecret(), mergeAccount({}, domain, account)));
        }
        this.log.info('Account stored', { domain, attempt });
        return;
      } catch (error) {
        if (error instanceof ResourceConflictError || error instanceof ResourceAlreadyExistsError) {
          this.log.warn('Account store changed concurrently, retrying', { domain, attempt });
          continue;
        }
        throw error;
      }
    }

    throw new StoreOperationError(
      'update',
      this.ref,
      undefined,
      `gave up after ${this.maxAttempts} conflicting writes`
    );
  }

  private emptySecret(): ResourceObject {
    return {
      apiVersion: 'v1',
      kind: 'Secret',
      metadata: {
        name: this.options.name,
        namespace: this.options.namespace,
        labels: this.options.labels ?? {}
      },
      type: 'Opaque',
      data: {}
    };
  }

  private withDocument(secret: ResourceObject, document: AccountCredentialStore): ResourceObject {
    return {
      ...secret,
      data: {
        ...toStringMap(secret.data),
        ...encodeSecretData({ [this.key]: serializeAccountStore(document) })
      }
    };
  }
}
