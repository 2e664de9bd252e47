import type { ExchangeId } from '../core/events/EventBus';
import { logger } from '../infra/logger';
import type { ExchangeCredentials } from '../exchange/types';

/** Absent credentials are valid: the connection is limited to public channels. */
export interface CredentialsProvider {
  getCredentials(exchange: ExchangeId): ExchangeCredentials | null;
}

const ENV_PREFIX: Record<ExchangeId, string> = {
  bitget: 'BITGET',
  kucoin: 'KUCOIN',
};

export class EnvCredentialsProvider implements CredentialsProvider {
  private readonly warned = new Set<ExchangeId>();

  constructor(private readonly env: Record<string, string | undefined> = process.env) {}

  getCredentials(exchange: ExchangeId): ExchangeCredentials | null {
    const prefix = ENV_PREFIX[exchange];
    const key = this.env[`${prefix}_API_KEY`]?.trim();
    const secret = this.env[`${prefix}_SECRET_KEY`]?.trim();
    const passphrase = this.env[`${prefix}_PASSPHRASE`]?.trim();
    if (key && secret && passphrase) return { key, secret, passphrase };

    if ((key || secret || passphrase) && !this.warned.has(exchange)) {
      this.warned.add(exchange);
      logger.warn(`[Credentials] ${prefix}: incomplete API key / secret / passphrase, using public channels only`);
    }
    return null;
  }
}

export class StaticCredentialsProvider implements CredentialsProvider {
  constructor(private readonly byExchange: Partial<Record<ExchangeId, ExchangeCredentials>> = {}) {}

  getCredentials(exchange: ExchangeId): ExchangeCredentials | null {
    return this.byExchange[exchange] ?? null;
  }
}
