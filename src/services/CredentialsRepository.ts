import { ExchangeCredentials } from '../connectors/ExchangeConnector';
import { ApplicationError, ErrorCategory, ErrorSeverity } from '../utils/TradingErrors';

export interface CredentialsRepository {
  getCredentials(personId: string, exchange: string): Promise<ExchangeCredentials>;
}

/**
 * Reads `<personId>_<exchange>_api_key` and `<personId>_<exchange>_api_secret_key`
 */
export class EnvCredentialsRepository implements CredentialsRepository {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async getCredentials(personId: string, exchange: string): Promise<ExchangeCredentials> {
    const prefix = `${personId}_${exchange}`;
    const apiKey = this.env[`${prefix}_api_key`];
    const secret = this.env[`${prefix}_api_secret_key`];

    if (!apiKey || !secret) {
      throw new ApplicationError(
        `Missing credentials for ${personId} on ${exchange}`,
        'CREDENTIALS_NOT_FOUND',
        ErrorCategory.VALIDATION,
        ErrorSeverity.HIGH,
        { operation: 'getCredentials', component: 'EnvCredentialsRepository', timestamp: new Date() },
        { isRetryable: false }
      );
    }

    return { apiKey, secret };
  }
}
