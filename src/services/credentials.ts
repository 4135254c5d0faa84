import { Entry } from '@napi-rs/keyring';
import { AppConfig, CONFIG } from '../config/constants';
import { DashboardCredentials } from '../types/session';
import { CredentialRetrievalError, errorMessage } from '../utils/error-handler';
import { logger } from '../utils/logger';

export interface SecretStore {
  getSecret(service: string, account: string): Promise<string>;
}

/**
 * OS credential manager (Windows Credential Manager, macOS Keychain, Secret Service).
 */
export class KeyringSecretStore implements SecretStore {
  async getSecret(service: string, account: string): Promise<string> {
    let value: string | null | undefined;
    try {
      value = new Entry(service, account).getPassword();
    } catch (e) {
      throw new CredentialRetrievalError(
        `Credential store lookup failed for ${service}/${account}: ${errorMessage(e)}`
      );
    }
    if (!value) {
      throw new CredentialRetrievalError(
        `No credential stored for service "${service}", account "${account}"`
      );
    }
    return value;
  }
}

export function envSecretName(service: string, account: string): string {
  const part = (value: string) => value.replace(/[^A-Za-z0-9]+/g, '_').toUpperCase();
  return `SECRET_${part(service)}_${part(account)}`;
}

/**
 * For hosts without a credential manager: SECRET_<SERVICE>_<ACCOUNT>.
 */
export class EnvSecretStore implements SecretStore {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async getSecret(service: string, account: string): Promise<string> {
    const name = envSecretName(service, account);
    const value = this.env[name];
    if (!value) {
      throw new CredentialRetrievalError(`Environment variable ${name} is not set`);
    }
    return value;
  }
}

export function createSecretStore(config: AppConfig = CONFIG): SecretStore {
  return config.SECRETS.STORE === 'env' ? new EnvSecretStore() : new KeyringSecretStore();
}

export interface RunCredentials {
  dashboard: DashboardCredentials;
  databasePassword: string;
}

export async function loadRunCredentials(
  secrets: SecretStore,
  config: AppConfig = CONFIG
): Promise<RunCredentials> {
  const { SECRETS, DATABASE } = config;
  logger.info('Retrieving credentials...');

  const username = await secrets.getSecret(SECRETS.DASHBOARD_SERVICE, SECRETS.USERNAME_ACCOUNT);
  const password = await secrets.getSecret(SECRETS.DASHBOARD_SERVICE, SECRETS.PASSWORD_ACCOUNT);
  const databasePassword = await secrets.getSecret(SECRETS.DATABASE_SERVICE, DATABASE.USER);

  logger.debug(`Credentials loaded for ${username.slice(0, 3)}***`);
  return { dashboard: { username, password }, databasePassword };
}
