import { AppConfig, CONFIG } from '../config/constants';
import { MssqlProcedureClient } from '../db/procedures';
import { createSecretStore } from './credentials';
import { PlaywrightService } from './playwright';
import { SnapshotService } from './snapshot-service';

export function createSnapshotService(config: AppConfig = CONFIG): SnapshotService {
  return new SnapshotService({
    secrets: createSecretStore(config),
    createSession: () => new PlaywrightService(config),
    connectProcedures: (password) => MssqlProcedureClient.connect(password, config),
    config
  });
}
