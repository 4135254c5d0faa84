import * as sql from 'mssql';
import { AppConfig, CONFIG } from '../config/constants';
import { PersistenceError, errorMessage } from '../utils/error-handler';
import { logger } from '../utils/logger';

export type ProcedureParamType = 'datetime' | 'varchar' | 'int';

export interface ProcedureParam {
  name: string;
  type: ProcedureParamType;
  value: Date | string | number | null;
}

export interface ProcedureResult {
  recordset: Array<Record<string, unknown>>;
  returnValue: number;
}

/**
 * Stored-procedure boundary. Parameters are always bound, never spliced into SQL text.
 */
export interface ProcedureClient {
  callProcedure(name: string, params?: ProcedureParam[]): Promise<ProcedureResult>;
  close(): Promise<void>;
}

function sqlType(type: ProcedureParamType): sql.ISqlType {
  switch (type) {
    case 'datetime':
      return sql.DateTime();
    case 'varchar':
      return sql.VarChar(255);
    case 'int':
      return sql.Int();
  }
}

export function poolConfig(password: string, config: AppConfig = CONFIG): sql.config {
  const { DATABASE } = config;
  return {
    server: DATABASE.SERVER,
    port: DATABASE.PORT,
    database: DATABASE.NAME,
    user: DATABASE.USER,
    password,
    connectionTimeout: DATABASE.CONNECTION_TIMEOUT,
    requestTimeout: DATABASE.REQUEST_TIMEOUT,
    // One connection: inserts run strictly in order
    pool: { min: 0, max: 1 },
    options: {
      encrypt: DATABASE.ENCRYPT,
      trustServerCertificate: DATABASE.TRUST_SERVER_CERTIFICATE,
      useUTC: DATABASE.USE_UTC
    }
  };
}

export class MssqlProcedureClient implements ProcedureClient {
  private constructor(private readonly pool: sql.ConnectionPool) {}

  static async connect(password: string, config: AppConfig = CONFIG): Promise<MssqlProcedureClient> {
    const { DATABASE } = config;
    logger.info(`Connecting to SQL Server ${DATABASE.SERVER}/${DATABASE.NAME}...`);

    const pool = new sql.ConnectionPool(poolConfig(password, config));

    try {
      await pool.connect();
    } catch (e) {
      throw new PersistenceError(`Database connection failed: ${errorMessage(e)}`, 'connect');
    }

    logger.info('Database connection established');
    return new MssqlProcedureClient(pool);
  }

  async callProcedure(name: string, params: ProcedureParam[] = []): Promise<ProcedureResult> {
    const request = this.pool.request();
    for (const param of params) {
      request.input(param.name, sqlType(param.type), param.value);
    }

    const result = await request.execute<Record<string, unknown>>(name);
    return {
      recordset: result.recordset ?? [],
      returnValue: result.returnValue
    };
  }

  async close(): Promise<void> {
    await this.pool.close();
    logger.info('Database connection closed');
  }
}
