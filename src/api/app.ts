import express, { Express } from 'express';
import cors from 'cors';
import { RunHistory } from '../services/run-history';
import { SnapshotJob } from '../services/snapshot-job';
import { createHealthRouter } from './routes/health';
import { createRunsRouter } from './routes/runs';

export interface AppDeps {
  history: RunHistory;
  job: SnapshotJob;
  lockFile?: string;
}

export function createApp({ history, job, lockFile }: AppDeps): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.use('/api/health', createHealthRouter(lockFile));
  app.use('/api/runs', createRunsRouter(history, job));

  return app;
}
