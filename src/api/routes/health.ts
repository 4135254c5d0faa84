import { Router } from 'express';
import { readLockHolder } from '../../utils/lock';

export function createHealthRouter(lockFile?: string): Router {
  const router = Router();

  router.get('/', (req, res) => {
    const holder = readLockHolder(lockFile);
    res.json({
      status: 'ok',
      runInProgress: holder !== null,
      lockHeldBy: holder?.pid ?? null
    });
  });

  return router;
}
