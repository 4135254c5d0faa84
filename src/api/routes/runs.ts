import { Router } from 'express';
import { z } from 'zod';
import { RunHistory } from '../../services/run-history';
import { SnapshotJob } from '../../services/snapshot-job';
import { AppError, errorMessage } from '../../utils/error-handler';
import { logger } from '../../utils/logger';

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(20)
});

const idSchema = z.coerce.number().int().positive();

export function createRunsRouter(history: RunHistory, job: SnapshotJob): Router {
  const router = Router();

  router.get('/', async (req, res) => {
    const query = listQuerySchema.safeParse(req.query);
    if (!query.success) {
      return res.status(400).json({ error: 'INVALID_QUERY', issues: query.error.issues });
    }

    try {
      res.json(await history.list(query.data.limit));
    } catch (e) {
      logger.error('Failed to list runs:', errorMessage(e));
      res.status(500).json({ error: 'Failed to list runs' });
    }
  });

  router.get('/latest', async (req, res) => {
    try {
      const run = await history.latest();
      if (!run) {
        return res.status(404).json({ error: 'No runs recorded' });
      }
      res.json(run);
    } catch (e) {
      logger.error('Failed to get latest run:', errorMessage(e));
      res.status(500).json({ error: 'Failed to get latest run' });
    }
  });

  router.get('/:id', async (req, res) => {
    const id = idSchema.safeParse(req.params.id);
    if (!id.success) {
      return res.status(400).json({ error: 'INVALID_ID' });
    }

    try {
      const run = await history.get(id.data);
      if (!run) {
        return res.status(404).json({ error: 'Run not found' });
      }
      res.json(run);
    } catch (e) {
      logger.error(`Failed to get run ${id.data}:`, errorMessage(e));
      res.status(500).json({ error: 'Failed to get run' });
    }
  });

  // Runs synchronously: the response carries the run's outcome
  router.post('/', async (req, res) => {
    try {
      const { runId, summary } = await job();
      res.json({ runId, ...summary });
    } catch (e) {
      if (e instanceof AppError) {
        return res.status(e.statusCode).json({
          error: e.code,
          message: e.message,
          screenshotPath: e.screenshotPath
        });
      }
      res.status(500).json({ error: 'UNKNOWN_ERROR', message: errorMessage(e) });
    }
  });

  return router;
}
