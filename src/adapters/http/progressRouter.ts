import type { Router } from 'express';
import express from 'express';
import { z } from 'zod';
import type { DataCleanupService } from '../../core/cleanup/DataCleanupService.js';
import { isExportTable, type ProgressExporter } from '../../core/export/ProgressExporter.js';
import type { ImportPipeline } from '../../core/import/ImportPipeline.js';
import type { ImportRunRepository } from '../../persistence/repositories/ImportRunRepository.js';
import { ParseError, PersistError, TimeoutError, ValidationError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

export interface ProgressRouterDeps {
  pipeline: ImportPipeline;
  history: ImportRunRepository;
  exporter: ProgressExporter;
  cleanup: DataCleanupService;
  maxUploadBytes: number;
}

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const importQuery = z.object({
  dryRun: flag.optional(),
  conflictPolicy: z.enum(['last-wins', 'first-wins']).optional(),
  dateOrder: z.enum(['dmy', 'mdy']).optional(),
  sourceName: z.string().min(1).max(200).optional(),
});

const historyQuery = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(20),
});

const dateRangeQuery = z.object({
  from: z.string(),
  to: z.string(),
  removeEmptiedWeeks: flag.optional(),
});

const weekRangeQuery = z.object({
  fromWeek: z.coerce.number().int(),
  toWeek: z.coerce.number().int(),
  includeDailies: flag.optional(),
});

/** HTTP status for an error raised by the core. */
export function statusFor(error: unknown): number {
  if (error instanceof z.ZodError || error instanceof ValidationError) return 400;
  if (error instanceof ParseError) return 422;
  if (error instanceof PersistError) return 503;
  if (error instanceof TimeoutError) return 504;
  return 500;
}

function errorBody(error: unknown): { error: string; code?: string; line?: number; issues?: string[] } {
  if (error instanceof z.ZodError) {
    return {
      error: 'Invalid query',
      issues: error.issues.map((issue) => `${issue.path.join('.') || 'query'}: ${issue.message}`),
    };
  }
  if (error instanceof ParseError) {
    return { error: error.message, code: error.code, line: error.line };
  }
  if (error instanceof ValidationError || error instanceof PersistError || error instanceof TimeoutError) {
    return { error: error.message, code: error.code };
  }
  return { error: 'Internal server error' };
}

export function createProgressRouter(deps: ProgressRouterDeps): Router {
  const logger = createLogger({ component: 'progressRouter' });
  const router = express.Router();

  const fail = (res: express.Response, error: unknown): void => {
    const status = statusFor(error);
    if (status >= 500) {
      logger.error({ error }, 'Request failed');
    }
    res.status(status).json(errorBody(error));
  };

  router.post('/imports', express.raw({ type: () => true, limit: deps.maxUploadBytes }), async (req, res) => {
    try {
      const query = importQuery.parse(req.query);
      const body: unknown = req.body;
      if (!Buffer.isBuffer(body) || body.length === 0) {
        throw new ValidationError('request body must be the CSV file');
      }
      const report = await deps.pipeline.importFile(body, query);
      res.status(200).json(report);
    } catch (error) {
      fail(res, error);
    }
  });

  router.get('/imports', (req, res) => {
    try {
      const { limit } = historyQuery.parse(req.query);
      res.status(200).json({ imports: deps.history.listRecent(limit) });
    } catch (error) {
      fail(res, error);
    }
  });

  router.get('/exports/template.csv', (_req, res) => {
    res.status(200).type('text/csv').attachment('progress_template.csv').send(deps.exporter.template());
  });

  router.get('/exports/:table.csv', (req, res) => {
    const { table } = req.params;
    if (!isExportTable(table)) {
      res.status(404).json({ error: `Unknown table: ${table}` });
      return;
    }
    try {
      res.status(200).type('text/csv').attachment(`${table}.csv`).send(deps.exporter.exportTable(table));
    } catch (error) {
      fail(res, error);
    }
  });

  router.get('/cleanup/preview', (req, res) => {
    try {
      if ('fromWeek' in req.query || 'toWeek' in req.query) {
        const { fromWeek, toWeek } = weekRangeQuery.parse(req.query);
        res.status(200).json(deps.cleanup.previewWeekRange(fromWeek, toWeek));
        return;
      }
      const { from, to } = dateRangeQuery.parse(req.query);
      res.status(200).json(deps.cleanup.previewDateRange(from, to));
    } catch (error) {
      fail(res, error);
    }
  });

  router.delete('/daily', (req, res) => {
    try {
      const { from, to, removeEmptiedWeeks } = dateRangeQuery.parse(req.query);
      res.status(200).json(deps.cleanup.deleteDateRange(from, to, { removeEmptiedWeeks }));
    } catch (error) {
      fail(res, error);
    }
  });

  router.delete('/weeks', (req, res) => {
    try {
      const { fromWeek, toWeek, includeDailies } = weekRangeQuery.parse(req.query);
      res.status(200).json(deps.cleanup.deleteWeekRange(fromWeek, toWeek, { includeDailies }));
    } catch (error) {
      fail(res, error);
    }
  });

  return router;
}
