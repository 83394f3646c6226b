/**
 * Express Run Intake Server
 *
 * Routes:
 * - POST /runs: Validate a sorting run, enqueue it to BullMQ, return 202 with the run id
 * - GET /runs/:runId: Job state, progress and (when finished) the RunResult summary
 * - GET /health: Server status and kill switch state
 *
 * Run input is validated twice over: the body schema here, then a dry
 * JobContext build so slot ordering and period errors come back as 400
 * instead of a failed job.
 */

import express from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import { appConfig } from '../config.js';
import { JobContextError } from '../job/errors.js';
import { createJobContext, JobContextInputSchema } from '../job/job-context.js';
import type { RunJobData } from '../pipeline/types.js';
import { getRunQueue, RUN_QUEUE_NAME, runJobId } from './queue.js';

export const RunRequestSchema = JobContextInputSchema.extend({
  runId: z
    .string()
    .trim()
    .regex(/^[A-Za-z0-9_-]{1,64}$/, 'runId may contain letters, digits, "-" and "_" only')
    .optional(),
  files: z.array(z.string().trim().min(1)).min(1, 'At least one input file is required'),
  forceSplit: z.boolean().default(false),
  outputDir: z.string().trim().min(1).optional(),
});

export type RunRequest = z.infer<typeof RunRequestSchema>;

function asyncRoute(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function healthHandler(_req: Request, res: Response): void {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    killSwitch: appConfig.killSwitch,
    queue: RUN_QUEUE_NAME,
    version: process.env.npm_package_version ?? 'dev',
  });
}

/**
 * Create the Express application with all routes configured.
 *
 * Factory so tests get a fresh instance per case.
 */
export function createApp() {
  const app = express();
  app.use(express.json());

  app.get('/health', healthHandler);

  app.post(
    '/runs',
    asyncRoute(async (req, res) => {
      if (appConfig.killSwitch) {
        console.log('[server] Kill switch active, rejecting run');
        res.status(503).json({ message: 'Automation disabled' });
        return;
      }

      const parsed = RunRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue ? `${issue.path.join('.') || 'body'}: ${issue.message}` : 'invalid body';
        res.status(400).json({ error: 'INVALID_INPUT', message: where });
        return;
      }
      const body = parsed.data;

      let runId: string;
      try {
        const context = createJobContext(
          {
            runId: body.runId,
            confirmedPeriod: body.confirmedPeriod,
            periodSource: body.periodSource,
            jurisdictions: body.jurisdictions,
          },
          {
            specialJurisdiction: appConfig.sorter.specialJurisdiction,
            defaultPeriod: appConfig.sorter.defaultPeriod,
            auditWriter: () => undefined,
          },
        );
        runId = context.runId;
      } catch (err) {
        if (err instanceof JobContextError) {
          res.status(400).json({ error: err.code, message: err.message });
          return;
        }
        throw err;
      }

      const queue = getRunQueue();
      const jobId = runJobId(runId);
      if (await queue.getJob(jobId)) {
        res.status(409).json({ error: 'DUPLICATE_RUN', runId });
        return;
      }

      const jobData: RunJobData = {
        context: {
          runId,
          confirmedPeriod: body.confirmedPeriod,
          periodSource: body.periodSource,
          jurisdictions: body.jurisdictions,
        },
        files: body.files,
        forceSplit: body.forceSplit,
        ...(body.outputDir ? { outputDir: body.outputDir } : {}),
        receivedAt: new Date().toISOString(),
      };

      await queue.add('sort-run', jobData, { jobId });

      console.log('[server] Enqueued', { runId, jobId, files: body.files.length, forceSplit: body.forceSplit });
      res.status(202).json({ accepted: true, runId });
    }),
  );

  app.get(
    '/runs/:runId',
    asyncRoute(async (req, res) => {
      const runId = req.params.runId;
      const job = await getRunQueue().getJob(runJobId(runId));
      if (!job) {
        res.status(404).json({ error: 'Unknown run', runId });
        return;
      }

      const state = await job.getState();
      res.json({
        runId,
        state,
        progress: job.progress,
        result: state === 'completed' ? job.returnvalue : null,
        failedReason: state === 'failed' ? job.failedReason : null,
      });
    }),
  );

  // Global error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('[server] Unhandled error:', err.message);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
