import express, { type Express } from 'express';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { PersonalRecord } from './schema/attributes.js';
import type { FillEngine } from './services/fill-engine.js';
import { CONTROL_KINDS } from './types/index.js';
import { errorMessage } from './errors.js';
import { logger, type LogEntry } from './utils/logger.js';

const previewRequestSchema = z.object({
  fields: z
    .array(
      z.object({
        id: z.string().min(1),
        label: z.string(),
        kind: z.enum(CONTROL_KINDS),
        options: z.array(z.string()).optional(),
        required: z.boolean().optional(),
      })
    )
    .min(1),
});

export interface MatchServerOptions {
  engine: FillEngine;
  record: PersonalRecord;
}

/**
 * Local HTTP front for the engine, for detectors that run elsewhere (a
 * browser extension, an OCR pipeline). It only builds previews; injection
 * stays with the caller.
 */
export function createMatchServer({ engine, record }: MatchServerOptions): Express {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({ ok: true, ai: engine.aiEnabled });
  });

  app.post('/preview', async (req, res) => {
    const parsed = previewRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({
        error: 'Invalid request body',
        issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
      });
    }

    const runId = randomUUID();
    const logs: LogEntry[] = [];
    logger.addLogSink(runId, (entry) => {
      logs.push(entry);
    });

    try {
      const { preview, stats } = await logger.withRunContext(runId, () =>
        engine.buildPreview(parsed.data.fields, record)
      );
      return res.json({ entries: preview.entries, stats, logs: logs.map((l) => l.message) });
    } catch (error) {
      logger.error(`Preview failed: ${errorMessage(error)}`);
      return res.status(500).json({ error: errorMessage(error) });
    } finally {
      logger.removeLogSink(runId);
    }
  });

  return app;
}
