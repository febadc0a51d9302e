import { Hono, type Context } from 'hono';
import { z } from 'zod';
import { asDomainError, httpStatusFor } from '../errors/domain.error';
import type { OrchestratorService } from '../services/orchestrator.service';
import { REPORT_FORMATS, type ReportService } from '../services/report.service';
import type { StorageBackend } from '../storage/storage.backend';
import { COMPONENT_TYPES, isComponentType, type AnalyzerStatus, type ComponentType } from '../types';

export interface ReviewRouteDeps {
  orchestrator: OrchestratorService;
  storage: StorageBackend;
  reports: ReportService;
  defaultDaysBack: number;
}

const startReviewSchema = z.object({ daysBack: z.unknown().optional() }).passthrough();

function respondWithError(c: Context, error: unknown, summary: string) {
  const domain = asDomainError(error);
  const status = httpStatusFor(domain.code);
  if (status >= 500) {
    console.error(`${summary}:`, domain);
  }
  return c.json({ error: summary, details: domain.message }, status);
}

/** An absent or blank body means "all defaults"; anything else must parse. */
async function readJsonBody(c: Context): Promise<{ ok: true; value: unknown } | { ok: false }> {
  const text = await c.req.text();
  if (text.trim() === '') return { ok: true, value: {} };
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

// Result payloads are arbitrary JSON, so they are serialized here rather than through c.json's typed path
function sendPayload(c: Context, body: unknown) {
  c.header('Content-Type', 'application/json; charset=UTF-8');
  return c.body(JSON.stringify(body));
}

export function createReviewRoutes(deps: ReviewRouteDeps) {
  const { orchestrator, storage, reports, defaultDaysBack } = deps;
  const reviewRoutes = new Hono();

  // POST /api/reviews - start a review run
  reviewRoutes.post('/', async (c) => {
    try {
      const raw = await readJsonBody(c);
      if (!raw.ok) {
        return c.json({ error: 'Invalid request body', details: 'Malformed JSON' }, 400);
      }

      const body = startReviewSchema.safeParse(raw.value ?? {});
      if (!body.success) {
        return c.json({ error: 'Invalid request body', details: 'Expected a JSON object' }, 400);
      }

      const daysBack = body.data.daysBack ?? defaultDaysBack;
      const started = await orchestrator.startReview(daysBack);

      return c.json(
        {
          message: 'Review started',
          reviewId: started.reviewId,
          reportUrl: started.reportUrl,
          analyzers: started.analyzers,
        },
        202
      );
    } catch (error) {
      return respondWithError(c, error, 'Failed to start review');
    }
  });

  // GET /api/reviews/:reviewId - live run state, or the stored status once the process has moved on
  reviewRoutes.get('/:reviewId', async (c) => {
    try {
      const reviewId = c.req.param('reviewId');

      const run = orchestrator.getRun(reviewId);
      if (run) {
        return c.json({ source: 'live', ...run });
      }

      const stored = await storage.getStatus(reviewId);
      if (!stored.success) {
        return respondWithError(c, stored.error, 'Failed to fetch review status');
      }
      if (!stored.value) {
        return c.json({ error: 'Review not found' }, 404);
      }

      return c.json({ source: 'stored', ...stored.value });
    } catch (error) {
      return respondWithError(c, error, 'Failed to fetch review status');
    }
  });

  // GET /api/reviews/:reviewId/results
  reviewRoutes.get('/:reviewId/results', async (c) => {
    const reviewId = c.req.param('reviewId');
    const results = await storage.getAll(reviewId);

    if (!results.success) {
      return respondWithError(c, results.error, 'Failed to fetch results');
    }

    return sendPayload(c, { reviewId, results: results.value });
  });

  // GET /api/reviews/:reviewId/results/:componentType
  reviewRoutes.get('/:reviewId/results/:componentType', async (c) => {
    const reviewId = c.req.param('reviewId');
    const componentType = c.req.param('componentType');

    if (!isComponentType(componentType)) {
      return c.json({ error: `Unknown component type: ${componentType}` }, 400);
    }

    const result = await storage.get(reviewId, componentType);
    if (!result.success) {
      return respondWithError(c, result.error, 'Failed to fetch result');
    }
    if (!result.value) {
      return c.json({ error: `No ${componentType} result for review ${reviewId}` }, 404);
    }

    return sendPayload(c, result.value);
  });

  // GET /api/reviews/:reviewId/report?format=markdown|json|html
  reviewRoutes.get('/:reviewId/report', async (c) => {
    try {
      const reviewId = c.req.param('reviewId');
      const requested = c.req.query('format') ?? 'html';
      const format = REPORT_FORMATS.find((candidate) => candidate === requested);

      if (!format) {
        return c.json({ error: `Invalid format. Supported: ${REPORT_FORMATS.join(', ')}` }, 400);
      }

      if (format === 'html') {
        const stored = await storage.getReport(reviewId);
        if (!stored.success) {
          console.warn(`Review ${reviewId}: stored report unreadable, rendering instead: ${stored.error.message}`);
        } else if (stored.value) {
          c.header('Content-Type', stored.value.contentType);
          c.header('Content-Disposition', `inline; filename="operational-review-${reviewId}.html"`);
          c.header('X-Report-Location', stored.value.location);
          return c.body(stored.value.body);
        }
      }

      const known = await resolveStatuses(reviewId);
      if (!known) {
        return c.json({ error: 'Review not found' }, 404);
      }

      const report = await reports.assemble({ reviewId, ...known });

      c.header('Content-Type', reports.getMimeType(format));
      c.header(
        'Content-Disposition',
        `inline; filename="operational-review-${reviewId}.${reports.getFileExtension(format)}"`
      );
      return c.body(reports.render(report, format));
    } catch (error) {
      return respondWithError(c, error, 'Failed to generate report');
    }
  });

  async function resolveStatuses(
    reviewId: string
  ): Promise<{ analyzers: Partial<Record<ComponentType, AnalyzerStatus>>; daysBack?: number } | null> {
    const run = orchestrator.getRun(reviewId);
    if (run) return { analyzers: run.analyzers, daysBack: run.daysBack };

    const stored = await storage.getStatus(reviewId);
    if (!stored.success) throw stored.error;
    if (!stored.value) return null;

    const { analyzers, daysBack } = stored.value;
    if (analyzers) return { analyzers, daysBack };

    // Status written before any analyzer reported: every section is still pending
    const pending: Partial<Record<ComponentType, AnalyzerStatus>> = {};
    for (const componentType of COMPONENT_TYPES) pending[componentType] = 'pending';
    return { analyzers: pending, daysBack };
  }

  return reviewRoutes;
}
