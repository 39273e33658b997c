import express, { Router } from 'express';
import { z } from 'zod';
import { ValidationError } from '../errors';
import { asyncHandler } from '../middleware/asyncHandler';
import { AuthRequest, authRequired, getActor } from '../middleware/auth';
import type { SheetFormat } from '../services/callLogImport';
import type { Services } from '../services';
import { bulkCallLogSchema, callLogQuerySchema } from '../validation/callLogs';
import { parseInput } from '../validation/common';

const IMPORT_LIMIT = '5mb';

const importQuerySchema = z.object({
  format: z.enum(['csv', 'xlsx']).optional(),
  source: z.string().trim().min(1).max(50).optional(),
  upsert: z.enum(['true', 'false']).default('true').transform((v) => v === 'true'),
});

function sheetFormat(contentType: string | undefined, explicit?: SheetFormat): SheetFormat {
  if (explicit) return explicit;
  if (contentType?.includes('text/csv')) return 'csv';
  if (contentType?.includes('spreadsheetml') || contentType?.includes('application/vnd.ms-excel')) return 'xlsx';
  throw new ValidationError('Send text/csv or an xlsx workbook, or pass ?format=csv|xlsx');
}

export default function callLogsRouter({ callLogs, permissions }: Services) {
  const router = Router();
  router.use(authRequired);

  router.get('/', asyncHandler(async (req: AuthRequest, res) => {
    const actor = getActor(req);
    const query = parseInput(callLogQuerySchema, req.query);
    // without view_all an employee only sees their own logs
    if (query.employeeId !== actor.id && !(await permissions.can(actor, 'attendance.view_all'))) {
      query.employeeId = actor.id;
    }
    res.json(await callLogs.list(query));
  }));

  router.get('/template', (_req, res) => {
    res
      .type('application/vnd.openxmlformats-officedocument.spreadsheetml.sheet')
      .attachment('call-log-template.xlsx')
      .send(callLogs.template());
  });

  router.post('/', asyncHandler(async (req: AuthRequest, res) => {
    const upsert = req.query.upsert !== 'false';
    const { outcome, log } = await callLogs.ingestOne(getActor(req), req.body, { upsert });
    res.status(outcome === 'created' ? 201 : 200).json({ outcome, log });
  }));

  router.post('/bulk', asyncHandler(async (req: AuthRequest, res) => {
    const body = parseInput(bulkCallLogSchema, req.body);
    const summary = await callLogs.ingest(getActor(req), body.entries, { upsert: body.upsert, source: body.source });
    res.json(summary);
  }));

  router.post(
    '/import',
    express.raw({ type: () => true, limit: IMPORT_LIMIT }),
    asyncHandler(async (req: AuthRequest, res) => {
      const query = parseInput(importQuerySchema, req.query);
      if (!Buffer.isBuffer(req.body) || req.body.length === 0) throw new ValidationError('Upload is empty');
      const format = sheetFormat(req.headers['content-type'], query.format);
      const summary = await callLogs.importSheet(getActor(req), req.body, format, {
        upsert: query.upsert,
        source: query.source,
      });
      res.json(summary);
    }),
  );

  return router;
}
