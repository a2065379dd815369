import { Router } from 'express';
import { z } from 'zod';

import { LifecycleErrorCode, lifecycleFailure } from '@turbinetrack/shared';

import { ISO_DATE_RE } from '../utils/dates.js';
import { installPart, partLifecycle, removePart } from '../services/lifecycleService.js';
import {
  addMaintenanceLog,
  addPartInstance,
  addPartMaster,
  getPartInstanceBySerial,
  listPartInstances,
  listPartMasters,
} from '../services/registryService.js';
import type { TrackerSession } from '../services/session.js';
import { sendFailure, sendInvalidRequest } from './respond.js';

const isoDate = z.string().regex(ISO_DATE_RE, 'expected YYYY-MM-DD');

export function createPartsRouter(session: TrackerSession) {
  const router = Router();

  router.get('/masters', (_req, res) => {
    return res.json({ ok: true, partMasters: listPartMasters(session.document) });
  });

  router.post('/masters', (req, res) => {
    const schema = z.object({
      partNumber: z.string().min(1).max(200),
      description: z.string().min(1).max(2000),
      manufacturer: z.string().max(200).optional(),
    });
    const parsed = schema.safeParse(req.body);
    if (!parsed.success) return sendInvalidRequest(res, parsed.error);

    const result = addPartMaster(session, parsed.data);
    if (!result.ok) return sendFailure(res, result);
    return res.status(201).json(result);
  });

  router.get('/instances', (req, res) => {
    const parsed = z.object({ partNumber: z.string().optional() }).safeParse(req.query);
    if (!parsed.success) return sendInvalidRequest(res, parsed.error);
    return res.json({ ok: true, instances: listPartInstances(session.document, { partNumber: parsed.data.partNumber }) });
  });

  router.post('/instances', (req, res) => {
    const schema = z.object({
      partNumber: z.string().min(1).max(200),
      serialNumber: z.string().min(1).max(200),
      manufactureDate: isoDate.nullable().optional(),
    });
    const parsed = schema.safeParse(req.body);
    if (!parsed.success) return sendInvalidRequest(res, parsed.error);

    const result = addPartInstance(session, parsed.data);
    if (!result.ok) return sendFailure(res, result);
    return res.status(201).json(result);
  });

  router.get('/instances/:serialNumber/lifecycle', (req, res) => {
    const instance = getPartInstanceBySerial(session.document, String(req.params.serialNumber ?? ''));
    if (!instance) {
      return sendFailure(res, lifecycleFailure(LifecycleErrorCode.PartNotFound, `part ${req.params.serialNumber} not found`));
    }
    const result = partLifecycle(session.document, instance.instance_id);
    if (!result.ok) return sendFailure(res, result);
    return res.json(result);
  });

  router.post('/instances/:serialNumber/install', (req, res) => {
    const schema = z.object({
      turbineSerialNumber: z.string().min(1).max(200),
      installationDate: isoDate.optional(),
    });
    const parsed = schema.safeParse(req.body);
    if (!parsed.success) return sendInvalidRequest(res, parsed.error);

    const result = installPart(session, {
      partSerialNumber: String(req.params.serialNumber ?? ''),
      turbineSerialNumber: parsed.data.turbineSerialNumber,
      installationDate: parsed.data.installationDate,
    });
    if (!result.ok) return sendFailure(res, result);
    return res.status(201).json(result);
  });

  router.post('/instances/:serialNumber/remove', (req, res) => {
    const schema = z.object({
      removalDate: isoDate.optional(),
      turbineHours: z.number().nonnegative().optional(),
      turbineStarts: z.number().int().nonnegative().optional(),
    });
    const parsed = schema.safeParse(req.body ?? {});
    if (!parsed.success) return sendInvalidRequest(res, parsed.error);

    const result = removePart(session, { partSerialNumber: String(req.params.serialNumber ?? ''), ...parsed.data });
    if (!result.ok) return sendFailure(res, result);
    return res.json(result);
  });

  router.post('/instances/:serialNumber/maintenance', (req, res) => {
    const schema = z.object({
      description: z.string().min(1).max(5000),
      logDate: isoDate.optional(),
    });
    const parsed = schema.safeParse(req.body);
    if (!parsed.success) return sendInvalidRequest(res, parsed.error);

    const result = addMaintenanceLog(session, {
      partSerialNumber: String(req.params.serialNumber ?? ''),
      description: parsed.data.description,
      logDate: parsed.data.logDate,
    });
    if (!result.ok) return sendFailure(res, result);
    return res.status(201).json(result);
  });

  return router;
}
