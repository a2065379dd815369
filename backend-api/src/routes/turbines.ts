import { Router } from 'express';
import { z } from 'zod';

import { LifecycleErrorCode, lifecycleFailure } from '@turbinetrack/shared';

import { installedParts, turbineHistory } from '../services/lifecycleService.js';
import { addTurbine, getTurbineBySerial, listTurbines } from '../services/registryService.js';
import type { TrackerSession } from '../services/session.js';
import { sendFailure, sendInvalidRequest } from './respond.js';

export function createTurbinesRouter(session: TrackerSession) {
  const router = Router();

  router.get('/', (req, res) => {
    const parsed = z.object({ location: z.string().optional() }).safeParse(req.query);
    if (!parsed.success) return sendInvalidRequest(res, parsed.error);
    return res.json({ ok: true, turbines: listTurbines(session.document, { location: parsed.data.location }) });
  });

  router.post('/', (req, res) => {
    const schema = z.object({
      serialNumber: z.string().min(1).max(200),
      frameType: z.string().min(1).max(200),
      location: z.string().max(200).optional(),
      currentTotalHours: z.number().nonnegative().optional(),
      currentTotalStarts: z.number().int().nonnegative().optional(),
    });
    const parsed = schema.safeParse(req.body);
    if (!parsed.success) return sendInvalidRequest(res, parsed.error);

    const result = addTurbine(session, parsed.data);
    if (!result.ok) return sendFailure(res, result);
    return res.status(201).json(result);
  });

  router.get('/:serialNumber', (req, res) => {
    const turbine = getTurbineBySerial(session.document, String(req.params.serialNumber ?? ''));
    if (!turbine) {
      return sendFailure(res, lifecycleFailure(LifecycleErrorCode.TurbineNotFound, `turbine ${req.params.serialNumber} not found`));
    }
    return res.json({ ok: true, turbine });
  });

  router.get('/:serialNumber/parts', (req, res) => {
    const turbine = getTurbineBySerial(session.document, String(req.params.serialNumber ?? ''));
    if (!turbine) {
      return sendFailure(res, lifecycleFailure(LifecycleErrorCode.TurbineNotFound, `turbine ${req.params.serialNumber} not found`));
    }
    return res.json({ ok: true, turbine, parts: installedParts(session.document, turbine.turbine_id) });
  });

  router.get('/:serialNumber/history', (req, res) => {
    const turbine = getTurbineBySerial(session.document, String(req.params.serialNumber ?? ''));
    if (!turbine) {
      return sendFailure(res, lifecycleFailure(LifecycleErrorCode.TurbineNotFound, `turbine ${req.params.serialNumber} not found`));
    }
    const result = turbineHistory(session.document, turbine.turbine_id);
    if (!result.ok) return sendFailure(res, result);
    return res.json(result);
  });

  return router;
}
