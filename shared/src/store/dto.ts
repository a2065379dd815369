import { z } from 'zod';

import type { TrackerDocument } from '../domain/turbineParts.js';

// Shape of the persisted document. Unknown fields pass through untouched so that
// a load/save cycle never drops data written by another tool.

const surrogateId = z.number().int().positive();
const counterValue = z.number().finite().nullable().default(null);

export const turbineRowSchema = z
  .object({
    turbine_id: surrogateId,
    serial_number: z.string(),
    frame_type: z.string().default(''),
    location: z.string().default(''),
    current_total_hours: z.number().finite().default(0),
    current_total_starts: z.number().int().default(0),
  })
  .passthrough();

export const partMasterRowSchema = z
  .object({
    part_number: z.string(),
    description: z.string().default(''),
    manufacturer: z.string().default(''),
  })
  .passthrough();

export const partInstanceRowSchema = z
  .object({
    instance_id: surrogateId,
    part_number: z.string(),
    serial_number: z.string(),
    manufacture_date: z.string().nullable().default(null),
  })
  .passthrough();

export const installationRecordRowSchema = z
  .object({
    installation_id: surrogateId,
    instance_id: surrogateId,
    turbine_id: surrogateId,
    installation_date: z.string(),
    removal_date: z.string().nullable().default(null),
    turbine_hours_at_install: counterValue,
    turbine_starts_at_install: counterValue,
    turbine_hours_at_removal: counterValue,
    turbine_starts_at_removal: counterValue,
  })
  .passthrough();

export const maintenanceLogRowSchema = z
  .object({
    log_id: surrogateId,
    instance_id: surrogateId,
    description: z.string(),
    log_date: z.string(),
  })
  .passthrough();

// Missing collections initialize to empty ones.
export const trackerDocumentSchema = z
  .object({
    turbines: z.array(turbineRowSchema).default([]),
    part_masters: z.array(partMasterRowSchema).default([]),
    part_instances: z.array(partInstanceRowSchema).default([]),
    installation_records: z.array(installationRecordRowSchema).default([]),
    maintenance_logs: z.array(maintenanceLogRowSchema).default([]),
  })
  .passthrough();

export type ParsedTrackerDocument =
  | { ok: true; document: TrackerDocument }
  | { ok: false; error: string };

export function parseTrackerDocument(raw: unknown): ParsedTrackerDocument {
  const parsed = trackerDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    if (!issue) return { ok: false, error: parsed.error.message };
    const where = issue.path.join('.');
    return { ok: false, error: where ? `${where}: ${issue.message}` : issue.message };
  }
  return { ok: true, document: parsed.data };
}
