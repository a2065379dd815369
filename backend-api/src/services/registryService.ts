import {
  LifecycleErrorCode,
  lifecycleFailure,
  type LifecycleFailure,
  type MaintenanceLog,
  type PartInstance,
  type PartMaster,
  type TrackerDocument,
  type Turbine,
} from '@turbinetrack/shared';

import { todayIsoDate } from '../utils/dates.js';
import { logInfo } from '../utils/logger.js';
import { findBy, nextId } from '../utils/records.js';
import { checkCounters, cleanDate, cleanText, rejected, requireText } from './inputChecks.js';
import { appendAndPersist, type TrackerSession } from './session.js';

export function getTurbineBySerial(document: TrackerDocument, serialNumber: string): Turbine | undefined {
  return findBy(document.turbines, 'serial_number', cleanText(serialNumber));
}

export function getPartInstanceBySerial(document: TrackerDocument, serialNumber: string): PartInstance | undefined {
  return findBy(document.part_instances, 'serial_number', cleanText(serialNumber));
}

export function listTurbines(document: TrackerDocument, args?: { location?: string | undefined }): Turbine[] {
  const location = cleanText(args?.location);
  if (!location) return [...document.turbines];
  return document.turbines.filter((t) => t.location === location);
}

// Distinct non-empty locations, sorted for display.
export function listLocations(document: TrackerDocument): string[] {
  const locations = new Set<string>();
  for (const t of document.turbines) {
    if (t.location) locations.add(t.location);
  }
  return [...locations].sort((a, b) => a.localeCompare(b));
}

export function listPartMasters(document: TrackerDocument): PartMaster[] {
  return [...document.part_masters];
}

export function listPartInstances(document: TrackerDocument, args?: { partNumber?: string | undefined }): PartInstance[] {
  const partNumber = cleanText(args?.partNumber);
  if (!partNumber) return [...document.part_instances];
  return document.part_instances.filter((p) => p.part_number === partNumber);
}

export function addTurbine(
  session: TrackerSession,
  args: {
    serialNumber: string;
    frameType: string;
    location?: string | undefined;
    currentTotalHours?: number | undefined;
    currentTotalStarts?: number | undefined;
  },
): { ok: true; turbine: Turbine } | LifecycleFailure {
  const serialNumber = requireText(args.serialNumber, 'turbine serial number');
  if (typeof serialNumber !== 'string') return rejected('addTurbine', serialNumber);
  const frameType = requireText(args.frameType, 'frame type');
  if (typeof frameType !== 'string') return rejected('addTurbine', frameType);
  const badCounters = checkCounters({ hours: args.currentTotalHours, starts: args.currentTotalStarts });
  if (badCounters) return rejected('addTurbine', badCounters);

  const turbines = session.document.turbines;
  if (findBy(turbines, 'serial_number', serialNumber)) {
    return rejected('addTurbine', lifecycleFailure(LifecycleErrorCode.DuplicateKey, `turbine ${serialNumber} already exists`));
  }

  const turbine: Turbine = {
    turbine_id: nextId(turbines, 'turbine_id'),
    serial_number: serialNumber,
    frame_type: frameType,
    location: cleanText(args.location),
    current_total_hours: args.currentTotalHours ?? 0,
    current_total_starts: args.currentTotalStarts ?? 0,
  };
  appendAndPersist(session, turbines, turbine);
  logInfo('turbine added', { turbineId: turbine.turbine_id, serialNumber });
  return { ok: true, turbine };
}

export function addPartMaster(
  session: TrackerSession,
  args: { partNumber: string; description: string; manufacturer?: string | undefined },
): { ok: true; partMaster: PartMaster } | LifecycleFailure {
  const partNumber = requireText(args.partNumber, 'part number');
  if (typeof partNumber !== 'string') return rejected('addPartMaster', partNumber);
  const description = requireText(args.description, 'description');
  if (typeof description !== 'string') return rejected('addPartMaster', description);

  const masters = session.document.part_masters;
  if (findBy(masters, 'part_number', partNumber)) {
    return rejected('addPartMaster', lifecycleFailure(LifecycleErrorCode.DuplicateKey, `part master ${partNumber} already exists`));
  }

  const partMaster: PartMaster = {
    part_number: partNumber,
    description,
    manufacturer: cleanText(args.manufacturer),
  };
  appendAndPersist(session, masters, partMaster);
  logInfo('part master added', { partNumber });
  return { ok: true, partMaster };
}

export function addPartInstance(
  session: TrackerSession,
  args: { partNumber: string; serialNumber: string; manufactureDate?: string | null | undefined },
): { ok: true; instance: PartInstance } | LifecycleFailure {
  const partNumber = requireText(args.partNumber, 'part number');
  if (typeof partNumber !== 'string') return rejected('addPartInstance', partNumber);
  const serialNumber = requireText(args.serialNumber, 'part serial number');
  if (typeof serialNumber !== 'string') return rejected('addPartInstance', serialNumber);

  const doc = session.document;
  if (!findBy(doc.part_masters, 'part_number', partNumber)) {
    return rejected('addPartInstance', lifecycleFailure(LifecycleErrorCode.PartMasterNotFound, `part master ${partNumber} not found`));
  }
  if (findBy(doc.part_instances, 'serial_number', serialNumber)) {
    return rejected('addPartInstance', lifecycleFailure(LifecycleErrorCode.DuplicateKey, `part ${serialNumber} already exists`));
  }

  const instance: PartInstance = {
    instance_id: nextId(doc.part_instances, 'instance_id'),
    part_number: partNumber,
    serial_number: serialNumber,
    manufacture_date: cleanDate(args.manufactureDate),
  };
  appendAndPersist(session, doc.part_instances, instance);
  logInfo('part instance added', { instanceId: instance.instance_id, partNumber, serialNumber });
  return { ok: true, instance };
}

export function addMaintenanceLog(
  session: TrackerSession,
  args: ({ partSerialNumber: string } | { instanceId: number }) & { description: string; logDate?: string | undefined },
): { ok: true; log: MaintenanceLog } | LifecycleFailure {
  const description = requireText(args.description, 'description');
  if (typeof description !== 'string') return rejected('addMaintenanceLog', description);

  const doc = session.document;
  let instance: PartInstance | undefined;
  if ('instanceId' in args) {
    instance = findBy(doc.part_instances, 'instance_id', args.instanceId);
    if (!instance) {
      return rejected(
        'addMaintenanceLog',
        lifecycleFailure(LifecycleErrorCode.InstanceNotFound, `part instance ${args.instanceId} not found`),
      );
    }
  } else {
    instance = getPartInstanceBySerial(doc, args.partSerialNumber);
    if (!instance) {
      return rejected(
        'addMaintenanceLog',
        lifecycleFailure(LifecycleErrorCode.PartNotFound, `part ${cleanText(args.partSerialNumber)} not found`),
      );
    }
  }

  const log: MaintenanceLog = {
    log_id: nextId(doc.maintenance_logs, 'log_id'),
    instance_id: instance.instance_id,
    description,
    log_date: cleanDate(args.logDate) ?? todayIsoDate(),
  };
  appendAndPersist(session, doc.maintenance_logs, log);
  logInfo('maintenance log added', { logId: log.log_id, instanceId: instance.instance_id });
  return { ok: true, log };
}
