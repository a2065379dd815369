import {
  isOpenInstallation,
  LifecycleErrorCode,
  lifecycleFailure,
  type InstallationRecord,
  type LifecycleFailure,
  type PartInstance,
  type PartLifecycleView,
  type TrackerDocument,
  type Turbine,
  type TurbineHistoryEntry,
} from '@turbinetrack/shared';

import { todayIsoDate } from '../utils/dates.js';
import { logInfo } from '../utils/logger.js';
import { filterBy, findBy, nextId } from '../utils/records.js';
import { checkCounters, cleanDate, cleanText, rejected } from './inputChecks.js';
import { getPartInstanceBySerial, getTurbineBySerial } from './registryService.js';
import { appendAndPersist, persistOrRevert, type TrackerSession } from './session.js';

// First open episode in insertion order. More than one can only come from a hand-edited file.
export function findOpenInstallation(document: TrackerDocument, instanceId: number): InstallationRecord | undefined {
  return document.installation_records.find((r) => r.instance_id === instanceId && isOpenInstallation(r));
}

export function installPart(
  session: TrackerSession,
  args: { partSerialNumber: string; turbineSerialNumber: string; installationDate?: string | undefined },
): { ok: true; record: InstallationRecord } | LifecycleFailure {
  const doc = session.document;
  const instance = getPartInstanceBySerial(doc, args.partSerialNumber);
  if (!instance) {
    return rejected(
      'installPart',
      lifecycleFailure(LifecycleErrorCode.PartNotFound, `part ${cleanText(args.partSerialNumber)} not found`),
    );
  }
  const turbine = getTurbineBySerial(doc, args.turbineSerialNumber);
  if (!turbine) {
    return rejected(
      'installPart',
      lifecycleFailure(LifecycleErrorCode.TurbineNotFound, `turbine ${cleanText(args.turbineSerialNumber)} not found`),
    );
  }

  // Any open episode blocks, including one in this same turbine.
  const active = findOpenInstallation(doc, instance.instance_id);
  if (active) {
    const where = findBy(doc.turbines, 'turbine_id', active.turbine_id)?.serial_number ?? `#${active.turbine_id}`;
    return rejected(
      'installPart',
      lifecycleFailure(LifecycleErrorCode.AlreadyInstalled, `part ${instance.serial_number} is already installed in turbine ${where}`),
    );
  }

  const record: InstallationRecord = {
    installation_id: nextId(doc.installation_records, 'installation_id'),
    instance_id: instance.instance_id,
    turbine_id: turbine.turbine_id,
    installation_date: cleanDate(args.installationDate) ?? todayIsoDate(),
    removal_date: null,
    turbine_hours_at_install: turbine.current_total_hours,
    turbine_starts_at_install: turbine.current_total_starts,
    turbine_hours_at_removal: null,
    turbine_starts_at_removal: null,
  };
  appendAndPersist(session, doc.installation_records, record);
  logInfo('part installed', {
    installationId: record.installation_id,
    part: instance.serial_number,
    turbine: turbine.serial_number,
  });
  return { ok: true, record };
}

// Closes the active episode in place. Counters given here become the turbine's new totals;
// without them the removal snapshot takes the turbine's current values.
export function removePart(
  session: TrackerSession,
  args: {
    partSerialNumber: string;
    removalDate?: string | undefined;
    turbineHours?: number | undefined;
    turbineStarts?: number | undefined;
  },
): { ok: true; record: InstallationRecord; turbine: Turbine | null } | LifecycleFailure {
  const badCounters = checkCounters({ hours: args.turbineHours, starts: args.turbineStarts });
  if (badCounters) return rejected('removePart', badCounters);

  const doc = session.document;
  const instance = getPartInstanceBySerial(doc, args.partSerialNumber);
  if (!instance) {
    return rejected(
      'removePart',
      lifecycleFailure(LifecycleErrorCode.PartNotFound, `part ${cleanText(args.partSerialNumber)} not found`),
    );
  }
  const record = findOpenInstallation(doc, instance.instance_id);
  if (!record) {
    return rejected(
      'removePart',
      lifecycleFailure(LifecycleErrorCode.NoActiveInstallation, `part ${instance.serial_number} has no active installation`),
    );
  }

  const turbine = findBy(doc.turbines, 'turbine_id', record.turbine_id) ?? null;
  const recordBefore = { ...record };
  const turbineBefore = turbine ? { ...turbine } : null;

  record.removal_date = cleanDate(args.removalDate) ?? todayIsoDate();
  record.turbine_hours_at_removal = args.turbineHours ?? turbine?.current_total_hours ?? null;
  record.turbine_starts_at_removal = args.turbineStarts ?? turbine?.current_total_starts ?? null;
  if (turbine) {
    if (args.turbineHours !== undefined) turbine.current_total_hours = args.turbineHours;
    if (args.turbineStarts !== undefined) turbine.current_total_starts = args.turbineStarts;
  }

  persistOrRevert(session, () => {
    Object.assign(record, recordBefore);
    if (turbine && turbineBefore) Object.assign(turbine, turbineBefore);
  });
  logInfo('part removed', {
    installationId: record.installation_id,
    part: instance.serial_number,
    removalDate: record.removal_date,
  });
  return { ok: true, record, turbine };
}

// Instances with an open episode on this turbine, in part-instance insertion order.
export function installedParts(document: TrackerDocument, turbineId: number): PartInstance[] {
  const installed = new Set<number>();
  for (const r of document.installation_records) {
    if (r.turbine_id === turbineId && isOpenInstallation(r)) installed.add(r.instance_id);
  }
  return document.part_instances.filter((p) => installed.has(p.instance_id));
}

export function partLifecycle(
  document: TrackerDocument,
  instanceId: number,
): { ok: true; lifecycle: PartLifecycleView } | LifecycleFailure {
  const instance = findBy(document.part_instances, 'instance_id', instanceId);
  if (!instance) {
    return lifecycleFailure(LifecycleErrorCode.InstanceNotFound, `part instance ${instanceId} not found`);
  }
  return {
    ok: true,
    lifecycle: {
      instance,
      partMaster: findBy(document.part_masters, 'part_number', instance.part_number) ?? null,
      installations: filterBy(document.installation_records, 'instance_id', instanceId),
      maintenanceLogs: filterBy(document.maintenance_logs, 'instance_id', instanceId),
    },
  };
}

// Every episode (open and closed) that took place in the turbine, oldest first.
export function turbineHistory(
  document: TrackerDocument,
  turbineId: number,
): { ok: true; turbine: Turbine; history: TurbineHistoryEntry[] } | LifecycleFailure {
  const turbine = findBy(document.turbines, 'turbine_id', turbineId);
  if (!turbine) {
    return lifecycleFailure(LifecycleErrorCode.TurbineNotFound, `turbine #${turbineId} not found`);
  }
  const history = filterBy(document.installation_records, 'turbine_id', turbineId).map((record) => ({
    record,
    instance: findBy(document.part_instances, 'instance_id', record.instance_id) ?? null,
  }));
  return { ok: true, turbine, history };
}
