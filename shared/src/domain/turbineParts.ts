// Records of the turbine/part lifecycle document (used by the store and the backend).
// Field names match the persisted JSON, hence snake_case.

export type Turbine = {
  turbine_id: number;
  serial_number: string;
  frame_type: string;
  location: string;
  current_total_hours: number;
  current_total_starts: number;
};

// Catalog entry for a part type, keyed by part_number.
export type PartMaster = {
  part_number: string;
  description: string;
  manufacturer: string;
};

// One physical, serialized unit of a part type.
export type PartInstance = {
  instance_id: number;
  part_number: string;
  serial_number: string;
  manufacture_date: string | null;
};

// One continuous interval of a part instance inside a turbine.
// removal_date === null means the episode is still open.
export type InstallationRecord = {
  installation_id: number;
  instance_id: number;
  turbine_id: number;
  installation_date: string;
  removal_date: string | null;
  turbine_hours_at_install: number | null;
  turbine_starts_at_install: number | null;
  turbine_hours_at_removal: number | null;
  turbine_starts_at_removal: number | null;
};

export type MaintenanceLog = {
  log_id: number;
  instance_id: number;
  description: string;
  log_date: string;
};

export type TrackerDocument = {
  turbines: Turbine[];
  part_masters: PartMaster[];
  part_instances: PartInstance[];
  installation_records: InstallationRecord[];
  maintenance_logs: MaintenanceLog[];
};

export function emptyTrackerDocument(): TrackerDocument {
  return {
    turbines: [],
    part_masters: [],
    part_instances: [],
    installation_records: [],
    maintenance_logs: [],
  };
}

export function isOpenInstallation(record: Pick<InstallationRecord, 'removal_date'>): boolean {
  return record.removal_date == null;
}

export type PartLifecycleView = {
  instance: PartInstance;
  partMaster: PartMaster | null;
  installations: InstallationRecord[];
  maintenanceLogs: MaintenanceLog[];
};

export type TurbineHistoryEntry = {
  record: InstallationRecord;
  instance: PartInstance | null;
};
