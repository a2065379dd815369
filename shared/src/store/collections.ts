// Top-level keys of the persisted document. Store and backend must agree on them.

export const CollectionName = {
  Turbines: 'turbines',
  PartMasters: 'part_masters',
  PartInstances: 'part_instances',
  InstallationRecords: 'installation_records',
  MaintenanceLogs: 'maintenance_logs',
} as const;

export type CollectionName = (typeof CollectionName)[keyof typeof CollectionName];

export const COLLECTION_NAMES: readonly CollectionName[] = Object.values(CollectionName);
