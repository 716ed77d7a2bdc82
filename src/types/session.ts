import type { DiskSpec, StoragePool } from './host';

export const STAGES = [
  'Init',
  'StorageAllocated',
  'FilesystemReady',
  'ContainerCreated',
  'Mounted',
  'TimezoneSynced',
  'Started',
  'SetupPushed',
  'SetupExecuted',
  'Complete',
] as const;

export type Stage = (typeof STAGES)[number];

export type TemplateReference = {
  osFamily: string;
  osVersion: string;
  fullName: string;
  /** Volume the container is created from, e.g. `local:vztmpl/<fullName>`. */
  volumeId: string;
};

/**
 * What the rollback controller gets to see of a session.
 */
export type SessionState = {
  id: number;
  storage: StoragePool;
  disk?: DiskSpec;
  stage: Stage;
  mounted: boolean;
};

export type ProvisioningResult = {
  id: number;
  ip: string;
  hostname: string;
  endpoints: [string, string];
  description: string;
  storage: string;
  template: string;
};
