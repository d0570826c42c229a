export type ResourceStatus = 'running' | 'stopped' | 'unknown';

export interface ResourceSummary {
  id: string;
  name: string | null;
  status: ResourceStatus;
}
