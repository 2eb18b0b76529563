export type ResourceKind =
  | 'engine'
  | 'network'
  | 'container'
  | 'topic'
  | 'database'
  | 'table'
  | 'view'
  | 'device'
  | 'credentials'
  | 'rule-node'
  | 'rule-connection'
  | 'folder'
  | 'datasource'
  | 'dashboard'
  | 'alert-rule';

export type ResourceStatus = 'created' | 'already-present' | 'updated' | 'failed';

export interface ResourceRef {
  kind: ResourceKind;
  name: string;
}

export interface ResourceOutcome extends ResourceRef {
  status: ResourceStatus;
  detail?: string;
}
