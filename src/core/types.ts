// Domain model for the workflow harness, decoupled from the wire schemas

export type ContentType = 'image' | 'audio' | 'file';
export type ResourceKind = 'entry' | 'database' | 'user';

export interface Credential {
  readonly identity: string;
  readonly secret: string;
}

export interface PermissionFlags {
  can_view: boolean;
  can_create: boolean;
  can_edit: boolean;
  can_delete: boolean;
  is_admin: boolean;
}

export interface UserAccount extends PermissionFlags {
  id: string; // server-assigned, normalised to string
  username: string;
}

export interface CustomField {
  name: string;
  type: string;
}

export interface DatabaseDescriptor {
  name: string;
  content_type: ContentType;
  custom_fields: CustomField[];
}

export interface Fixture {
  contentType: ContentType;
  path: string;
  filename: string;
  mediaType: string;
  bytes: Buffer;
  metadata: Record<string, string>;
}

export interface LedgerRecord {
  kind: ResourceKind;
  key: string;
  owner: string; // identity of the session that created it
  database?: string; // owning database, entries only
}

export type WorkflowState =
  | 'INIT'
  | 'PRECLEANUP'
  | 'READY_CHECK'
  | 'USER_ADMIN_OPS'
  | 'DB_CREATE'
  | 'ENTRY_UPLOAD'
  | 'ENTRY_VERIFY'
  | 'ROLE_UPDATE'
  | 'PERMISSION_RECHECK'
  | 'USER_DELETE'
  | 'DONE'
  | 'ABORT'
  | 'TEARDOWN'
  | 'EXIT';

export type DeletionOutcome = 'deleted' | 'absent' | 'failed';

export interface DeletionResult {
  kind: ResourceKind | 'fixture';
  key: string;
  outcome: DeletionOutcome;
  detail?: string;
}

export interface TeardownReport {
  results: DeletionResult[];
  failures: number;
}

export interface WellKnownResources {
  databases: string[];
  usernames: string[];
}
