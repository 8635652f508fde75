export const DEPARTMENTS = [
  'Engineering',
  'Product',
  'Design',
  'Marketing',
  'Sales',
  'Operations',
  'HR',
  'Finance',
] as const;
export type Department = (typeof DEPARTMENTS)[number];

export const WORKFLOW_ARCHETYPES = ['Engineering', 'Marketing', 'Product', 'Design', 'Operations'] as const;
export type WorkflowArchetype = (typeof WORKFLOW_ARCHETYPES)[number];

export const PROJECT_TYPES = ['Sprint', 'Kanban', 'Timeline', 'List', 'Calendar'] as const;
export type ProjectType = (typeof PROJECT_TYPES)[number];

export const DUE_DATE_BUCKETS = ['within_1_week', 'within_1_month', 'within_3_months', 'no_due_date', 'overdue'] as const;
export type DueDateBucket = (typeof DUE_DATE_BUCKETS)[number];

export type UserRole = 'admin' | 'member' | 'limited_access' | 'guest';
export type ProjectStatus = 'active' | 'on_hold' | 'completed' | 'archived';
export type WorkItemStatus = 'incomplete' | 'complete';
export type CustomFieldType = 'text' | 'number' | 'enum' | 'multi_enum' | 'date' | 'people';

/** Inclusive bounds of a simulated history; `end` doubles as "now". Epoch milliseconds. */
export type Horizon = {
  start: number;
  end: number;
};

export type OrganizationRecord = {
  id: string;
  name: string;
  domain: string;
  isOrganization: boolean;
  createdAt: number;
};

export type TeamRecord = {
  id: string;
  organizationId: string;
  name: string;
  description: string | null;
  department: Department;
  createdAt: number;
};

export type UserRecord = {
  id: string;
  organizationId: string;
  email: string;
  firstName: string;
  lastName: string;
  role: UserRole;
  jobTitle: string;
  department: Department;
  isActive: boolean;
  createdAt: number;
  lastActiveAt: number;
};

export type TeamMembershipRecord = {
  id: string;
  teamId: string;
  userId: string;
  isTeamLead: boolean;
  joinedAt: number;
};

export type ProjectRecord = {
  id: string;
  organizationId: string;
  teamId: string;
  name: string;
  description: string | null;
  projectType: ProjectType;
  workflowType: WorkflowArchetype;
  status: ProjectStatus;
  ownerId: string;
  isPublic: boolean;
  color: string;
  createdAt: number;
  dueDate: number | null;
  completedAt: number | null;
  archivedAt: number | null;
};

export type ProjectMembershipRecord = {
  id: string;
  projectId: string;
  userId: string;
  canEdit: boolean;
  addedAt: number;
};

export type SectionRecord = {
  id: string;
  projectId: string;
  name: string;
  position: number;
  createdAt: number;
};

/** A task or a subtask; subtasks carry `parentTaskId` and never have children of their own. */
export type WorkItemRecord = {
  id: string;
  projectId: string;
  sectionId: string;
  parentTaskId: string | null;
  name: string;
  description: string | null;
  assigneeId: string | null;
  createdBy: string;
  status: WorkItemStatus;
  dueDate: number | null;
  createdAt: number;
  modifiedAt: number;
  completedAt: number | null;
  completedBy: string | null;
  numLikes: number;
  numSubtasks: number;
  numComments: number;
};

export type CommentRecord = {
  id: string;
  taskId: string;
  userId: string;
  commentType: 'comment';
  text: string;
  createdAt: number;
  isPinned: boolean;
  numLikes: number;
};

export type CustomFieldDefinitionRecord = {
  id: string;
  organizationId: string;
  name: string;
  description: string | null;
  fieldType: CustomFieldType;
  isGlobal: boolean;
  createdAt: number;
};

export type CustomFieldEnumOptionRecord = {
  id: string;
  fieldId: string;
  name: string;
  color: string;
  position: number;
  enabled: boolean;
};

export type CustomFieldValueRecord = {
  id: string;
  taskId: string;
  fieldId: string;
  textValue: string | null;
  numberValue: number | null;
  dateValue: number | null;
  enumOptionId: string | null;
  createdAt: number;
  modifiedAt: number;
};

export type TagRecord = {
  id: string;
  organizationId: string;
  name: string;
  color: string;
  createdAt: number;
};

export type TaskTagRecord = {
  id: string;
  taskId: string;
  tagId: string;
  createdAt: number;
};

export type AttachmentRecord = {
  id: string;
  taskId: string;
  uploadedBy: string;
  filename: string;
  fileType: string;
  fileSize: number;
  storageUrl: string;
  createdAt: number;
};

export type GenerationLogKind = 'stage_complete' | 'llm_request' | 'llm_error' | 'run_complete';

export type GenerationLogRecord = {
  id: string;
  kind: GenerationLogKind;
  payload: Record<string, unknown>;
  createdAt: number;
};
