import type { CollectionRow } from '../db/schema';
import type {
  AttachmentRecord,
  CommentRecord,
  CustomFieldDefinitionRecord,
  CustomFieldEnumOptionRecord,
  CustomFieldValueRecord,
  GenerationLogRecord,
  OrganizationRecord,
  ProjectMembershipRecord,
  ProjectRecord,
  SectionRecord,
  TagRecord,
  TaskTagRecord,
  TeamMembershipRecord,
  TeamRecord,
  UserRecord,
  WorkItemRecord,
} from './types';
import { toIsoDate, toIsoTimestamp } from './utils';

const optionalTimestamp = (value: number | null) => (value === null ? null : toIsoTimestamp(value));
const optionalDate = (value: number | null) => (value === null ? null : toIsoDate(value));

export const toOrganizationRow = (record: OrganizationRecord): CollectionRow<'organizations'> => ({
  ...record,
  createdAt: toIsoTimestamp(record.createdAt),
});

export const toTeamRow = (record: TeamRecord): CollectionRow<'teams'> => ({
  id: record.id,
  organizationId: record.organizationId,
  name: record.name,
  description: record.description,
  teamType: record.department,
  createdAt: toIsoTimestamp(record.createdAt),
});

export const toUserRow = (record: UserRecord): CollectionRow<'users'> => ({
  ...record,
  createdAt: toIsoTimestamp(record.createdAt),
  lastActiveAt: toIsoTimestamp(record.lastActiveAt),
});

export const toTeamMembershipRow = (record: TeamMembershipRecord): CollectionRow<'team_memberships'> => ({
  ...record,
  joinedAt: toIsoTimestamp(record.joinedAt),
});

export const toProjectRow = (record: ProjectRecord): CollectionRow<'projects'> => ({
  ...record,
  createdAt: toIsoTimestamp(record.createdAt),
  dueDate: optionalDate(record.dueDate),
  completedAt: optionalTimestamp(record.completedAt),
  archivedAt: optionalTimestamp(record.archivedAt),
});

export const toProjectMembershipRow = (record: ProjectMembershipRecord): CollectionRow<'project_memberships'> => ({
  ...record,
  addedAt: toIsoTimestamp(record.addedAt),
});

export const toSectionRow = (record: SectionRecord): CollectionRow<'sections'> => ({
  ...record,
  createdAt: toIsoTimestamp(record.createdAt),
});

export const toTaskRow = (record: WorkItemRecord): CollectionRow<'tasks'> => ({
  ...record,
  dueDate: optionalDate(record.dueDate),
  createdAt: toIsoTimestamp(record.createdAt),
  modifiedAt: toIsoTimestamp(record.modifiedAt),
  completedAt: optionalTimestamp(record.completedAt),
});

export const toCommentRow = (record: CommentRecord): CollectionRow<'comments'> => ({
  ...record,
  createdAt: toIsoTimestamp(record.createdAt),
});

export const toCustomFieldDefinitionRow = (
  record: CustomFieldDefinitionRecord
): CollectionRow<'custom_field_definitions'> => ({
  ...record,
  createdAt: toIsoTimestamp(record.createdAt),
});

export const toCustomFieldEnumOptionRow = (
  record: CustomFieldEnumOptionRecord
): CollectionRow<'custom_field_enum_options'> => ({ ...record });

export const toCustomFieldValueRow = (record: CustomFieldValueRecord): CollectionRow<'custom_field_values'> => ({
  ...record,
  dateValue: optionalDate(record.dateValue),
  createdAt: toIsoTimestamp(record.createdAt),
  modifiedAt: toIsoTimestamp(record.modifiedAt),
});

export const toTagRow = (record: TagRecord): CollectionRow<'tags'> => ({
  ...record,
  createdAt: toIsoTimestamp(record.createdAt),
});

export const toTaskTagRow = (record: TaskTagRecord): CollectionRow<'task_tags'> => ({
  ...record,
  createdAt: toIsoTimestamp(record.createdAt),
});

export const toAttachmentRow = (record: AttachmentRecord): CollectionRow<'attachments'> => ({
  ...record,
  createdAt: toIsoTimestamp(record.createdAt),
});

export const toGenerationLogRow = (record: GenerationLogRecord): CollectionRow<'generation_logs'> => ({
  ...record,
  createdAt: toIsoTimestamp(record.createdAt),
});
