import { integer, real, sqliteTable, text } from 'drizzle-orm/sqlite-core';

export const organizations = sqliteTable('organizations', {
  id: text('id').primaryKey(),
  name: text('name').notNull(),
  domain: text('domain').notNull(),
  isOrganization: integer('is_organization', { mode: 'boolean' }).notNull(),
  createdAt: text('created_at').notNull(),
});

export const teams = sqliteTable('teams', {
  id: text('id').primaryKey(),
  organizationId: text('organization_id').notNull(),
  name: text('name').notNull(),
  description: text('description'),
  teamType: text('team_type').notNull(),
  createdAt: text('created_at').notNull(),
});

export const users = sqliteTable('users', {
  id: text('id').primaryKey(),
  organizationId: text('organization_id').notNull(),
  email: text('email').notNull(),
  firstName: text('first_name').notNull(),
  lastName: text('last_name').notNull(),
  role: text('role').notNull(),
  jobTitle: text('job_title'),
  department: text('department'),
  isActive: integer('is_active', { mode: 'boolean' }).notNull(),
  createdAt: text('created_at').notNull(),
  lastActiveAt: text('last_active_at'),
});

export const teamMemberships = sqliteTable('team_memberships', {
  id: text('id').primaryKey(),
  teamId: text('team_id').notNull(),
  userId: text('user_id').notNull(),
  isTeamLead: integer('is_team_lead', { mode: 'boolean' }).notNull(),
  joinedAt: text('joined_at').notNull(),
});

export const projects = sqliteTable('projects', {
  id: text('id').primaryKey(),
  organizationId: text('organization_id').notNull(),
  teamId: text('team_id'),
  name: text('name').notNull(),
  description: text('description'),
  projectType: text('project_type').notNull(),
  workflowType: text('workflow_type').notNull(),
  status: text('status').notNull(),
  ownerId: text('owner_id'),
  isPublic: integer('is_public', { mode: 'boolean' }).notNull(),
  color: text('color'),
  createdAt: text('created_at').notNull(),
  dueDate: text('due_date'),
  completedAt: text('completed_at'),
  archivedAt: text('archived_at'),
});

export const projectMemberships = sqliteTable('project_memberships', {
  id: text('id').primaryKey(),
  projectId: text('project_id').notNull(),
  userId: text('user_id').notNull(),
  canEdit: integer('can_edit', { mode: 'boolean' }).notNull(),
  addedAt: text('added_at').notNull(),
});

export const sections = sqliteTable('sections', {
  id: text('id').primaryKey(),
  projectId: text('project_id').notNull(),
  name: text('name').notNull(),
  position: integer('position').notNull(),
  createdAt: text('created_at').notNull(),
});

export const tasks = sqliteTable('tasks', {
  id: text('id').primaryKey(),
  projectId: text('project_id'),
  sectionId: text('section_id'),
  parentTaskId: text('parent_task_id'),
  name: text('name').notNull(),
  description: text('description'),
  assigneeId: text('assignee_id'),
  createdBy: text('created_by').notNull(),
  status: text('status').notNull(),
  dueDate: text('due_date'),
  createdAt: text('created_at').notNull(),
  modifiedAt: text('modified_at').notNull(),
  completedAt: text('completed_at'),
  completedBy: text('completed_by'),
  numLikes: integer('num_likes').notNull(),
  numSubtasks: integer('num_subtasks').notNull(),
  numComments: integer('num_comments').notNull(),
});

export const comments = sqliteTable('comments', {
  id: text('id').primaryKey(),
  taskId: text('task_id').notNull(),
  userId: text('user_id').notNull(),
  commentType: text('comment_type').notNull(),
  text: text('text').notNull(),
  createdAt: text('created_at').notNull(),
  isPinned: integer('is_pinned', { mode: 'boolean' }).notNull(),
  numLikes: integer('num_likes').notNull(),
});

export const customFieldDefinitions = sqliteTable('custom_field_definitions', {
  id: text('id').primaryKey(),
  organizationId: text('organization_id').notNull(),
  name: text('name').notNull(),
  description: text('description'),
  fieldType: text('field_type').notNull(),
  isGlobal: integer('is_global', { mode: 'boolean' }).notNull(),
  createdAt: text('created_at').notNull(),
});

export const customFieldEnumOptions = sqliteTable('custom_field_enum_options', {
  id: text('id').primaryKey(),
  fieldId: text('field_id').notNull(),
  name: text('name').notNull(),
  color: text('color'),
  position: integer('position').notNull(),
  enabled: integer('enabled', { mode: 'boolean' }).notNull(),
});

export const customFieldValues = sqliteTable('custom_field_values', {
  id: text('id').primaryKey(),
  taskId: text('task_id').notNull(),
  fieldId: text('field_id').notNull(),
  textValue: text('text_value'),
  numberValue: real('number_value'),
  dateValue: text('date_value'),
  enumOptionId: text('enum_option_id'),
  createdAt: text('created_at').notNull(),
  modifiedAt: text('modified_at').notNull(),
});

export const tags = sqliteTable('tags', {
  id: text('id').primaryKey(),
  organizationId: text('organization_id').notNull(),
  name: text('name').notNull(),
  color: text('color'),
  createdAt: text('created_at').notNull(),
});

export const taskTags = sqliteTable('task_tags', {
  id: text('id').primaryKey(),
  taskId: text('task_id').notNull(),
  tagId: text('tag_id').notNull(),
  createdAt: text('created_at').notNull(),
});

export const attachments = sqliteTable('attachments', {
  id: text('id').primaryKey(),
  taskId: text('task_id').notNull(),
  uploadedBy: text('uploaded_by').notNull(),
  filename: text('filename').notNull(),
  fileType: text('file_type'),
  fileSize: integer('file_size'),
  storageUrl: text('storage_url'),
  createdAt: text('created_at').notNull(),
});

export const generationLogs = sqliteTable('generation_logs', {
  id: text('id').primaryKey(),
  kind: text('kind').notNull(),
  payload: text('payload', { mode: 'json' }).notNull().$type<Record<string, unknown>>(),
  createdAt: text('created_at').notNull(),
});

export const collections = {
  organizations,
  teams,
  users,
  team_memberships: teamMemberships,
  projects,
  project_memberships: projectMemberships,
  sections,
  tasks,
  comments,
  custom_field_definitions: customFieldDefinitions,
  custom_field_enum_options: customFieldEnumOptions,
  custom_field_values: customFieldValues,
  tags,
  task_tags: taskTags,
  attachments,
  generation_logs: generationLogs,
};

export type Collections = typeof collections;
export type CollectionName = keyof Collections;
export type CollectionRow<K extends CollectionName> = Collections[K]['$inferInsert'];
