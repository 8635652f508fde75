import type { CollectionName } from '../db/schema';
import type { DataStore } from '../db/sqlite';
import type { CompanyProvider } from '../providers/companyProvider';
import type { NameProvider } from '../providers/nameProvider';
import type { ProjectNameProvider } from '../providers/projectNameProvider';
import { backfillCounts } from './backfillService';
import { generateComments } from './commentService';
import type { GenerationContext } from './context';
import {
  generateAttachments,
  generateCustomFields,
  generateCustomFieldValues,
  generateTags,
  generateTaskTags,
} from './enrichmentService';
import type { Logger } from './logService';
import { recordLog } from './logService';
import { generateOrganization } from './organizationService';
import { generateProjects, generateSections } from './projectService';
import {
  toAttachmentRow,
  toCommentRow,
  toCustomFieldDefinitionRow,
  toCustomFieldEnumOptionRow,
  toCustomFieldValueRow,
  toOrganizationRow,
  toProjectMembershipRow,
  toProjectRow,
  toSectionRow,
  toTagRow,
  toTaskRow,
  toTaskTagRow,
  toTeamMembershipRow,
  toTeamRow,
  toUserRow,
} from './serializers';
import { generateSubtasks, generateTasks } from './taskService';
import { generateTeamMemberships, generateTeams } from './teamService';
import { generateUsers } from './userService';
import type { TextService, TextServiceStats } from './textService';
import type {
  AttachmentRecord,
  CommentRecord,
  CustomFieldDefinitionRecord,
  CustomFieldEnumOptionRecord,
  CustomFieldValueRecord,
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
import { toIsoTimestamp } from './utils';

export type GenerationDependencies = {
  store: DataStore;
  companies: CompanyProvider;
  names: NameProvider;
  projectNames: ProjectNameProvider;
  text: TextService;
  logger: Logger;
};

/** Every collection a run produced; `workItems` holds tasks then subtasks with backfilled counts. */
export type GenerationState = {
  organization: OrganizationRecord;
  customFields: CustomFieldDefinitionRecord[];
  customFieldOptions: CustomFieldEnumOptionRecord[];
  tags: TagRecord[];
  teams: TeamRecord[];
  users: UserRecord[];
  teamMemberships: TeamMembershipRecord[];
  projects: ProjectRecord[];
  projectMemberships: ProjectMembershipRecord[];
  sections: SectionRecord[];
  workItems: WorkItemRecord[];
  comments: CommentRecord[];
  customFieldValues: CustomFieldValueRecord[];
  taskTags: TaskTagRecord[];
  attachments: AttachmentRecord[];
};

export const ENTITY_COLLECTIONS = [
  'organizations',
  'teams',
  'users',
  'team_memberships',
  'projects',
  'project_memberships',
  'sections',
  'tasks',
  'comments',
  'custom_field_definitions',
  'custom_field_enum_options',
  'custom_field_values',
  'tags',
  'task_tags',
  'attachments',
] as const satisfies readonly CollectionName[];

export type GenerationSummary = {
  /** Rows in the store per entity collection, read back after the last stage. */
  counts: Record<string, number>;
  llm: TextServiceStats;
  seed: number | null;
  horizon: { start: string; end: string };
  durationMs: number;
};

const STAGE_COUNT = 15;

const countCollections = async (store: DataStore) => {
  const counts: Record<string, number> = {};
  for (const collection of ENTITY_COLLECTIONS) {
    counts[collection] = await store.count(collection);
  }
  return counts;
};

export const runGeneration = async (
  ctx: GenerationContext,
  deps: GenerationDependencies
): Promise<{ state: GenerationState; summary: GenerationSummary }> => {
  const { store, logger } = deps;
  const startedAt = Date.now();
  let step = 0;

  const completeStage = async (stage: string, count: number, persisted = true) => {
    step += 1;
    logger.info(`[${step}/${STAGE_COUNT}] ${stage}: ${count}`);
    await recordLog(store, 'stage_complete', { stage, count, persisted });
  };

  logger.info(
    `Simulating ${ctx.config.numEmployees} employees from ${toIsoTimestamp(ctx.horizon.start)} to ${toIsoTimestamp(ctx.horizon.end)}`
  );

  const organization = await generateOrganization(ctx, deps.companies);
  await store.bulkInsert('organizations', [toOrganizationRow(organization)]);
  await completeStage('organization', 1);

  const fields = generateCustomFields(ctx, organization);
  await store.bulkInsert('custom_field_definitions', fields.definitions.map(toCustomFieldDefinitionRow));
  await store.bulkInsert('custom_field_enum_options', fields.options.map(toCustomFieldEnumOptionRow));
  await completeStage('custom fields', fields.definitions.length);

  const tags = generateTags(ctx, organization);
  await store.bulkInsert('tags', tags.map(toTagRow));
  await completeStage('tags', tags.length);

  const teams = generateTeams(ctx, organization.id);
  await store.bulkInsert('teams', teams.map(toTeamRow));
  await completeStage('teams', teams.length);

  const users = generateUsers(ctx, organization, deps.names);
  await store.bulkInsert('users', users.map(toUserRow));
  await completeStage('users', users.length);

  const teamMemberships = generateTeamMemberships(ctx, teams, users);
  await store.bulkInsert('team_memberships', teamMemberships.map(toTeamMembershipRow));
  await completeStage('team memberships', teamMemberships.length);

  const { projects, projectMemberships } = await generateProjects(
    ctx,
    teams,
    teamMemberships,
    deps.projectNames,
    deps.text
  );
  await store.bulkInsert('projects', projects.map(toProjectRow));
  await store.bulkInsert('project_memberships', projectMemberships.map(toProjectMembershipRow));
  await completeStage('projects', projects.length);

  const sections = generateSections(ctx, projects);
  await store.bulkInsert('sections', sections.map(toSectionRow));
  await completeStage('sections', sections.length);

  // Work items and comments are written once their counts are final.
  const tasks = generateTasks(ctx, projects, sections, teamMemberships);
  await completeStage('tasks', tasks.length, false);

  const subtasks = generateSubtasks(ctx, tasks);
  await completeStage('subtasks', subtasks.length, false);

  const comments = generateComments(ctx, [...tasks, ...subtasks]);
  await completeStage('comments', comments.length, false);

  const workItems = backfillCounts(tasks, subtasks, comments);
  await store.bulkInsert('tasks', workItems.map(toTaskRow));
  await store.bulkInsert('comments', comments.map(toCommentRow));
  await completeStage('backfill', workItems.length);

  const customFieldValues = generateCustomFieldValues(ctx, workItems, fields);
  await store.bulkInsert('custom_field_values', customFieldValues.map(toCustomFieldValueRow));
  await completeStage('custom field values', customFieldValues.length);

  const taskTags = generateTaskTags(ctx, workItems, tags);
  await store.bulkInsert('task_tags', taskTags.map(toTaskTagRow));
  await completeStage('task tags', taskTags.length);

  const attachments = generateAttachments(ctx, workItems);
  await store.bulkInsert('attachments', attachments.map(toAttachmentRow));
  await completeStage('attachments', attachments.length);

  const counts = await countCollections(store);
  const summary: GenerationSummary = {
    counts,
    llm: deps.text.getStats(),
    seed: ctx.config.seed ?? null,
    horizon: { start: toIsoTimestamp(ctx.horizon.start), end: toIsoTimestamp(ctx.horizon.end) },
    durationMs: Date.now() - startedAt,
  };
  await recordLog(store, 'run_complete', summary);

  return {
    state: {
      organization,
      customFields: fields.definitions,
      customFieldOptions: fields.options,
      tags,
      teams,
      users,
      teamMemberships,
      projects,
      projectMemberships,
      sections,
      workItems,
      comments,
      customFieldValues,
      taskTags,
      attachments,
    },
    summary,
  };
};
