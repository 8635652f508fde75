import { archetypeForDepartment, templatesFor } from '../providers/archetypes';
import type { ProjectNameProvider } from '../providers/projectNameProvider';
import type { GenerationContext } from './context';
import { pickFromDistribution, weightedPick } from './distributions';
import { membersByTeam } from './teamService';
import type { TextService } from './textService';
import type {
  ProjectMembershipRecord,
  ProjectRecord,
  ProjectStatus,
  ProjectType,
  SectionRecord,
  TeamMembershipRecord,
  TeamRecord,
} from './types';
import { DAY_MS, generateId, randomHexColor } from './utils';

const STATUSES: ProjectStatus[] = ['active', 'on_hold', 'completed', 'archived'];
const STATUS_WEIGHTS = [0.7, 0.1, 0.15, 0.05];
const FALLBACK_PROJECT_TYPES: Partial<Record<ProjectType, number>> = { List: 0.5, Kanban: 0.5 };

const DESCRIPTION_SYSTEM_PROMPT =
  'You write short, plain descriptions for projects in a work management tool. Two sentences, no markdown.';
const DESCRIPTION_MAX_TOKENS = 120;

export type ProjectBundle = {
  projects: ProjectRecord[];
  projectMemberships: ProjectMembershipRecord[];
};

type ProjectDraft = Omit<ProjectRecord, 'description'>;

const descriptionPrompt = (project: ProjectDraft, team: TeamRecord) =>
  `Describe the ${project.projectType} project "${project.name}" run by the ${team.name} team.`;

export const generateProjects = async (
  ctx: GenerationContext,
  teams: TeamRecord[],
  teamMemberships: TeamMembershipRecord[],
  projectNames: ProjectNameProvider,
  text: TextService
): Promise<ProjectBundle> => {
  const { config, rng, horizon, temporal } = ctx;
  const members = membersByTeam(teamMemberships);
  const creationEnd = Math.max(horizon.start, horizon.end - config.projectCreationBufferDays * DAY_MS);

  const drafts: ProjectDraft[] = [];
  const prompts: string[] = [];
  const projectMemberships: ProjectMembershipRecord[] = [];

  for (const team of teams) {
    const numProjects = rng.integer(...config.projectsPerTeam);
    const typeDistribution = config.projectTypesByDepartment[team.department] ?? FALLBACK_PROJECT_TYPES;
    const memberIds = members.get(team.id) ?? [];
    if (memberIds.length === 0) continue;

    for (let index = 0; index < numProjects; index += 1) {
      const projectType = pickFromDistribution(rng, typeDistribution);
      const { name, workflowType } = projectNames.project(archetypeForDepartment(team.department));
      const status = weightedPick(rng, STATUSES, STATUS_WEIGHTS);
      const ownerId = rng.pick(memberIds);
      const color = randomHexColor(rng);
      const createdAt = temporal.createdAt(horizon.start, creationEnd);

      const draft: ProjectDraft = {
        id: generateId(rng),
        organizationId: team.organizationId,
        teamId: team.id,
        name,
        projectType,
        workflowType,
        status,
        ownerId,
        isPublic: true,
        color,
        createdAt,
        dueDate: projectType === 'Sprint' ? temporal.sprintDueDate(createdAt) : null,
        completedAt: status === 'completed' ? temporal.between(createdAt, horizon.end) : null,
        archivedAt: status === 'archived' ? temporal.between(createdAt, horizon.end) : null,
      };
      drafts.push(draft);
      prompts.push(descriptionPrompt(draft, team));

      const memberCount = Math.min(memberIds.length, rng.integer(...config.projectMembersPerProject));
      for (const userId of rng.sample(memberIds, memberCount)) {
        projectMemberships.push({
          id: generateId(rng),
          projectId: draft.id,
          userId,
          canEdit: true,
          addedAt: createdAt,
        });
      }
    }
  }

  const descriptions = await text.completeBatch(prompts, {
    maxTokens: DESCRIPTION_MAX_TOKENS,
    systemPrompt: DESCRIPTION_SYSTEM_PROMPT,
  });
  const projects = drafts.map((draft, index) => ({ ...draft, description: descriptions[index] || null }));
  return { projects, projectMemberships };
};

export const generateSections = (ctx: GenerationContext, projects: ProjectRecord[]): SectionRecord[] =>
  projects.flatMap((project) =>
    templatesFor(project.workflowType).sections.map((name, position) => ({
      id: generateId(ctx.rng),
      projectId: project.id,
      name,
      position,
      createdAt: project.createdAt,
    }))
  );
