import { describe, it, expect, vi } from 'vitest';
import { parseGenerationConfig } from '../config';
import type { GenerationConfigInput } from '../config';
import { ProjectNameProvider } from '../providers/projectNameProvider';
import { createGenerationContext } from './context';
import { createLogger } from './logService';
import { generateProjects, generateSections } from './projectService';
import { DISABLED_PLACEHOLDER, TextService } from './textService';
import type { TeamMembershipRecord, TeamRecord } from './types';
import { DAY_MS } from './utils';

const teams: TeamRecord[] = [
  {
    id: 'eng',
    organizationId: 'org-1',
    name: 'Engineering - Platform',
    description: null,
    department: 'Engineering',
    createdAt: Date.UTC(2025, 0, 1),
  },
  {
    id: 'design',
    organizationId: 'org-1',
    name: 'Design',
    description: null,
    department: 'Design',
    createdAt: Date.UTC(2025, 0, 1),
  },
];

const memberIds = ['u1', 'u2', 'u3', 'u4'];
const memberships: TeamMembershipRecord[] = memberIds.map((userId, index) => ({
  id: `m${index}`,
  teamId: 'eng',
  userId,
  isTeamLead: index === 0,
  joinedAt: Date.UTC(2025, 0, 1),
}));

const llmOff = { model: 'test-model', temperature: 0.7, maxTokens: 100, batchDelayMs: 0 };

const build = async (overrides: GenerationConfigInput = {}, text = new TextService(llmOff, createLogger('test', 'error'))) => {
  const ctx = createGenerationContext(parseGenerationConfig({ seed: 13, ...overrides }));
  const bundle = await generateProjects(ctx, teams, memberships, new ProjectNameProvider(ctx.rng), text);
  return { ctx, ...bundle };
};

describe('generateProjects', () => {
  it('only builds projects for staffed teams', async () => {
    const { projects } = await build();
    expect(projects.length).toBeGreaterThanOrEqual(3);
    expect(projects.length).toBeLessThanOrEqual(5);
    expect(projects.every((project) => project.teamId === 'eng' && project.workflowType === 'Engineering')).toBe(true);
    expect(projects.every((project) => memberIds.includes(project.ownerId))).toBe(true);
  });

  it('creates projects at least the buffer before the horizon end', async () => {
    const { ctx, projects } = await build({ projectsPerTeam: [40, 40] });
    for (const project of projects) {
      expect(project.createdAt).toBeGreaterThanOrEqual(ctx.horizon.start);
      expect(project.createdAt).toBeLessThanOrEqual(ctx.horizon.end - 30 * DAY_MS);
    }
  });

  it('sets lifecycle dates from type and status', async () => {
    const { ctx, projects } = await build({ projectsPerTeam: [60, 60] });
    for (const project of projects) {
      expect(project.dueDate !== null).toBe(project.projectType === 'Sprint');
      expect(project.completedAt !== null).toBe(project.status === 'completed');
      expect(project.archivedAt !== null).toBe(project.status === 'archived');
      if (project.completedAt !== null) {
        expect(project.completedAt).toBeGreaterThanOrEqual(project.createdAt);
        expect(project.completedAt).toBeLessThanOrEqual(ctx.horizon.end);
      }
    }
  });

  it('follows the department project type distribution', async () => {
    const { projects } = await build({ projectsPerTeam: [10, 10], projectTypesByDepartment: { Engineering: { Kanban: 1 } } });
    expect(projects.every((project) => project.projectType === 'Kanban')).toBe(true);
  });

  it('samples distinct project members from the team', async () => {
    const { projects, projectMemberships } = await build();
    for (const project of projects) {
      const members = projectMemberships.filter((membership) => membership.projectId === project.id);
      expect(members.length).toBeGreaterThanOrEqual(3);
      expect(members.length).toBeLessThanOrEqual(4);
      expect(new Set(members.map((membership) => membership.userId)).size).toBe(members.length);
      expect(members.every((membership) => memberIds.includes(membership.userId))).toBe(true);
      expect(members.every((membership) => membership.addedAt === project.createdAt)).toBe(true);
    }
  });

  it('uses the placeholder text while completion is disabled', async () => {
    const { projects } = await build();
    expect(projects.every((project) => project.description === DISABLED_PLACEHOLDER)).toBe(true);
  });

  it('asks for one description per project and maps empty replies to null', async () => {
    const text = new TextService(llmOff, createLogger('test', 'error'));
    const completeBatch = vi
      .spyOn(text, 'completeBatch')
      .mockImplementation(async (prompts) => prompts.map((_, index) => (index === 0 ? '' : `Description ${index}`)));

    const { projects } = await build({}, text);

    expect(completeBatch).toHaveBeenCalledTimes(1);
    const [prompts] = completeBatch.mock.calls[0];
    expect(prompts).toHaveLength(projects.length);
    expect(prompts[0]).toBe(
      `Describe the ${projects[0].projectType} project "${projects[0].name}" run by the Engineering - Platform team.`
    );
    expect(projects[0].description).toBeNull();
    expect(projects[1].description).toBe('Description 1');
  });

  it('reproduces the same projects from the same seed', async () => {
    const first = await build();
    const second = await build();
    expect(second.projects).toEqual(first.projects);
    expect(second.projectMemberships).toEqual(first.projectMemberships);
  });
});

describe('generateSections', () => {
  it('lays out the archetype sections in order', async () => {
    const { ctx, projects } = await build();
    const sections = generateSections(ctx, projects);
    expect(sections).toHaveLength(projects.length * 5);
    const first = sections.filter((section) => section.projectId === projects[0].id);
    expect(first.map((section) => [section.name, section.position])).toEqual([
      ['Backlog', 0],
      ['To Do', 1],
      ['In Progress', 2],
      ['In Review', 3],
      ['Done', 4],
    ]);
    expect(first.every((section) => section.createdAt === projects[0].createdAt)).toBe(true);
  });
});
