import { describe, it, expect } from 'vitest';
import { parseGenerationConfig } from '../config';
import type { GenerationConfigInput } from '../config';
import { createGenerationContext } from './context';
import { generateSections } from './projectService';
import { createRng } from './random';
import { generateSubtasks, generateTasks, taskDescription } from './taskService';
import type { ProjectRecord, TeamMembershipRecord, WorkItemRecord } from './types';
import { DAY_MS } from './utils';

const memberIds = Array.from({ length: 10 }, (_, index) => `u${index}`);
const memberships: TeamMembershipRecord[] = memberIds.map((userId, index) => ({
  id: `m${index}`,
  teamId: 'eng',
  userId,
  isTeamLead: index === 0,
  joinedAt: Date.UTC(2025, 0, 1),
}));

const buildContext = (overrides: GenerationConfigInput = {}) =>
  createGenerationContext(parseGenerationConfig({ seed: 17, ...overrides }));

const projectFor = (start: number, overrides: Partial<ProjectRecord> = {}): ProjectRecord => ({
  id: 'p1',
  organizationId: 'org-1',
  teamId: 'eng',
  name: 'API Improvements',
  description: null,
  projectType: 'List',
  workflowType: 'Engineering',
  status: 'active',
  ownerId: 'u0',
  isPublic: true,
  color: '#123456',
  createdAt: start + 10 * DAY_MS,
  dueDate: null,
  completedAt: null,
  archivedAt: null,
  ...overrides,
});

const build = (overrides: GenerationConfigInput = {}) => {
  const ctx = buildContext(overrides);
  const project = projectFor(ctx.horizon.start);
  const sections = generateSections(ctx, [project]);
  const tasks = generateTasks(ctx, [project], sections, memberships);
  return { ctx, project, sections, tasks };
};

describe('generateTasks', () => {
  it('draws the per-project count from the configured range', () => {
    expect(build({ tasksPerProject: [20, 20] }).tasks).toHaveLength(20);
    const { tasks } = build();
    expect(tasks.length).toBeGreaterThanOrEqual(15);
    expect(tasks.length).toBeLessThanOrEqual(40);
  });

  it('keeps every work item consistent', () => {
    const { ctx, project, sections, tasks } = build({ tasksPerProject: [300, 300] });
    const sectionIds = new Set(sections.map((section) => section.id));
    for (const task of tasks) {
      expect(task.parentTaskId).toBeNull();
      expect(sectionIds.has(task.sectionId)).toBe(true);
      expect(memberIds).toContain(task.createdBy);
      if (task.assigneeId !== null) expect(memberIds).toContain(task.assigneeId);
      expect(task.createdAt).toBeGreaterThanOrEqual(project.createdAt);
      expect(task.createdAt).toBeLessThanOrEqual(ctx.horizon.end);
      expect(task.modifiedAt).toBeGreaterThanOrEqual(task.createdAt);
      if (task.dueDate !== null) expect(task.dueDate).toBeLessThanOrEqual(ctx.horizon.end);
      expect(task.status === 'complete').toBe(task.completedAt !== null);
      if (task.completedAt !== null) {
        expect(task.completedAt).toBeGreaterThanOrEqual(task.createdAt);
        expect(task.completedAt).toBeLessThanOrEqual(ctx.horizon.end);
        expect(task.completedBy).toBe(task.assigneeId ?? task.createdBy);
        expect(task.modifiedAt).toBe(task.completedAt);
      } else {
        expect(task.completedBy).toBeNull();
      }
      expect(task.numLikes).toBeGreaterThanOrEqual(0);
      expect(task.numLikes).toBeLessThanOrEqual(5);
    }
  });

  it('completes roughly the configured share', () => {
    const { tasks } = build({ tasksPerProject: [2000, 2000], completionRates: { List: [0.4, 0.4] } });
    const share = tasks.filter((task) => task.status === 'complete').length / tasks.length;
    expect(share).toBeGreaterThan(0.35);
    expect(share).toBeLessThan(0.45);
  });

  it('honours the unassigned rate at its extremes', () => {
    expect(build({ unassignedTaskRate: 1 }).tasks.every((task) => task.assigneeId === null)).toBe(true);
    expect(build({ unassignedTaskRate: 0 }).tasks.every((task) => task.assigneeId !== null)).toBe(true);
  });

  it('favours earlier sections', () => {
    const { sections, tasks } = build({ tasksPerProject: [500, 500] });
    const inFirst = tasks.filter((task) => task.sectionId === sections[0].id).length;
    const inLast = tasks.filter((task) => task.sectionId === sections[sections.length - 1].id).length;
    expect(inFirst).toBeGreaterThan(inLast * 2);
  });

  it('concentrates work on a few people under the pareto strategy', () => {
    const { tasks } = build({ tasksPerProject: [400, 400], unassignedTaskRate: 0, assignmentStrategy: 'pareto' });
    const perUser = new Map<string, number>();
    for (const task of tasks) {
      if (task.assigneeId !== null) perUser.set(task.assigneeId, (perUser.get(task.assigneeId) ?? 0) + 1);
    }
    const [first = 0, second = 0] = [...perUser.values()].sort((a, b) => b - a);
    expect((first + second) / tasks.length).toBeGreaterThan(0.7);
    expect((first + second) / tasks.length).toBeLessThan(0.9);
  });

  it('gives all assigned work to the top group when it holds the whole ratio', () => {
    const { tasks } = build({
      tasksPerProject: [200, 200],
      unassignedTaskRate: 0,
      assignmentStrategy: 'pareto',
      workloadParetoRatio: 1,
    });
    expect(tasks).toHaveLength(200);
    expect(new Set(tasks.map((task) => task.assigneeId)).size).toBe(2);
  });

  it('spreads work over everyone when the top group is the whole team', () => {
    const { tasks } = build({
      tasksPerProject: [400, 400],
      unassignedTaskRate: 0,
      assignmentStrategy: 'pareto',
      workloadParetoFraction: 1,
      workloadParetoRatio: 1,
    });
    expect(new Set(tasks.map((task) => task.assigneeId)).size).toBe(10);
  });

  it('skips projects without members or sections', () => {
    const ctx = buildContext();
    const project = projectFor(ctx.horizon.start);
    const sections = generateSections(ctx, [project]);
    expect(generateTasks(ctx, [project], sections, [])).toEqual([]);
    expect(generateTasks(ctx, [project], [], memberships)).toEqual([]);
  });
});

describe('taskDescription', () => {
  it('mixes empty, short and detailed descriptions', () => {
    const rng = createRng(4);
    const descriptions = Array.from({ length: 3000 }, () => taskDescription(rng, 'Fix Memory Leak'));
    const empty = descriptions.filter((description) => description === null).length / descriptions.length;
    const short = descriptions.filter((description) => description === 'Work on: fix memory leak').length / 3000;
    expect(empty).toBeGreaterThan(0.16);
    expect(empty).toBeLessThan(0.24);
    expect(short).toBeGreaterThan(0.45);
    expect(short).toBeLessThan(0.55);
    expect(descriptions).toContain(
      'Task details:\n- Fix Memory Leak\n- Please review and implement\n- Coordinate with team'
    );
  });
});

describe('generateSubtasks', () => {
  it('adds the configured number under each chosen task', () => {
    const { ctx, tasks } = build();
    const subtasks = generateSubtasks(
      { ...ctx, config: { ...ctx.config, subtaskRate: 1, subtasksPerTask: [2, 2] } },
      tasks
    );
    expect(subtasks).toHaveLength(tasks.length * 2);
    for (const parent of tasks) {
      const children = subtasks.filter((subtask) => subtask.parentTaskId === parent.id);
      expect(children.map((child) => child.name.split(':')[0])).toEqual(['Subtask 1', 'Subtask 2']);
      for (const child of children) {
        expect(child.projectId).toBe(parent.projectId);
        expect(child.sectionId).toBe(parent.sectionId);
        expect(child.assigneeId).toBe(parent.assigneeId);
        expect(child.createdBy).toBe(parent.createdBy);
        expect(child.dueDate).toBeNull();
        expect(child.createdAt).toBeGreaterThanOrEqual(parent.createdAt);
        expect(child.createdAt).toBeLessThanOrEqual(parent.modifiedAt);
        expect(child.modifiedAt).toBeGreaterThanOrEqual(child.createdAt);
        if (parent.status === 'incomplete') expect(child.status).toBe('incomplete');
        if (child.completedAt !== null) {
          expect(child.completedAt).toBeGreaterThanOrEqual(child.createdAt);
          expect(child.completedAt).toBeLessThanOrEqual(parent.modifiedAt);
          expect(child.completedBy).toBe(parent.assigneeId ?? parent.createdBy);
        }
      }
    }
  });

  it('truncates long parent names', () => {
    const ctx = buildContext({ subtaskRate: 1, subtasksPerTask: [1, 1] });
    const parent: WorkItemRecord = {
      id: 't1',
      projectId: 'p1',
      sectionId: 's1',
      parentTaskId: null,
      name: 'Implement notifications for the billing service',
      description: null,
      assigneeId: null,
      createdBy: 'u1',
      status: 'incomplete',
      dueDate: null,
      createdAt: ctx.horizon.start,
      modifiedAt: ctx.horizon.start + DAY_MS,
      completedAt: null,
      completedBy: null,
      numLikes: 0,
      numSubtasks: 0,
      numComments: 0,
    };
    const [subtask] = generateSubtasks(ctx, [parent, { ...parent, id: 't2', parentTaskId: 't1' }]);
    expect(subtask.name).toBe('Subtask 1: Implement notifications for th...');
    expect(generateSubtasks(ctx, [{ ...parent, name: 'Short name' }])[0].name).toBe('Subtask 1: Short name');
  });

  it('only nests under top-level tasks', () => {
    const { ctx, tasks } = build();
    const nested = tasks.map((task) => ({ ...task, parentTaskId: 'someone' }));
    expect(generateSubtasks({ ...ctx, config: { ...ctx.config, subtaskRate: 1 } }, nested)).toEqual([]);
  });

  it('adds nothing when the rate is zero', () => {
    const { ctx, tasks } = build();
    expect(generateSubtasks({ ...ctx, config: { ...ctx.config, subtaskRate: 0 } }, tasks)).toEqual([]);
  });
});
