import type { Random } from 'random-js';
import { fillTemplate, taskSlots, templatesFor } from '../providers/archetypes';
import type { GenerationContext } from './context';
import { paretoWeights, weightedPick } from './distributions';
import { membersByTeam } from './teamService';
import type {
  ProjectRecord,
  SectionRecord,
  TeamMembershipRecord,
  WorkflowArchetype,
  WorkItemRecord,
  WorkItemStatus,
} from './types';
import { addHours, generateId } from './utils';

const FALLBACK_COMPLETION_RATE: [number, number] = [0.5, 0.6];
const LIKED_RATE = 0.3;
const MAX_TASK_LIKES = 5;
const SUBTASK_COMPLETE_RATE = 0.8;
const SUBTASK_NAME_LENGTH = 30;

export const taskName = (rng: Random, archetype: WorkflowArchetype) =>
  fillTemplate(rng, rng.pick(templatesFor(archetype).taskPatterns), taskSlots());

/** 20% none, 50% one line, 30% a short checklist. */
export const taskDescription = (rng: Random, name: string) => {
  const draw = rng.real(0, 1);
  if (draw < 0.2) return null;
  if (draw < 0.7) return `Work on: ${name.toLowerCase()}`;
  return `Task details:\n- ${name}\n- Please review and implement\n- Coordinate with team`;
};

const sectionsByProject = (sections: SectionRecord[]) => {
  const byProject = new Map<string, SectionRecord[]>();
  for (const section of sections) {
    const list = byProject.get(section.projectId) ?? [];
    list.push(section);
    byProject.set(section.projectId, list);
  }
  for (const list of byProject.values()) list.sort((a, b) => a.position - b.position);
  return byProject;
};

type AssigneePicker = () => string;

const assigneePicker = (ctx: GenerationContext, memberIds: string[]): AssigneePicker => {
  const { config, rng } = ctx;
  if (config.assignmentStrategy === 'uniform') return () => rng.pick(memberIds);
  const weights = paretoWeights(rng, memberIds, config.workloadParetoFraction, config.workloadParetoRatio);
  const ordered = memberIds.map((id) => weights.get(id) ?? 0);
  return () => weightedPick(rng, memberIds, ordered);
};

/** Top-level tasks for every project whose team has members and whose archetype has sections. */
export const generateTasks = (
  ctx: GenerationContext,
  projects: ProjectRecord[],
  sections: SectionRecord[],
  teamMemberships: TeamMembershipRecord[]
): WorkItemRecord[] => {
  const { config, rng, horizon, temporal } = ctx;
  const members = membersByTeam(teamMemberships);
  const projectSections = sectionsByProject(sections);
  const pickers = new Map<string, AssigneePicker>();
  const tasks: WorkItemRecord[] = [];

  for (const project of projects) {
    const numTasks = rng.integer(...config.tasksPerProject);
    const available = projectSections.get(project.id) ?? [];
    const memberIds = members.get(project.teamId) ?? [];
    if (available.length === 0 || memberIds.length === 0) continue;

    let pickAssignee = pickers.get(project.teamId);
    if (!pickAssignee) {
      pickAssignee = assigneePicker(ctx, memberIds);
      pickers.set(project.teamId, pickAssignee);
    }
    const sectionWeights = available.map((_, rank) => 1 / (rank + 1));
    const [minRate, maxRate] = config.completionRates[project.projectType] ?? FALLBACK_COMPLETION_RATE;

    for (let index = 0; index < numTasks; index += 1) {
      const section = weightedPick(rng, available, sectionWeights);
      const name = taskName(rng, project.workflowType);
      const assigneeId = rng.real(0, 1) < config.unassignedTaskRate ? null : pickAssignee();
      const createdBy = rng.pick(memberIds);
      const createdAt = temporal.createdAt(project.createdAt, horizon.end);
      const dueDate = temporal.dueDate(createdAt);

      const threshold = rng.real(minRate, maxRate);
      const isComplete = rng.real(0, 1) < threshold;
      const completedAt = isComplete ? temporal.completedAt(createdAt, dueDate) : null;
      const description = taskDescription(rng, name);
      const modifiedAt = temporal.modifiedAt(createdAt, completedAt);
      const numLikes = rng.real(0, 1) < LIKED_RATE ? rng.integer(0, MAX_TASK_LIKES) : 0;

      tasks.push({
        id: generateId(rng),
        projectId: project.id,
        sectionId: section.id,
        parentTaskId: null,
        name,
        description,
        assigneeId,
        createdBy,
        status: isComplete ? 'complete' : 'incomplete',
        dueDate,
        createdAt,
        modifiedAt,
        completedAt,
        completedBy: isComplete ? assigneeId ?? createdBy : null,
        numLikes,
        numSubtasks: 0,
        numComments: 0,
      });
    }
  }
  return tasks;
};

const subtaskName = (index: number, parentName: string) => {
  const stem =
    parentName.length > SUBTASK_NAME_LENGTH ? `${parentName.slice(0, SUBTASK_NAME_LENGTH)}...` : parentName;
  return `Subtask ${index + 1}: ${stem}`;
};

/**
 * One level of subtasks under top-level tasks. Subtask times never pass the
 * parent's `modifiedAt`, so a finished parent closes after its children.
 */
export const generateSubtasks = (ctx: GenerationContext, tasks: WorkItemRecord[]): WorkItemRecord[] => {
  const { config, rng, temporal } = ctx;
  const subtasks: WorkItemRecord[] = [];

  for (const parent of tasks) {
    if (parent.parentTaskId !== null) continue;
    if (rng.real(0, 1) >= config.subtaskRate) continue;

    const count = rng.integer(...config.subtasksPerTask);
    for (let index = 0; index < count; index += 1) {
      const isComplete = parent.status === 'complete' && rng.real(0, 1) < SUBTASK_COMPLETE_RATE;
      const status: WorkItemStatus = isComplete ? 'complete' : 'incomplete';
      const createdAt = Math.min(addHours(parent.createdAt, rng.integer(1, 48)), parent.modifiedAt);
      const completedAt = isComplete
        ? Math.min(temporal.completedAt(createdAt, null), parent.modifiedAt)
        : null;

      subtasks.push({
        id: generateId(rng),
        projectId: parent.projectId,
        sectionId: parent.sectionId,
        parentTaskId: parent.id,
        name: subtaskName(index, parent.name),
        description: null,
        assigneeId: parent.assigneeId,
        createdBy: parent.createdBy,
        status,
        dueDate: null,
        createdAt,
        modifiedAt: completedAt ?? parent.modifiedAt,
        completedAt,
        completedBy: isComplete ? parent.assigneeId ?? parent.createdBy : null,
        numLikes: 0,
        numSubtasks: 0,
        numComments: 0,
      });
    }
  }
  return subtasks;
};
