import type { Random } from 'random-js';
import type { WorkflowArchetype } from '../services/types';
import { fillTemplate, sharedProjectSlots, templatesFor } from './archetypes';

export type ProjectName = {
  name: string;
  workflowType: WorkflowArchetype;
};

export class ProjectNameProvider {
  constructor(private readonly rng: Random) {}

  project(archetype: WorkflowArchetype): ProjectName {
    const templates = templatesFor(archetype);
    const pattern = this.rng.pick(templates.projectPatterns);
    const slots = { ...sharedProjectSlots(), ...templates.projectSlots };
    return {
      name: fillTemplate(this.rng, pattern, slots, templates.versionMajorMax),
      workflowType: archetype,
    };
  }
}
