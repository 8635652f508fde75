import { z } from 'zod';
import type { Random } from 'random-js';
import rawArchetypes from '../data/archetypes.json';
import { ConfigError } from '../services/errors';
import type { Department, WorkflowArchetype } from '../services/types';

const slotTable = z.record(z.string(), z.array(z.string().min(1)).min(1));

const archetypeTemplatesSchema = z.object({
  sections: z.array(z.string().min(1)).min(1),
  versionMajorMax: z.number().int().positive(),
  projectPatterns: z.array(z.string().min(1)).min(1),
  projectSlots: slotTable,
  taskPatterns: z.array(z.string().min(1)).min(1),
});

const archetypeDataSchema = z.object({
  sharedProjectSlots: slotTable,
  taskSlots: slotTable,
  archetypes: z.object({
    Engineering: archetypeTemplatesSchema,
    Marketing: archetypeTemplatesSchema,
    Product: archetypeTemplatesSchema,
    Design: archetypeTemplatesSchema,
    Operations: archetypeTemplatesSchema,
  }),
});

export type SlotTable = z.infer<typeof slotTable>;
export type ArchetypeTemplates = z.infer<typeof archetypeTemplatesSchema>;

const PLACEHOLDER = /\{(\w+)\}/g;
const VERSION_SLOT = 'version';

const placeholdersOf = (pattern: string) => [...pattern.matchAll(PLACEHOLDER)].map((match) => match[1]);

const missingSlots = (patterns: string[], slots: SlotTable) =>
  patterns.flatMap((pattern) =>
    placeholdersOf(pattern)
      .filter((name) => name !== VERSION_SLOT && !(name in slots))
      .map((name) => `"${pattern}" has no values for {${name}}`)
  );

const loadArchetypeData = () => {
  const parsed = archetypeDataSchema.safeParse(rawArchetypes);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid archetype templates',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const data = parsed.data;
  const problems = Object.values(data.archetypes).flatMap((templates) => [
    ...missingSlots(templates.projectPatterns, { ...data.sharedProjectSlots, ...templates.projectSlots }),
    ...missingSlots(templates.taskPatterns, data.taskSlots),
  ]);
  if (problems.length > 0) throw new ConfigError('Invalid archetype templates', problems);
  return data;
};

const archetypeData = loadArchetypeData();

export const archetypeForDepartment = (department: Department): WorkflowArchetype => {
  switch (department) {
    case 'Engineering':
    case 'Marketing':
    case 'Product':
    case 'Design':
      return department;
    case 'Sales':
    case 'Operations':
    case 'HR':
    case 'Finance':
      return 'Operations';
    default: {
      const exhaustive: never = department;
      return exhaustive;
    }
  }
};

export const templatesFor = (archetype: WorkflowArchetype): ArchetypeTemplates => {
  switch (archetype) {
    case 'Engineering':
      return archetypeData.archetypes.Engineering;
    case 'Marketing':
      return archetypeData.archetypes.Marketing;
    case 'Product':
      return archetypeData.archetypes.Product;
    case 'Design':
      return archetypeData.archetypes.Design;
    case 'Operations':
      return archetypeData.archetypes.Operations;
    default: {
      const exhaustive: never = archetype;
      return exhaustive;
    }
  }
};

export const sharedProjectSlots = (): SlotTable => archetypeData.sharedProjectSlots;
export const taskSlots = (): SlotTable => archetypeData.taskSlots;

/** Replaces each `{slot}` left to right with a draw from its value list; `{version}` becomes `vM.m`. */
export const fillTemplate = (rng: Random, pattern: string, slots: SlotTable, versionMajorMax = 5) =>
  pattern.replace(PLACEHOLDER, (match, name: string) => {
    if (name === VERSION_SLOT) return `v${rng.integer(1, versionMajorMax)}.${rng.integer(0, 9)}`;
    const values = slots[name];
    return values ? rng.pick(values) : match;
  });
