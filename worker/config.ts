import { z } from 'zod';
import { ConfigError } from './services/errors';
import { DEPARTMENTS, DUE_DATE_BUCKETS, PROJECT_TYPES } from './services/types';
import type { Horizon } from './services/types';
import { DAY_MS, parseIsoDate } from './services/utils';

const probability = z.number().min(0).max(1);
const count = z.number().int().nonnegative();
const share = z.number().gt(0).max(1);

const intRange = z
  .tuple([count, count])
  .refine(([min, max]) => min <= max, { message: 'range minimum must not exceed its maximum' });

const rateRange = z
  .tuple([probability, probability])
  .refine(([min, max]) => min <= max, { message: 'range minimum must not exceed its maximum' });

const departmentSchema = z.enum(DEPARTMENTS);
const projectTypeSchema = z.enum(PROJECT_TYPES);
const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
  .refine((value) => parseIsoDate(value) !== null, { message: 'not a calendar date' });

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export type LogLevel = z.infer<typeof logLevelSchema>;

const customFieldSchema = z.discriminatedUnion('type', [
  z.object({ name: z.string().min(1), type: z.literal('enum'), options: z.array(z.string().min(1)).min(1) }),
  z.object({ name: z.string().min(1), type: z.literal('multi_enum'), options: z.array(z.string().min(1)).min(1) }),
  z.object({ name: z.string().min(1), type: z.enum(['text', 'number', 'date', 'people']) }),
]);
export type CustomFieldSpec = z.infer<typeof customFieldSchema>;

const attachmentTypeSchema = z.object({
  mimeType: z.string().min(1),
  extensions: z.array(z.string().startsWith('.')).min(1),
});

export const generationConfigSchema = z.object({
  numEmployees: z.number().int().positive().default(7500),
  simulationEndDate: isoDate.default('2026-01-07'),
  simulationDays: z.number().int().positive().default(180),
  seed: z.number().int().nonnegative().optional(),

  departmentDistribution: z.record(departmentSchema, probability).default({
    Engineering: 0.4,
    Product: 0.1,
    Design: 0.08,
    Marketing: 0.12,
    Sales: 0.15,
    Operations: 0.08,
    HR: 0.04,
    Finance: 0.03,
  }),
  teamSizeRanges: z.record(departmentSchema, intRange).default({
    Engineering: [8, 15],
    Product: [5, 10],
    Design: [5, 8],
    Marketing: [6, 12],
    Sales: [8, 15],
    Operations: [5, 10],
    HR: [4, 8],
    Finance: [3, 6],
  }),
  projectTypesByDepartment: z.record(departmentSchema, z.record(projectTypeSchema, probability)).default({
    Engineering: { Sprint: 0.6, Kanban: 0.3, List: 0.1 },
    Product: { Timeline: 0.5, List: 0.3, Kanban: 0.2 },
    Design: { Kanban: 0.5, Timeline: 0.3, List: 0.2 },
    Marketing: { Timeline: 0.4, Calendar: 0.3, List: 0.3 },
    Sales: { List: 0.6, Kanban: 0.3, Timeline: 0.1 },
    Operations: { List: 0.5, Kanban: 0.4, Timeline: 0.1 },
    HR: { List: 0.7, Timeline: 0.2, Kanban: 0.1 },
    Finance: { List: 0.8, Timeline: 0.2 },
  }),
  completionRates: z.record(projectTypeSchema, rateRange).default({
    Sprint: [0.7, 0.85],
    Kanban: [0.6, 0.7],
    Timeline: [0.5, 0.65],
    List: [0.4, 0.55],
    Calendar: [0.65, 0.75],
  }),
  dueDateDistribution: z.record(z.enum(DUE_DATE_BUCKETS), probability).default({
    within_1_week: 0.25,
    within_1_month: 0.4,
    within_3_months: 0.2,
    no_due_date: 0.1,
    overdue: 0.05,
  }),

  projectsPerTeam: intRange.default([3, 5]),
  projectMembersPerProject: intRange.default([3, 8]),
  projectCreationBufferDays: count.default(30),
  tasksPerProject: intRange.default([15, 40]),
  unassignedTaskRate: probability.default(0.15),
  assignmentStrategy: z.enum(['uniform', 'pareto']).default('uniform'),
  workloadParetoFraction: share.default(0.2),
  workloadParetoRatio: share.default(0.8),

  subtaskRate: probability.default(0.3),
  subtasksPerTask: intRange.default([1, 5]),
  commentRate: probability.default(0.45),
  commentsPerTask: intRange.default([1, 8]),
  attachmentRate: probability.default(0.2),
  taskTagRate: probability.default(0.3),
  tagsPerTask: intRange.default([1, 2]),
  priorityFieldRate: probability.default(0.7),
  effortFieldRate: probability.default(0.5),

  weekendAvoidanceRate: probability.default(0.85),
  weekdayBiasRate: probability.default(0.6),
  sprintDurationDays: z.number().int().positive().default(14),

  customFields: z.array(customFieldSchema).default([
    { name: 'Priority', type: 'enum', options: ['Critical', 'High', 'Medium', 'Low'] },
    { name: 'Effort', type: 'enum', options: ['XS', 'S', 'M', 'L', 'XL'] },
    { name: 'Status', type: 'enum', options: ['Not Started', 'In Progress', 'Blocked', 'In Review', 'Done'] },
    { name: 'Story Points', type: 'number' },
    { name: 'Sprint', type: 'text' },
  ]),
  tags: z
    .array(z.string().min(1))
    .refine((tags) => new Set(tags).size === tags.length, { message: 'tag names must be unique' })
    .default([
    'bug',
    'feature',
    'enhancement',
    'urgent',
    'blocked',
    'needs-review',
    'documentation',
    'technical-debt',
    'customer-request',
    'security',
    'performance',
    'ux',
    'backend',
    'frontend',
  ]),
  attachmentFileTypes: z.array(attachmentTypeSchema).min(1).default([
    { mimeType: 'application/pdf', extensions: ['.pdf'] },
    { mimeType: 'image/png', extensions: ['.png'] },
    { mimeType: 'image/jpeg', extensions: ['.jpg', '.jpeg'] },
    { mimeType: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document', extensions: ['.docx'] },
    { mimeType: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet', extensions: ['.xlsx'] },
    { mimeType: 'application/vnd.openxmlformats-officedocument.presentationml.presentation', extensions: ['.pptx'] },
    { mimeType: 'text/plain', extensions: ['.txt'] },
    { mimeType: 'application/zip', extensions: ['.zip'] },
  ]),
  storageBaseUrl: z.string().url().default('https://storage.example.com'),

  llm: z
    .object({
      apiKey: z.string().min(1).optional(),
      model: z.string().min(1).default('gemini-2.5-flash'),
      temperature: z.number().min(0).max(2).default(0.7),
      maxTokens: z.number().int().positive().default(1000),
      batchDelayMs: count.default(500),
    })
    .default({}),

  dbPath: z.string().min(1).default('output/workspace.sqlite'),
  logLevel: logLevelSchema.default('info'),
  companySourceUrl: z.string().url().optional(),
});

export type GenerationConfig = z.infer<typeof generationConfigSchema>;
export type GenerationConfigInput = z.input<typeof generationConfigSchema>;
export type LlmConfig = GenerationConfig['llm'];

const formatIssues = (error: z.ZodError) =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);

export const parseGenerationConfig = (input: GenerationConfigInput = {}): GenerationConfig => {
  const parsed = generationConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError('Invalid generation config', formatIssues(parsed.error));
  }
  return parsed.data;
};

/** The simulated window ends at UTC midnight of `simulationEndDate`. */
export const resolveHorizon = (config: Pick<GenerationConfig, 'simulationEndDate' | 'simulationDays'>): Horizon => {
  const end = parseIsoDate(config.simulationEndDate);
  if (end === null) throw new ConfigError('Invalid generation config', [`simulationEndDate: not a calendar date`]);
  return { start: end - config.simulationDays * DAY_MS, end };
};

const envNumber = z.coerce.number();
const envInt = z.coerce.number().int();

const envSchema = z.object({
  NUM_EMPLOYEES: envInt.optional(),
  SIMULATION_END_DATE: z.string().optional(),
  SIMULATION_DAYS: envInt.optional(),
  SEED: envInt.optional(),
  DB_PATH: z.string().optional(),
  LOG_LEVEL: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(logLevelSchema)
    .optional(),
  GEMINI_API_KEY: z.string().optional(),
  LLM_MODEL: z.string().optional(),
  LLM_TEMPERATURE: envNumber.optional(),
  LLM_MAX_TOKENS: envInt.optional(),
  LLM_BATCH_DELAY_MS: envInt.optional(),
  COMPANY_SOURCE_URL: z.string().optional(),
});

const present = (value: string | undefined) => (value === undefined || value.trim() === '' ? undefined : value);

/** Builds a config from process-style environment variables; blank values fall back to defaults. */
export const loadEnvConfig = (env: Record<string, string | undefined>): GenerationConfig => {
  const cleaned = Object.fromEntries(Object.entries(env).map(([key, value]) => [key, present(value)]));
  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError('Invalid environment', formatIssues(parsed.error));
  }
  const vars = parsed.data;
  return parseGenerationConfig({
    numEmployees: vars.NUM_EMPLOYEES,
    simulationEndDate: vars.SIMULATION_END_DATE,
    simulationDays: vars.SIMULATION_DAYS,
    seed: vars.SEED,
    dbPath: vars.DB_PATH,
    logLevel: vars.LOG_LEVEL,
    companySourceUrl: vars.COMPANY_SOURCE_URL,
    llm: {
      apiKey: vars.GEMINI_API_KEY,
      model: vars.LLM_MODEL,
      temperature: vars.LLM_TEMPERATURE,
      maxTokens: vars.LLM_MAX_TOKENS,
      batchDelayMs: vars.LLM_BATCH_DELAY_MS,
    },
  });
};
