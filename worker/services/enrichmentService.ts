import type { CustomFieldSpec } from '../config';
import type { GenerationContext } from './context';
import { weightedSample, zipf } from './distributions';
import type {
  AttachmentRecord,
  CustomFieldDefinitionRecord,
  CustomFieldEnumOptionRecord,
  CustomFieldValueRecord,
  OrganizationRecord,
  TagRecord,
  TaskTagRecord,
  WorkItemRecord,
} from './types';
import { addHours, generateId } from './utils';

const OPTION_PALETTE = ['#ff0000', '#00ff00', '#0000ff', '#ffff00', '#ff00ff', '#00ffff'];
const TAG_PALETTE = ['#ff5733', '#33ff57', '#3357ff', '#ff33a1', '#a133ff', '#33fff5'];

const PRIORITY_FIELD = 'Priority';
const EFFORT_FIELD = 'Effort';
const MIN_ATTACHMENT_BYTES = 1024;
const MAX_ATTACHMENT_BYTES = 10 * 1024 * 1024;

export type CustomFieldBundle = {
  definitions: CustomFieldDefinitionRecord[];
  options: CustomFieldEnumOptionRecord[];
};

const optionNames = (spec: CustomFieldSpec) => ('options' in spec ? spec.options : []);

export const generateCustomFields = (ctx: GenerationContext, organization: OrganizationRecord): CustomFieldBundle => {
  const definitions: CustomFieldDefinitionRecord[] = [];
  const options: CustomFieldEnumOptionRecord[] = [];

  for (const spec of ctx.config.customFields) {
    const definition: CustomFieldDefinitionRecord = {
      id: generateId(ctx.rng),
      organizationId: organization.id,
      name: spec.name,
      description: null,
      fieldType: spec.type,
      isGlobal: true,
      createdAt: ctx.horizon.start,
    };
    definitions.push(definition);
    optionNames(spec).forEach((name, position) => {
      options.push({
        id: generateId(ctx.rng),
        fieldId: definition.id,
        name,
        color: OPTION_PALETTE[position % OPTION_PALETTE.length],
        position,
        enabled: true,
      });
    });
  }
  return { definitions, options };
};

export const generateTags = (ctx: GenerationContext, organization: OrganizationRecord): TagRecord[] =>
  ctx.config.tags.map((name, index) => ({
    id: generateId(ctx.rng),
    organizationId: organization.id,
    name,
    color: TAG_PALETTE[index % TAG_PALETTE.length],
    createdAt: ctx.horizon.start,
  }));

const optionsOf = (bundle: CustomFieldBundle, fieldName: string) => {
  const field = bundle.definitions.find((definition) => definition.name === fieldName);
  if (!field) return null;
  const options = bundle.options.filter((option) => option.fieldId === field.id);
  return options.length > 0 ? { field, options } : null;
};

/** Enum values for the Priority and Effort fields, when those fields exist. */
export const generateCustomFieldValues = (
  ctx: GenerationContext,
  items: WorkItemRecord[],
  fields: CustomFieldBundle
): CustomFieldValueRecord[] => {
  const { config, rng } = ctx;
  const targets = [
    { rate: config.priorityFieldRate, choice: optionsOf(fields, PRIORITY_FIELD) },
    { rate: config.effortFieldRate, choice: optionsOf(fields, EFFORT_FIELD) },
  ];
  const values: CustomFieldValueRecord[] = [];

  for (const item of items) {
    for (const { rate, choice } of targets) {
      if (rng.real(0, 1) >= rate || !choice) continue;
      values.push({
        id: generateId(rng),
        taskId: item.id,
        fieldId: choice.field.id,
        textValue: null,
        numberValue: null,
        dateValue: null,
        enumOptionId: rng.pick(choice.options).id,
        createdAt: item.createdAt,
        modifiedAt: item.modifiedAt,
      });
    }
  }
  return values;
};

/** Distinct tags per item; earlier tags in the configured list are favored by a Zipf curve. */
export const generateTaskTags = (
  ctx: GenerationContext,
  items: WorkItemRecord[],
  tags: TagRecord[]
): TaskTagRecord[] => {
  const { config, rng } = ctx;
  if (tags.length === 0) return [];
  const weights = zipf(tags.length);
  const taskTags: TaskTagRecord[] = [];

  for (const item of items) {
    if (rng.real(0, 1) >= config.taskTagRate) continue;
    const count = Math.min(rng.integer(...config.tagsPerTask), tags.length);
    for (const tag of weightedSample(rng, tags, weights, count)) {
      taskTags.push({ id: generateId(rng), taskId: item.id, tagId: tag.id, createdAt: item.createdAt });
    }
  }
  return taskTags;
};

export const generateAttachments = (ctx: GenerationContext, items: WorkItemRecord[]): AttachmentRecord[] => {
  const { config, rng, horizon } = ctx;
  const baseUrl = config.storageBaseUrl.replace(/\/+$/, '');
  const attachments: AttachmentRecord[] = [];

  for (const item of items) {
    if (rng.real(0, 1) >= config.attachmentRate) continue;
    const fileType = rng.pick(config.attachmentFileTypes);
    const extension = rng.pick(fileType.extensions);
    const filename = `attachment_${rng.integer(1000, 9999)}${extension}`;
    const id = generateId(rng);
    attachments.push({
      id,
      taskId: item.id,
      uploadedBy: item.createdBy,
      filename,
      fileType: fileType.mimeType,
      fileSize: rng.integer(MIN_ATTACHMENT_BYTES, MAX_ATTACHMENT_BYTES),
      storageUrl: `${baseUrl}/${id}/${filename}`,
      createdAt: Math.min(addHours(item.createdAt, rng.integer(1, 168)), horizon.end),
    });
  }
  return attachments;
};
