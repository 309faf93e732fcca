import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { IoPointError } from '../errors';
import { DEFAULT_RACK_LAYOUT } from '../engine/engineTypes';
import type { RackLayout } from '../engine/engineTypes';
import { dataTypeWidth, parsePlcAddress } from '../io/addressFormat';
import { ChannelModelCatalog } from '../io/channelModelCatalog';
import { FieldSchemaRegistry, KNOWN_FIELD_IDS } from '../schema/fieldRegistry';
import { TemplateRegistry } from '../tables/tableTemplates';
import { ANALOG_CLASSES } from '../types';
import type { ChannelModel, DefinitionSetId, ExtendedPointLayout, FieldDefinition } from '../types';

const signalClassSchema = z.enum(['AI', 'AO', 'DI', 'DO']);

const fieldSchema = z.object({
  id: z.string().min(1),
  displayName: z.string().min(1),
  type: z.enum(['text', 'number', 'enum']),
  rawKey: z.string().min(1),
  required: z.boolean().optional(),
  values: z.array(z.string()).optional()
});

const fieldMappingsSchema = z.object({
  mainForm: z.array(fieldSchema),
  equipmentSubform: z.array(fieldSchema)
});

// Numbers are checked by the catalog itself so that violations surface as InvalidModuleModel.
const channelModelSchema = z.object({
  moduleType: z.string().min(1),
  signalClass: signalClassSchema,
  capacity: z.number(),
  base: z.union([z.number(), z.string()]),
  channelStride: z.number().optional(),
  instanceStride: z.number().optional(),
  priority: z.number().optional(),
  targets: z.array(z.enum(['plc', 'hmi'])).optional(),
  maxInstances: z.number().optional(),
  description: z.string().optional()
});

const addressSchema = z.union([z.number(), z.string()]);

const extendedPointsSchema = z.object({
  regions: z.object({ BOOL: addressSchema, REAL: addressSchema }),
  points: z.array(
    z.object({
      key: z.string().min(1),
      label: z.string().min(1),
      suffix: z.string(),
      dataType: z.enum(['BOOL', 'REAL']),
      signalClasses: z.array(signalClassSchema).optional()
    })
  )
});

const catalogFileSchema = z.object({
  models: z.array(channelModelSchema),
  extendedPoints: extendedPointsSchema.optional()
});

const templateFileSchema = z.object({
  templates: z.array(
    z.object({
      id: z.string().min(1),
      kind: z.enum(['plc', 'hmi-bool', 'hmi-real', 'fat']),
      title: z.string().optional(),
      columns: z
        .array(
          z.object({
            key: z.string().min(1),
            header: z.string(),
            mandatory: z.boolean().optional(),
            default: z.string().optional()
          })
        )
        .min(1)
    })
  )
});

const rackLayoutSchema = z.object({
  firstSlot: z.number().int().min(0),
  slotsPerRack: z.number().int().min(1),
  rackModel: z.string().min(1).optional(),
  rackCount: z.number().int().min(1).optional()
});

export type ChannelModelEntry = z.infer<typeof channelModelSchema>;
export type ExtendedPointsEntry = z.infer<typeof extendedPointsSchema>;

export interface RawConfigSources {
  fieldMappings: unknown;
  channelModels: unknown;
  templates: unknown;
  rackLayout?: unknown;
}

export interface EngineConfig {
  registry: FieldSchemaRegistry;
  catalog: ChannelModelCatalog;
  templates: TemplateRegistry;
  rackLayout: RackLayout;
}

export const CONFIG_FILES = {
  fieldMappings: 'field-mappings.json',
  channelModels: 'channel-models.json',
  templates: 'templates.json',
  rackLayout: 'rack-layout.json'
} as const;

export function defaultConfigDir(): string {
  const fromEnv = process.env.IOPT_CONFIG_DIR;
  if (fromEnv && fromEnv.trim().length > 0) {
    return path.resolve(fromEnv);
  }
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../config');
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, source: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new IoPointError('ConfigError', `Invalid ${source}: ${describeIssues(parsed.error)}`, { source });
  }
  return parsed.data;
}

function resolveAddress(value: number | string, owner: string, details: Record<string, string>): number {
  if (typeof value === 'number') {
    return value;
  }
  const parsed = parsePlcAddress(value);
  if (parsed === undefined) {
    throw new IoPointError('InvalidModuleModel', `${owner} base ${value} is not a %MX/%MD address.`, details);
  }
  return parsed;
}

function resolveBase(entry: ChannelModelEntry): number {
  return resolveAddress(entry.base, `Module ${entry.moduleType}`, { moduleType: entry.moduleType });
}

export function toExtendedPointLayout(entry: ExtendedPointsEntry): ExtendedPointLayout {
  return {
    regions: {
      BOOL: resolveAddress(entry.regions.BOOL, 'Extended BOOL region', { point: 'BOOL' }),
      REAL: resolveAddress(entry.regions.REAL, 'Extended REAL region', { point: 'REAL' })
    },
    points: entry.points.map(point => ({
      key: point.key,
      label: point.label,
      suffix: point.suffix,
      dataType: point.dataType,
      signalClasses: point.signalClasses ?? ANALOG_CLASSES
    }))
  };
}

export function toChannelModel(entry: ChannelModelEntry, index: number): ChannelModel {
  const dataType = entry.signalClass === 'AI' || entry.signalClass === 'AO' ? 'REAL' : 'BOOL';
  const channelStride = entry.channelStride ?? dataTypeWidth(dataType);
  return {
    moduleType: entry.moduleType,
    signalClass: entry.signalClass,
    dataType,
    capacity: entry.capacity,
    addressing: {
      base: resolveBase(entry),
      channelStride,
      instanceStride: entry.instanceStride ?? entry.capacity * channelStride
    },
    priority: entry.priority ?? index,
    targets: entry.targets ?? ['plc', 'hmi'],
    maxInstances: entry.maxInstances,
    description: entry.description
  };
}

export function buildCatalog(value: unknown): ChannelModelCatalog {
  const parsed = catalogFileSchema.safeParse(value);
  if (!parsed.success) {
    throw new IoPointError('InvalidModuleModel', `Invalid channel model catalog: ${describeIssues(parsed.error)}`, {
      source: CONFIG_FILES.channelModels
    });
  }
  const { models, extendedPoints } = parsed.data;
  return new ChannelModelCatalog(
    models.map(toChannelModel),
    extendedPoints ? toExtendedPointLayout(extendedPoints) : undefined
  );
}

export function buildRegistry(value: unknown): FieldSchemaRegistry {
  const parsed = parseWith(fieldMappingsSchema, value, CONFIG_FILES.fieldMappings);
  const toDefinitions = (setId: DefinitionSetId): FieldDefinition[] =>
    parsed[setId].map(field => {
      if (!KNOWN_FIELD_IDS[setId].includes(field.id)) {
        throw new IoPointError('ConfigError', `Field ${field.id} is not a known ${setId} field.`, {
          field: field.id,
          definitionSet: setId
        });
      }
      return { ...field, required: field.required ?? false };
    });
  return new FieldSchemaRegistry({
    mainForm: toDefinitions('mainForm'),
    equipmentSubform: toDefinitions('equipmentSubform')
  });
}

export function buildEngineConfig(sources: RawConfigSources): EngineConfig {
  const templates = parseWith(templateFileSchema, sources.templates, CONFIG_FILES.templates);
  return {
    registry: buildRegistry(sources.fieldMappings),
    catalog: buildCatalog(sources.channelModels),
    templates: new TemplateRegistry(templates.templates),
    rackLayout:
      sources.rackLayout === undefined
        ? DEFAULT_RACK_LAYOUT
        : parseWith(rackLayoutSchema, sources.rackLayout, CONFIG_FILES.rackLayout)
  };
}

function readJson(filePath: string, required: boolean): unknown {
  if (!fs.existsSync(filePath)) {
    if (!required) {
      return undefined;
    }
    throw new IoPointError('ConfigError', `Configuration file ${filePath} does not exist.`, { source: filePath });
  }
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new IoPointError(
      'ConfigError',
      `Configuration file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { source: filePath }
    );
  }
}

export interface LoadEngineConfigOptions {
  configDir?: string;
}

export function loadEngineConfig(options: LoadEngineConfigOptions = {}): EngineConfig {
  const configDir = options.configDir ?? defaultConfigDir();
  return buildEngineConfig({
    fieldMappings: readJson(path.join(configDir, CONFIG_FILES.fieldMappings), true),
    channelModels: readJson(path.join(configDir, CONFIG_FILES.channelModels), true),
    templates: readJson(path.join(configDir, CONFIG_FILES.templates), true),
    rackLayout: readJson(path.join(configDir, CONFIG_FILES.rackLayout), false)
  });
}
