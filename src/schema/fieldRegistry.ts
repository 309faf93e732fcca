import { z } from 'zod';
import { IoPointError, schemaMismatch } from '../errors';
import type { DefinitionSetId, FieldDefinition, RawPayload, TypedRecord, TypedValue } from '../types';

export type FieldDefinitionSets = Record<DefinitionSetId, readonly FieldDefinition[]>;

const MAIN_FORM_FIELDS = ['projectName', 'projectNumber', 'designNumber', 'clientName', 'station'] as const;

const EQUIPMENT_FIELDS = [
  'rowId',
  'equipmentName',
  'brand',
  'specModel',
  'techParams',
  'quantity',
  'unit',
  'subsystem',
  'remark',
  'techRemark',
  'contractStatus',
  'aiCount',
  'aoCount',
  'diCount',
  'doCount',
  'rangeLow',
  'rangeHigh',
  'rangeUnit'
] as const;

export type MainFormFieldId = (typeof MAIN_FORM_FIELDS)[number];
export type EquipmentFieldId = (typeof EQUIPMENT_FIELDS)[number];

const DEFINITION_SETS: readonly DefinitionSetId[] = ['mainForm', 'equipmentSubform'];

export const KNOWN_FIELD_IDS: Record<DefinitionSetId, readonly string[]> = {
  mainForm: MAIN_FORM_FIELDS,
  equipmentSubform: EQUIPMENT_FIELDS
};

const textSchema = z.union([z.string(), z.number(), z.boolean()]).transform(value => String(value).trim());

const numberSchema = z.union([z.number(), z.string().trim()]).pipe(z.coerce.number().finite());

function schemaFor(field: FieldDefinition): z.ZodType<string | number, z.ZodTypeDef, unknown> {
  switch (field.type) {
    case 'number':
      return numberSchema;
    case 'enum': {
      const allowed = field.values ?? [];
      return textSchema.refine(value => allowed.includes(value), {
        message: `Expected one of ${allowed.join(', ')}`
      });
    }
    default:
      return textSchema;
  }
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim().length === 0);
}

/**
 * Immutable lookup of field definitions per definition set. Interprets raw key/value payloads
 * into typed records keyed by field id.
 */
export class FieldSchemaRegistry {
  private readonly sets: ReadonlyMap<DefinitionSetId, ReadonlyMap<string, FieldDefinition>>;
  private readonly schemas = new Map<FieldDefinition, z.ZodType<string | number, z.ZodTypeDef, unknown>>();

  constructor(definitions: FieldDefinitionSets) {
    const sets = new Map<DefinitionSetId, ReadonlyMap<string, FieldDefinition>>();
    DEFINITION_SETS.forEach(setId => {
      const fields = new Map<string, FieldDefinition>();
      definitions[setId].forEach(field => {
        if (fields.has(field.id)) {
          throw new IoPointError('ConfigError', `Field ${field.id} is declared twice in ${setId}.`, {
            field: field.id,
            definitionSet: setId
          });
        }
        if (field.type === 'enum' && (!field.values || field.values.length === 0)) {
          throw new IoPointError('ConfigError', `Enum field ${field.id} declares no values.`, { field: field.id });
        }
        const frozen = Object.freeze({ ...field, values: field.values ? Object.freeze([...field.values]) : undefined });
        fields.set(field.id, frozen);
        this.schemas.set(frozen, schemaFor(frozen));
      });
      sets.set(setId, fields);
    });
    this.sets = sets;
    Object.freeze(this);
  }

  public fields(setId: DefinitionSetId): FieldDefinition[] {
    return Array.from(this.sets.get(setId)?.values() ?? []);
  }

  public get(setId: DefinitionSetId, fieldId: string): FieldDefinition | undefined {
    return this.sets.get(setId)?.get(fieldId);
  }

  public interpret(payload: RawPayload, setId: DefinitionSetId): TypedRecord {
    const record: Record<string, TypedValue> = {};

    this.fields(setId).forEach(field => {
      const raw = payload[field.rawKey];
      if (isBlank(raw)) {
        if (field.required) {
          throw schemaMismatch(field.id, `Required field ${field.displayName} (${field.rawKey}) is missing.`, {
            rawKey: field.rawKey,
            definitionSet: setId
          });
        }
        record[field.id] = undefined;
        return;
      }

      const schema = this.schemas.get(field) ?? schemaFor(field);
      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        const reason = parsed.error.issues[0]?.message ?? 'invalid value';
        throw schemaMismatch(
          field.id,
          `Field ${field.displayName} (${field.rawKey}) cannot be read as ${field.type}: ${reason}.`,
          { rawKey: field.rawKey, definitionSet: setId, value: String(raw) }
        );
      }
      record[field.id] = parsed.data;
    });

    return Object.freeze(record);
  }
}

export function readText(record: TypedRecord, fieldId: string): string | undefined {
  const value = record[fieldId];
  return value === undefined ? undefined : String(value);
}

export function readNumber(record: TypedRecord, fieldId: string): number | undefined {
  const value = record[fieldId];
  return typeof value === 'number' ? value : undefined;
}
