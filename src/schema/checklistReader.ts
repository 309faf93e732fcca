import { IoPointError } from '../errors';
import type { ChannelModelCatalog } from '../io/channelModelCatalog';
import type { EngineeringRange, EquipmentItem, ProjectInfo, RawPayload, SignalClass, SignalRequirements, TypedRecord } from '../types';
import { readNumber, readText } from './fieldRegistry';
import type { FieldSchemaRegistry } from './fieldRegistry';

export interface ChecklistReadResult {
  project: ProjectInfo;
  items: EquipmentItem[];
  rackCount?: number;
}

const COUNT_FIELDS: ReadonlyArray<[SignalClass, string]> = [
  ['AI', 'aiCount'],
  ['AO', 'aoCount'],
  ['DI', 'diCount'],
  ['DO', 'doCount']
];

export function readProject(record: TypedRecord): ProjectInfo {
  return {
    projectName: readText(record, 'projectName'),
    projectNumber: readText(record, 'projectNumber'),
    designNumber: readText(record, 'designNumber'),
    clientName: readText(record, 'clientName'),
    station: readText(record, 'station') ?? ''
  };
}

function readRequirements(record: TypedRecord, catalog: ChannelModelCatalog): SignalRequirements {
  const explicit: Partial<Record<SignalClass, number>> = {};
  let hasExplicit = false;
  COUNT_FIELDS.forEach(([signalClass, fieldId]) => {
    const count = readNumber(record, fieldId);
    if (count !== undefined) {
      explicit[signalClass] = count;
      hasExplicit = true;
    }
  });
  if (hasExplicit) {
    return explicit;
  }

  // Rows listing IO modules ("LK610" x 2) need every channel of those modules. Only whole
  // modules count.
  const model = catalog.matchModel(readText(record, 'specModel'));
  const quantity = readNumber(record, 'quantity');
  const modules = quantity === undefined ? 0 : Math.trunc(quantity);
  if (!model || modules <= 0) {
    return {};
  }
  const derived: Partial<Record<SignalClass, number>> = {};
  derived[model.signalClass] = modules * model.capacity;
  return derived;
}

function readRange(record: TypedRecord, itemId: string): EngineeringRange | undefined {
  const low = readNumber(record, 'rangeLow');
  const high = readNumber(record, 'rangeHigh');
  if (low === undefined && high === undefined) {
    return undefined;
  }
  if (low === undefined || high === undefined) {
    throw new IoPointError('SchemaMismatch', `Equipment ${itemId} declares only one end of its engineering range.`, {
      item: itemId,
      field: low === undefined ? 'rangeLow' : 'rangeHigh'
    });
  }
  return { low, high, unit: readText(record, 'rangeUnit') };
}

/**
 * Turns the main-form payload and its equipment sub-form rows into EquipmentItems. Row order is
 * kept; it decides channel order downstream.
 */
export function readChecklist(
  main: RawPayload,
  equipment: readonly RawPayload[],
  registry: FieldSchemaRegistry,
  catalog: ChannelModelCatalog,
  rackModel?: string
): ChecklistReadResult {
  const project = readProject(registry.interpret(main, 'mainForm'));
  const items: EquipmentItem[] = [];
  let rackCount: number | undefined;

  equipment.forEach((payload, index) => {
    const record = registry.interpret(payload, 'equipmentSubform');
    const id = readText(record, 'rowId') ?? `EQ${index + 1}`;
    const specModel = readText(record, 'specModel');
    const quantity = readNumber(record, 'quantity');

    if (rackModel && specModel?.toUpperCase().includes(rackModel.toUpperCase()) && rackCount === undefined) {
      rackCount = quantity ?? 1;
    }

    items.push(
      Object.freeze({
        id,
        name: readText(record, 'equipmentName') ?? id,
        station: project.station,
        requirements: Object.freeze(readRequirements(record, catalog)),
        specModel,
        quantity,
        subsystem: readText(record, 'subsystem'),
        engineeringRange: readRange(record, id)
      })
    );
  });

  return { project, items, rackCount };
}
