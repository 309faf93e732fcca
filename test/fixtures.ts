import type { PointTableInput } from '../src/engine/engineTypes';
import type { RawPayload } from '../src/types';

// Raw keys of config/field-mappings.json.
export const MAIN = {
  projectName: '_widget_1635777114903',
  projectNumber: '_widget_1635777114935',
  station: '_widget_1635777114991'
} as const;

export const ROW = {
  equipmentName: '_widget_1635777115211',
  specModel: '_widget_1635777115287',
  quantity: '_widget_1635777485580',
  subsystem: '_widget_1636353456514'
} as const;

export const mainPayload: RawPayload = {
  [MAIN.projectName]: 'Demo Plant',
  [MAIN.projectNumber]: 'P-001',
  [MAIN.station]: 'North Station'
};

export function sampleInput(equipment: RawPayload[] = defaultRows()): PointTableInput {
  return { main: mainPayload, equipment };
}

export function defaultRows(): RawPayload[] {
  return [
    { _id: 'P-101', [ROW.equipmentName]: 'Feed pump', di_count: 2, do_count: '1' },
    { _id: 'PT-1', [ROW.equipmentName]: 'Inlet pressure', ai_count: 1, range_low: 0, range_high: '1.6', range_unit: 'MPa' }
  ];
}
