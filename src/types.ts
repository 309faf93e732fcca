export type SignalClass = 'AI' | 'AO' | 'DI' | 'DO';

// Allocation order of the signal classes; the checklist tool has always emitted analog first.
export const SIGNAL_CLASS_ORDER: readonly SignalClass[] = ['AI', 'AO', 'DI', 'DO'];

export const DISCRETE_CLASSES: readonly SignalClass[] = ['DI', 'DO'];
export const ANALOG_CLASSES: readonly SignalClass[] = ['AI', 'AO'];

export type PointDataType = 'BOOL' | 'REAL';

export type FieldType = 'text' | 'number' | 'enum';

export type DefinitionSetId = 'mainForm' | 'equipmentSubform';

export type RawValue = string | number | boolean | null | undefined;
export type RawPayload = Record<string, RawValue>;

export type TypedValue = string | number | undefined;
export type TypedRecord = Readonly<Record<string, TypedValue>>;

export interface FieldDefinition {
  readonly id: string;
  readonly displayName: string;
  readonly type: FieldType;
  readonly rawKey: string;
  readonly required: boolean;
  readonly values?: readonly string[];
}

export interface EngineeringRange {
  readonly low: number;
  readonly high: number;
  readonly unit?: string;
}

export type SignalRequirements = Readonly<Partial<Record<SignalClass, number>>>;

export interface EquipmentItem {
  readonly id: string;
  readonly name: string;
  readonly station: string;
  readonly requirements: SignalRequirements;
  readonly specModel?: string;
  readonly quantity?: number;
  readonly subsystem?: string;
  readonly engineeringRange?: EngineeringRange;
}

export interface AddressingParameters {
  readonly base: number;
  readonly channelStride: number;
  readonly instanceStride: number;
}

export type TableTarget = 'plc' | 'hmi';

export interface ChannelModel {
  readonly moduleType: string;
  readonly signalClass: SignalClass;
  readonly dataType: PointDataType;
  readonly capacity: number;
  readonly addressing: AddressingParameters;
  readonly priority: number;
  readonly targets: readonly TableTarget[];
  readonly maxInstances?: number;
  readonly description?: string;
}

/**
 * Companion point allocated for every channel of the listed classes: alarm limits, alarm bits
 * and maintenance switches. Its tag is the channel tag followed by `suffix`.
 */
export interface ExtendedPointDefinition {
  readonly key: string;
  readonly label: string;
  readonly suffix: string;
  readonly dataType: PointDataType;
  readonly signalClasses: readonly SignalClass[];
}

// Extended points of one data type are packed from their region base, in assignment order.
export interface ExtendedPointLayout {
  readonly regions: Readonly<Record<PointDataType, number>>;
  readonly points: readonly ExtendedPointDefinition[];
}

export interface ExtendedAssignment {
  readonly key: string;
  readonly label: string;
  readonly tag: string;
  readonly dataType: PointDataType;
  readonly address: number;
  readonly plcAddress: string;
  readonly commAddress: number;
}

export interface ChannelAssignment {
  readonly moduleType: string;
  readonly moduleInstance: number;
  readonly channelIndex: number;
  readonly address: number;
  readonly tag: string;
  readonly signalClass: SignalClass;
  readonly dataType: PointDataType;
  readonly equipment: EquipmentItem;
  readonly ordinal: number;
  readonly rack: number;
  readonly slot: number;
  readonly channelCode: string;
  readonly plcAddress: string;
  readonly commAddress: number;
  readonly extended: readonly ExtendedAssignment[];
}

// Unused channel of an allocated module, listed as a spare point.
export interface ReservedChannel {
  readonly moduleType: string;
  readonly moduleInstance: number;
  readonly channelIndex: number;
  readonly address: number;
  readonly tag: string;
  readonly description: string;
  readonly signalClass: SignalClass;
  readonly dataType: PointDataType;
  readonly rack: number;
  readonly slot: number;
  readonly channelCode: string;
  readonly plcAddress: string;
  readonly commAddress: number;
}

export type TableKind = 'plc' | 'hmi-bool' | 'hmi-real' | 'fat';

export interface TableColumn {
  readonly key: string;
  readonly header: string;
}

export type TableRow = Readonly<Record<string, string>>;

export interface GeneratedTable {
  readonly kind: TableKind;
  readonly templateId: string;
  readonly signalClasses: readonly SignalClass[];
  readonly columns: readonly TableColumn[];
  readonly rows: readonly TableRow[];
}

export type ProgressSink = (completed: number, total: number) => unknown;

export interface ProjectInfo {
  readonly projectName?: string;
  readonly projectNumber?: string;
  readonly designNumber?: string;
  readonly clientName?: string;
  readonly station: string;
}
