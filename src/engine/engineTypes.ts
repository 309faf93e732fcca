import type {
  ChannelAssignment,
  GeneratedTable,
  ProjectInfo,
  RawPayload,
  ReservedChannel,
  SignalClass,
  TableKind
} from '../types';

export interface EngineLogEvent {
  level: 'info' | 'warn' | 'error';
  scope: string;
  message: string;
  details?: Record<string, unknown>;
}

export type EngineLogger = (event: EngineLogEvent) => void;

export interface RackLayout {
  firstSlot: number;
  slotsPerRack: number;
  rackModel?: string;
  rackCount?: number;
}

export const DEFAULT_RACK_LAYOUT: RackLayout = {
  firstSlot: 2,
  slotsPerRack: 10,
  rackModel: 'LK117'
};

export interface ModuleInstanceSummary {
  readonly moduleType: string;
  readonly signalClass: SignalClass;
  readonly instance: number;
  readonly rack: number;
  readonly slot: number;
  readonly channelsUsed: number;
  readonly capacity: number;
}

export interface CalculationResult {
  assignments: readonly ChannelAssignment[];
  modules: readonly ModuleInstanceSummary[];
  reserved: readonly ReservedChannel[];
  catalogVersion: string;
  rackCount: number;
}

export interface PointTableInput {
  main: RawPayload;
  equipment: RawPayload[];
}

export interface CalculationResponse extends CalculationResult {
  project: ProjectInfo;
  cached: boolean;
}

export interface TableRequest {
  kind: TableKind;
  template?: string;
  // PLC and FAT tables only: list the spare channels of allocated modules as reserved rows.
  includeReserved?: boolean;
}

export interface GenerationResponse {
  project: ProjectInfo;
  catalogVersion: string;
  tables: GeneratedTable[];
}
