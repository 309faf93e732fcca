import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadEngineConfig } from '../src/config/configLoader';
import type { EngineConfig } from '../src/config/configLoader';
import type { EngineLogEvent } from '../src/engine/engineTypes';
import type { ChannelModel, EquipmentItem, SignalClass, SignalRequirements } from '../src/types';

export const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../config');

export function loadTestConfig(): EngineConfig {
  return loadEngineConfig({ configDir: CONFIG_DIR });
}

export function equipment(id: string, requirements: SignalRequirements, extra: Partial<EquipmentItem> = {}): EquipmentItem {
  return {
    id,
    name: id,
    station: 'North',
    requirements,
    ...extra
  };
}

export function channelModel(
  moduleType: string,
  signalClass: SignalClass,
  capacity: number,
  base: number,
  overrides: Partial<ChannelModel> = {}
): ChannelModel {
  const dataType = signalClass === 'AI' || signalClass === 'AO' ? 'REAL' : 'BOOL';
  const channelStride = dataType === 'REAL' ? 32 : 1;
  return {
    moduleType,
    signalClass,
    dataType,
    capacity,
    addressing: { base, channelStride, instanceStride: capacity * channelStride },
    priority: 0,
    targets: ['plc', 'hmi'],
    ...overrides
  };
}

export function catchError(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the action to throw.');
}

export function collectLogs(): { events: EngineLogEvent[]; logger: (event: EngineLogEvent) => void } {
  const events: EngineLogEvent[] = [];
  return { events, logger: event => events.push(event) };
}
