import { IoPointError } from '../errors';
import { DEFAULT_RACK_LAYOUT } from '../engine/engineTypes';
import type { CalculationResult, EngineLogEvent, ModuleInstanceSummary, RackLayout } from '../engine/engineTypes';
import { SIGNAL_CLASS_ORDER } from '../types';
import type {
  ChannelAssignment,
  ChannelModel,
  EquipmentItem,
  ExtendedAssignment,
  ExtendedPointDefinition,
  PointDataType,
  ReservedChannel,
  SignalClass
} from '../types';
import { dataTypeWidth, formatPlcAddress, toCommAddress } from './addressFormat';
import type { ChannelModelCatalog } from './channelModelCatalog';
import { racksNeeded, slotForModule } from './rackLayout';

export interface ChannelCalculatorOptions {
  rackLayout?: RackLayout;
  logger?: (event: EngineLogEvent) => void;
}

interface OpenModule {
  model: ChannelModel;
  instance: number;
  rack: number;
  slot: number;
  channelsUsed: number;
}

interface OccupiedSpan {
  tag: string;
  address: number;
  dataType: PointDataType;
  plcAddress: string;
}

type ExtendedCursors = Record<PointDataType, number>;

export const RESERVED_TAG_PREFIX = 'YLDW';
export const RESERVED_DESCRIPTION_PREFIX = '预留点位';

export function requiredCount(item: EquipmentItem, signalClass: SignalClass): number {
  return item.requirements[signalClass] ?? 0;
}

export function tagSegment(identifier: string): string {
  const cleaned = identifier.trim().replace(/[^A-Za-z0-9_]/g, '_');
  return cleaned.length > 0 ? cleaned : 'ITEM';
}

function channelAddress(model: ChannelModel, instance: number, channel: number): number {
  return model.addressing.base + instance * model.addressing.instanceStride + channel * model.addressing.channelStride;
}

/**
 * Allocates one channel per required point. Classes are processed in SIGNAL_CLASS_ORDER, items in
 * input order; a module instance is never filled past its capacity and every new instance takes
 * the next rack slot. Channels of classes with extended points also receive those points, packed
 * per data type from the catalog's extended regions.
 */
export class ChannelCalculator {
  private readonly rackLayout: RackLayout;

  constructor(
    private readonly catalog: ChannelModelCatalog,
    private readonly options: ChannelCalculatorOptions = {}
  ) {
    this.rackLayout = options.rackLayout ?? DEFAULT_RACK_LAYOUT;
  }

  public calculate(items: readonly EquipmentItem[], rackCount?: number): CalculationResult {
    this.validateRequirements(items);

    const assignments: ChannelAssignment[] = [];
    const opened: OpenModule[] = [];
    const cursors: ExtendedCursors = { BOOL: 0, REAL: 0 };

    SIGNAL_CLASS_ORDER.forEach(signalClass => {
      this.allocateClass(signalClass, items, assignments, opened, cursors);
    });

    this.assertNoAddressOverlap(assignments);

    const modules: readonly ModuleInstanceSummary[] = Object.freeze(
      opened.map(module =>
        Object.freeze({
          moduleType: module.model.moduleType,
          signalClass: module.model.signalClass,
          instance: module.instance,
          rack: module.rack,
          slot: module.slot,
          channelsUsed: module.channelsUsed,
          capacity: module.model.capacity
        })
      )
    );
    const reserved = Object.freeze(opened.flatMap(module => this.spareChannels(module)));

    const usedRacks = racksNeeded(modules.length, this.rackLayout);
    const availableRacks = rackCount ?? this.rackLayout.rackCount;
    if (availableRacks !== undefined && usedRacks > availableRacks) {
      this.log({
        level: 'warn',
        scope: 'calculator',
        message: `IO modules need ${usedRacks} racks but only ${availableRacks} are available.`,
        details: { usedRacks, availableRacks, modules: modules.length }
      });
    }

    this.log({
      level: 'info',
      scope: 'calculator',
      message: `Allocated ${assignments.length} points on ${modules.length} modules.`,
      details: { catalogVersion: this.catalog.version }
    });

    return {
      assignments: Object.freeze(assignments),
      modules,
      reserved,
      catalogVersion: this.catalog.version,
      rackCount: usedRacks
    };
  }

  private validateRequirements(items: readonly EquipmentItem[]): void {
    items.forEach(item => {
      SIGNAL_CLASS_ORDER.forEach(signalClass => {
        const count = item.requirements[signalClass];
        if (count === undefined) {
          return;
        }
        if (!Number.isInteger(count) || count < 0) {
          throw new IoPointError(
            'InvalidRequirement',
            `Equipment ${item.id} requests ${count} ${signalClass} points; counts must be non-negative integers.`,
            { item: item.id, signalClass, count }
          );
        }
      });
    });
  }

  private allocateClass(
    signalClass: SignalClass,
    items: readonly EquipmentItem[],
    assignments: ChannelAssignment[],
    modules: OpenModule[],
    cursors: ExtendedCursors
  ): void {
    const total = items.reduce((sum, item) => sum + requiredCount(item, signalClass), 0);
    if (total === 0) {
      return;
    }

    const models = this.catalog.modelsFor(signalClass);
    const extendedPoints = this.catalog.extendedFor(signalClass);
    if (models.length === 0) {
      throw new IoPointError('UnknownModuleType', `No module type serves ${signalClass} points.`, { signalClass });
    }

    let modelIndex = 0;
    let instance = 0;
    let channel = 0;
    let current: OpenModule | undefined;

    items.forEach(item => {
      const count = requiredCount(item, signalClass);
      for (let ordinal = 0; ordinal < count; ordinal += 1) {
        if (channel === 0) {
          let model = models[modelIndex];
          if (model?.maxInstances !== undefined && instance >= model.maxInstances) {
            modelIndex += 1;
            instance = 0;
            model = models[modelIndex];
          }
          if (!model) {
            throw new IoPointError(
              'CapacityExhausted',
              `No ${signalClass} module instance is left for equipment ${item.id}.`,
              { item: item.id, signalClass, allocated: assignments.filter(a => a.signalClass === signalClass).length, total }
            );
          }
          const position = slotForModule(modules.length, this.rackLayout);
          current = { model, instance, rack: position.rack, slot: position.slot, channelsUsed: 0 };
          modules.push(current);
        }

        if (!current) {
          throw new IoPointError('UnknownModuleType', `No open ${signalClass} module.`, { signalClass });
        }

        const { model } = current;
        const address = channelAddress(model, instance, channel);
        const channelCode = `${current.rack}_${current.slot}_${signalClass}_${channel}`;
        const tag = `${tagSegment(item.id)}_${channelCode}`;

        assignments.push(
          Object.freeze({
            moduleType: model.moduleType,
            moduleInstance: instance,
            channelIndex: channel,
            address,
            tag,
            signalClass,
            dataType: model.dataType,
            equipment: item,
            ordinal,
            rack: current.rack,
            slot: current.slot,
            channelCode,
            plcAddress: formatPlcAddress(address, model.dataType),
            commAddress: toCommAddress(address, model.dataType),
            extended: Object.freeze(extendedPoints.map(point => this.allocateExtended(tag, point, cursors)))
          })
        );
        current.channelsUsed += 1;

        channel += 1;
        if (channel === model.capacity) {
          channel = 0;
          instance += 1;
        }
      }
    });
  }

  private allocateExtended(parentTag: string, point: ExtendedPointDefinition, cursors: ExtendedCursors): ExtendedAssignment {
    const { dataType } = point;
    const address = this.catalog.extendedRegion(dataType) + cursors[dataType] * dataTypeWidth(dataType);
    cursors[dataType] += 1;
    return Object.freeze({
      key: point.key,
      label: point.label,
      tag: `${parentTag}${point.suffix}`,
      dataType,
      address,
      plcAddress: formatPlcAddress(address, dataType),
      commAddress: toCommAddress(address, dataType)
    });
  }

  private spareChannels(module: OpenModule): ReservedChannel[] {
    const { model } = module;
    const spares: ReservedChannel[] = [];
    for (let channel = module.channelsUsed; channel < model.capacity; channel += 1) {
      const address = channelAddress(model, module.instance, channel);
      const channelCode = `${module.rack}_${module.slot}_${model.signalClass}_${channel}`;
      spares.push(
        Object.freeze({
          moduleType: model.moduleType,
          moduleInstance: module.instance,
          channelIndex: channel,
          address,
          tag: `${RESERVED_TAG_PREFIX}${channelCode}`,
          description: `${RESERVED_DESCRIPTION_PREFIX}${channelCode}`,
          signalClass: model.signalClass,
          dataType: model.dataType,
          rack: module.rack,
          slot: module.slot,
          channelCode,
          plcAddress: formatPlcAddress(address, model.dataType),
          commAddress: toCommAddress(address, model.dataType)
        })
      );
    }
    return spares;
  }

  private assertNoAddressOverlap(assignments: readonly ChannelAssignment[]): void {
    const spans: OccupiedSpan[] = assignments.flatMap(assignment => [assignment, ...assignment.extended]);
    const sorted = spans.sort((a, b) => a.address - b.address);
    for (let i = 1; i < sorted.length; i += 1) {
      const previous = sorted[i - 1];
      const next = sorted[i];
      if (previous && next && previous.address + dataTypeWidth(previous.dataType) > next.address) {
        throw new IoPointError(
          'AddressCollision',
          `${previous.tag} (${previous.plcAddress}) overlaps ${next.tag} (${next.plcAddress}).`,
          { first: previous.tag, second: next.tag, address: next.address }
        );
      }
    }
  }

  private log(event: EngineLogEvent): void {
    this.options.logger?.(event);
  }
}
