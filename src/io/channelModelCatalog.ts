import { createHash } from 'node:crypto';
import { IoPointError, invalidModuleModel } from '../errors';
import type { ChannelModel, ExtendedPointDefinition, ExtendedPointLayout, PointDataType, SignalClass } from '../types';
import { dataTypeWidth } from './addressFormat';

interface AddressRange {
  start: number;
  end: number;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function instanceZeroRange(model: ChannelModel): AddressRange {
  const { base, channelStride } = model.addressing;
  return {
    start: base,
    end: base + (model.capacity - 1) * channelStride + dataTypeWidth(model.dataType)
  };
}

function overlaps(a: AddressRange, b: AddressRange): boolean {
  return a.start < b.end && b.start < a.end;
}

function validateModel(model: ChannelModel): void {
  const { moduleType, capacity, addressing } = model;
  if (!isPositiveInteger(capacity)) {
    throw invalidModuleModel(moduleType, `Module ${moduleType} capacity must be a positive integer (got ${capacity}).`);
  }
  if (!Number.isInteger(addressing.base) || addressing.base < 0) {
    throw invalidModuleModel(moduleType, `Module ${moduleType} base address must be a non-negative integer.`);
  }
  if (!isPositiveInteger(addressing.channelStride) || !isPositiveInteger(addressing.instanceStride)) {
    throw invalidModuleModel(moduleType, `Module ${moduleType} strides must be positive integers.`);
  }
  const width = dataTypeWidth(model.dataType);
  if (addressing.channelStride < width) {
    throw invalidModuleModel(
      moduleType,
      `Module ${moduleType} channel stride ${addressing.channelStride} is narrower than a ${model.dataType} (${width} bits).`
    );
  }
  if (addressing.instanceStride < capacity * addressing.channelStride) {
    throw invalidModuleModel(
      moduleType,
      `Module ${moduleType} instance stride ${addressing.instanceStride} overlaps the next instance (needs ${capacity * addressing.channelStride}).`
    );
  }
  if (model.maxInstances !== undefined && !isPositiveInteger(model.maxInstances)) {
    throw invalidModuleModel(moduleType, `Module ${moduleType} maxInstances must be a positive integer.`);
  }
  // %MD addresses name whole bytes, so a REAL may not start inside one.
  if (
    model.dataType === 'REAL' &&
    [addressing.base, addressing.channelStride, addressing.instanceStride].some(value => value % 8 !== 0)
  ) {
    throw invalidModuleModel(moduleType, `Module ${moduleType} REAL addressing must be whole bytes (multiples of 8 bits).`);
  }
  const expectedType = model.signalClass === 'AI' || model.signalClass === 'AO' ? 'REAL' : 'BOOL';
  if (model.dataType !== expectedType) {
    throw invalidModuleModel(moduleType, `Module ${moduleType} serves ${model.signalClass} and must carry ${expectedType} points.`);
  }
}

const EMPTY_LAYOUT: ExtendedPointLayout = Object.freeze({
  regions: Object.freeze({ BOOL: 0, REAL: 0 }),
  points: Object.freeze([])
});

function invalidExtendedPoint(key: string, message: string): IoPointError {
  return new IoPointError('InvalidModuleModel', message, { point: key });
}

function freezeLayout(layout: ExtendedPointLayout): ExtendedPointLayout {
  (['BOOL', 'REAL'] as const).forEach(dataType => {
    const base = layout.regions[dataType];
    if (!Number.isInteger(base) || base < 0) {
      throw invalidExtendedPoint(dataType, `Extended ${dataType} region base must be a non-negative integer.`);
    }
  });
  if (layout.regions.REAL % 8 !== 0) {
    throw invalidExtendedPoint('REAL', 'Extended REAL region must start on a whole byte.');
  }

  const keys = new Set<string>();
  const suffixes = new Set<string>();
  const points = layout.points.map(point => {
    if (keys.has(point.key)) {
      throw invalidExtendedPoint(point.key, `Extended point ${point.key} is declared twice.`);
    }
    if (point.suffix.length === 0 || suffixes.has(point.suffix)) {
      throw invalidExtendedPoint(point.key, `Extended point ${point.key} needs a unique, non-empty tag suffix.`);
    }
    if (point.signalClasses.length === 0) {
      throw invalidExtendedPoint(point.key, `Extended point ${point.key} applies to no signal class.`);
    }
    keys.add(point.key);
    suffixes.add(point.suffix);
    return Object.freeze({ ...point, signalClasses: Object.freeze([...point.signalClasses]) });
  });

  return Object.freeze({ regions: Object.freeze({ ...layout.regions }), points: Object.freeze(points) });
}

/**
 * Read-only registry of hardware module types. Construction validates every entry; a catalog
 * instance that exists is consistent.
 */
export class ChannelModelCatalog {
  public readonly version: string;
  private readonly models: ReadonlyMap<string, ChannelModel>;
  private readonly declared: readonly ChannelModel[];
  public readonly extendedPoints: ExtendedPointLayout;

  constructor(models: readonly ChannelModel[], extendedPoints?: ExtendedPointLayout) {
    const registered = new Map<string, ChannelModel>();
    models.forEach(model => {
      validateModel(model);
      if (registered.has(model.moduleType)) {
        throw invalidModuleModel(model.moduleType, `Module type ${model.moduleType} is registered twice.`);
      }
      registered.forEach(other => {
        if (other.signalClass === model.signalClass && overlaps(instanceZeroRange(other), instanceZeroRange(model))) {
          throw invalidModuleModel(
            model.moduleType,
            `Module ${model.moduleType} overlaps ${other.moduleType} in the ${model.signalClass} address range.`
          );
        }
      });
      registered.set(model.moduleType, Object.freeze({ ...model, targets: Object.freeze([...model.targets]) }));
    });

    this.models = registered;
    this.declared = Object.freeze(Array.from(registered.values()));
    this.extendedPoints = extendedPoints ? freezeLayout(extendedPoints) : EMPTY_LAYOUT;

    const hash = createHash('sha256').update(JSON.stringify(this.declared));
    if (this.extendedPoints.points.length > 0) {
      hash.update(JSON.stringify(this.extendedPoints));
    }
    this.version = hash.digest('hex').slice(0, 16);
  }

  public lookup(moduleType: string): ChannelModel {
    const model = this.models.get(moduleType);
    if (!model) {
      throw new IoPointError('UnknownModuleType', `Module type ${moduleType} is not registered.`, { moduleType });
    }
    return model;
  }

  public has(moduleType: string): boolean {
    return this.models.has(moduleType);
  }

  public all(): readonly ChannelModel[] {
    return this.declared;
  }

  public modelsFor(signalClass: SignalClass): ChannelModel[] {
    return this.declared
      .map((model, index) => ({ model, index }))
      .filter(entry => entry.model.signalClass === signalClass)
      .sort((a, b) => a.model.priority - b.model.priority || a.index - b.index)
      .map(entry => entry.model);
  }

  public extendedFor(signalClass: SignalClass): ExtendedPointDefinition[] {
    return this.extendedPoints.points.filter(point => point.signalClasses.includes(signalClass));
  }

  public extendedRegion(dataType: PointDataType): number {
    return this.extendedPoints.regions[dataType];
  }

  // Checklist rows name modules inside free-text spec models, e.g. "LK610 16-ch DI".
  public matchModel(specModel: string | undefined): ChannelModel | undefined {
    if (!specModel) {
      return undefined;
    }
    const normalized = specModel.toUpperCase();
    return this.declared.find(model => normalized.includes(model.moduleType.toUpperCase()));
  }
}
