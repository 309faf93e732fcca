import { SIGNAL_CLASS_ORDER } from '../types';
import type { ChannelAssignment, PointDataType, ReservedChannel, SignalClass, TableKind, TableTarget } from '../types';
import { TableGenerator, describePoint, extendedSources } from './tableGenerator';
import type { RowSource, RowValues } from './tableGenerator';

type ModulePosition = Pick<ChannelAssignment, 'moduleType' | 'rack' | 'slot'>;

export function moduleIdentifier(position: ModulePosition): string {
  return `${position.moduleType}-R${position.rack}S${position.slot}`;
}

function variableDefaults(dataType: PointDataType): RowValues {
  const isReal = dataType === 'REAL';
  return {
    dataType,
    initialValue: isReal ? '0' : 'FALSE',
    retain: isReal ? 'TRUE' : 'FALSE',
    forcible: 'TRUE',
    soe: 'FALSE'
  };
}

/**
 * PLC variable table: one row per point on a module type that targets the PLC, each followed by
 * its extended points. BOOL variables start FALSE and do not retain; REAL variables start at 0
 * and retain on power loss.
 */
export class PlcTableGenerator extends TableGenerator {
  public readonly kind: TableKind = 'plc';
  public readonly signalClasses: readonly SignalClass[] = SIGNAL_CLASS_ORDER;
  protected override readonly target: TableTarget = 'plc';
  protected override readonly listsReserved = true;

  protected override collect(
    selected: readonly ChannelAssignment[],
    assignments: readonly ChannelAssignment[],
    reserved: readonly ReservedChannel[]
  ): RowSource[] {
    return super
      .collect(selected, assignments, reserved)
      .flatMap(source => (source.type === 'point' ? [source, ...extendedSources(source.assignment)] : [source]));
  }

  protected buildRow(source: RowSource, index: number): RowValues {
    switch (source.type) {
      case 'point': {
        const { assignment } = source;
        return {
          index: index + 1,
          tag: assignment.tag,
          address: assignment.plcAddress,
          module: moduleIdentifier(assignment),
          comment: describePoint(assignment),
          equipment: assignment.equipment.name,
          channelCode: assignment.channelCode,
          commAddress: assignment.commAddress,
          ...variableDefaults(assignment.dataType)
        };
      }
      case 'extended': {
        const { assignment, point } = source;
        return {
          index: index + 1,
          tag: point.tag,
          address: point.plcAddress,
          module: moduleIdentifier(assignment),
          comment: `${describePoint(assignment)} ${point.label}`,
          equipment: assignment.equipment.name,
          channelCode: assignment.channelCode,
          commAddress: point.commAddress,
          ...variableDefaults(point.dataType)
        };
      }
      case 'reserved': {
        const { channel } = source;
        return {
          index: index + 1,
          tag: channel.tag,
          address: channel.plcAddress,
          module: moduleIdentifier(channel),
          comment: channel.description,
          channelCode: channel.channelCode,
          commAddress: channel.commAddress,
          ...variableDefaults(channel.dataType)
        };
      }
    }
  }
}
