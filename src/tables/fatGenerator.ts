import { SIGNAL_CLASS_ORDER } from '../types';
import type { SignalClass, TableKind } from '../types';
import { moduleIdentifier } from './plcGenerator';
import { TableGenerator, describePoint } from './tableGenerator';
import type { RowSource, RowValues } from './tableGenerator';

/**
 * Factory acceptance sheet: PLC and HMI columns side by side for every allocated point. Extended
 * points become column triples: `<key>` holds the tag, `<key>Address` the PLC address and
 * `<key>CommAddress` the communication address.
 */
export class FatTableGenerator extends TableGenerator {
  public readonly kind: TableKind = 'fat';
  public readonly signalClasses: readonly SignalClass[] = SIGNAL_CLASS_ORDER;
  protected override readonly listsReserved = true;

  protected buildRow(source: RowSource, index: number): RowValues {
    if (source.type === 'reserved') {
      const { channel } = source;
      return {
        index: index + 1,
        signalClass: channel.signalClass,
        moduleType: channel.moduleType,
        module: moduleIdentifier(channel),
        channelCode: channel.channelCode,
        tag: channel.tag,
        description: channel.description,
        dataType: channel.dataType,
        address: channel.plcAddress,
        commAddress: channel.commAddress
      };
    }

    const { assignment } = source;
    const range = assignment.equipment.engineeringRange;
    const row: RowValues = {
      index: index + 1,
      equipment: assignment.equipment.name,
      signalClass: assignment.signalClass,
      moduleType: assignment.moduleType,
      module: moduleIdentifier(assignment),
      channelCode: assignment.channelCode,
      tag: assignment.tag,
      station: assignment.equipment.station,
      description: describePoint(assignment),
      dataType: assignment.dataType,
      address: assignment.plcAddress,
      commAddress: assignment.commAddress,
      rangeLow: range?.low,
      rangeHigh: range?.high,
      engineeringUnit: range?.unit
    };
    assignment.extended.forEach(point => {
      row[point.key] = point.tag;
      row[`${point.key}Address`] = point.plcAddress;
      row[`${point.key}CommAddress`] = point.commAddress;
    });
    return row;
  }
}
