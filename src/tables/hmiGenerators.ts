import { IoPointError } from '../errors';
import { ANALOG_CLASSES, DISCRETE_CLASSES } from '../types';
import type { ChannelAssignment, ReservedChannel, SignalClass, TableKind, TableTarget } from '../types';
import { TableGenerator, describePoint, extendedSources, sourceItem, sourceTag } from './tableGenerator';
import type { RowSource, RowValues } from './tableGenerator';
import type { TableTemplate, TemplateColumn } from './tableTemplates';

const RANGE_COLUMNS: ReadonlySet<string> = new Set(['minValue', 'maxValue', 'engineeringUnit']);

function formatScale(value: number | undefined): string | undefined {
  return value === undefined ? undefined : value.toFixed(6);
}

// HMI tables never list reserved channels, so every source belongs to an assignment.
function hostAssignment(source: RowSource): ChannelAssignment | undefined {
  return source.type === 'reserved' ? undefined : source.assignment;
}

function hmiBase(source: RowSource, index: number): RowValues {
  const assignment = hostAssignment(source);
  if (!assignment) {
    return { tagId: index + 1, tagName: sourceTag(source) };
  }
  const point = source.type === 'extended' ? source.point : undefined;
  return {
    tagId: index + 1,
    tagName: point ? point.tag : assignment.tag,
    description: point ? `${describePoint(assignment)}_${point.label}` : describePoint(assignment),
    deviceName: assignment.equipment.station,
    tagGroup: assignment.equipment.station,
    address: point ? point.plcAddress : assignment.plcAddress,
    commAddress: point ? point.commAddress : assignment.commAddress,
    equipment: assignment.equipment.name
  };
}

/**
 * Discrete HMI tags (IO_DISC sheet): the DI/DO points, then the alarm and maintenance bits of
 * the analog points. Coil item names carry the leading 0 of the 0xxxxx range.
 */
export class HmiBoolTableGenerator extends TableGenerator {
  public readonly kind: TableKind = 'hmi-bool';
  public readonly signalClasses: readonly SignalClass[] = DISCRETE_CLASSES;
  protected override readonly target: TableTarget = 'hmi';

  protected override collect(
    selected: readonly ChannelAssignment[],
    assignments: readonly ChannelAssignment[],
    reserved: readonly ReservedChannel[]
  ): RowSource[] {
    return [
      ...super.collect(selected, assignments, reserved),
      ...this.forTarget(assignments).flatMap(assignment => extendedSources(assignment, 'BOOL'))
    ];
  }

  protected buildRow(source: RowSource, index: number): RowValues {
    const base = hmiBase(source, index);
    return {
      ...base,
      discreteType: hostAssignment(source)?.signalClass,
      tagDataType: 'IODisc',
      itemName: `0${base.commAddress ?? ''}`,
      itemDataType: 'BIT'
    };
  }
}

/**
 * Analog HMI tags (IO_FLOAT sheet): the AI/AO points, then their limit and maintenance setpoints.
 * Setpoints share the engineering range of their point. Range columns stay blank for equipment
 * without a range unless the template marks them mandatory.
 */
export class HmiRealTableGenerator extends TableGenerator {
  public readonly kind: TableKind = 'hmi-real';
  public readonly signalClasses: readonly SignalClass[] = ANALOG_CLASSES;
  protected override readonly target: TableTarget = 'hmi';

  protected override collect(
    selected: readonly ChannelAssignment[],
    assignments: readonly ChannelAssignment[],
    reserved: readonly ReservedChannel[]
  ): RowSource[] {
    return [
      ...super.collect(selected, assignments, reserved),
      ...selected.flatMap(assignment => extendedSources(assignment, 'REAL'))
    ];
  }

  protected buildRow(source: RowSource, index: number): RowValues {
    const base = hmiBase(source, index);
    const assignment = hostAssignment(source);
    const range = assignment?.equipment.engineeringRange;
    return {
      ...base,
      analogType: assignment?.signalClass,
      tagDataType: 'IOFloat',
      itemName: base.commAddress === undefined ? undefined : String(base.commAddress),
      itemDataType: 'FLOAT',
      minValue: formatScale(range?.low),
      maxValue: formatScale(range?.high),
      engineeringUnit: range?.unit
    };
  }

  protected override missingValue(template: TableTemplate, column: TemplateColumn, source: RowSource): IoPointError {
    if (!RANGE_COLUMNS.has(column.key)) {
      return super.missingValue(template, column, source);
    }
    return new IoPointError(
      'MissingEngineeringRange',
      `Template ${template.id} requires ${column.header} but equipment ${sourceItem(source) ?? sourceTag(source)} lacks engineering range data.`,
      { template: template.id, column: column.key, item: sourceItem(source), tag: sourceTag(source) }
    );
  }
}
