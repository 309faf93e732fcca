import { IoPointError, emptyAssignmentSet } from '../errors';
import type { EngineLogger } from '../engine/engineTypes';
import type { ChannelModelCatalog } from '../io/channelModelCatalog';
import type {
  ChannelAssignment,
  ExtendedAssignment,
  GeneratedTable,
  PointDataType,
  ProgressSink,
  ReservedChannel,
  SignalClass,
  TableKind,
  TableRow,
  TableTarget
} from '../types';
import type { TableTemplate, TemplateColumn, TemplateRegistry } from './tableTemplates';

export interface GenerateOptions {
  onProgress?: ProgressSink;
  logger?: EngineLogger;
  // Spare channels to list; only generators that render reserved rows read them.
  reserved?: readonly ReservedChannel[];
}

export type RowValues = Record<string, string | number | undefined>;

export type RowSource =
  | { readonly type: 'point'; readonly assignment: ChannelAssignment }
  | { readonly type: 'extended'; readonly assignment: ChannelAssignment; readonly point: ExtendedAssignment }
  | { readonly type: 'reserved'; readonly channel: ReservedChannel };

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}

export function describePoint(assignment: ChannelAssignment): string {
  return `${assignment.equipment.name} ${assignment.signalClass}-${assignment.ordinal + 1}`;
}

export function sourceTag(source: RowSource): string {
  switch (source.type) {
    case 'point':
      return source.assignment.tag;
    case 'extended':
      return source.point.tag;
    case 'reserved':
      return source.channel.tag;
  }
}

export function sourceItem(source: RowSource): string | undefined {
  return source.type === 'reserved' ? undefined : source.assignment.equipment.id;
}

export function extendedSources(assignment: ChannelAssignment, dataType?: PointDataType): RowSource[] {
  return assignment.extended
    .filter(point => dataType === undefined || point.dataType === dataType)
    .map((point): RowSource => ({ type: 'extended', assignment, point }));
}

function channelPosition(source: RowSource): [number, number, number] {
  const channel = source.type === 'reserved' ? source.channel : source.assignment;
  return [channel.rack, channel.slot, channel.channelIndex];
}

function byChannelPosition(a: RowSource, b: RowSource): number {
  const [rackA, slotA, channelA] = channelPosition(a);
  const [rackB, slotB, channelB] = channelPosition(b);
  return rackA - rackB || slotA - slotB || channelA - channelB;
}

/**
 * Projects a finished assignment sequence through a template. Subclasses pick the assignments
 * they render and compute every value a template of their kind may ask for.
 */
export abstract class TableGenerator {
  public abstract readonly kind: TableKind;
  public abstract readonly signalClasses: readonly SignalClass[];
  // Module types whose targets leave this system out are skipped; unset means every module type.
  protected readonly target?: TableTarget;
  protected readonly listsReserved: boolean = false;

  constructor(
    protected readonly templates: TemplateRegistry,
    protected readonly catalog: ChannelModelCatalog
  ) {}

  public generate(
    assignments: readonly ChannelAssignment[],
    templateRef?: string,
    options: GenerateOptions = {}
  ): GeneratedTable {
    const template = templateRef ? this.templates.get(templateRef) : this.templates.defaultFor(this.kind);
    if (template.kind !== this.kind) {
      throw new IoPointError(
        'TemplateMismatch',
        `Template ${template.id} renders ${template.kind} tables, not ${this.kind}.`,
        { template: template.id, kind: this.kind }
      );
    }

    const selected = this.select(assignments);
    if (selected.length === 0) {
      throw emptyAssignmentSet(template.id, this.signalClasses);
    }

    const reserved = this.listsReserved ? this.selectReserved(options.reserved ?? []) : [];
    const sources = this.collect(selected, assignments, reserved);
    const rows: TableRow[] = [];
    sources.forEach((source, index) => {
      rows.push(this.project(template, source, this.buildRow(source, index)));
      this.notify(options, index + 1, sources.length);
    });

    return {
      kind: this.kind,
      templateId: template.id,
      signalClasses: this.signalClasses,
      columns: template.columns.map(column => ({ key: column.key, header: column.header })),
      rows
    };
  }

  protected select(assignments: readonly ChannelAssignment[]): ChannelAssignment[] {
    return this.forTarget(assignments).filter(assignment => this.signalClasses.includes(assignment.signalClass));
  }

  protected forTarget(assignments: readonly ChannelAssignment[]): ChannelAssignment[] {
    return assignments.filter(assignment => this.targets(assignment.moduleType));
  }

  /**
   * Rows in table order. The default lists every selected point, with the reserved channels
   * merged in channel order.
   */
  protected collect(
    selected: readonly ChannelAssignment[],
    _assignments: readonly ChannelAssignment[],
    reserved: readonly ReservedChannel[]
  ): RowSource[] {
    const points = selected.map((assignment): RowSource => ({ type: 'point', assignment }));
    if (reserved.length === 0) {
      return points;
    }
    const spares = reserved.map((channel): RowSource => ({ type: 'reserved', channel }));
    return [...points, ...spares].sort(byChannelPosition);
  }

  protected abstract buildRow(source: RowSource, index: number): RowValues;

  protected missingValue(template: TableTemplate, column: TemplateColumn, source: RowSource): IoPointError {
    return new IoPointError(
      'MissingColumnValue',
      `Column ${column.header} of template ${template.id} is mandatory but ${sourceTag(source)} has no value for it.`,
      { template: template.id, column: column.key, tag: sourceTag(source), item: sourceItem(source) }
    );
  }

  private targets(moduleType: string): boolean {
    const target = this.target;
    return target === undefined || this.catalog.lookup(moduleType).targets.includes(target);
  }

  private selectReserved(reserved: readonly ReservedChannel[]): ReservedChannel[] {
    return reserved.filter(channel => this.signalClasses.includes(channel.signalClass) && this.targets(channel.moduleType));
  }

  private project(template: TableTemplate, source: RowSource, values: RowValues): TableRow {
    const row: Record<string, string> = {};
    template.columns.forEach(column => {
      const raw = values[column.key];
      const generated = raw === undefined ? '' : String(raw);
      const value = generated.trim().length > 0 ? generated : column.default ?? '';
      if (column.mandatory && value.trim().length === 0) {
        throw this.missingValue(template, column, source);
      }
      row[column.key] = value;
    });
    return Object.freeze(row);
  }

  private notify(options: GenerateOptions, completed: number, total: number): void {
    const sink = options.onProgress;
    if (!sink) {
      return;
    }
    const report = (error: unknown): void => {
      options.logger?.({
        level: 'warn',
        scope: 'tables',
        message: `Progress sink failed: ${error instanceof Error ? error.message : String(error)}`,
        details: { kind: this.kind, completed, total }
      });
    };
    try {
      const result = sink(completed, total);
      if (isPromiseLike(result)) {
        result.then(undefined, report);
      }
    } catch (error) {
      report(error);
    }
  }
}
