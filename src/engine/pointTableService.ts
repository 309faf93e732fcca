import { createHash } from 'node:crypto';
import type { EngineConfig } from '../config/configLoader';
import { isIoPointError } from '../errors';
import { ChannelCalculator } from '../io/channelCalculator';
import { readChecklist } from '../schema/checklistReader';
import type { ChecklistReadResult } from '../schema/checklistReader';
import { renderPlcopenGlobalVars } from '../services/plcopenExport';
import { FatTableGenerator } from '../tables/fatGenerator';
import { HmiBoolTableGenerator, HmiRealTableGenerator } from '../tables/hmiGenerators';
import { PlcTableGenerator } from '../tables/plcGenerator';
import type { TableGenerator } from '../tables/tableGenerator';
import type { ChannelModel, EquipmentItem, ExtendedPointLayout, TableKind } from '../types';
import type {
  CalculationResponse,
  CalculationResult,
  EngineLogEvent,
  EngineLogger,
  GenerationResponse,
  PointTableInput,
  TableRequest
} from './engineTypes';

const DEFAULT_CACHE_SIZE = 32;

export interface PointTableServiceOptions {
  logger?: EngineLogger;
  cacheSize?: number;
}

export interface GenerateTablesOptions {
  onProgress?: (kind: TableKind, completed: number, total: number) => unknown;
}

export interface PlcopenExportRequest {
  template?: string;
  variableListName?: string;
  creationDateTime?: string;
  includeReserved?: boolean;
}

export interface CatalogSnapshot {
  version: string;
  models: readonly ChannelModel[];
  extendedPoints: ExtendedPointLayout;
}

/**
 * Entry point shared by the hosts: reads a checklist, allocates channels and renders tables.
 * Allocation runs are memoized per equipment sequence and catalog version; a cached result is
 * frozen, so callers share it safely.
 */
export class PointTableService {
  private readonly calculator: ChannelCalculator;
  private readonly generators: Record<TableKind, TableGenerator>;
  private readonly cache = new Map<string, CalculationResult>();
  private readonly cacheSize: number;

  constructor(
    private readonly config: EngineConfig,
    private readonly options: PointTableServiceOptions = {}
  ) {
    this.cacheSize = Math.max(1, Math.floor(options.cacheSize ?? DEFAULT_CACHE_SIZE));
    this.calculator = new ChannelCalculator(config.catalog, {
      rackLayout: config.rackLayout,
      logger: options.logger
    });
    this.generators = {
      plc: new PlcTableGenerator(config.templates, config.catalog),
      'hmi-bool': new HmiBoolTableGenerator(config.templates, config.catalog),
      'hmi-real': new HmiRealTableGenerator(config.templates, config.catalog),
      fat: new FatTableGenerator(config.templates, config.catalog)
    };
  }

  public get catalogVersion(): string {
    return this.config.catalog.version;
  }

  public getCatalog(): CatalogSnapshot {
    const { catalog } = this.config;
    return { version: catalog.version, models: catalog.all(), extendedPoints: catalog.extendedPoints };
  }

  public listTemplates(): Array<{ id: string; kind: TableKind; title?: string; columns: number }> {
    return this.config.templates.list().map(template => ({
      id: template.id,
      kind: template.kind,
      title: template.title,
      columns: template.columns.length
    }));
  }

  public read(input: PointTableInput): ChecklistReadResult {
    return readChecklist(
      input.main,
      input.equipment,
      this.config.registry,
      this.config.catalog,
      this.config.rackLayout.rackModel
    );
  }

  public calculate(input: PointTableInput): CalculationResponse {
    return this.run('calculate', () => {
      const checklist = this.read(input);
      const { result, cached } = this.calculateItems(checklist.items, checklist.rackCount);
      return { ...result, project: checklist.project, cached };
    });
  }

  public generate(
    input: PointTableInput,
    requests: readonly TableRequest[],
    options: GenerateTablesOptions = {}
  ): GenerationResponse {
    return this.run('generate', () => {
      const checklist = this.read(input);
      const { result } = this.calculateItems(checklist.items, checklist.rackCount);
      const onProgress = options.onProgress;
      const tables = requests.map(request =>
        this.generators[request.kind].generate(result.assignments, request.template, {
          logger: this.options.logger,
          reserved: request.includeReserved ? result.reserved : undefined,
          onProgress: onProgress ? (completed, total) => onProgress(request.kind, completed, total) : undefined
        })
      );
      this.log({
        level: 'info',
        scope: 'service',
        message: `Generated ${tables.length} tables from ${result.assignments.length} points.`,
        details: { kinds: requests.map(request => request.kind).join(','), catalogVersion: result.catalogVersion }
      });
      return { project: checklist.project, catalogVersion: result.catalogVersion, tables };
    });
  }

  public exportPlcopen(input: PointTableInput, request: PlcopenExportRequest = {}): string {
    const generated = this.generate(input, [
      { kind: 'plc', template: request.template, includeReserved: request.includeReserved }
    ]);
    const [table] = generated.tables;
    if (!table) {
      throw new Error('PLC table generation returned no table.');
    }
    return renderPlcopenGlobalVars(table, {
      projectName: generated.project.projectName ?? generated.project.projectNumber ?? 'IO',
      variableListName: request.variableListName,
      creationDateTime: request.creationDateTime
    });
  }

  public clearCache(): void {
    this.cache.clear();
  }

  private calculateItems(
    items: readonly EquipmentItem[],
    rackCount: number | undefined
  ): { result: CalculationResult; cached: boolean } {
    const key = this.cacheKey(items);
    const hit = this.cache.get(key);
    if (hit) {
      // Re-insert so eviction drops the least recently used run.
      this.cache.delete(key);
      this.cache.set(key, hit);
      this.log({ level: 'info', scope: 'service', message: 'Reusing cached allocation.', details: { key } });
      return { result: hit, cached: true };
    }

    const result = this.calculator.calculate(items, rackCount);
    this.cache.set(key, result);
    while (this.cache.size > this.cacheSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done) {
        break;
      }
      this.cache.delete(oldest.value);
    }
    return { result, cached: false };
  }

  private cacheKey(items: readonly EquipmentItem[]): string {
    return createHash('sha256')
      .update(this.config.catalog.version)
      .update('\n')
      .update(JSON.stringify(items))
      .digest('hex');
  }

  private run<T>(operation: string, action: () => T): T {
    try {
      return action();
    } catch (error) {
      this.log({
        level: 'error',
        scope: 'service',
        message: `${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
        details: isIoPointError(error) ? { code: error.code, ...error.details } : undefined
      });
      throw error;
    }
  }

  private log(event: EngineLogEvent): void {
    this.options.logger?.(event);
  }
}
