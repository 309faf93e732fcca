import { describe, expect, it } from 'vitest';
import { PointTableService } from '../src/engine/pointTableService';
import type { TableKind } from '../src/types';
import { catchError, collectLogs, loadTestConfig } from './helpers';
import { ROW, sampleInput } from './fixtures';

describe('PointTableService', () => {
  it('reads the checklist and allocates its points', () => {
    const service = new PointTableService(loadTestConfig());
    const response = service.calculate(sampleInput());

    expect(response.cached).toBe(false);
    expect(response.project.projectNumber).toBe('P-001');
    expect(response.catalogVersion).toBe(service.catalogVersion);
    expect(response.rackCount).toBe(1);
    expect(response.assignments.map(a => a.tag)).toEqual([
      'PT_1_1_2_AI_0',
      'P_101_1_3_DI_0',
      'P_101_1_3_DI_1',
      'P_101_1_4_DO_0'
    ]);
    expect(response.assignments[0]?.equipment.station).toBe('North Station');
  });

  it('reuses the allocation of an unchanged checklist', () => {
    const { events, logger } = collectLogs();
    const service = new PointTableService(loadTestConfig(), { logger });

    const first = service.calculate(sampleInput());
    const second = service.calculate(sampleInput());

    expect(second.cached).toBe(true);
    expect(second.assignments).toBe(first.assignments);
    expect(events.filter(event => event.message === 'Reusing cached allocation.')).toHaveLength(1);

    const module = first.modules[0];
    expect(module && Reflect.set(module, 'channelsUsed', 99)).toBe(false);
    expect(service.calculate(sampleInput()).modules[0]?.channelsUsed).toBe(1);

    service.clearCache();
    expect(service.calculate(sampleInput()).cached).toBe(false);
  });

  it('evicts the least recently used allocation', () => {
    const service = new PointTableService(loadTestConfig(), { cacheSize: 1 });
    const other = sampleInput([{ [ROW.equipmentName]: 'Valve', do_count: 1 }]);

    service.calculate(sampleInput());
    service.calculate(other);

    expect(service.calculate(sampleInput()).cached).toBe(false);
    expect(service.calculate(sampleInput()).cached).toBe(true);
  });

  it('generates the requested tables in order', () => {
    const service = new PointTableService(loadTestConfig());
    const progress: Array<[TableKind, number, number]> = [];

    const response = service.generate(
      sampleInput(),
      [{ kind: 'hmi-real' }, { kind: 'plc' }, { kind: 'fat' }],
      {
        onProgress: (kind, completed, total) => {
          progress.push([kind, completed, total]);
        }
      }
    );

    expect(response.tables.map(table => [table.kind, table.templateId, table.rows.length])).toEqual([
      ['hmi-real', 'hmi-real-default', 6],
      ['plc', 'plc-default', 14],
      ['fat', 'fat-default', 4]
    ]);
    expect(response.tables[0]?.rows[0]).toMatchObject({ minValue: '0.000000', maxValue: '1.600000', engineeringUnit: 'MPa' });
    expect(progress.filter(([, completed, total]) => completed === total)).toEqual([
      ['hmi-real', 6, 6],
      ['plc', 14, 14],
      ['fat', 4, 4]
    ]);
  });

  it('adds reserved rows only to the tables that ask for them', () => {
    const service = new PointTableService(loadTestConfig());

    const response = service.generate(sampleInput(), [{ kind: 'fat', includeReserved: true }, { kind: 'fat' }]);

    expect(response.tables.map(table => table.rows.length)).toEqual([40, 4]);
    expect(response.tables[0]?.rows.slice(0, 2).map(row => row.tag)).toEqual(['PT_1_1_2_AI_0', 'YLDW1_2_AI_1']);
    expect(service.exportPlcopen(sampleInput(), { includeReserved: true })).toContain(
      '<variable name="YLDW1_3_DI_2" address="%MX20.2">'
    );
  });

  it('logs a failed run and rethrows it', () => {
    const { events, logger } = collectLogs();
    const service = new PointTableService(loadTestConfig(), { logger });
    const input = sampleInput([{ _id: 'BAD', [ROW.equipmentName]: 'Broken', di_count: -1 }]);

    expect(catchError(() => service.calculate(input))).toMatchObject({ code: 'InvalidRequirement', details: { item: 'BAD' } });
    expect(events.at(-1)).toMatchObject({
      level: 'error',
      scope: 'service',
      details: { code: 'InvalidRequirement', item: 'BAD', signalClass: 'DI', count: -1 }
    });
  });

  it('exports the PLC table as PLCopen XML', () => {
    const service = new PointTableService(loadTestConfig());
    const xml = service.exportPlcopen(sampleInput(), { creationDateTime: '2026-01-05T08:00:00' });

    expect(xml).toContain('<contentHeader name="Demo Plant">');
    expect(xml).toContain('<variable name="P_101_1_3_DI_0" address="%MX20.0">');
  });

  it('describes its catalog and templates', () => {
    const service = new PointTableService(loadTestConfig());

    expect(service.getCatalog().models.map(model => model.moduleType)).toEqual(['LK411', 'LK512', 'LK610', 'LK710']);
    expect(service.getCatalog().extendedPoints.points).toHaveLength(10);
    expect(service.listTemplates()[0]).toEqual({ id: 'plc-default', kind: 'plc', title: 'PLC点表', columns: 10 });
  });
});
