import { describe, expect, it } from 'vitest';
import { buildCatalog } from '../src/config/configLoader';
import { ChannelCalculator } from '../src/io/channelCalculator';
import type { ChannelModelCatalog } from '../src/io/channelModelCatalog';
import { FatTableGenerator } from '../src/tables/fatGenerator';
import { HmiBoolTableGenerator, HmiRealTableGenerator } from '../src/tables/hmiGenerators';
import { PlcTableGenerator } from '../src/tables/plcGenerator';
import { TemplateRegistry } from '../src/tables/tableTemplates';
import type { CalculationResult } from '../src/engine/engineTypes';
import type { ChannelAssignment, EquipmentItem } from '../src/types';
import { catchError, collectLogs, equipment, loadTestConfig } from './helpers';

const config = loadTestConfig();

const pump = equipment('P-101', { DI: 2, DO: 1 }, { name: 'Feed pump' });
const transmitter = equipment('PT-1', { AI: 1 }, { name: 'Inlet pressure', engineeringRange: { low: 0, high: 1.6, unit: 'MPa' } });

function calculate(items: EquipmentItem[], catalog: ChannelModelCatalog = config.catalog): CalculationResult {
  return new ChannelCalculator(catalog, { rackLayout: config.rackLayout }).calculate(items);
}

function allocate(items: EquipmentItem[], catalog: ChannelModelCatalog = config.catalog): readonly ChannelAssignment[] {
  return calculate(items, catalog).assignments;
}

describe('PlcTableGenerator', () => {
  it('renders one row per point with the PLC variable defaults', () => {
    const table = new PlcTableGenerator(config.templates, config.catalog).generate(allocate([pump, transmitter]));

    expect(table.templateId).toBe('plc-default');
    expect(table.columns[1]).toEqual({ key: 'tag', header: '变量名' });
    expect(table.rows).toHaveLength(14);
    expect(table.rows[0]).toEqual({
      index: '1',
      tag: 'PT_1_1_2_AI_0',
      address: '%MD2000',
      comment: 'Inlet pressure AI-1',
      dataType: 'REAL',
      initialValue: '0',
      retain: 'TRUE',
      forcible: 'TRUE',
      soe: 'FALSE',
      module: 'LK411-R1S2'
    });
    expect(table.rows[13]).toEqual({
      index: '14',
      tag: 'P_101_1_4_DO_0',
      address: '%MX420.0',
      comment: 'Feed pump DO-1',
      dataType: 'BOOL',
      initialValue: 'FALSE',
      retain: 'FALSE',
      forcible: 'TRUE',
      soe: 'FALSE',
      module: 'LK710-R1S4'
    });
  });

  it('follows every analog point with its extended points', () => {
    const table = new PlcTableGenerator(config.templates, config.catalog).generate(allocate([pump, transmitter]));

    expect(table.rows.slice(1, 11).map(row => row.tag)).toEqual([
      'PT_1_1_2_AI_0_LoLoLimit',
      'PT_1_1_2_AI_0_LoLimit',
      'PT_1_1_2_AI_0_HiLimit',
      'PT_1_1_2_AI_0_HiHiLimit',
      'PT_1_1_2_AI_0_LL',
      'PT_1_1_2_AI_0_L',
      'PT_1_1_2_AI_0_H',
      'PT_1_1_2_AI_0_HH',
      'PT_1_1_2_AI_0_whz',
      'PT_1_1_2_AI_0_MAIN_EN'
    ]);
    expect(table.rows[1]).toEqual({
      index: '2',
      tag: 'PT_1_1_2_AI_0_LoLoLimit',
      address: '%MD10000',
      comment: 'Inlet pressure AI-1 SLL设定点位',
      dataType: 'REAL',
      initialValue: '0',
      retain: 'TRUE',
      forcible: 'TRUE',
      soe: 'FALSE',
      module: 'LK411-R1S2'
    });
    expect(table.rows[5]).toMatchObject({
      tag: 'PT_1_1_2_AI_0_LL',
      address: '%MX1000.0',
      comment: 'Inlet pressure AI-1 LL报警',
      dataType: 'BOOL',
      initialValue: 'FALSE',
      retain: 'FALSE'
    });
    expect(table.rows[11]?.tag).toBe('P_101_1_3_DI_0');
  });

  it('lists spare channels as reserved rows on request', () => {
    const result = calculate([pump]);
    const generator = new PlcTableGenerator(config.templates, config.catalog);

    expect(generator.generate(result.assignments).rows).toHaveLength(3);

    const table = generator.generate(result.assignments, undefined, { reserved: result.reserved });
    expect(table.rows).toHaveLength(32);
    expect(table.rows[2]).toEqual({
      index: '3',
      tag: 'YLDW1_2_DI_2',
      address: '%MX20.2',
      comment: '预留点位1_2_DI_2',
      dataType: 'BOOL',
      initialValue: 'FALSE',
      retain: 'FALSE',
      forcible: 'TRUE',
      soe: 'FALSE',
      module: 'LK610-R1S2'
    });
    expect(table.rows.slice(15, 18).map(row => row.tag)).toEqual(['YLDW1_2_DI_15', 'P_101_1_3_DO_0', 'YLDW1_3_DO_1']);
  });

  it('produces identical rows on every export', () => {
    const generator = new PlcTableGenerator(config.templates, config.catalog);
    const assignments = allocate([pump, transmitter]);

    expect(generator.generate(assignments)).toEqual(generator.generate(assignments));
  });

  it('skips module types that do not target the PLC', () => {
    const catalog = buildCatalog({
      models: [
        { moduleType: 'LK610', signalClass: 'DI', capacity: 16, base: '%MX20.0', targets: ['hmi'] },
        { moduleType: 'LK710', signalClass: 'DO', capacity: 16, base: '%MX60.0' }
      ]
    });
    const assignments = allocate([pump], catalog);

    expect(new PlcTableGenerator(config.templates, catalog).generate(assignments).rows.map(row => row.tag)).toEqual([
      'P_101_1_3_DO_0'
    ]);
    expect(new HmiBoolTableGenerator(config.templates, catalog).generate(assignments).rows).toHaveLength(3);
    expect(
      catchError(() => new PlcTableGenerator(config.templates, catalog).generate(allocate([equipment('S1', { DI: 1 })], catalog)))
    ).toMatchObject({ code: 'EmptyAssignmentSet', details: { template: 'plc-default' } });
  });

  it('rejects templates of another kind and unknown templates', () => {
    const generator = new PlcTableGenerator(config.templates, config.catalog);
    const assignments = allocate([pump]);

    expect(catchError(() => generator.generate(assignments, 'fat-default'))).toMatchObject({
      code: 'TemplateMismatch',
      details: { template: 'fat-default', kind: 'plc' }
    });
    expect(catchError(() => generator.generate(assignments, 'plc-missing'))).toMatchObject({
      code: 'UnknownTemplate',
      details: { template: 'plc-missing' }
    });
  });

  it('fails when a mandatory column has no value', () => {
    const templates = new TemplateRegistry([
      {
        id: 'plc-with-owner',
        kind: 'plc',
        columns: [
          { key: 'tag', header: 'Tag' },
          { key: 'owner', header: 'Owner', mandatory: true }
        ]
      }
    ]);

    expect(catchError(() => new PlcTableGenerator(templates, config.catalog).generate(allocate([pump])))).toMatchObject({
      code: 'MissingColumnValue',
      details: { template: 'plc-with-owner', column: 'owner', tag: 'P_101_1_2_DI_0', item: 'P-101' }
    });
  });

  it('reports progress after every row', () => {
    const calls: Array<[number, number]> = [];
    new PlcTableGenerator(config.templates, config.catalog).generate(allocate([pump]), undefined, {
      onProgress: (completed, total) => {
        calls.push([completed, total]);
      }
    });

    expect(calls).toEqual([
      [1, 3],
      [2, 3],
      [3, 3]
    ]);
  });

  it('keeps generating when the progress sink fails', async () => {
    const { events, logger } = collectLogs();
    const generator = new PlcTableGenerator(config.templates, config.catalog);
    const assignments = allocate([pump]);

    const table = generator.generate(assignments, undefined, {
      logger,
      onProgress: () => {
        throw new Error('sink closed');
      }
    });
    expect(table.rows).toHaveLength(3);
    expect(events.map(event => [event.level, event.scope, event.message])).toEqual([
      ['warn', 'tables', 'Progress sink failed: sink closed'],
      ['warn', 'tables', 'Progress sink failed: sink closed'],
      ['warn', 'tables', 'Progress sink failed: sink closed']
    ]);

    events.length = 0;
    generator.generate(assignments, undefined, {
      logger,
      onProgress: async () => {
        throw new Error('late failure');
      }
    });
    await new Promise(resolve => setTimeout(resolve, 0));
    expect(events).toHaveLength(3);
    expect(events[0]).toMatchObject({ level: 'warn', message: 'Progress sink failed: late failure' });
  });
});

describe('HMI generators', () => {
  it('renders discrete tags with coil item names', () => {
    const table = new HmiBoolTableGenerator(config.templates, config.catalog).generate(allocate([pump, transmitter]));

    expect(table.templateId).toBe('hmi-bool-default');
    expect(table.rows.map(row => row.tagName)).toEqual([
      'P_101_1_3_DI_0',
      'P_101_1_3_DI_1',
      'P_101_1_4_DO_0',
      'PT_1_1_2_AI_0_LL',
      'PT_1_1_2_AI_0_L',
      'PT_1_1_2_AI_0_H',
      'PT_1_1_2_AI_0_HH',
      'PT_1_1_2_AI_0_MAIN_EN'
    ]);
    expect(table.rows[0]).toEqual({
      tagId: '1',
      tagName: 'P_101_1_3_DI_0',
      description: 'Feed pump DI-1',
      tagType: '用户变量',
      tagDataType: 'IODisc',
      deviceName: 'North',
      tagGroup: 'North',
      channelName: 'Network1',
      channelDriver: 'ModbusMaster',
      deviceSeries: 'ModbusTCP',
      collectInterval: '1000',
      itemName: '03161',
      itemDataType: 'BIT',
      itemAccessMode: '读写',
      address: '%MX20.0',
      discreteType: 'DI'
    });
    expect(table.rows[3]).toMatchObject({
      tagId: '4',
      tagName: 'PT_1_1_2_AI_0_LL',
      description: 'Inlet pressure AI-1_LL报警',
      tagDataType: 'IODisc',
      deviceName: 'North',
      itemName: '011001',
      address: '%MX1000.0',
      discreteType: 'AI'
    });
  });

  it('never lists reserved channels', () => {
    const result = calculate([pump]);
    const table = new HmiBoolTableGenerator(config.templates, config.catalog).generate(result.assignments, undefined, {
      reserved: result.reserved
    });

    expect(table.rows).toHaveLength(3);
  });

  it('carries the engineering range into analog tags', () => {
    const table = new HmiRealTableGenerator(config.templates, config.catalog).generate(allocate([pump, transmitter]));

    expect(table.rows).toHaveLength(6);
    expect(table.rows[0]).toMatchObject({
      tagId: '1',
      tagName: 'PT_1_1_2_AI_0',
      tagDataType: 'IOFloat',
      minValue: '0.000000',
      maxValue: '1.600000',
      engineeringUnit: 'MPa',
      itemName: '44001',
      itemDataType: 'FLOAT',
      analogType: 'AI'
    });
    expect(table.rows.map(row => row.tagName).slice(1)).toEqual([
      'PT_1_1_2_AI_0_LoLoLimit',
      'PT_1_1_2_AI_0_LoLimit',
      'PT_1_1_2_AI_0_HiLimit',
      'PT_1_1_2_AI_0_HiHiLimit',
      'PT_1_1_2_AI_0_whz'
    ]);
    expect(table.rows[5]).toMatchObject({
      tagId: '6',
      description: 'Inlet pressure AI-1_维护值设定点位',
      itemName: '48009',
      address: '%MD10016',
      minValue: '0.000000',
      maxValue: '1.600000',
      engineeringUnit: 'MPa'
    });
  });

  it('leaves optional range columns blank and enforces mandatory ones', () => {
    const bare = equipment('FT-2', { AO: 1 }, { name: 'Flow setpoint' });
    const generator = new HmiRealTableGenerator(config.templates, config.catalog);
    const assignments = allocate([bare]);

    expect(generator.generate(assignments).rows[0]).toMatchObject({ minValue: '', maxValue: '', engineeringUnit: '' });
    expect(catchError(() => generator.generate(assignments, 'hmi-real-scaled'))).toMatchObject({
      code: 'MissingEngineeringRange',
      details: { template: 'hmi-real-scaled', column: 'minValue', item: 'FT-2' }
    });
  });

  it('refuses to render an analog table without analog points', () => {
    const generator = new HmiRealTableGenerator(config.templates, config.catalog);

    expect(catchError(() => generator.generate(allocate([pump])))).toMatchObject({
      code: 'EmptyAssignmentSet',
      details: { template: 'hmi-real-default', signalClasses: 'AI,AO' }
    });
  });
});

describe('FatTableGenerator', () => {
  it('projects PLC and HMI columns and fills blanks with a slash', () => {
    const table = new FatTableGenerator(config.templates, config.catalog).generate(allocate([pump, transmitter]));

    expect(table.rows).toHaveLength(4);
    expect(table.rows[0]).toMatchObject({
      index: '1',
      equipment: 'Inlet pressure',
      signalClass: 'AI',
      channelCode: '1_2_AI_0',
      tag: 'PT_1_1_2_AI_0',
      rangeLow: '0',
      rangeHigh: '1.6',
      engineeringUnit: 'MPa',
      address: '%MD2000',
      commAddress: '44001',
      sll: 'PT_1_1_2_AI_0_LoLoLimit',
      sllAddress: '%MD10000',
      sllCommAddress: '48001',
      mainEn: 'PT_1_1_2_AI_0_MAIN_EN',
      mainEnAddress: '%MX1000.4',
      mainEnCommAddress: '11005'
    });
    expect(table.rows[1]).toMatchObject({
      station: 'North',
      description: 'Feed pump DI-1',
      readWrite: 'R/W',
      powerSupply: '/',
      wiring: '/',
      rangeLow: '/',
      rangeHigh: '/',
      engineeringUnit: '/',
      commAddress: '3161',
      sll: '/',
      llAddress: '/',
      mainEnCommAddress: '/'
    });
  });

  it('adds reserved rows in channel order on request', () => {
    const result = calculate([pump]);
    const table = new FatTableGenerator(config.templates, config.catalog).generate(result.assignments, undefined, {
      reserved: result.reserved
    });

    expect(table.rows).toHaveLength(32);
    expect(table.rows[2]).toMatchObject({
      index: '3',
      equipment: '',
      signalClass: 'DI',
      channelCode: '1_2_DI_2',
      station: '/',
      tag: 'YLDW1_2_DI_2',
      description: '预留点位1_2_DI_2',
      dataType: 'BOOL',
      address: '%MX20.2',
      commAddress: '3163',
      sll: '/'
    });
  });
});
