export * from './types';
export * from './errors';
export { FieldSchemaRegistry } from './schema/fieldRegistry';
export type { FieldDefinitionSets } from './schema/fieldRegistry';
export { readChecklist, readProject } from './schema/checklistReader';
export type { ChecklistReadResult } from './schema/checklistReader';
export { formatPlcAddress, parsePlcAddress, toCommAddress } from './io/addressFormat';
export { ChannelModelCatalog } from './io/channelModelCatalog';
export { ChannelCalculator } from './io/channelCalculator';
export type { ChannelCalculatorOptions } from './io/channelCalculator';
export { TemplateRegistry } from './tables/tableTemplates';
export type { TableTemplate, TemplateColumn } from './tables/tableTemplates';
export { TableGenerator } from './tables/tableGenerator';
export type { GenerateOptions } from './tables/tableGenerator';
export { PlcTableGenerator } from './tables/plcGenerator';
export { HmiBoolTableGenerator, HmiRealTableGenerator } from './tables/hmiGenerators';
export { FatTableGenerator } from './tables/fatGenerator';
export { renderPlcopenGlobalVars } from './services/plcopenExport';
export type { PlcopenExportOptions } from './services/plcopenExport';
export { buildEngineConfig, loadEngineConfig } from './config/configLoader';
export type { EngineConfig, RawConfigSources } from './config/configLoader';
export * from './engine/engineTypes';
export { PointTableService } from './engine/pointTableService';
export type { GenerateTablesOptions, PointTableServiceOptions } from './engine/pointTableService';
export { createPointTableMcpServer } from './engine/mcp/server';
export type { PointTableMcpServer, PointTableMcpServerOptions } from './engine/mcp/server';
