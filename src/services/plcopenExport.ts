import { XMLBuilder } from 'fast-xml-parser';
import { IoPointError } from '../errors';
import type { GeneratedTable, TableRow } from '../types';

const builderOptions = {
  ignoreAttributes: false,
  attributeNamePrefix: '',
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true
};

const PLCOPEN_NAMESPACE = 'http://www.plcopen.org/xml/tc6_0201';
const XHTML_NAMESPACE = 'http://www.w3.org/1999/xhtml';

export interface PlcopenExportOptions {
  projectName: string;
  configurationName?: string;
  resourceName?: string;
  variableListName?: string;
  // Left out unless given so that repeated exports stay identical.
  creationDateTime?: string;
}

interface XmlVariable {
  name: string;
  address: string;
  type: Record<string, Record<string, never>>;
  initialValue?: { simpleValue: { value: string } };
  documentation?: { 'xhtml:p': { '#text': string } };
}

function requireCell(row: TableRow, key: string, templateId: string): string {
  const value = row[key];
  if (value === undefined || value.length === 0) {
    throw new IoPointError('TemplateMismatch', `PLCopen export needs column ${key}, which template ${templateId} does not fill.`, {
      template: templateId,
      column: key
    });
  }
  return value;
}

function toVariable(row: TableRow, templateId: string): XmlVariable {
  const variable: XmlVariable = {
    name: requireCell(row, 'tag', templateId),
    address: requireCell(row, 'address', templateId),
    type: { [requireCell(row, 'dataType', templateId)]: {} }
  };
  const initialValue = row.initialValue;
  if (initialValue) {
    variable.initialValue = { simpleValue: { value: initialValue } };
  }
  const comment = row.comment;
  if (comment) {
    variable.documentation = { 'xhtml:p': { '#text': comment } };
  }
  return variable;
}

/**
 * Renders a PLC point table as a PLCopen TC6 project holding a single global variable list, the
 * import format of most IEC 61131-3 programming tools.
 */
export function renderPlcopenGlobalVars(table: GeneratedTable, options: PlcopenExportOptions): string {
  if (table.kind !== 'plc') {
    throw new IoPointError('TemplateMismatch', `PLCopen export takes a plc table, not ${table.kind}.`, {
      template: table.templateId
    });
  }

  const fileHeader: Record<string, string> = {
    companyName: '',
    productName: options.projectName,
    productVersion: '1'
  };
  if (options.creationDateTime) {
    fileHeader.creationDateTime = options.creationDateTime;
  }

  const document = {
    '?xml': { version: '1.0', encoding: 'utf-8' },
    project: {
      xmlns: PLCOPEN_NAMESPACE,
      'xmlns:xhtml': XHTML_NAMESPACE,
      fileHeader,
      contentHeader: {
        name: options.projectName,
        coordinateInfo: {
          fbd: { scaling: { x: '1', y: '1' } },
          ld: { scaling: { x: '1', y: '1' } },
          sfc: { scaling: { x: '1', y: '1' } }
        }
      },
      types: { dataTypes: {}, pous: {} },
      instances: {
        configurations: {
          configuration: {
            name: options.configurationName ?? 'Config0',
            resource: {
              name: options.resourceName ?? 'Res0',
              globalVars: {
                name: options.variableListName ?? 'IO',
                variable: table.rows.map(row => toVariable(row, table.templateId))
              }
            }
          }
        }
      }
    }
  };

  return new XMLBuilder(builderOptions).build(document);
}
