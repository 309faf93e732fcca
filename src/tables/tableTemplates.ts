import { IoPointError } from '../errors';
import type { TableKind } from '../types';

export interface TemplateColumn {
  key: string;
  header: string;
  mandatory?: boolean;
  // Written when the generated value is blank.
  default?: string;
}

export interface TableTemplate {
  id: string;
  kind: TableKind;
  title?: string;
  columns: TemplateColumn[];
}

export class TemplateRegistry {
  private readonly templates = new Map<string, TableTemplate>();

  constructor(templates: readonly TableTemplate[]) {
    templates.forEach(template => {
      if (this.templates.has(template.id)) {
        throw new IoPointError('ConfigError', `Template ${template.id} is declared twice.`, { template: template.id });
      }
      const keys = new Set<string>();
      template.columns.forEach(column => {
        if (keys.has(column.key)) {
          throw new IoPointError('ConfigError', `Template ${template.id} repeats column ${column.key}.`, {
            template: template.id,
            column: column.key
          });
        }
        keys.add(column.key);
      });
      this.templates.set(template.id, Object.freeze({ ...template, columns: template.columns.map(c => Object.freeze({ ...c })) }));
    });
  }

  public get(templateId: string): TableTemplate {
    const template = this.templates.get(templateId);
    if (!template) {
      throw new IoPointError('UnknownTemplate', `Template ${templateId} is not registered.`, { template: templateId });
    }
    return template;
  }

  // The first registered template of a kind is its default.
  public defaultFor(kind: TableKind): TableTemplate {
    const template = Array.from(this.templates.values()).find(candidate => candidate.kind === kind);
    if (!template) {
      throw new IoPointError('UnknownTemplate', `No template is registered for ${kind} tables.`, { kind });
    }
    return template;
  }

  public list(): TableTemplate[] {
    return Array.from(this.templates.values());
  }
}
