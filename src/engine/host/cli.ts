import * as fs from 'node:fs';
import * as path from 'node:path';
import { loadEngineConfig } from '../../config/configLoader';
import { isIoPointError } from '../../errors';
import type { EngineLogEvent, TableRequest } from '../engineTypes';
import { PointTableService } from '../pointTableService';
import { pointTableInputSchema, tableRequestSchema } from '../requestSchemas';

type OutputFormat = 'json' | 'plcopen';

const args = process.argv.slice(2);
const readArg = (name: string): string | undefined => {
  const arg = args.find(candidate => candidate.startsWith(`--${name}=`));
  return arg ? arg.slice(name.length + 3) : undefined;
};

const logger = (event: EngineLogEvent): void => {
  process.stderr.write(`${event.level.toUpperCase()} ${event.scope}: ${event.message}\n`);
};

// "plc,hmi-real:hmi-real-scaled" -> [{ kind: 'plc' }, { kind: 'hmi-real', template: 'hmi-real-scaled' }]
function parseTables(value: string, includeReserved: boolean): TableRequest[] {
  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0)
    .map(entry => {
      const [kind, template] = entry.split(':');
      const parsed = tableRequestSchema.safeParse({
        kind,
        template: template || undefined,
        includeReserved: includeReserved && (kind === 'plc' || kind === 'fat') ? true : undefined
      });
      if (!parsed.success) {
        throw new Error(`Unknown table "${entry}". Use plc, hmi-bool, hmi-real or fat, optionally as kind:template.`);
      }
      return parsed.data;
    });
}

function parseFormat(value: string | undefined): OutputFormat {
  if (value === undefined || value === 'json') {
    return 'json';
  }
  if (value === 'plcopen') {
    return 'plcopen';
  }
  throw new Error(`Unknown format "${value}". Use json or plcopen.`);
}

function readInput(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(path.resolve(filePath), 'utf8'));
}

function main(): void {
  const inputPath = readArg('input');
  if (!inputPath) {
    throw new Error(
      'Usage: io-points --input=checklist.json [--tables=plc,fat] [--reserved] [--format=json|plcopen] [--config=dir] [--out=file]'
    );
  }

  const parsed = pointTableInputSchema.safeParse(readInput(inputPath));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
    throw new Error(`Input ${inputPath} is not a checklist: ${issues}`);
  }

  const service = new PointTableService(loadEngineConfig({ configDir: readArg('config') }), { logger });
  const format = parseFormat(readArg('format'));
  const includeReserved = args.includes('--reserved');
  const tables = parseTables(readArg('tables') ?? 'plc,fat', includeReserved);

  const output =
    format === 'plcopen'
      ? service.exportPlcopen(parsed.data, {
          template: tables.find(table => table.kind === 'plc')?.template,
          includeReserved
        })
      : `${JSON.stringify(
          service.generate(parsed.data, tables, {
            onProgress: (kind, completed, total) => {
              if (completed === total) {
                logger({ level: 'info', scope: 'cli', message: `${kind}: ${total} rows` });
              }
            }
          }),
          null,
          2
        )}\n`;

  const outPath = readArg('out');
  if (outPath) {
    fs.writeFileSync(path.resolve(outPath), output, 'utf8');
    logger({ level: 'info', scope: 'cli', message: `Wrote ${outPath}` });
  } else {
    process.stdout.write(output);
  }
}

try {
  main();
} catch (error) {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(isIoPointError(error) ? `ERROR ${error.code}: ${message}\n` : `ERROR cli: ${message}\n`);
  process.exit(1);
}
