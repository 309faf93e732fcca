import { FastMCP, UserError } from 'fastmcp';
import type { Context as HonoContext } from 'hono';
import { z } from 'zod';
import { isConfigurationError, isIoPointError } from '../../errors';
import type { PointTableService } from '../pointTableService';
import { generateSchema, plcopenExportSchema, pointTableInputSchema } from '../requestSchemas';

export interface PointTableMcpServerOptions {
  endpoint?: `/${string}`;
  host?: string;
  port: number;
}

export interface PointTableMcpServer {
  start(): Promise<void>;
  stop(): Promise<void>;
}

const jsonString = (value: unknown): string => JSON.stringify(value, null, 2);

export function createPointTableMcpServer(
  service: PointTableService,
  options: PointTableMcpServerOptions
): PointTableMcpServer {
  const server = new FastMCP({
    instructions:
      'Use io_points_calculate to allocate IO channels for a project checklist and io_points_generate to render PLC, HMI and FAT point tables.',
    name: 'io-point-table-mcp',
    version: '0.1.0'
  });

  registerTools(server, service);
  registerResources(server, service);
  registerRestRoutes(server, service);

  return {
    start: () =>
      server.start({
        httpStream: {
          endpoint: options.endpoint ?? '/mcp',
          host: options.host ?? '127.0.0.1',
          port: options.port
        },
        transportType: 'httpStream'
      }),
    stop: () => server.stop()
  };
}

// Engine failures reach the MCP client as tool errors carrying the error code.
function toolCall(action: () => unknown): string {
  try {
    return jsonString(action());
  } catch (error) {
    if (isIoPointError(error)) {
      throw new UserError(jsonString({ code: error.code, message: error.message, details: error.details }));
    }
    throw error;
  }
}

function registerTools(server: FastMCP, service: PointTableService): void {
  server.addTool({
    description: 'Allocate IO channels for a checklist (main form payload plus equipment rows).',
    execute: async args => toolCall(() => service.calculate(args)),
    name: 'io_points_calculate',
    parameters: pointTableInputSchema
  });

  server.addTool({
    description: 'Allocate IO channels and render the requested point tables (plc, hmi-bool, hmi-real, fat).',
    execute: async ({ tables, ...input }) => toolCall(() => service.generate(input, tables)),
    name: 'io_points_generate',
    parameters: generateSchema
  });

  server.addTool({
    description: 'Render the PLC point table as a PLCopen XML global variable list.',
    execute: async ({ template, variableListName, includeReserved, ...input }) =>
      toolCall(() => service.exportPlcopen(input, { template, variableListName, includeReserved })),
    name: 'io_points_export_plcopen',
    parameters: plcopenExportSchema
  });
}

function registerResources(server: FastMCP, service: PointTableService): void {
  server.addResource({
    description: 'Registered IO module types and the catalog version.',
    load: async () => ({
      mimeType: 'application/json',
      text: jsonString(service.getCatalog())
    }),
    mimeType: 'application/json',
    name: 'io-points-catalog',
    uri: 'resource://io-points/catalog'
  });

  server.addResource({
    description: 'Table templates available for generation.',
    load: async () => ({
      mimeType: 'application/json',
      text: jsonString({ templates: service.listTemplates() })
    }),
    mimeType: 'application/json',
    name: 'io-points-templates',
    uri: 'resource://io-points/templates'
  });
}

function registerRestRoutes(server: FastMCP, service: PointTableService): void {
  const app = server.getApp();

  app.get('/api/v1', c =>
    c.json({
      endpoints: {
        catalog: '/api/v1/catalog',
        health: '/api/v1/health',
        pointsCalculate: '/api/v1/points/calculate',
        pointsExportPlcopen: '/api/v1/points/export/plcopen',
        pointsGenerate: '/api/v1/points/generate',
        templates: '/api/v1/templates'
      },
      mcpEndpoint: '/mcp'
    })
  );

  app.get('/api/v1/health', c =>
    c.json({
      catalogVersion: service.catalogVersion,
      service: 'io-point-table-mcp',
      status: 'ok'
    })
  );

  app.get('/api/v1/catalog', c => c.json(service.getCatalog()));
  app.get('/api/v1/templates', c => c.json({ templates: service.listTemplates() }));

  app.post('/api/v1/points/calculate', async c => withBody(c, pointTableInputSchema, body => c.json(service.calculate(body))));
  app.post('/api/v1/points/generate', async c =>
    withBody(c, generateSchema, ({ tables, ...input }) => c.json(service.generate(input, tables)))
  );
  app.post('/api/v1/points/export/plcopen', async c =>
    withBody(c, plcopenExportSchema, ({ template, variableListName, includeReserved, ...input }) =>
      c.body(service.exportPlcopen(input, { template, variableListName, includeReserved }), 200, {
        'Content-Type': 'application/xml; charset=utf-8'
      })
    )
  );
}

async function withBody<T>(
  c: HonoContext,
  schema: z.ZodType<T>,
  handler: (body: T) => Response
): Promise<Response> {
  const raw = await safeJson(c);
  const parsed = schema.safeParse(raw);

  if (!parsed.success) {
    return c.json(
      {
        code: 'invalid_params',
        issues: parsed.error.issues.map(issue => ({
          message: issue.message,
          path: issue.path.join('.')
        }))
      },
      400
    );
  }

  try {
    return handler(parsed.data);
  } catch (error) {
    return handleEngineError(c, error);
  }
}

async function safeJson(c: HonoContext): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return {};
  }
}

function handleEngineError(c: HonoContext, error: unknown): Response {
  if (isIoPointError(error)) {
    return c.json(
      { code: error.code, message: error.message, details: error.details },
      isConfigurationError(error) ? 500 : 422
    );
  }

  const message = error instanceof Error ? error.message : String(error);
  return c.json({ code: 'internal_error', message }, 500);
}
