import { loadEngineConfig } from '../../config/configLoader';
import type { EngineLogEvent } from '../engineTypes';
import { PointTableService } from '../pointTableService';
import { createPointTableMcpServer } from './server';

const defaultPort = Number.parseInt(process.env.IOPT_MCP_PORT ?? '8125', 10);
const defaultHost = process.env.IOPT_MCP_HOST ?? '127.0.0.1';
const defaultEndpoint = process.env.IOPT_MCP_ENDPOINT ?? '/mcp';

const args = process.argv.slice(2);
const portArg = args.find(arg => arg.startsWith('--port='));
const hostArg = args.find(arg => arg.startsWith('--host='));
const endpointArg = args.find(arg => arg.startsWith('--endpoint='));
const configArg = args.find(arg => arg.startsWith('--config='));

const port = portArg ? Number.parseInt(portArg.split('=')[1] ?? '', 10) : defaultPort;
const host = hostArg ? hostArg.split('=')[1] || defaultHost : defaultHost;
const endpointCandidate = endpointArg ? endpointArg.split('=')[1] || defaultEndpoint : defaultEndpoint;
const endpoint: `/${string}` = endpointCandidate.startsWith('/') ? `/${endpointCandidate.slice(1)}` : `/${endpointCandidate}`;

const logger = (event: EngineLogEvent): void => {
  process.stderr.write(`${event.level.toUpperCase()} ${event.scope}: ${event.message}\n`);
};

async function main(): Promise<void> {
  const config = loadEngineConfig({ configDir: configArg ? configArg.split('=')[1] : undefined });
  const service = new PointTableService(config, { logger });
  const mcpServer = createPointTableMcpServer(service, {
    endpoint,
    host,
    port: Number.isFinite(port) ? port : defaultPort
  });

  const shutdown = async (): Promise<void> => {
    await mcpServer.stop().catch(error => {
      logger({ level: 'warn', scope: 'mcp', message: `Stop failed: ${error instanceof Error ? error.message : String(error)}` });
    });
    process.exit(0);
  };
  process.on('SIGINT', () => {
    void shutdown();
  });
  process.on('SIGTERM', () => {
    void shutdown();
  });

  await mcpServer.start();
  process.stderr.write(`[MCP] IO point table MCP server started on http://${host}:${port}${endpoint}\n`);
  process.stderr.write(`[REST] IO point table REST API available at http://${host}:${port}/api/v1\n`);
}

void main().catch(error => {
  process.stderr.write(`[MCP] Failed to start IO point table MCP server: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
