import * as path from 'node:path';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerPipelineTool } from './tools/pipeline.js';
import { registerTemplateTool } from './tools/template.js';
import { registerTextureTool } from './tools/texture.js';
import { registerPublishTool } from './tools/publish.js';
import { PipelineClass } from './classes/pipeline.js';
import { getWorkspace } from './classes/workspace.js';
import { loadConfigFile } from './io/config-io.js';
import { logger } from './logger.js';

export const SERVER_NAME = 'texpub-mcp-server';
export const SERVER_VERSION = '1.0.0';

export function createServer(): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerPipelineTool(server);
  registerTemplateTool(server);
  registerTextureTool(server);
  registerPublishTool(server);

  return server;
}

/**
 * Loads the configuration named on the command line or in TEXPUB_CONFIG, if any.
 */
export async function openInitialPipeline(configPath: string | undefined): Promise<PipelineClass | null> {
  if (configPath === undefined || configPath === '') return null;

  const resolved = path.resolve(configPath);
  const pipeline = PipelineClass.fromJSON(resolved, await loadConfigFile(resolved));
  getWorkspace().setPipeline(pipeline);
  logger.info(`Opened pipeline '${pipeline.name}'`, { filePath: resolved });
  return pipeline;
}
