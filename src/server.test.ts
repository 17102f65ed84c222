import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { createServer, openInitialPipeline } from './server.js';
import { WorkspaceClass, getWorkspace } from './classes/workspace.js';
import { defaultPipelineConfig } from './classes/pipeline.js';
import { saveConfigFile } from './io/config-io.js';
import { ConfigError } from './pipeline-errors.js';

describe('texpub MCP server', () => {
  let tempDir: string;

  beforeEach(async () => {
    WorkspaceClass.reset();
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'texpub-server-'));
  });

  afterEach(async () => {
    WorkspaceClass.reset();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('creates an McpServer with the tools registered', () => {
    expect(createServer()).toBeInstanceOf(McpServer);
  });

  it('opens no pipeline without a configuration path', async () => {
    expect(await openInitialPipeline(undefined)).toBeNull();
    expect(await openInitialPipeline('')).toBeNull();
    expect(getWorkspace().pipeline).toBeNull();
  });

  it('opens the configuration it is started with', async () => {
    const configPath = path.join(tempDir, 'texpub.json');
    await saveConfigFile(configPath, defaultPipelineConfig('Demo'));

    const pipeline = await openInitialPipeline(configPath);

    expect(pipeline?.name).toBe('Demo');
    expect(getWorkspace().pipeline).toBe(pipeline);
  });

  it('fails on a missing configuration', async () => {
    await expect(openInitialPipeline(path.join(tempDir, 'missing.json'))).rejects.toBeInstanceOf(ConfigError);
  });
});
