import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import { PipelineClass } from '../classes/pipeline.js';
import { getWorkspace, type WorkspaceClass } from '../classes/workspace.js';
import { loadConfigFile, saveConfigFile } from '../io/config-io.js';
import { isErrnoException } from '../pipeline-errors.js';
import * as errors from '../errors.js';

export const CONFIG_FILENAME = 'texpub.json';

/**
 * Zod input schema for the `pipeline` tool.
 *
 * - `init`: path required (studio root directory)
 * - `open`: path required (texpub.json file path)
 * - `info`: no additional args
 */
const pipelineInputSchema = {
    action: z.enum(['init', 'open', 'info']).describe(
        'Action to perform: init (write a default texpub.json), open (load one), info (show the loaded configuration)',
    ),
    path: z.string().optional().describe('For init: the studio root directory. For open: path to texpub.json'),
    name: z.string().optional().describe('Pipeline name (used by init; defaults to the directory name)'),
};

export type PipelineToolArgs = z.infer<z.ZodObject<typeof pipelineInputSchema>>;

/**
 * Registers the `pipeline` tool on the MCP server.
 */
export function registerPipelineTool(server: McpServer): void {
    server.registerTool(
        'pipeline',
        {
            title: 'Pipeline',
            description: 'Load or create the texpub.json configuration that declares keys, templates and publish settings. Actions: init, open, info.',
            inputSchema: pipelineInputSchema,
        },
        args => handlePipelineTool(args),
    );
}

export async function handlePipelineTool(args: PipelineToolArgs): Promise<CallToolResult> {
    const workspace = getWorkspace();
    try {
        switch (args.action) {
            case 'init':
                return await handleInit(workspace, args.path, args.name);
            case 'open':
                return await handleOpen(workspace, args.path);
            case 'info':
                return handleInfo(workspace);
        }
    } catch (e: unknown) {
        return errors.toolError(e);
    }
}

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

async function handleInit(workspace: WorkspaceClass, dirPath: string | undefined, pipelineName: string | undefined) {
    if (!dirPath) {
        return errors.invalidArgument('pipeline init requires a "path" (studio root directory).');
    }

    const resolvedDir = path.resolve(dirPath);
    const filePath = path.join(resolvedDir, CONFIG_FILENAME);
    if (await fileExists(filePath)) {
        return errors.configAlreadyExists(filePath);
    }

    const name = pipelineName ?? path.basename(resolvedDir);
    const pipeline = PipelineClass.create(filePath, name);
    await saveConfigFile(filePath, pipeline.toJSON());
    pipeline.isDirty = false;
    workspace.setPipeline(pipeline);

    return {
        content: [{
            type: 'text' as const,
            text: JSON.stringify({
                message: `Pipeline '${name}' initialized.`,
                path: filePath,
            }),
        }],
    };
}

async function handleOpen(workspace: WorkspaceClass, filePath: string | undefined) {
    if (!filePath) {
        return errors.invalidArgument(`pipeline open requires a "path" to ${CONFIG_FILENAME}.`);
    }

    const resolvedPath = path.resolve(filePath);
    const data = await loadConfigFile(resolvedPath);
    const pipeline = PipelineClass.fromJSON(resolvedPath, data);
    workspace.setPipeline(pipeline);

    return {
        content: [{
            type: 'text' as const,
            text: JSON.stringify({
                message: `Pipeline '${pipeline.name}' opened.`,
                path: resolvedPath,
                keys: Object.keys(data.keys).length,
                templates: Object.keys(data.templates).length,
            }),
        }],
    };
}

function handleInfo(workspace: WorkspaceClass) {
    if (!workspace.pipeline) {
        return errors.noPipelineLoaded();
    }

    return {
        content: [{
            type: 'text' as const,
            text: JSON.stringify({
                ...workspace.pipeline.info(),
                pendingRegistrations: workspace.info().pendingRegistrations,
            }),
        }],
    };
}

async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch (e: unknown) {
        if (isErrnoException(e) && e.code === 'ENOENT') return false;
        throw e;
    }
}
