import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import * as path from 'node:path';
import { getWorkspace } from '../classes/workspace.js';
import { parseExportedFiles, scanExportArea } from '../io/export-scan.js';
import { aggregateTextureSets } from '../algorithms/texture-set.js';
import { TEXTURE_FILENAME_PATTERN } from '../algorithms/texture-filename.js';
import { fieldsSchema } from './template.js';
import * as errors from '../errors.js';

/**
 * Zod input schema for the `texture` tool.
 *
 * - `parse`: filenames required
 * - `scan`: a directory, or context fields resolving the export work area
 */
const textureInputSchema = {
    action: z.enum(['parse', 'scan']).describe(
        `Action to perform: parse (check filenames against ${TEXTURE_FILENAME_PATTERN}), scan (group the files of an export area into texture sets)`,
    ),
    filenames: z.array(z.string()).optional().describe('For parse: file names or paths'),
    texture_sets: z.array(z.string()).optional().describe('Texture set names of the host project; needed when a name contains "_"'),
    dir: z.string().optional().describe('For scan: the directory to scan'),
    context: fieldsSchema.optional().describe('For scan without dir: fields resolving the export work area template'),
};

export type TextureToolArgs = z.infer<z.ZodObject<typeof textureInputSchema>>;

/**
 * Registers the `texture` tool on the MCP server.
 */
export function registerTextureTool(server: McpServer): void {
    server.registerTool(
        'texture',
        {
            title: 'Texture',
            description: 'Inspect exported texture files before publishing. Actions: parse, scan.',
            inputSchema: textureInputSchema,
        },
        args => handleTextureTool(args),
    );
}

export async function handleTextureTool(args: TextureToolArgs): Promise<CallToolResult> {
    const options = { textureSets: args.texture_sets ?? [] };
    try {
        switch (args.action) {
            case 'parse': {
                if (!args.filenames || args.filenames.length === 0) {
                    return errors.invalidArgument('texture parse requires "filenames".');
                }
                return json(parseExportedFiles(args.filenames, options));
            }
            case 'scan': {
                const pipeline = getWorkspace().pipeline;
                let dir: string;
                if (args.dir) {
                    dir = path.resolve(pipeline?.root ?? '.', args.dir);
                } else if (args.context) {
                    if (!pipeline) return errors.noPipelineLoaded();
                    dir = pipeline.engine.resolve(pipeline.publish.templates.export_area, args.context);
                } else {
                    return errors.invalidArgument('texture scan requires a "dir" or "context" fields.');
                }

                const scan = await scanExportArea(dir, options);
                const singleSlotPerMap = pipeline
                    ? !pipeline.engine.template(pipeline.publish.templates.texture).fields.includes(pipeline.publish.fields.colorspace)
                    : false;
                return json({
                    dir,
                    textureSets: aggregateTextureSets(scan.matched, { singleSlotPerMap }).map(set => ({
                        name: set.name,
                        isTiled: set.isTiled,
                        maps: set.maps.map(map => ({
                            mapName: map.mapName,
                            colorSpace: map.colorSpace,
                            extension: map.extension,
                            tiles: map.tiles,
                            files: map.files.map(file => file.path),
                        })),
                    })),
                    mismatched: scan.mismatched,
                });
            }
        }
    } catch (e: unknown) {
        return errors.toolError(e);
    }
}

function json(value: unknown) {
    return { content: [{ type: 'text' as const, text: JSON.stringify(value) }] };
}
