import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import * as path from 'node:path';
import { getWorkspace } from '../classes/workspace.js';
import { findPathsFromTemplate } from '../io/template-scan.js';
import * as errors from '../errors.js';

export const fieldsSchema = z.record(z.string(), z.union([z.string(), z.number()]));

/**
 * Zod input schema for the `template` tool.
 *
 * - `list`: no additional args
 * - `resolve` / `resolve_abstract`: name and fields
 * - `extract`: name and path
 * - `find`: name, optional fields pinning the search
 */
const templateInputSchema = {
    action: z.enum(['list', 'resolve', 'resolve_abstract', 'extract', 'find']).describe(
        'Action to perform: list (all templates), resolve (fields → path), resolve_abstract (missing fields become tokens such as <UDIM>), extract (path → fields), find (existing paths matching the template)',
    ),
    name: z.string().optional().describe('Template name'),
    fields: fieldsSchema.optional().describe('Field values keyed by field name, e.g. {"Asset": "Hero", "version": 3}'),
    path: z.string().optional().describe('For extract: the path to parse (absolute or relative to the pipeline root)'),
};

export type TemplateToolArgs = z.infer<z.ZodObject<typeof templateInputSchema>>;

/**
 * Registers the `template` tool on the MCP server.
 */
export function registerTemplateTool(server: McpServer): void {
    server.registerTool(
        'template',
        {
            title: 'Template',
            description: 'Resolve and parse paths with the templates of the loaded pipeline. Actions: list, resolve, resolve_abstract, extract, find.',
            inputSchema: templateInputSchema,
        },
        args => handleTemplateTool(args),
    );
}

export async function handleTemplateTool(args: TemplateToolArgs): Promise<CallToolResult> {
    const pipeline = getWorkspace().pipeline;
    if (!pipeline) {
        return errors.noPipelineLoaded();
    }
    const engine = pipeline.engine;

    if (args.action === 'list') {
        return json(engine.listTemplates().map(info => ({
            name: info.name,
            definition: info.definition,
            expanded: info.expanded,
            fields: info.fields,
            requiredFields: info.requiredFields,
        })));
    }

    if (!args.name) {
        return errors.invalidArgument(`template ${args.action} requires a "name".`);
    }
    const name = args.name;

    try {
        switch (args.action) {
            case 'resolve':
                return json({ path: engine.resolve(name, args.fields ?? {}) });
            case 'resolve_abstract':
                return json({ path: engine.resolveAbstract(name, args.fields ?? {}) });
            case 'extract': {
                if (!args.path) {
                    return errors.invalidArgument('template extract requires a "path".');
                }
                const target = path.resolve(pipeline.root, args.path);
                return json({ path: target, fields: engine.extract(name, target) });
            }
            case 'find':
                return json(await findPathsFromTemplate(engine, name, args.fields ?? {}));
        }
    } catch (e: unknown) {
        return errors.toolError(e);
    }
}

function json(value: unknown) {
    return { content: [{ type: 'text' as const, text: JSON.stringify(value) }] };
}
