import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { getWorkspace, type WorkspaceClass } from '../classes/workspace.js';
import { type PipelineServices } from '../classes/pipeline.js';
import { type PublishIdentity, type PublishResult } from '../types/publish.js';
import { PipelineError, RegistrationError } from '../pipeline-errors.js';
import { fieldsSchema } from './template.js';
import * as errors from '../errors.js';

const familySchema = z.enum(['project', 'texture_set', 'texture_map']);

const textureSetRequestSchema = z.object({
    preset: z.string().describe('Exporter preset name; must start with the configured prefix'),
    texture_set: z.string().describe('Texture set name as the host project reports it'),
    known_texture_sets: z.array(z.string()).optional(),
    preset_output_maps: z.array(z.string()).optional(),
    version: z.number().int().positive().optional(),
});

/**
 * Zod input schema for the `publish` tool.
 *
 * - `next_version`: family, asset, task, name, optional scope
 * - `project`: work_path
 * - `texture_set`: preset, texture_set, context
 * - `session`: work_path and texture_sets
 * - `retry_registration`: registration_id
 * - `pending`, `records`: listing
 */
const publishInputSchema = {
    action: z.enum(['next_version', 'project', 'texture_set', 'session', 'retry_registration', 'pending', 'records']).describe(
        'Action to perform: next_version (version the next publish would get), project (publish a work file), texture_set (export and publish one texture set), session (work file then its texture sets), retry_registration (register a committed publish again), pending (publishes waiting for registration), records (query the registry)',
    ),
    family: familySchema.optional().describe('For next_version and records: project, texture_set or texture_map'),
    asset: z.string().optional(),
    task: z.string().optional(),
    name: z.string().optional().describe('Work file base name, texture set name or map name'),
    scope: fieldsSchema.optional().describe('For next_version of a texture_map: e.g. {"texture_set": "Body", "colorspace": "sRGB"}'),
    work_path: z.string().optional().describe('For project and session: path to the work file'),
    ...textureSetRequestSchema.partial().shape,
    context: fieldsSchema.optional().describe('For texture_set: fields such as Asset and task_name'),
    texture_sets: z.array(textureSetRequestSchema).optional().describe('For session: the texture sets to publish'),
    comment: z.string().optional(),
    dependencies: z.array(z.string()).optional().describe('Record ids the publish depends on'),
    registration_id: z.string().optional().describe('For retry_registration'),
};

export type PublishToolArgs = z.infer<z.ZodObject<typeof publishInputSchema>>;

/**
 * Registers the `publish` tool on the MCP server.
 */
export function registerPublishTool(server: McpServer): void {
    server.registerTool(
        'publish',
        {
            title: 'Publish',
            description: 'Publish work files and texture sets as new immutable versions and register them. Actions: next_version, project, texture_set, session, retry_registration, pending, records.',
            inputSchema: publishInputSchema,
        },
        args => handlePublishTool(args),
    );
}

export async function handlePublishTool(args: PublishToolArgs): Promise<CallToolResult> {
    const workspace = getWorkspace();
    const services = workspace.services;
    if (!workspace.pipeline || !services) {
        return errors.noPipelineLoaded();
    }

    try {
        switch (args.action) {
            case 'next_version':
                return await handleNextVersion(services, args);
            case 'project': {
                if (!args.work_path) return errors.invalidArgument('publish project requires a "work_path".');
                const result = await services.orchestrator.publishProject({
                    workPath: args.work_path,
                    comment: args.comment,
                    dependencies: args.dependencies,
                });
                return json(summarize(result));
            }
            case 'texture_set': {
                if (!args.preset || !args.texture_set || !args.context) {
                    return errors.invalidArgument('publish texture_set requires "preset", "texture_set" and "context".');
                }
                const result = await services.orchestrator.publishTextureSet({
                    presetName: args.preset,
                    textureSet: args.texture_set,
                    context: args.context,
                    knownTextureSets: args.known_texture_sets,
                    presetOutputMaps: args.preset_output_maps,
                    version: args.version,
                    comment: args.comment,
                    dependencies: args.dependencies,
                });
                return json(summarize(result));
            }
            case 'session': {
                if (!args.work_path) return errors.invalidArgument('publish session requires a "work_path".');
                const result = await services.orchestrator.publishSession({
                    workPath: args.work_path,
                    comment: args.comment,
                    textureSets: (args.texture_sets ?? []).map(request => ({
                        presetName: request.preset,
                        textureSet: request.texture_set,
                        knownTextureSets: request.known_texture_sets,
                        presetOutputMaps: request.preset_output_maps,
                        version: request.version,
                    })),
                });
                return json({
                    project: summarize(result.project),
                    textureSets: result.textureSets.map(summarize),
                });
            }
            case 'retry_registration':
                return await handleRetry(workspace, services, args.registration_id);
            case 'pending':
                return json(workspace.info().pendingRegistrations);
            case 'records':
                return json(await services.registry.listRecords({
                    type: args.family,
                    asset: args.asset,
                    task: args.task,
                    name: args.name,
                }));
        }
    } catch (e: unknown) {
        if (e instanceof RegistrationError && e.plan !== undefined) {
            return errors.fromError(e, workspace.addPendingRegistration(e.plan));
        }
        return errors.toolError(e);
    }
}

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

async function handleNextVersion(services: PipelineServices, args: PublishToolArgs) {
    if (!args.family || !args.asset || !args.task || !args.name) {
        return errors.invalidArgument('publish next_version requires "family", "asset", "task" and "name".');
    }
    const identity: PublishIdentity = { family: args.family, asset: args.asset, task: args.task, name: args.name };
    if (args.scope !== undefined) identity.scope = args.scope;

    return json({
        identity,
        current: await services.resolver.currentVersions(identity),
        next: await services.resolver.nextVersion(identity),
    });
}

async function handleRetry(workspace: WorkspaceClass, services: PipelineServices, id: string | undefined) {
    if (!id) {
        return errors.invalidArgument('publish retry_registration requires a "registration_id".');
    }
    const pending = workspace.getPendingRegistration(id);
    if (pending === undefined) {
        return errors.unknownRegistration(id);
    }

    try {
        const result = await services.orchestrator.register(pending.plan);
        workspace.removePendingRegistration(id);
        return json(summarize(result));
    } catch (e: unknown) {
        // the plan keeps the records already created; it stays pending under the same id
        if (e instanceof PipelineError) return errors.fromError(e, id);
        throw e;
    }
}

function summarize(result: PublishResult) {
    return {
        identity: result.identity,
        version: result.version,
        state: result.state,
        copiedPaths: result.copiedPaths,
        records: result.records.map(record => ({
            id: record.id,
            type: record.type,
            name: record.name,
            path: record.path,
            version: record.version,
            children: record.children,
        })),
    };
}

function json(value: unknown) {
    return { content: [{ type: 'text' as const, text: JSON.stringify(value) }] };
}
