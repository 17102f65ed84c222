/**
 * Schema and types for the texpub.json pipeline configuration file.
 *
 * Declares the keys and templates of the studio's folder layout, which
 * templates the publish steps use, and where the registry lives.
 */

import { z } from 'zod';

const fieldValueSchema = z.union([z.string(), z.number()]);

export const keyConfigSchema = z.object({
    type: z.enum(['str', 'int', 'alphanum']),
    format_spec: z.string().regex(/^0[1-9][0-9]*$/, 'expected a zero-padding spec such as "03"').optional(),
    alias: z.string().min(1).optional(),
    default: fieldValueSchema.optional(),
    choices: z.array(fieldValueSchema).min(1).optional(),
    abstract: z.string().min(1).optional(),
});

export const templateConfigSchema = z.union([
    z.string().min(1),
    z.object({
        definition: z.string().min(1),
        base: z.string().min(1).optional(),
    }),
]);

/** Template names used by each publish step. */
export const publishTemplatesSchema = z.object({
    project_work: z.string().default('spp_asset_work'),
    project_publish: z.string().default('spp_asset_publish'),
    export_area: z.string().default('textures_export_work_area'),
    texture: z.string().default('texture_publish'),
    texture_udim: z.string().default('texture_udim_publish'),
    texture_set: z.string().default('texture_set_publish_folder'),
});

/** Field names the pipeline reads and writes. */
export const publishFieldsSchema = z.object({
    asset: z.string().default('Asset'),
    task: z.string().default('task_name'),
    name: z.string().default('name'),
    version: z.string().default('version'),
    texture_set: z.string().default('texture_set'),
    texture_map: z.string().default('texture_map'),
    colorspace: z.string().default('colorspace'),
    udim: z.string().default('UDIM'),
    extension: z.string().default('extension'),
});

export const publishConfigSchema = z.object({
    /** Export presets must start with this prefix (case-insensitive). */
    preset_prefix: z.string().min(1).default('studio'),
    /** Bound on every filesystem call during COMMIT. */
    timeout_ms: z.number().int().positive().default(30_000),
    thumbnails: z.boolean().default(true),
    templates: publishTemplatesSchema.default({}),
    fields: publishFieldsSchema.default({}),
});

export const exportConfigSchema = z.object({
    /** Executable that runs the exporter. Without it, textures are expected to be exported already. */
    command: z.string().min(1).optional(),
    /** Arguments; `{preset}`, `{output}` and `{texture_set}` are substituted. */
    args: z.array(z.string()).default(['--preset', '{preset}', '--output', '{output}', '--texture-set', '{texture_set}']),
    /** The exporter is killed after this long. */
    timeout_ms: z.number().int().positive().default(600_000),
});

export const registryConfigSchema = z.object({
    /** Registry file, relative to texpub.json. */
    path: z.string().min(1).default('texpub-registry.json'),
});

export const pipelineConfigSchema = z.object({
    texpub_version: z.string(),
    name: z.string(),
    /** ISO 8601 creation timestamp */
    created: z.string().optional(),
    /** Root of the work and publish areas, relative to texpub.json. */
    root: z.string().default('.'),
    keys: z.record(z.string(), keyConfigSchema),
    templates: z.record(z.string(), templateConfigSchema),
    publish: publishConfigSchema.default({}),
    export: exportConfigSchema.default({}),
    registry: registryConfigSchema.default({}),
});

export type KeyConfig = z.infer<typeof keyConfigSchema>;
export type TemplateConfig = z.infer<typeof templateConfigSchema>;
export type PublishTemplates = z.infer<typeof publishTemplatesSchema>;
export type PublishFields = z.infer<typeof publishFieldsSchema>;
export type PublishConfig = z.infer<typeof publishConfigSchema>;
export type ExportConfig = z.infer<typeof exportConfigSchema>;

/** The complete structure of texpub.json after defaults are applied. */
export type PipelineConfig = z.output<typeof pipelineConfigSchema>;

/** texpub.json as written, before defaults. */
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;
