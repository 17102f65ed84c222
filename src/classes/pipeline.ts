import * as path from 'path';
import {
    pipelineConfigSchema,
    type ExportConfig,
    type KeyConfig,
    type PipelineConfig,
    type PublishConfig,
} from '../types/config.js';
import { type KeyDefinition } from '../types/key.js';
import { type TemplateFamily } from '../types/publish.js';
import { ConfigError, PipelineError } from '../pipeline-errors.js';
import { KeyRegistryClass } from './key-registry.js';
import { TemplateEngineClass } from './template-engine.js';
import { JsonFileRegistryClient, type RegistryClient } from './registry-client.js';
import { VersionResolverClass, type FamilyTemplates } from './version-resolver.js';
import { CommandExportTrigger, ManualExportTrigger, type ExportTrigger } from './export-trigger.js';
import { IdentityLock } from './identity-lock.js';
import { PublishOrchestrator, type Thumbnailer } from './publish-orchestrator.js';
import { type PublishFileSystem } from '../io/publish-fs.js';
import { type Logger } from '../logger.js';

export const CONFIG_FORMAT_VERSION = '1.0';

/** Services built from one configuration. */
export interface PipelineServices {
    registry: RegistryClient;
    resolver: VersionResolverClass;
    orchestrator: PublishOrchestrator;
}

export interface ServiceOverrides {
    registry?: RegistryClient;
    exportTrigger?: ExportTrigger;
    fs?: PublishFileSystem;
    lock?: IdentityLock;
    thumbnailer?: Thumbnailer;
    logger?: Logger;
}

/**
 * Stateful wrapper for a loaded texpub.json configuration.
 * Owns the key registry and template engine built from it, and resolves
 * paths inside the file against the file's directory.
 */
export class PipelineClass {
    /** Tracks whether the configuration has unsaved changes */
    public isDirty: boolean = false;

    private _data: PipelineConfig;
    private _path: string;
    private _keys: KeyRegistryClass;
    private _engine: TemplateEngineClass;

    /**
     * Internal constructor. Use static create() or fromJSON().
     */
    private constructor(filePath: string, data: PipelineConfig) {
        this._path = filePath;
        this._data = structuredClone(data);
        this._keys = new KeyRegistryClass();
        this._engine = new TemplateEngineClass(this._keys, { root: this.root });
        this.build();
    }

    // ------------------------------------------------------------------------
    // Getters & Meta
    // ------------------------------------------------------------------------

    get path(): string {
        return this._path;
    }

    get name(): string {
        return this._data.name;
    }

    get texpub_version(): string {
        return this._data.texpub_version;
    }

    get created(): string | undefined {
        return this._data.created;
    }

    /** Absolute root of the work and publish areas. */
    get root(): string {
        return path.resolve(path.dirname(this._path), this._data.root);
    }

    get registryPath(): string {
        return path.resolve(path.dirname(this._path), this._data.registry.path);
    }

    get publish(): PublishConfig {
        return structuredClone(this._data.publish);
    }

    get exportConfig(): ExportConfig {
        return structuredClone(this._data.export);
    }

    get keys(): KeyRegistryClass {
        return this._keys;
    }

    get engine(): TemplateEngineClass {
        return this._engine;
    }

    /**
     * Returns a summary of the configuration for the `pipeline info` tool.
     */
    info() {
        return {
            path: this._path,
            name: this._data.name,
            texpub_version: this._data.texpub_version,
            created: this._data.created,
            root: this.root,
            registry: this.registryPath,
            keys: this._keys.list().map(key => key.name),
            templates: this._engine.listTemplates().map(template => template.name),
            publish: this._data.publish,
            export: this._data.export,
        };
    }

    /**
     * Publish templates whose files carry each family's versions.
     */
    familyTemplates(): FamilyTemplates {
        const { templates } = this._data.publish;
        const families: Record<TemplateFamily, string[]> = {
            project: [templates.project_publish],
            texture_set: [templates.texture_set],
            texture_map: [templates.texture, templates.texture_udim],
        };
        return families;
    }

    /**
     * Builds the registry, version resolver and orchestrator for this configuration.
     */
    createServices(overrides: ServiceOverrides = {}): PipelineServices {
        const publish = this.publish;
        const registry = overrides.registry ?? new JsonFileRegistryClient(this.registryPath);
        const resolver = new VersionResolverClass(this._engine, this.familyTemplates(), publish.fields, registry);

        const { command, args, timeout_ms } = this._data.export;
        const exportTrigger = overrides.exportTrigger ?? (command !== undefined
            ? new CommandExportTrigger(command, args, { cwd: path.dirname(this._path), timeoutMs: timeout_ms })
            : new ManualExportTrigger());

        const orchestrator = new PublishOrchestrator({
            engine: this._engine,
            publish,
            resolver,
            registry,
            exportTrigger,
            fs: overrides.fs,
            lock: overrides.lock,
            thumbnailer: overrides.thumbnailer,
            logger: overrides.logger,
        });
        return { registry, resolver, orchestrator };
    }

    // ------------------------------------------------------------------------
    // Serialization
    // ------------------------------------------------------------------------

    /**
     * Returns the raw config data suitable for JSON serialization.
     */
    toJSON(): PipelineConfig {
        return structuredClone(this._data);
    }

    /**
     * Creates a configuration with the default keys and folder layout.
     * @param filePath The absolute path where texpub.json will be saved.
     * @param name The display name of the pipeline.
     */
    static create(filePath: string, name: string): PipelineClass {
        const pipeline = new PipelineClass(filePath, defaultPipelineConfig(name));
        pipeline.isDirty = true;
        return pipeline;
    }

    /**
     * Instantiates a PipelineClass from parsed JSON, applying schema defaults.
     * @throws ConfigError when the data fails the schema, or its keys and templates do not load
     */
    static fromJSON(filePath: string, data: unknown): PipelineClass {
        const result = pipelineConfigSchema.safeParse(data);
        if (!result.success) {
            throw new ConfigError(`Configuration ${filePath} does not match the pipeline configuration format.`, filePath, result.error);
        }
        return new PipelineClass(filePath, result.data);
    }

    // ------------------------------------------------------------------------
    // Private Helpers
    // ------------------------------------------------------------------------

    private build(): void {
        try {
            for (const [name, config] of Object.entries(this._data.keys)) {
                this._keys.registerKey(keyDefinition(name, config));
            }
            this._engine.registerTemplates(this._data.templates);
        } catch (e: unknown) {
            if (e instanceof PipelineError) {
                throw new ConfigError(`Configuration ${this._path} is invalid: ${e.message}`, this._path);
            }
            throw e;
        }
        this.checkPublishTemplates();
    }

    private checkPublishTemplates(): void {
        const { templates, fields: f } = this._data.publish;

        const required: Array<[string, string[]]> = [
            [templates.project_work, [f.asset, f.task, f.name, f.version]],
            [templates.project_publish, [f.asset, f.task, f.name, f.version]],
            [templates.export_area, []],
            [templates.texture, [f.asset, f.task, f.texture_set, f.version, f.texture_map, f.extension]],
            [templates.texture_udim, [f.asset, f.task, f.texture_set, f.version, f.texture_map, f.udim, f.extension]],
            [templates.texture_set, [f.asset, f.task, f.texture_set, f.version]],
        ];

        for (const [name, fields] of required) {
            if (!this._engine.has(name)) {
                throw new ConfigError(`Publish template '${name}' is not defined in ${this._path}.`, this._path);
            }
            const info = this._engine.template(name);
            const missing = fields.filter(field => !info.requiredFields.includes(field));
            if (missing.length > 0) {
                throw new ConfigError(
                    `Publish template '${name}' must use the field(s) ${missing.map(m => `'${m}'`).join(', ')} ` +
                    'outside optional sections.',
                    this._path,
                );
            }
        }
    }
}

function keyDefinition(name: string, config: KeyConfig): KeyDefinition {
    const key: KeyDefinition = { name, type: config.type };
    if (config.format_spec !== undefined) key.formatSpec = config.format_spec;
    if (config.alias !== undefined) key.alias = config.alias;
    if (config.default !== undefined) key.default = config.default;
    if (config.choices !== undefined) key.choices = config.choices;
    if (config.abstract !== undefined) key.abstractToken = config.abstract;
    return key;
}

/**
 * The configuration `pipeline init` writes: one work and publish area per asset and task.
 */
export function defaultPipelineConfig(name: string): PipelineConfig {
    return pipelineConfigSchema.parse({
        texpub_version: CONFIG_FORMAT_VERSION,
        name,
        created: new Date().toISOString(),
        keys: {
            Asset: { type: 'str' },
            task_name: { type: 'str' },
            name: { type: 'alphanum' },
            version: { type: 'int', format_spec: '03' },
            texture_set: { type: 'alphanum' },
            texture_map: { type: 'alphanum' },
            colorspace: { type: 'alphanum' },
            extension: { type: 'alphanum' },
            UDIM: { type: 'int', format_spec: '04', abstract: '<UDIM>' },
        },
        templates: {
            asset_root: 'assets/{Asset}/{task_name}',
            spp_asset_work: '@asset_root/work/{name}.v{version}.spp',
            spp_asset_publish: '@asset_root/publish/{name}.v{version}.spp',
            textures_export_work_area: '@asset_root/work/textures',
            texture_set_publish_folder: '@asset_root/publish/textures/{texture_set}/v{version}',
            texture_publish: '@texture_set_publish_folder/{Asset}_{texture_set}_{texture_map}_{colorspace}.{extension}',
            texture_udim_publish:
                '@texture_set_publish_folder/{Asset}_{texture_set}_{texture_map}_{colorspace}.{UDIM}.{extension}',
        },
    });
}
