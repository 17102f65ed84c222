import * as fs from 'fs/promises';
import * as path from 'path';
import { type Fields } from '../types/key.js';
import { type PublishConfig } from '../types/config.js';
import { type TextureSet } from '../types/texture.js';
import {
    type PlannedRecord,
    type ProjectPublishRequest,
    type PublishedRecord,
    type PublishIdentity,
    type PublishOptions,
    type PublishResult,
    type PublishState,
    type RecordInput,
    type RegistrationPlan,
    type SessionPublishRequest,
    type SessionPublishResult,
    type StagedFile,
    type TextureSetPublishRequest,
} from '../types/publish.js';
import { type TemplateEngineClass } from './template-engine.js';
import { type VersionResolverClass } from './version-resolver.js';
import { type RegistryClient } from './registry-client.js';
import { type ExportTrigger, ManualExportTrigger } from './export-trigger.js';
import { IdentityLock, identityKey } from './identity-lock.js';
import { CommandHistory } from '../commands/command.js';
import { CopyFileCommand } from '../commands/copy-file-command.js';
import { type PublishFileSystem, nodeFileSystem, withTimeout } from '../io/publish-fs.js';
import { parseExportedFiles, scanExportArea } from '../io/export-scan.js';
import { generateThumbnail } from '../io/thumbnail-io.js';
import { hasPresetPrefix, findInvalidPresetMaps, PRESET_MAP_PATTERN } from '../algorithms/export-preset.js';
import { aggregateTextureSets, publishedTextureSetName } from '../algorithms/texture-set.js';
import {
    ExportError,
    InconsistentTextureSetError,
    InvalidFieldValueError,
    MissingFieldError,
    NoMatchError,
    PatternMismatchError,
    PipelineError,
    PublishCancelledError,
    PublishIOError,
    RegistrationError,
    ValidationError,
    errorMessage,
    isErrnoException,
} from '../pipeline-errors.js';
import { logger as rootLogger, type Logger } from '../logger.js';

export type Thumbnailer = (sourcePath: string) => Promise<string | undefined>;

export interface PublishOrchestratorDeps {
    engine: TemplateEngineClass;
    publish: PublishConfig;
    resolver: VersionResolverClass;
    registry: RegistryClient;
    exportTrigger?: ExportTrigger;
    fs?: PublishFileSystem;
    /** Share one lock between orchestrators publishing into the same area. */
    lock?: IdentityLock;
    thumbnailer?: Thumbnailer;
    logger?: Logger;
}

/**
 * Tracks the state of one publish, reporting every transition.
 */
class PublishRun {
    state: PublishState = 'VALIDATE';
    identity: PublishIdentity | null = null;

    constructor(
        private readonly operation: string,
        private readonly options: PublishOptions,
        private readonly log: Logger,
    ) {}

    enter(state: PublishState): void {
        this.state = state;
        this.log.info(`${this.operation}: ${state}`, {
            operation: this.operation,
            state,
            identity: this.identity ?? undefined,
        });
        this.options.onStateChange?.(state, this.identity);
    }

    /** Throws when the caller has cancelled. Only called before COMMIT starts. */
    checkCancelled(): void {
        if (this.options.signal?.aborted === true) throw new PublishCancelledError(this.state);
    }

    async guard<T>(body: () => Promise<T>): Promise<T> {
        this.enter('VALIDATE');
        try {
            return await body();
        } catch (e: unknown) {
            const failedIn = this.state;
            this.state = 'FAILED';
            this.log.error(`${this.operation} failed during ${failedIn}: ${errorMessage(e)}`, {
                operation: this.operation,
                state: failedIn,
            });
            this.options.onStateChange?.('FAILED', this.identity);
            throw e;
        }
    }
}

/**
 * Drives a publish through VALIDATE → EXPORT_SCAN → STAGE → COMMIT → REGISTER.
 *
 * Version allocation and COMMIT run under a lock keyed by the publish identity;
 * REGISTER runs outside it. A failed or cancelled COMMIT removes everything it
 * wrote. Files stay published when REGISTER fails; the RegistrationError carries
 * a plan that {@link register} retries.
 */
export class PublishOrchestrator {
    private readonly engine: TemplateEngineClass;
    private readonly config: PublishConfig;
    private readonly resolver: VersionResolverClass;
    private readonly registry: RegistryClient;
    private readonly exportTrigger: ExportTrigger;
    private readonly fs: PublishFileSystem;
    private readonly lock: IdentityLock;
    private readonly thumbnailer: Thumbnailer;
    private readonly log: Logger;

    constructor(deps: PublishOrchestratorDeps) {
        this.engine = deps.engine;
        this.config = deps.publish;
        this.resolver = deps.resolver;
        this.registry = deps.registry;
        this.exportTrigger = deps.exportTrigger ?? new ManualExportTrigger();
        this.fs = deps.fs ?? nodeFileSystem;
        this.lock = deps.lock ?? new IdentityLock();
        this.thumbnailer = deps.thumbnailer ?? (source => generateThumbnail(source));
        this.log = deps.logger ?? rootLogger.child('publish');
    }

    // ------------------------------------------------------------------------
    // Project file
    // ------------------------------------------------------------------------

    /**
     * Publishes a work file as the next version of its project.
     */
    publishProject(request: ProjectPublishRequest, options: PublishOptions = {}): Promise<PublishResult> {
        const run = new PublishRun('publish project', options, this.log);
        return run.guard(async () => {
            const { templates, fields: f } = this.config;
            const workPath = path.resolve(request.workPath);

            await this.requireFile(workPath);
            const workFields = this.extractWorkFields(workPath);
            const identity: PublishIdentity = {
                family: 'project',
                asset: String(workFields[f.asset]),
                task: String(workFields[f.task]),
                name: String(workFields[f.name]),
            };
            run.identity = identity;
            run.checkCancelled();

            const { version, staged } = await this.lock.runExclusive(identityKey(identity), async () => {
                run.enter('STAGE');
                const next = await this.resolver.nextVersion(identity);
                const destination = this.engine.resolve(templates.project_publish, { ...workFields, [f.version]: next });
                const files: StagedFile[] = [{ source: workPath, destination }];
                run.checkCancelled();

                run.enter('COMMIT');
                await this.commit(identity, files, options.signal);
                return { version: next, staged: files };
            });

            const entry: PlannedRecord = {
                input: this.recordInput({
                    name: `${identity.asset}_${identity.task}_${identity.name}`,
                    type: 'project',
                    path: staged[0].destination,
                    version,
                    identity,
                    dependencies: request.dependencies ?? [],
                    comment: request.comment,
                }),
            };
            const plan: RegistrationPlan = {
                identity,
                version,
                copiedPaths: staged.map(file => file.destination),
                entries: [entry],
            };

            run.enter('REGISTER');
            const records = await this.registerPlan(plan);
            run.enter('DONE');
            return { identity, version, state: 'DONE', copiedPaths: plan.copiedPaths, records };
        });
    }

    // ------------------------------------------------------------------------
    // Texture set
    // ------------------------------------------------------------------------

    /**
     * Exports one texture set and publishes its maps as the next version of the set.
     */
    publishTextureSet(request: TextureSetPublishRequest, options: PublishOptions = {}): Promise<PublishResult> {
        const run = new PublishRun('publish texture set', options, this.log);
        return run.guard(async () => {
            const { templates, fields: f } = this.config;

            // VALIDATE
            if (!hasPresetPrefix(request.presetName, this.config.preset_prefix)) {
                throw new ValidationError(
                    `Export preset '${request.presetName}' must start with '${this.config.preset_prefix}'.`,
                    { presetName: request.presetName, prefix: this.config.preset_prefix },
                );
            }
            if (request.presetOutputMaps !== undefined) {
                const invalid = findInvalidPresetMaps(request.presetOutputMaps);
                if (invalid.length > 0) {
                    throw new ValidationError(
                        `Export preset '${request.presetName}' has maps that do not follow ` +
                        `'${PRESET_MAP_PATTERN}': ${invalid.join(', ')}.`,
                        { presetName: request.presetName, invalid },
                    );
                }
            }

            const setName = publishedTextureSetName(request.textureSet);
            const asset = request.context[f.asset];
            const task = request.context[f.task];
            if (typeof asset !== 'string' || typeof task !== 'string') {
                throw new ValidationError(
                    `The publish context must give '${f.asset}' and '${f.task}'.`,
                    { context: request.context },
                );
            }
            if (request.version !== undefined && (!Number.isSafeInteger(request.version) || request.version < 1)) {
                throw new ValidationError(`Version ${String(request.version)} is not a positive integer.`, {
                    version: request.version,
                });
            }
            const exportDir = this.validateContext(() => {
                this.engine.validateField(f.texture_set, setName);
                return this.engine.resolve(templates.export_area, request.context);
            }, request.textureSet);

            const identity: PublishIdentity = { family: 'texture_set', asset, task, name: setName };
            run.identity = identity;
            run.checkCancelled();

            // EXPORT_SCAN
            run.enter('EXPORT_SCAN');
            const textureSet = await this.exportAndScan(request, exportDir, options.signal);
            run.checkCancelled();

            const baseFields: Fields = { ...request.context, [f.texture_set]: setName };
            const { version, staged, entries, parent } = await this.lock.runExclusive(identityKey(identity), async () => {
                // STAGE
                run.enter('STAGE');
                const next = await this.resolver.nextVersion(identity);
                if (request.version !== undefined && request.version < next) {
                    throw new ValidationError(
                        `Version ${String(request.version)} of texture set '${setName}' must be greater than ` +
                        `the latest published version ${String(next - 1)}.`,
                        { identity, version: request.version },
                    );
                }
                const chosen = request.version ?? next;
                const stage = this.stageTextureSet(textureSet, identity, { ...baseFields, [f.version]: chosen }, request);
                run.checkCancelled();

                // COMMIT
                run.enter('COMMIT');
                await this.commit(identity, stage.staged, options.signal);
                return { version: chosen, ...stage };
            });

            const plan: RegistrationPlan = {
                identity,
                version,
                copiedPaths: staged.map(file => file.destination),
                entries,
                parent,
            };

            run.enter('REGISTER');
            const records = await this.registerPlan(plan);
            run.enter('DONE');
            return { identity, version, state: 'DONE', copiedPaths: plan.copiedPaths, records };
        });
    }

    // ------------------------------------------------------------------------
    // Session
    // ------------------------------------------------------------------------

    /**
     * Publishes the work file, then each texture set with the work file's fields
     * as context and the project record as a dependency. Texture sets take the
     * project's version unless the request pins one.
     *
     * When a texture set fails, the error's context lists the publishes that
     * already completed under `completed` and `published`.
     */
    async publishSession(request: SessionPublishRequest, options: PublishOptions = {}): Promise<SessionPublishResult> {
        const project = await this.publishProject({ workPath: request.workPath, comment: request.comment }, options);

        const context = this.extractWorkFields(path.resolve(request.workPath));
        delete context[this.config.fields.version];
        const dependencies = project.records.map(record => record.id);

        const textureSets: PublishResult[] = [];
        for (const textureSet of request.textureSets) {
            try {
                textureSets.push(await this.publishTextureSet({
                    ...textureSet,
                    version: textureSet.version ?? project.version,
                    context,
                    comment: request.comment,
                    dependencies,
                }, options));
            } catch (e: unknown) {
                if (e instanceof PipelineError) {
                    const completed = [project, ...textureSets];
                    e.context.completed = completed;
                    e.context.published = completed.map(result =>
                        `${result.identity.family} '${result.identity.name}' v${String(result.version)}`);
                }
                throw e;
            }
        }
        return { project, textureSets };
    }

    // ------------------------------------------------------------------------
    // Registration
    // ------------------------------------------------------------------------

    /**
     * Retries the registration of a publish whose files are already committed.
     * Records created by an earlier attempt are kept; nothing is copied.
     */
    async register(plan: RegistrationPlan, options: PublishOptions = {}): Promise<PublishResult> {
        const run = new PublishRun('retry registration', options, this.log);
        run.identity = plan.identity;
        return run.guard(async () => {
            run.enter('REGISTER');
            const records = await this.registerPlan(plan);
            run.enter('DONE');
            return { identity: plan.identity, version: plan.version, state: 'DONE', copiedPaths: plan.copiedPaths, records };
        });
    }

    private async registerPlan(plan: RegistrationPlan): Promise<PublishedRecord[]> {
        try {
            for (const entry of plan.entries) {
                if (entry.record !== undefined) continue;
                entry.record = await this.registry.createRecord(await this.withThumbnail(entry));
            }
            if (plan.parent !== undefined && plan.parent.record === undefined) {
                const children = plan.entries.flatMap(entry => (entry.record !== undefined ? [entry.record.id] : []));
                plan.parent.record = await this.registry.createRecord({ ...plan.parent.input, children });
            }
        } catch (e: unknown) {
            throw new RegistrationError(
                `Registration of ${plan.identity.family} '${plan.identity.name}' v${String(plan.version)} failed: ` +
                `${errorMessage(e)} The published files were kept; retry the registration.`,
                plan.copiedPaths,
                plan,
            );
        }

        return [...plan.entries, ...(plan.parent !== undefined ? [plan.parent] : [])]
            .flatMap(entry => (entry.record !== undefined ? [entry.record] : []));
    }

    private async withThumbnail(entry: PlannedRecord): Promise<RecordInput> {
        if (!this.config.thumbnails || entry.thumbnailSource === undefined || entry.input.thumbnailPath !== undefined) {
            return entry.input;
        }
        try {
            const thumbnailPath = await this.thumbnailer(entry.thumbnailSource);
            if (thumbnailPath !== undefined) entry.input = { ...entry.input, thumbnailPath };
        } catch (e: unknown) {
            this.log.debug(`No thumbnail for ${entry.thumbnailSource}: ${errorMessage(e)}`, {
                operation: 'thumbnail',
                filePath: entry.thumbnailSource,
            });
        }
        return entry.input;
    }

    // ------------------------------------------------------------------------
    // Commit
    // ------------------------------------------------------------------------

    /**
     * Copies every staged file in parallel. On any failure, or when cancelled
     * while copying, waits for in-flight copies and removes everything written.
     */
    private async commit(identity: PublishIdentity, staged: StagedFile[], signal?: AbortSignal): Promise<void> {
        const history = new CommandHistory();
        const commands = staged.map(file =>
            new CopyFileCommand(file.source, file.destination, this.fs, this.config.timeout_ms));

        const failures = await history.pushAll(commands);
        const cancelled = signal?.aborted === true;
        if (failures.length === 0 && !cancelled) {
            this.log.info(`Committed ${String(commands.length)} file(s)`, { operation: 'commit', identity });
            return;
        }

        const rollbackFailures = await history.rollback();
        for (const failure of rollbackFailures) {
            this.log.error(`Rollback step failed: ${failure.command.label}: ${errorMessage(failure.error)}`, {
                operation: 'rollback',
            });
        }
        // read after rollback: a timed-out rename may have landed while undo waited for it
        const written = commands.filter(command => command.placed).map(command => command.destination);

        const leftovers: string[] = [];
        for (const candidate of [...written, ...commands.map(command => command.tempPath)]) {
            if (await this.stillExists(candidate)) leftovers.push(candidate);
        }
        const rolledBack = written.filter(destination => !leftovers.includes(destination));

        if (failures.length === 0) {
            throw new PublishCancelledError('COMMIT', rolledBack);
        }

        const first = failures[0];
        const failedCopy = commands.find(command => command === first.command);
        throw new PublishIOError(
            `Publish of ${identity.family} '${identity.name}' failed: ${first.command.label}: ${errorMessage(first.error)}` +
            (leftovers.length > 0 ? ` Rollback left ${leftovers.join(', ')} behind.` : ' All written files were removed.'),
            {
                identity,
                failedPath: failedCopy?.source,
                rolledBack,
                leftovers,
                cause: errorMessage(first.error),
            },
        );
    }

    private async stillExists(target: string): Promise<boolean> {
        try {
            return await withTimeout(this.fs.exists(target), this.config.timeout_ms, `check ${target}`);
        } catch (e: unknown) {
            this.log.warn(`Could not check ${target} after rollback: ${errorMessage(e)}`, { operation: 'rollback' });
            return true;
        }
    }

    // ------------------------------------------------------------------------
    // Helpers
    // ------------------------------------------------------------------------

    private async requireFile(filePath: string): Promise<void> {
        try {
            const stat = await fs.stat(filePath);
            if (stat.isFile()) return;
        } catch (e: unknown) {
            if (!isErrnoException(e) || (e.code !== 'ENOENT' && e.code !== 'ENOTDIR')) throw e;
        }
        throw new ValidationError(`Work file not found: ${filePath}`, { path: filePath });
    }

    private extractWorkFields(workPath: string): Fields {
        const template = this.config.templates.project_work;
        try {
            return this.engine.extract(template, workPath);
        } catch (e: unknown) {
            if (e instanceof NoMatchError) {
                throw new ValidationError(`Work file '${workPath}' does not match template '${template}'.`, {
                    path: workPath,
                    template,
                });
            }
            throw e;
        }
    }

    private validateContext<T>(fn: () => T, textureSet: string): T {
        try {
            return fn();
        } catch (e: unknown) {
            if (e instanceof MissingFieldError || e instanceof InvalidFieldValueError) {
                throw new ValidationError(`Cannot publish texture set '${textureSet}': ${e.message}`, {
                    textureSet,
                    field: e.field,
                });
            }
            throw e;
        }
    }

    private async exportAndScan(
        request: TextureSetPublishRequest,
        exportDir: string,
        signal: AbortSignal | undefined,
    ): Promise<TextureSet> {
        const outcome = await this.exportTrigger.export({
            presetName: request.presetName,
            textureSet: request.textureSet,
            outputDir: exportDir,
            signal,
        });
        if (!outcome.success) {
            throw new ExportError(request.presetName, outcome.message ?? 'the exporter reported a failure');
        }

        const textureSets = [...(request.knownTextureSets ?? []), request.textureSet];
        const scan = outcome.files !== undefined
            ? parseExportedFiles(outcome.files, { textureSets })
            : await scanExportArea(exportDir, { textureSets });

        if (scan.mismatched.length > 0) {
            const names = scan.mismatched.map(file => path.basename(file.path));
            const reason = scan.mismatched.length === 1
                ? scan.mismatched[0].reason
                : scan.mismatched.map(file => `${path.basename(file.path)}: ${file.reason}`).join('; ');
            throw new PatternMismatchError(names, reason);
        }

        const files = scan.matched.filter(file => file.textureSet === request.textureSet);
        if (files.length === 0) {
            throw new ValidationError(
                `No exported files found for texture set '${request.textureSet}' in ${exportDir}.`,
                { textureSet: request.textureSet, exportDir },
            );
        }

        const singleSlotPerMap = !this.engine.template(this.config.templates.texture).fields
            .includes(this.config.fields.colorspace);
        const [textureSet] = aggregateTextureSets(files, { singleSlotPerMap });
        return textureSet;
    }

    private stageTextureSet(
        textureSet: TextureSet,
        identity: PublishIdentity,
        setFields: Fields,
        request: TextureSetPublishRequest,
    ): { staged: StagedFile[]; entries: PlannedRecord[]; parent: PlannedRecord } {
        const { templates, fields: f } = this.config;
        const version = Number(setFields[f.version]);
        const dependencies = request.dependencies ?? [];

        const staged: StagedFile[] = [];
        const entries: PlannedRecord[] = [];
        const sources = new Map<string, string>();

        for (const map of textureSet.maps) {
            const mapFields: Fields = {
                ...setFields,
                [f.texture_map]: map.mapName,
                [f.colorspace]: map.colorSpace,
                [f.extension]: map.extension,
            };
            delete mapFields[f.udim];

            const destinations = map.files.map(file =>
                map.isTiled
                    ? this.engine.resolve(templates.texture_udim, { ...mapFields, [f.udim]: file.udim ?? 0 })
                    : this.engine.resolve(templates.texture, mapFields));

            map.files.forEach((file, i) => {
                const destination = destinations[i];
                const previous = sources.get(destination);
                if (previous !== undefined) {
                    throw new InconsistentTextureSetError(
                        textureSet.name,
                        `'${path.basename(previous)}' and '${file.filename}' both publish to ${destination}`,
                        [previous, file.path],
                    );
                }
                sources.set(destination, file.path);
                staged.push({ source: file.path, destination });
            });

            entries.push({
                input: this.recordInput({
                    name: `${identity.asset}_${identity.task}_${identity.name}_${map.mapName}`,
                    type: 'texture_map',
                    path: map.isTiled
                        ? this.engine.resolveAbstract(templates.texture_udim, mapFields)
                        : destinations[0],
                    version,
                    identity: {
                        family: 'texture_map',
                        asset: identity.asset,
                        task: identity.task,
                        name: map.mapName,
                        scope: { [f.texture_set]: identity.name, [f.colorspace]: map.colorSpace },
                    },
                    dependencies,
                    comment: request.comment,
                }),
                thumbnailSource: map.extension.toLowerCase() === 'png' ? destinations[0] : undefined,
            });
        }

        const parent: PlannedRecord = {
            input: this.recordInput({
                name: `${identity.asset}_${identity.task}_${identity.name}`,
                type: 'texture_set',
                path: this.engine.resolve(templates.texture_set, setFields),
                version,
                identity,
                dependencies,
                comment: request.comment,
            }),
        };
        return { staged, entries, parent };
    }

    private recordInput(input: Omit<RecordInput, 'children' | 'comment'> & { comment?: string | undefined }): RecordInput {
        const { comment, ...rest } = input;
        const record: RecordInput = { ...rest, dependencies: [...rest.dependencies], children: [] };
        if (comment !== undefined) record.comment = comment;
        return record;
    }
}
