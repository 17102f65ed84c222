import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { PipelineClass, defaultPipelineConfig, type ServiceOverrides } from './pipeline.js';
import { JsonFileRegistryClient, type RecordFilter, type RegistryClient } from './registry-client.js';
import { type PublishOrchestrator } from './publish-orchestrator.js';
import { type ExportTrigger } from './export-trigger.js';
import { nodeFileSystem, type PublishFileSystem } from '../io/publish-fs.js';
import { type PublishIdentity, type PublishState, type PublishedRecord, type RecordInput } from '../types/publish.js';
import { Logger, LogLevel } from '../logger.js';
import {
    ExportError,
    PatternMismatchError,
    PublishCancelledError,
    PublishIOError,
    RegistrationError,
    ValidationError,
} from '../pipeline-errors.js';

const quiet = new Logger({ level: LogLevel.ERROR });

const EXPORT_AREA = 'assets/Hero/lookdev/work/textures';
const HULL_FILES = [
    'hull_BaseColor_sRGB.png',
    'hull_Roughness_raw.png',
    'hull_Normal_raw.1001.png',
    'hull_Normal_raw.1002.png',
];
const CONTEXT = { Asset: 'Hero', task_name: 'lookdev' };

/** Registry that fails the chosen createRecord calls, counting from 1. */
class FlakyRegistry implements RegistryClient {
    calls = 0;
    failOn = new Set<number>();

    constructor(private readonly inner: RegistryClient) {}

    createRecord(input: RecordInput): Promise<PublishedRecord> {
        this.calls++;
        if (this.failOn.has(this.calls)) return Promise.reject(new Error('registry unavailable'));
        return this.inner.createRecord(input);
    }

    queryMaxVersion(identity: PublishIdentity): Promise<number | null> {
        return this.inner.queryMaxVersion(identity);
    }

    listRecords(filter?: RecordFilter): Promise<PublishedRecord[]> {
        return this.inner.listRecords(filter);
    }
}

describe('PublishOrchestrator', () => {
    let tempDir: string;
    let registry: FlakyRegistry;
    let thumbnailer: Mock<(source: string) => Promise<string | undefined>>;

    function at(relative: string): string {
        return path.join(tempDir, ...relative.split('/'));
    }

    async function write(relative: string, content = relative): Promise<void> {
        await fs.mkdir(path.dirname(at(relative)), { recursive: true });
        await fs.writeFile(at(relative), content);
    }

    async function exists(relative: string): Promise<boolean> {
        return nodeFileSystem.exists(at(relative));
    }

    function orchestrator(overrides: ServiceOverrides = {}, timeoutMs?: number): PublishOrchestrator {
        const config = defaultPipelineConfig('test');
        if (timeoutMs !== undefined) config.publish = { ...config.publish, timeout_ms: timeoutMs };
        const pipeline = PipelineClass.fromJSON(path.join(tempDir, 'texpub.json'), config);
        return pipeline.createServices({ registry, thumbnailer, logger: quiet, ...overrides }).orchestrator;
    }

    function sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }

    /** Filesystem whose copyFile fails for one source file name. */
    function failingCopy(sourceName: string): PublishFileSystem {
        return {
            ...nodeFileSystem,
            copyFile: (from, to) =>
                path.basename(from) === sourceName
                    ? Promise.reject(new Error('ENOSPC: no space left on device'))
                    : nodeFileSystem.copyFile(from, to),
        };
    }

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'texpub-publish-'));
        registry = new FlakyRegistry(new JsonFileRegistryClient(path.join(tempDir, 'texpub-registry.json'), quiet));
        thumbnailer = vi.fn((source: string) => Promise.resolve<string | undefined>(`${source}.thumb`));
        for (const file of HULL_FILES) await write(`${EXPORT_AREA}/${file}`);
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    // ─── texture set ─────────────────────────────────────────────────

    describe('publishTextureSet', () => {
        const request = { presetName: 'studio_pbr', textureSet: 'hull', context: CONTEXT };
        const v1 = 'assets/Hero/lookdev/publish/textures/hull/v001';

        it('publishes every map of the set as version 1 and registers maps then the set', async () => {
            const states: PublishState[] = [];
            const result = await orchestrator().publishTextureSet(request, {
                onStateChange: state => states.push(state),
            });

            expect(states).toEqual(['VALIDATE', 'EXPORT_SCAN', 'STAGE', 'COMMIT', 'REGISTER', 'DONE']);
            expect(result.version).toBe(1);
            expect(result.identity).toEqual({ family: 'texture_set', asset: 'Hero', task: 'lookdev', name: 'hull' });
            expect(result.copiedPaths).toEqual([
                at(`${v1}/Hero_hull_BaseColor_sRGB.png`),
                at(`${v1}/Hero_hull_Normal_raw.1001.png`),
                at(`${v1}/Hero_hull_Normal_raw.1002.png`),
                at(`${v1}/Hero_hull_Roughness_raw.png`),
            ]);
            expect(await fs.readFile(at(`${v1}/Hero_hull_Normal_raw.1002.png`), 'utf8')).toBe(
                `${EXPORT_AREA}/hull_Normal_raw.1002.png`,
            );
            expect((await fs.readdir(at(v1))).filter(name => name.startsWith('.'))).toEqual([]);

            const [baseColor, normal, roughness, set] = result.records;
            expect(result.records.map(r => [r.type, r.name])).toEqual([
                ['texture_map', 'Hero_lookdev_hull_BaseColor'],
                ['texture_map', 'Hero_lookdev_hull_Normal'],
                ['texture_map', 'Hero_lookdev_hull_Roughness'],
                ['texture_set', 'Hero_lookdev_hull'],
            ]);
            expect(normal.path).toBe(at(`${v1}/Hero_hull_Normal_raw.<UDIM>.png`));
            expect(normal.identity).toEqual({
                family: 'texture_map',
                asset: 'Hero',
                task: 'lookdev',
                name: 'Normal',
                scope: { texture_set: 'hull', colorspace: 'raw' },
            });
            expect(baseColor.thumbnailPath).toBe(`${at(`${v1}/Hero_hull_BaseColor_sRGB.png`)}.thumb`);
            expect(roughness.version).toBe(1);
            expect(set.path).toBe(at(v1));
            expect(set.children).toEqual([baseColor.id, normal.id, roughness.id]);
        });

        it('gives the next publish of the same set version 2', async () => {
            await orchestrator().publishTextureSet(request);
            const second = await orchestrator().publishTextureSet(request);

            expect(second.version).toBe(2);
            expect(await exists('assets/Hero/lookdev/publish/textures/hull/v002/Hero_hull_BaseColor_sRGB.png')).toBe(true);
        });

        it('rolls back every file when one copy fails, leaving the sources alone', async () => {
            await fs.rm(at(`${EXPORT_AREA}/hull_Normal_raw.1001.png`));
            await fs.rm(at(`${EXPORT_AREA}/hull_Normal_raw.1002.png`));
            await write(`${EXPORT_AREA}/hull_Normal_raw.png`);

            const error = await orchestrator({ fs: failingCopy('hull_Normal_raw.png') })
                .publishTextureSet(request)
                .catch((e: unknown) => e);

            expect(error).toBeInstanceOf(PublishIOError);
            if (!(error instanceof PublishIOError)) return;
            expect(error.leftovers).toEqual([]);
            expect([...error.rolledBack].sort()).toEqual([
                at(`${v1}/Hero_hull_BaseColor_sRGB.png`),
                at(`${v1}/Hero_hull_Roughness_raw.png`),
            ]);
            expect(error.context.failedPath).toBe(at(`${EXPORT_AREA}/hull_Normal_raw.png`));
            expect(await exists('assets/Hero/lookdev/publish')).toBe(false);
            expect((await fs.readdir(at(EXPORT_AREA))).sort()).toEqual([
                'hull_BaseColor_sRGB.png',
                'hull_Normal_raw.png',
                'hull_Roughness_raw.png',
            ]);
            expect(await registry.listRecords()).toEqual([]);
        });

        it('rolls back the whole set when one copy times out', async () => {
            const stalling: PublishFileSystem = {
                ...nodeFileSystem,
                copyFile: async (from, to) => {
                    if (path.basename(from) === 'hull_Roughness_raw.png') await sleep(300);
                    await nodeFileSystem.copyFile(from, to);
                },
            };

            const error = await orchestrator({ fs: stalling }, 100).publishTextureSet(request).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(PublishIOError);
            if (!(error instanceof PublishIOError)) return;
            expect(error.context.cause).toBe(`copy (${at(`${v1}/Hero_hull_Roughness_raw.png`)}) timed out after 100ms.`);
            expect(error.leftovers).toEqual([]);
            expect(error.message.endsWith(' All written files were removed.')).toBe(true);
            expect(await exists('assets/Hero/lookdev/publish')).toBe(false);
            expect(await registry.listRecords()).toEqual([]);
        });

        it('removes a file whose rename lands after it timed out', async () => {
            const roughness = at(`${v1}/Hero_hull_Roughness_raw.png`);
            const lateRename: PublishFileSystem = {
                ...nodeFileSystem,
                rename: async (from, to) => {
                    await nodeFileSystem.rename(from, to);
                    if (to === roughness) await sleep(300);
                },
            };

            const error = await orchestrator({ fs: lateRename }, 100).publishTextureSet(request).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(PublishIOError);
            if (!(error instanceof PublishIOError)) return;
            expect(error.context.cause).toBe(`rename (${roughness}) timed out after 100ms.`);
            expect(error.leftovers).toEqual([]);
            expect(error.rolledBack).toContain(roughness);
            expect(error.rolledBack).toHaveLength(4);
            expect(await exists('assets/Hero/lookdev/publish')).toBe(false);
            expect(await registry.listRecords()).toEqual([]);
        });

        it('refuses to replace a destination that appears during commit', async () => {
            const taken = at(`${v1}/Hero_hull_Roughness_raw.png`);
            const racing: PublishFileSystem = {
                ...nodeFileSystem,
                exists: target => (target === taken ? Promise.resolve(true) : nodeFileSystem.exists(target)),
            };

            const error = await orchestrator({ fs: racing }).publishTextureSet(request).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(PublishIOError);
            expect(error instanceof PublishIOError && error.message).toContain(`Destination already exists: ${taken}`);
            expect(await exists(`${v1}/Hero_hull_BaseColor_sRGB.png`)).toBe(false);
        });

        it('keeps the files when registration fails and finishes on retry without copying', async () => {
            registry.failOn.add(2);
            const publisher = orchestrator();

            const error = await publisher.publishTextureSet(request).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(RegistrationError);
            if (!(error instanceof RegistrationError) || error.plan === undefined) return;
            expect(error.copiedPaths).toHaveLength(4);
            expect(await exists(`${v1}/Hero_hull_Normal_raw.1001.png`)).toBe(true);
            expect(await registry.listRecords()).toHaveLength(1);

            const copy = vi.spyOn(nodeFileSystem, 'copyFile');
            const retried = await publisher.register(error.plan);

            expect(copy).not.toHaveBeenCalled();
            copy.mockRestore();
            expect(retried.version).toBe(1);
            expect(retried.records.map(r => r.name)).toEqual([
                'Hero_lookdev_hull_BaseColor',
                'Hero_lookdev_hull_Normal',
                'Hero_lookdev_hull_Roughness',
                'Hero_lookdev_hull',
            ]);
            expect(await registry.listRecords()).toHaveLength(4);
            expect(registry.calls).toBe(5);
        });

        it('accepts an explicit version above the latest and rejects one at or below it', async () => {
            const publisher = orchestrator();
            const first = await publisher.publishTextureSet({ ...request, version: 5 });
            expect(first.version).toBe(5);
            expect(await exists('assets/Hero/lookdev/publish/textures/hull/v005')).toBe(true);

            await expect(publisher.publishTextureSet({ ...request, version: 5 })).rejects.toThrow(
                "Version 5 of texture set 'hull' must be greater than the latest published version 5.",
            );
        });

        it('rejects a preset without the studio prefix before exporting', async () => {
            const exportTrigger: ExportTrigger = { export: vi.fn(() => Promise.resolve({ success: true })) };

            await expect(orchestrator({ exportTrigger }).publishTextureSet({ ...request, presetName: 'pbr' })).rejects.toThrow(
                "Export preset 'pbr' must start with 'studio'.",
            );
            expect(exportTrigger.export).not.toHaveBeenCalled();
        });

        it('rejects preset output maps that break the naming pattern', async () => {
            const error = await orchestrator()
                .publishTextureSet({ ...request, presetOutputMaps: ['$textureSet_Base_Color_$colorSpace'] })
                .catch((e: unknown) => e);
            expect(error).toBeInstanceOf(ValidationError);
        });

        it('reports a failed export', async () => {
            const exportTrigger: ExportTrigger = {
                export: () => Promise.resolve({ success: false, message: 'preset missing' }),
            };
            await expect(orchestrator({ exportTrigger }).publishTextureSet(request)).rejects.toThrow(
                new ExportError('studio_pbr', 'preset missing').message,
            );
        });

        it('uses the file list the exporter reports instead of scanning', async () => {
            const exportTrigger: ExportTrigger = {
                export: () => Promise.resolve({ success: true, files: [at(`${EXPORT_AREA}/hull_BaseColor_sRGB.png`)] }),
            };
            const result = await orchestrator({ exportTrigger }).publishTextureSet(request);
            expect(result.copiedPaths).toEqual([at(`${v1}/Hero_hull_BaseColor_sRGB.png`)]);
        });

        it('aborts on a file that does not follow the naming pattern', async () => {
            await write(`${EXPORT_AREA}/hull_Base_Color_sRGB.png`);

            const error = await orchestrator().publishTextureSet(request).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(PatternMismatchError);
            expect(error instanceof PatternMismatchError && error.filenames).toEqual(['hull_Base_Color_sRGB.png']);
            expect(await exists('assets/Hero/lookdev/publish')).toBe(false);
        });

        it('fails when nothing was exported for the set', async () => {
            await expect(orchestrator().publishTextureSet({ ...request, textureSet: 'deck' })).rejects.toThrow(
                `No exported files found for texture set 'deck' in ${at(EXPORT_AREA)}.`,
            );
        });

        it('publishes a host texture set name with underscores under its name without them', async () => {
            for (const file of HULL_FILES) await fs.rm(at(`${EXPORT_AREA}/${file}`));
            await write(`${EXPORT_AREA}/hull_main_BaseColor_sRGB.png`);

            const result = await orchestrator().publishTextureSet({ ...request, textureSet: 'hull_main' });

            expect(result.identity.name).toBe('hullmain');
            expect(result.copiedPaths).toEqual([
                at('assets/Hero/lookdev/publish/textures/hullmain/v001/Hero_hullmain_BaseColor_sRGB.png'),
            ]);
        });

        it('requires the context to name the asset and task', async () => {
            await expect(orchestrator().publishTextureSet({ ...request, context: { Asset: 'Hero' } })).rejects.toThrow(
                "The publish context must give 'Asset' and 'task_name'.",
            );
        });

        it('has no side effects when cancelled before commit', async () => {
            const controller = new AbortController();
            controller.abort();

            const error = await orchestrator().publishTextureSet(request, { signal: controller.signal }).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(PublishCancelledError);
            expect(error instanceof PublishCancelledError && error.message).toBe('Publish cancelled during VALIDATE.');
            expect(await exists('assets/Hero/lookdev/publish')).toBe(false);
        });

        it('rolls back when cancelled while copying', async () => {
            const controller = new AbortController();
            const cancelling: PublishFileSystem = {
                ...nodeFileSystem,
                copyFile: (from, to) => {
                    controller.abort();
                    return nodeFileSystem.copyFile(from, to);
                },
            };
            const states: PublishState[] = [];

            const error = await orchestrator({ fs: cancelling })
                .publishTextureSet(request, { signal: controller.signal, onStateChange: state => states.push(state) })
                .catch((e: unknown) => e);

            expect(error).toBeInstanceOf(PublishCancelledError);
            if (!(error instanceof PublishCancelledError)) return;
            expect(error.message).toBe('Publish cancelled during COMMIT.');
            expect(error.rolledBack).toHaveLength(4);
            expect(states[states.length - 1]).toBe('FAILED');
            expect(await exists('assets/Hero/lookdev/publish')).toBe(false);
        });
    });

    // ─── project file ────────────────────────────────────────────────

    describe('publishProject', () => {
        const workFile = 'assets/Hero/lookdev/work/hull.v003.spp';

        beforeEach(async () => {
            await write(workFile, 'scene');
        });

        it('copies the work file to the next publish version and registers it', async () => {
            const result = await orchestrator().publishProject({ workPath: at(workFile), comment: 'first pass' });

            expect(result.version).toBe(1);
            expect(result.copiedPaths).toEqual([at('assets/Hero/lookdev/publish/hull.v001.spp')]);
            expect(await fs.readFile(at('assets/Hero/lookdev/publish/hull.v001.spp'), 'utf8')).toBe('scene');
            expect(result.records).toHaveLength(1);
            expect(result.records[0]).toMatchObject({
                type: 'project',
                name: 'Hero_lookdev_hull',
                version: 1,
                comment: 'first pass',
                children: [],
                dependencies: [],
            });
        });

        it('hands out consecutive versions to parallel publishes of one identity', async () => {
            const publisher = orchestrator();
            const results = await Promise.all(
                [1, 2, 3, 4, 5].map(() => publisher.publishProject({ workPath: at(workFile) })),
            );

            expect(results.map(r => r.version).sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5]);
            expect((await fs.readdir(at('assets/Hero/lookdev/publish'))).sort()).toEqual([
                'hull.v001.spp',
                'hull.v002.spp',
                'hull.v003.spp',
                'hull.v004.spp',
                'hull.v005.spp',
            ]);
        });

        it('continues after versions already registered', async () => {
            await registry.createRecord({
                name: 'Hero_lookdev_hull',
                type: 'project',
                path: at('elsewhere/hull.v007.spp'),
                version: 7,
                identity: { family: 'project', asset: 'Hero', task: 'lookdev', name: 'hull' },
                children: [],
                dependencies: [],
            });

            const result = await orchestrator().publishProject({ workPath: at(workFile) });
            expect(result.version).toBe(8);
        });

        it('rejects a missing work file', async () => {
            const missing = at('assets/Hero/lookdev/work/deck.v001.spp');
            await expect(orchestrator().publishProject({ workPath: missing })).rejects.toThrow(`Work file not found: ${missing}`);
        });

        it('rejects a work file outside the work template', async () => {
            await write('scratch/hull.spp');
            const error = await orchestrator().publishProject({ workPath: at('scratch/hull.spp') }).catch((e: unknown) => e);
            expect(error).toBeInstanceOf(ValidationError);
            expect(error instanceof ValidationError && error.message).toBe(
                `Work file '${at('scratch/hull.spp')}' does not match template 'spp_asset_work'.`,
            );
        });
    });

    // ─── session ─────────────────────────────────────────────────────

    describe('publishSession', () => {
        it('publishes the work file then its texture sets, linked by dependency', async () => {
            await write('assets/Hero/lookdev/work/hull.v002.spp');

            const result = await orchestrator().publishSession({
                workPath: at('assets/Hero/lookdev/work/hull.v002.spp'),
                textureSets: [{ presetName: 'studio_pbr', textureSet: 'hull' }],
            });

            expect(result.project.version).toBe(1);
            expect(result.textureSets).toHaveLength(1);
            const projectId = result.project.records[0].id;
            expect(result.textureSets[0].records.map(r => r.dependencies)).toEqual([
                [projectId],
                [projectId],
                [projectId],
                [projectId],
            ]);
        });

        it('gives texture sets the version of the project publish', async () => {
            await write('assets/Hero/lookdev/work/hull.v002.spp');
            await write('assets/Hero/lookdev/publish/hull.v001.spp');
            await write('assets/Hero/lookdev/publish/hull.v002.spp');

            const result = await orchestrator().publishSession({
                workPath: at('assets/Hero/lookdev/work/hull.v002.spp'),
                textureSets: [{ presetName: 'studio_pbr', textureSet: 'hull' }],
            });

            expect(result.project.version).toBe(3);
            expect(result.textureSets[0].version).toBe(3);
            expect(await exists('assets/Hero/lookdev/publish/textures/hull/v003/Hero_hull_BaseColor_sRGB.png')).toBe(true);
        });

        it('lists the publishes that completed before a texture set failed', async () => {
            await write('assets/Hero/lookdev/work/hull.v002.spp');

            const error = await orchestrator().publishSession({
                workPath: at('assets/Hero/lookdev/work/hull.v002.spp'),
                textureSets: [
                    { presetName: 'studio_pbr', textureSet: 'hull' },
                    { presetName: 'studio_pbr', textureSet: 'deck' },
                ],
            }).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ValidationError);
            if (!(error instanceof ValidationError)) return;
            expect(error.message).toBe(`No exported files found for texture set 'deck' in ${at(EXPORT_AREA)}.`);
            expect(error.context.published).toEqual(["project 'hull' v1", "texture_set 'hull' v1"]);
            expect(error.context.completed).toHaveLength(2);
        });
    });
});
