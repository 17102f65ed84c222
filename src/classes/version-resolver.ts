import { type Fields } from '../types/key.js';
import { type PublishIdentity, type TemplateFamily } from '../types/publish.js';
import { type PublishFields } from '../types/config.js';
import { type TemplateEngineClass } from './template-engine.js';
import { type RegistryClient } from './registry-client.js';
import { findPathsFromTemplate } from '../io/template-scan.js';
import { PipelineError, VersionQueryError, errorMessage } from '../pipeline-errors.js';
import { logger as rootLogger, type Logger } from '../logger.js';

/** Publish templates whose files carry the versions of each family. */
export type FamilyTemplates = Record<TemplateFamily, string[]>;

/**
 * Works out the next free version of a published artifact.
 *
 * The publish area on disk is the source of truth; the registry is consulted
 * as well, and the larger of the two wins.
 */
export class VersionResolverClass {
    private readonly log: Logger;

    constructor(
        private readonly engine: TemplateEngineClass,
        private readonly templates: FamilyTemplates,
        private readonly fields: PublishFields,
        private readonly registry?: RegistryClient,
        log: Logger = rootLogger.child('version'),
    ) {
        this.log = log;
    }

    /**
     * Field values an identity pins in its family's publish templates.
     */
    identityFields(identity: PublishIdentity): Fields {
        return {
            ...identity.scope,
            [this.fields.asset]: identity.asset,
            [this.fields.task]: identity.task,
            [this.nameField(identity.family)]: identity.name,
        };
    }

    /**
     * Versions published on disk for the identity, ascending.
     */
    async currentVersions(identity: PublishIdentity): Promise<number[]> {
        const pinned = this.identityFields(identity);
        const versions = new Set<number>();
        for (const template of this.templates[identity.family]) {
            for (const match of await findPathsFromTemplate(this.engine, template, pinned)) {
                const version = match.fields[this.fields.version];
                if (typeof version === 'number') versions.add(version);
            }
        }
        return [...versions].sort((a, b) => a - b);
    }

    /**
     * `max(disk, registry) + 1`, or 1 when nothing has been published.
     * @throws VersionQueryError when the publish area or the registry cannot be read
     */
    async nextVersion(identity: PublishIdentity): Promise<number> {
        let onDisk: number[];
        try {
            onDisk = await this.currentVersions(identity);
        } catch (e: unknown) {
            if (e instanceof PipelineError) throw e;
            throw new VersionQueryError(identity, `scanning the publish area failed: ${errorMessage(e)}`);
        }

        let registered: number | null = null;
        if (this.registry !== undefined) {
            try {
                registered = await this.registry.queryMaxVersion(identity);
            } catch (e: unknown) {
                if (e instanceof VersionQueryError) throw e;
                throw new VersionQueryError(identity, `registry query failed: ${errorMessage(e)}`);
            }
        }

        const latest = Math.max(0, ...onDisk, registered ?? 0);
        this.log.debug(`Next version of ${identity.family} '${identity.name}' is ${String(latest + 1)}`, {
            operation: 'nextVersion',
            onDisk: onDisk.length > 0 ? onDisk[onDisk.length - 1] : null,
            registered,
        });
        return latest + 1;
    }

    private nameField(family: TemplateFamily): string {
        switch (family) {
            case 'project':
                return this.fields.name;
            case 'texture_set':
                return this.fields.texture_set;
            case 'texture_map':
                return this.fields.texture_map;
        }
    }
}
