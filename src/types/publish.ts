/**
 * Publish requests, identities and registry records.
 */

import { type Fields } from './key.js';

/** Which kind of artifact a version sequence and a record belong to. */
export type TemplateFamily = 'project' | 'texture_map' | 'texture_set';

/**
 * Scope of a version sequence. Two publishes with equal identities share
 * version numbers and are serialized against each other.
 */
export interface PublishIdentity {
    family: TemplateFamily;
    asset: string;
    task: string;
    /** Base name: the work file name, texture set name, or map name. */
    name: string;
    /** Further fields pinning the sequence, e.g. the texture set of a map. */
    scope?: Fields;
}

export type PublishState = 'VALIDATE' | 'EXPORT_SCAN' | 'STAGE' | 'COMMIT' | 'REGISTER' | 'DONE' | 'FAILED';

/**
 * Data sent to the registry to create a record.
 */
export interface RecordInput {
    name: string;
    type: TemplateFamily;
    /** Published path. Tiled maps use their abstract `<UDIM>` path. */
    path: string;
    version: number;
    identity: PublishIdentity;
    /** Child record ids (texture set parent → its maps). */
    children: string[];
    /** Upstream record ids, e.g. the project publish a texture was exported from. */
    dependencies: string[];
    thumbnailPath?: string;
    comment?: string;
}

/**
 * An immutable registry entry for one published file or texture-set group.
 */
export interface PublishedRecord extends RecordInput {
    id: string;
    createdAt: string;
}

/** A source file and the versioned destination it is committed to. */
export interface StagedFile {
    source: string;
    destination: string;
}

export interface PlannedRecord {
    input: RecordInput;
    /** File a thumbnail is generated from at registration time. */
    thumbnailSource?: string;
    /** Set once the registry has accepted the record. */
    record?: PublishedRecord;
}

/**
 * Everything REGISTER needs once files are committed.
 * Kept on a RegistrationError so registration can be retried without copying.
 */
export interface RegistrationPlan {
    identity: PublishIdentity;
    version: number;
    copiedPaths: string[];
    entries: PlannedRecord[];
    /** Parent record created after `entries`, linking to them as children. */
    parent?: PlannedRecord;
}

export interface PublishResult {
    identity: PublishIdentity;
    version: number;
    state: 'DONE';
    copiedPaths: string[];
    records: PublishedRecord[];
}

export interface ProjectPublishRequest {
    /** Path of the work file to publish. */
    workPath: string;
    comment?: string;
    dependencies?: string[];
}

export interface TextureSetPublishRequest {
    /** Exporter preset name; must start with the configured prefix. */
    presetName: string;
    /** Texture set name as the host application reports it. */
    textureSet: string;
    /** Context fields (asset, task, ...) used to resolve the export area and publish paths. */
    context: Fields;
    /** Every texture set name in the host project, used to parse names containing `_`. */
    knownTextureSets?: string[];
    /** Output filename patterns of the preset, checked when given. */
    presetOutputMaps?: string[];
    /** Explicit version; must be greater than every existing version. */
    version?: number;
    comment?: string;
    dependencies?: string[];
}

export interface SessionPublishRequest {
    workPath: string;
    comment?: string;
    textureSets: Array<Omit<TextureSetPublishRequest, 'context' | 'comment' | 'dependencies'>>;
}

export interface SessionPublishResult {
    project: PublishResult;
    textureSets: PublishResult[];
}

export interface PublishOptions {
    signal?: AbortSignal;
    onStateChange?: (state: PublishState, identity: PublishIdentity | null) => void;
}
