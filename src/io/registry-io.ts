import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { type PublishedRecord } from '../types/publish.js';
import { errorMessage, isErrnoException } from '../pipeline-errors.js';

export const REGISTRY_FORMAT_VERSION = '1.0';

let writeCounter = 0;

const fieldsSchema = z.record(z.string(), z.union([z.string(), z.number()]));

const identitySchema = z.object({
    family: z.enum(['project', 'texture_map', 'texture_set']),
    asset: z.string(),
    task: z.string(),
    name: z.string(),
    scope: fieldsSchema.optional(),
});

export const publishedRecordSchema = z.object({
    id: z.string(),
    name: z.string(),
    type: z.enum(['project', 'texture_map', 'texture_set']),
    path: z.string(),
    version: z.number().int().nonnegative(),
    identity: identitySchema,
    children: z.array(z.string()),
    dependencies: z.array(z.string()),
    thumbnailPath: z.string().optional(),
    comment: z.string().optional(),
    createdAt: z.string(),
});

const registryEnvelopeSchema = z.object({
    texpub_version: z.string(),
    created: z.string().optional(),
    modified: z.string().optional(),
    records: z.array(publishedRecordSchema),
});

export type RegistryFileEnvelope = z.infer<typeof registryEnvelopeSchema>;

export interface RegistryContents {
    created?: string | undefined;
    records: PublishedRecord[];
}

/**
 * Loads registry records from a JSON file.
 * A missing file is an empty registry.
 *
 * @param filePath - Path to the registry file
 * @returns The records, oldest first, and the file's creation timestamp
 */
export async function loadRegistryFile(filePath: string): Promise<RegistryContents> {
    let fileContent: string;
    try {
        fileContent = await fs.readFile(filePath, 'utf8');
    } catch (error: unknown) {
        if (isErrnoException(error) && error.code === 'ENOENT') return { records: [] };
        throw error;
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(fileContent);
    } catch (e: unknown) {
        throw new Error(`Invalid JSON in registry file: ${filePath}. ${errorMessage(e)}`);
    }

    const result = registryEnvelopeSchema.safeParse(parsed);
    if (!result.success) {
        throw new Error(`File ${filePath} does not match the registry format.`);
    }
    return { created: result.data.created, records: result.data.records };
}

/**
 * Saves registry records, wrapped in the on-disk envelope.
 * Writes a temporary file beside the target and renames it into place.
 *
 * @param created - Creation timestamp to keep; defaults to now.
 */
export async function saveRegistryFile(filePath: string, records: PublishedRecord[], created?: string): Promise<void> {
    const now = new Date().toISOString();
    const envelope: RegistryFileEnvelope = {
        texpub_version: REGISTRY_FORMAT_VERSION,
        created: created ?? now,
        modified: now,
        records,
    };

    await fs.mkdir(path.dirname(filePath), { recursive: true });
    writeCounter++;
    const tempPath = `${filePath}.${String(process.pid)}-${String(writeCounter)}.tmp`;
    await fs.writeFile(tempPath, `${JSON.stringify(envelope, null, 2)}\n`, 'utf8');
    await fs.rename(tempPath, filePath);
}
