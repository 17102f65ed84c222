import { randomUUID } from 'crypto';
import { type PublishIdentity, type PublishedRecord, type RecordInput, type TemplateFamily } from '../types/publish.js';
import { loadRegistryFile, saveRegistryFile } from '../io/registry-io.js';
import { RegistrationError, VersionQueryError, errorMessage } from '../pipeline-errors.js';
import { identityKey } from './identity-lock.js';
import { logger as rootLogger, type Logger } from '../logger.js';

export interface RecordFilter {
    type?: TemplateFamily;
    asset?: string;
    task?: string;
    name?: string;
}

/**
 * The tracking database published files are registered in.
 * Records are append-only: never updated or deleted.
 */
export interface RegistryClient {
    createRecord(input: RecordInput): Promise<PublishedRecord>;

    /** Highest registered version for the identity, or null when it has none. */
    queryMaxVersion(identity: PublishIdentity): Promise<number | null>;

    listRecords(filter?: RecordFilter): Promise<PublishedRecord[]>;
}

/**
 * Registry kept in a JSON file beside the pipeline configuration.
 * Reads and writes go through one queue, so concurrent publishes never lose a record.
 */
export class JsonFileRegistryClient implements RegistryClient {
    private queue: Promise<void> = Promise.resolve();
    private readonly log: Logger;

    constructor(private readonly filePath: string, log: Logger = rootLogger.child('registry')) {
        this.log = log;
    }

    get path(): string {
        return this.filePath;
    }

    createRecord(input: RecordInput): Promise<PublishedRecord> {
        return this.enqueue(async () => {
            try {
                const { created, records } = await loadRegistryFile(this.filePath);
                const record: PublishedRecord = {
                    ...structuredClone(input),
                    id: randomUUID(),
                    createdAt: new Date().toISOString(),
                };
                await saveRegistryFile(this.filePath, [...records, record], created);
                this.log.debug(`Registered ${record.type} '${record.name}' v${String(record.version)}`, {
                    operation: 'createRecord',
                    filePath: record.path,
                });
                return record;
            } catch (e: unknown) {
                throw new RegistrationError(`Could not register '${input.name}': ${errorMessage(e)}`, [input.path]);
            }
        });
    }

    queryMaxVersion(identity: PublishIdentity): Promise<number | null> {
        return this.enqueue(async () => {
            let records: PublishedRecord[];
            try {
                ({ records } = await loadRegistryFile(this.filePath));
            } catch (e: unknown) {
                throw new VersionQueryError(identity, `registry query failed: ${errorMessage(e)}`);
            }
            const key = identityKey(identity);
            const versions = records.filter(r => identityKey(r.identity) === key).map(r => r.version);
            return versions.length > 0 ? Math.max(...versions) : null;
        });
    }

    listRecords(filter: RecordFilter = {}): Promise<PublishedRecord[]> {
        return this.enqueue(async () => {
            const { records } = await loadRegistryFile(this.filePath);
            return records.filter(r =>
                (filter.type === undefined || r.type === filter.type) &&
                (filter.asset === undefined || r.identity.asset === filter.asset) &&
                (filter.task === undefined || r.identity.task === filter.task) &&
                (filter.name === undefined || r.identity.name === filter.name));
        });
    }

    private enqueue<T>(task: () => Promise<T>): Promise<T> {
        const run = this.queue.then(task);
        // failures reach the caller through `run`; the queue only orders tasks
        this.queue = run.then(
            () => undefined,
            () => undefined,
        );
        return run;
    }
}
