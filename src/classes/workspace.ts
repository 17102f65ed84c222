import { randomUUID } from 'crypto';
import { type RegistrationPlan } from '../types/publish.js';
import { type PipelineClass, type PipelineServices, type ServiceOverrides } from './pipeline.js';

/** A publish whose files are committed but whose records are not all registered. */
export interface PendingRegistration {
    id: string;
    plan: RegistrationPlan;
    failedAt: string;
}

/**
 * In-memory server session singleton.
 * Holds the loaded pipeline configuration, the services built from it, and the
 * publishes waiting for a registration retry.
 * Not persisted to disk; exists only for the duration of the server session.
 */
export class WorkspaceClass {
    private static _instance: WorkspaceClass | null = null;

    /** The active pipeline configuration, or null if none is loaded. */
    public pipeline: PipelineClass | null = null;

    private _services: PipelineServices | null = null;

    /** Overrides applied whenever services are built, e.g. a test registry. */
    private _overrides: ServiceOverrides = {};

    private readonly _pending: Map<string, PendingRegistration> = new Map();

    private constructor() {
        // Singleton: use WorkspaceClass.instance()
    }

    /**
     * Returns the singleton WorkspaceClass instance.
     */
    static instance(): WorkspaceClass {
        if (WorkspaceClass._instance === null) {
            WorkspaceClass._instance = new WorkspaceClass();
        }
        return WorkspaceClass._instance;
    }

    /**
     * Resets the singleton for testing. Clears all state.
     */
    static reset(): void {
        WorkspaceClass._instance = null;
    }

    // ------------------------------------------------------------------------
    // Pipeline Management
    // ------------------------------------------------------------------------

    /**
     * Sets the active pipeline and builds its services.
     * Pending registrations belong to the previous pipeline and are dropped.
     */
    setPipeline(pipeline: PipelineClass): void {
        this.pipeline = pipeline;
        this._services = pipeline.createServices(this._overrides);
        this._pending.clear();
    }

    /**
     * Sets the overrides used to build services, rebuilding them for the active pipeline.
     */
    setServiceOverrides(overrides: ServiceOverrides): void {
        this._overrides = overrides;
        if (this.pipeline !== null) {
            this._services = this.pipeline.createServices(overrides);
        }
    }

    get services(): PipelineServices | null {
        return this._services;
    }

    // ------------------------------------------------------------------------
    // Pending Registrations
    // ------------------------------------------------------------------------

    /**
     * Keeps a failed registration for a later retry.
     * @returns The id to retry it with.
     */
    addPendingRegistration(plan: RegistrationPlan): string {
        const id = randomUUID().slice(0, 8);
        this._pending.set(id, { id, plan, failedAt: new Date().toISOString() });
        return id;
    }

    getPendingRegistration(id: string): PendingRegistration | undefined {
        return this._pending.get(id);
    }

    removePendingRegistration(id: string): boolean {
        return this._pending.delete(id);
    }

    get pendingRegistrations(): PendingRegistration[] {
        return [...this._pending.values()];
    }

    // ------------------------------------------------------------------------
    // Session Info
    // ------------------------------------------------------------------------

    /**
     * Returns a summary of the current workspace state.
     */
    info() {
        return {
            pipeline: this.pipeline
                ? { name: this.pipeline.name, path: this.pipeline.path, root: this.pipeline.root }
                : null,
            pendingRegistrations: this.pendingRegistrations.map(pending => ({
                id: pending.id,
                identity: pending.plan.identity,
                version: pending.plan.version,
                copiedPaths: pending.plan.copiedPaths,
                failedAt: pending.failedAt,
            })),
        };
    }
}

/**
 * Module-level accessor for the workspace singleton.
 * Tool handlers import this function to get the workspace.
 */
export function getWorkspace(): WorkspaceClass {
    return WorkspaceClass.instance();
}
