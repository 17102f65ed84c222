import { execFile } from 'child_process';
import { promisify } from 'util';
import { ExportError, PublishCancelledError, errorMessage } from '../pipeline-errors.js';
import { logger as rootLogger, type Logger } from '../logger.js';

const execFileAsync = promisify(execFile);

export interface ExportRequest {
    presetName: string;
    /** Texture set name as the host reports it. */
    textureSet: string;
    /** Export work area the files are written to. */
    outputDir: string;
    signal?: AbortSignal | undefined;
}

export interface ExportOutcome {
    success: boolean;
    message?: string;
    /** Paths written, when the exporter reports them. Otherwise the export area is scanned. */
    files?: string[];
}

/**
 * Runs the external texture exporter for one texture set.
 */
export interface ExportTrigger {
    export(request: ExportRequest): Promise<ExportOutcome>;
}

/**
 * For textures the artist exported before publishing; the export area is scanned as it is.
 */
export class ManualExportTrigger implements ExportTrigger {
    export(): Promise<ExportOutcome> {
        return Promise.resolve({ success: true });
    }
}

export interface CommandExportTriggerOptions {
    cwd?: string;
    timeoutMs?: number;
    log?: Logger;
}

/**
 * Runs an exporter executable. `{preset}`, `{output}` and `{texture_set}` in
 * the arguments are replaced by the request's values.
 */
export class CommandExportTrigger implements ExportTrigger {
    private readonly log: Logger;

    constructor(
        private readonly command: string,
        private readonly args: string[],
        private readonly options: CommandExportTriggerOptions = {},
    ) {
        this.log = options.log ?? rootLogger.child('export');
    }

    buildArgs(request: ExportRequest): string[] {
        return this.args.map(arg =>
            arg
                .replaceAll('{preset}', request.presetName)
                .replaceAll('{output}', request.outputDir)
                .replaceAll('{texture_set}', request.textureSet));
    }

    async export(request: ExportRequest): Promise<ExportOutcome> {
        const args = this.buildArgs(request);
        this.log.info(`Exporting '${request.textureSet}' with preset '${request.presetName}'`, {
            operation: 'export',
            command: this.command,
            args,
        });
        try {
            const { stdout, stderr } = await this.log.withTiming('export', () =>
                execFileAsync(this.command, args, {
                    cwd: this.options.cwd,
                    timeout: this.options.timeoutMs,
                    signal: request.signal,
                }), { textureSet: request.textureSet });
            if (stdout.trim() !== '') this.log.debug(stdout.trim(), { operation: 'export' });
            if (stderr.trim() !== '') this.log.warn(stderr.trim(), { operation: 'export' });
            return { success: true };
        } catch (e: unknown) {
            if (request.signal?.aborted === true) throw new PublishCancelledError('EXPORT_SCAN');
            throw new ExportError(request.presetName, errorMessage(e));
        }
    }
}
