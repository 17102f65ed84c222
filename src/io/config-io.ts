import * as fs from 'fs/promises';
import * as path from 'path';
import { pipelineConfigSchema, type PipelineConfig, type PipelineConfigInput } from '../types/config.js';
import { ConfigError, errorMessage, isErrnoException } from '../pipeline-errors.js';

/**
 * Loads and validates a texpub.json configuration file.
 *
 * @param filePath - Path to the texpub.json file
 * @returns The configuration with schema defaults applied
 * @throws ConfigError when the file is missing, is not JSON, or fails the schema
 */
export async function loadConfigFile(filePath: string): Promise<PipelineConfig> {
    let fileContent: string;
    try {
        fileContent = await fs.readFile(filePath, 'utf8');
    } catch (error: unknown) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
            throw new ConfigError(`Pipeline configuration not found: ${filePath}`, filePath);
        }
        throw error;
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(fileContent);
    } catch (e: unknown) {
        throw new ConfigError(`Invalid JSON in pipeline configuration: ${filePath}. ${errorMessage(e)}`, filePath);
    }

    const result = pipelineConfigSchema.safeParse(parsed);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigError(
            `File ${filePath} does not match the pipeline configuration format: ${issues.join('; ')}`,
            filePath,
            result.error,
        );
    }
    return result.data;
}

/**
 * Saves a configuration as pretty JSON.
 * Adds the creation timestamp when missing and creates the parent directory.
 */
export async function saveConfigFile(filePath: string, config: PipelineConfig | PipelineConfigInput): Promise<void> {
    const dataToSave = { ...config };
    if (dataToSave.created === undefined) {
        dataToSave.created = new Date().toISOString();
    }

    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, `${JSON.stringify(dataToSave, null, 2)}\n`, 'utf8');
}
