import * as fs from 'fs/promises';
import * as path from 'path';
import { type ExportScan, type ExportedFile, type MismatchedFile } from '../types/texture.js';
import { parseTextureFilename, type ParseTextureFilenameOptions } from '../algorithms/texture-filename.js';
import { PatternMismatchError, isErrnoException } from '../pipeline-errors.js';

/**
 * Lists the exported textures under a directory, recursively.
 * Files the filename matcher rejects are reported, never skipped; dotfiles are ignored.
 *
 * @returns An empty scan when the directory does not exist.
 */
export async function scanExportArea(dir: string, options: ParseTextureFilenameOptions = {}): Promise<ExportScan> {
    const files = await listFiles(dir);
    return parseExportedFiles(files, options);
}

/**
 * Parses a list of exported file paths, splitting matches from mismatches.
 */
export function parseExportedFiles(filePaths: string[], options: ParseTextureFilenameOptions = {}): ExportScan {
    const matched: ExportedFile[] = [];
    const mismatched: MismatchedFile[] = [];
    for (const filePath of filePaths) {
        try {
            matched.push(parseTextureFilename(filePath, options));
        } catch (e: unknown) {
            if (!(e instanceof PatternMismatchError)) throw e;
            mismatched.push({ path: filePath, reason: e.reason });
        }
    }
    return { matched, mismatched };
}

async function listFiles(dir: string): Promise<string[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true }).catch((e: unknown) => {
        if (isErrnoException(e) && e.code === 'ENOENT') return null;
        throw e;
    });
    if (entries === null) return [];

    const files: string[] = [];
    for (const entry of entries) {
        if (entry.name.startsWith('.')) continue;
        const entryPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
            files.push(...(await listFiles(entryPath)));
        } else if (entry.isFile()) {
            files.push(entryPath);
        }
    }
    return files.sort();
}
