import * as path from 'path';
import { type ExportedFile } from '../types/texture.js';
import { PatternMismatchError } from '../pipeline-errors.js';

/**
 * Filename the exporter must produce: `<textureSet>_<mapName>_<colorSpace>[.<udim>].<ext>`.
 * Shown to users when a file or preset does not conform.
 */
export const TEXTURE_FILENAME_PATTERN = '<textureSet>_<mapName>_<colorSpace>[.<udim>].<ext>';

// <mapName>_<colorSpace>[.<udim>].<ext>, anchored at the end of the filename
const MAP_TAIL_REGEX = /^(?<mapName>[^_.\s]+)_(?<colorSpace>[^_.\s]+)(?:\.(?<udim>\d{4}))?\.(?<extension>[A-Za-z0-9]+)$/;

// Texture set token without underscores, used when the set name is not known up front
const FILENAME_REGEX = /^(?<textureSet>[^_.\s]+)_(?<mapName>[^_.\s]+)_(?<colorSpace>[^_.\s]+)(?:\.(?<udim>\d{4}))?\.(?<extension>[A-Za-z0-9]+)$/;

export interface ParseTextureFilenameOptions {
    /**
     * Texture set names reported by the host application. A filename starting
     * with `<name>_` is parsed with that texture set, longest name first, so set
     * names may contain underscores.
     */
    textureSets?: string[];
}

/**
 * Parses an exported texture filename into its semantic fields.
 *
 * The map name and colour space are the last two underscore-delimited
 * segments and never contain `_`, `.` or whitespace. Case is kept as exported.
 *
 * @param filePath Path or bare filename of the exported file.
 * @throws PatternMismatchError when the filename does not conform. No partial result is returned.
 */
export function parseTextureFilename(filePath: string, options: ParseTextureFilenameOptions = {}): ExportedFile {
    const filename = path.basename(filePath);

    const known = [...new Set(options.textureSets ?? [])].sort((a, b) => b.length - a.length);
    for (const textureSet of known) {
        if (textureSet === '' || !filename.startsWith(`${textureSet}_`)) continue;
        const match = MAP_TAIL_REGEX.exec(filename.slice(textureSet.length + 1));
        if (match?.groups !== undefined) {
            return buildExportedFile(filePath, filename, textureSet, match.groups);
        }
    }

    const match = FILENAME_REGEX.exec(filename);
    if (match?.groups !== undefined) {
        return buildExportedFile(filePath, filename, match.groups.textureSet, match.groups);
    }

    throw new PatternMismatchError([filename], describeMismatch(filename));
}

/**
 * Returns whether a filename conforms, without throwing.
 */
export function isTextureFilename(filePath: string, options: ParseTextureFilenameOptions = {}): boolean {
    try {
        parseTextureFilename(filePath, options);
        return true;
    } catch (e: unknown) {
        if (e instanceof PatternMismatchError) return false;
        throw e;
    }
}

function buildExportedFile(
    filePath: string,
    filename: string,
    textureSet: string,
    groups: Record<string, string | undefined>,
): ExportedFile {
    const file: ExportedFile = {
        path: filePath,
        filename,
        textureSet,
        mapName: groups.mapName ?? '',
        colorSpace: groups.colorSpace ?? '',
        extension: groups.extension ?? '',
    };
    if (groups.udim !== undefined) {
        file.udim = parseInt(groups.udim, 10);
    }
    return file;
}

/**
 * Explains why a filename was rejected.
 */
function describeMismatch(filename: string): string {
    if (/\s/.test(filename)) return 'whitespace is not allowed';

    const dot = filename.lastIndexOf('.');
    if (dot <= 0) return 'missing file extension';
    if (!/^[A-Za-z0-9]+$/.test(filename.slice(dot + 1))) return 'invalid file extension';

    let stem = filename.slice(0, dot);
    const tile = /\.(\d+)$/.exec(stem);
    if (tile !== null) {
        if (tile[1].length !== 4) return 'UDIM tile must have 4 digits';
        stem = stem.slice(0, -tile[0].length);
    }
    if (stem.includes('.')) return "unexpected '.' in name";

    const parts = stem.split('_');
    if (parts.length < 3 || parts.some(part => part === '')) {
        return 'expected <textureSet>_<mapName>_<colorSpace> with non-empty segments';
    }
    return "map name must not contain '_'";
}
