import { type ExportedFile, type TextureMap, type TextureSet } from '../types/texture.js';
import { InconsistentTextureSetError } from '../pipeline-errors.js';

// Separators that would make a map name ambiguous inside a filename or path
const FORBIDDEN_MAP_NAME_REGEX = /[_.\s/\\]/;

export interface AggregateOptions {
    /**
     * The destination template has one slot per map name (no colour space
     * field), so a map exported under two colour spaces cannot be published.
     */
    singleSlotPerMap?: boolean;
}

/**
 * Groups exported files into texture sets, and each set into maps.
 *
 * A map is identified by its name and colour space; the same map name under
 * two colour spaces gives two maps. Files carrying a UDIM tile form one tile
 * sequence per map. Partial tile sequences are kept as they are.
 *
 * @returns Texture sets and their maps in the order files were first seen; tiles ascending.
 * @throws InconsistentTextureSetError on duplicates, forbidden map names, or mixed tiling.
 */
export function aggregateTextureSets(files: ExportedFile[], options: AggregateOptions = {}): TextureSet[] {
    const sets = new Map<string, Map<string, ExportedFile[]>>();

    for (const file of files) {
        if (file.mapName === '' || FORBIDDEN_MAP_NAME_REGEX.test(file.mapName)) {
            throw new InconsistentTextureSetError(
                file.textureSet,
                `map name '${file.mapName}' is empty or contains a separator`,
                [file.path],
            );
        }
        let maps = sets.get(file.textureSet);
        if (maps === undefined) {
            maps = new Map();
            sets.set(file.textureSet, maps);
        }
        const mapKey = `${file.mapName}\u0000${file.colorSpace}`;
        const members = maps.get(mapKey);
        if (members === undefined) {
            maps.set(mapKey, [file]);
        } else {
            members.push(file);
        }
    }

    const result: TextureSet[] = [];
    for (const [name, maps] of sets) {
        const textureMaps = [...maps.values()].map(members => buildTextureMap(name, members));

        if (options.singleSlotPerMap === true) {
            checkSingleSlotPerMap(name, textureMaps);
        }

        result.push({
            name,
            isTiled: textureMaps.some(map => map.isTiled),
            maps: textureMaps,
        });
    }
    return result;
}

/**
 * Name a texture set is published under: the host name without underscores,
 * so the set token stays unambiguous inside published filenames.
 */
export function publishedTextureSetName(textureSet: string): string {
    return textureSet.replace(/_/g, '');
}

function buildTextureMap(textureSet: string, members: ExportedFile[]): TextureMap {
    const first = members[0];
    const label = `map '${first.mapName}' (${first.colorSpace})`;
    const paths = members.map(file => file.path);

    const tiled = members.filter(file => file.udim !== undefined);
    if (tiled.length > 0 && tiled.length !== members.length) {
        throw new InconsistentTextureSetError(textureSet, `${label} mixes UDIM tiles with an untiled file`, paths);
    }

    const seen = new Map<number, ExportedFile>();
    for (const file of members) {
        const slot = file.udim ?? -1;
        const previous = seen.get(slot);
        if (previous !== undefined) {
            const where = file.udim !== undefined ? `tile ${String(file.udim)}` : 'the same slot';
            throw new InconsistentTextureSetError(
                textureSet,
                `${label} has more than one file for ${where}`,
                [previous.path, file.path],
            );
        }
        seen.set(slot, file);
    }

    if (members.some(file => file.extension !== first.extension)) {
        throw new InconsistentTextureSetError(textureSet, `${label} mixes file extensions`, paths);
    }

    const isTiled = tiled.length > 0;
    const sorted = isTiled ? [...members].sort((a, b) => (a.udim ?? 0) - (b.udim ?? 0)) : [...members];
    return {
        mapName: first.mapName,
        colorSpace: first.colorSpace,
        extension: first.extension,
        isTiled,
        tiles: isTiled ? sorted.map(file => file.udim ?? 0) : [],
        files: sorted,
    };
}

function checkSingleSlotPerMap(textureSet: string, maps: TextureMap[]): void {
    const colorSpaces = new Map<string, string[]>();
    for (const map of maps) {
        const list = colorSpaces.get(map.mapName) ?? [];
        list.push(map.colorSpace);
        colorSpaces.set(map.mapName, list);
    }
    for (const [mapName, list] of colorSpaces) {
        if (list.length > 1) {
            throw new InconsistentTextureSetError(
                textureSet,
                `map '${mapName}' was exported with several colour spaces (${list.join(', ')}) ` +
                'but the publish template has one slot per map name',
                maps.filter(map => map.mapName === mapName).flatMap(map => map.files.map(file => file.path)),
            );
        }
    }
}
