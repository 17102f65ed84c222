/**
 * Exported texture files and their grouping into texture sets.
 */

/**
 * A file written by the external exporter, parsed from
 * `<textureSet>_<mapName>_<colorSpace>[.<udim>].<ext>`.
 */
export interface ExportedFile {
    /** Path as found on disk. */
    path: string;
    /** Base name of `path`. */
    filename: string;
    textureSet: string;
    mapName: string;
    colorSpace: string;
    /** UDIM tile number, e.g. 1001, when the file is one tile of a sequence. */
    udim?: number;
    /** Extension without the dot, e.g. `png`. */
    extension: string;
}

/**
 * One logical texture map: a single file, or a UDIM tile sequence.
 */
export interface TextureMap {
    mapName: string;
    colorSpace: string;
    extension: string;
    isTiled: boolean;
    /** Tile numbers in ascending order. Empty when not tiled. */
    tiles: number[];
    /** Member files, sorted by tile when tiled. */
    files: ExportedFile[];
}

/**
 * Exported files grouped under one texture set name.
 */
export interface TextureSet {
    name: string;
    isTiled: boolean;
    maps: TextureMap[];
}

/** A file the filename matcher rejected. */
export interface MismatchedFile {
    path: string;
    reason: string;
}

/** Result of scanning an export area. */
export interface ExportScan {
    matched: ExportedFile[];
    mismatched: MismatchedFile[];
}
