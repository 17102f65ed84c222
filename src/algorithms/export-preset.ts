/**
 * Checks on exporter presets, run before anything is exported.
 */

/** Output filename pattern every map of a publish preset must use. */
export const PRESET_MAP_PATTERN = '$textureSet_<MapNameNoUnderscores>_$colorSpace(.$udim)';

const PRESET_MAP_REGEX = /^\$textureSet_[A-Za-z0-9]+_\$colorSpace\(\.\$udim\)/;

/**
 * Whether the preset name carries the studio prefix. Case-insensitive.
 */
export function hasPresetPrefix(presetName: string, prefix: string): boolean {
    return presetName.toLowerCase().startsWith(prefix.toLowerCase());
}

/**
 * Whether one output map filename of a preset follows {@link PRESET_MAP_PATTERN}.
 */
export function isValidPresetMap(fileName: string): boolean {
    return PRESET_MAP_REGEX.test(fileName);
}

/**
 * Returns the output map filenames that do not follow {@link PRESET_MAP_PATTERN}.
 */
export function findInvalidPresetMaps(fileNames: string[]): string[] {
    return fileNames.filter(name => !isValidPresetMap(name));
}
