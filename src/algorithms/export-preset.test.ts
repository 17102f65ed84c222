import { describe, it, expect } from 'vitest';
import { hasPresetPrefix, isValidPresetMap, findInvalidPresetMaps } from './export-preset.js';

describe('preset checks', () => {
    it('matches the prefix case-insensitively', () => {
        expect(hasPresetPrefix('Studio_Hero', 'studio')).toBe(true);
        expect(hasPresetPrefix('hero_studio', 'studio')).toBe(false);
    });

    it('accepts the publish map pattern', () => {
        expect(isValidPresetMap('$textureSet_BaseColor_$colorSpace(.$udim)')).toBe(true);
    });

    it('lists maps that break the pattern', () => {
        expect(findInvalidPresetMaps([
            '$textureSet_BaseColor_$colorSpace(.$udim)',
            '$textureSet_Base_Color_$colorSpace(.$udim)',
            '$mesh_Normal_$colorSpace(.$udim)',
            '$textureSet_Roughness_$colorSpace',
        ])).toEqual([
            '$textureSet_Base_Color_$colorSpace(.$udim)',
            '$mesh_Normal_$colorSpace(.$udim)',
            '$textureSet_Roughness_$colorSpace',
        ]);
    });
});
