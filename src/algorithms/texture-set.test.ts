import { describe, it, expect } from 'vitest';
import { aggregateTextureSets, publishedTextureSetName } from './texture-set.js';
import { parseTextureFilename } from './texture-filename.js';
import { InconsistentTextureSetError } from '../pipeline-errors.js';

const parse = (...names: string[]) => names.map(name => parseTextureFilename(name));

describe('aggregateTextureSets', () => {
    it('groups a mixed tiled export into one set', () => {
        const sets = aggregateTextureSets(parse(
            'hull_BaseColor_sRGB.png',
            'hull_Roughness_raw.png',
            'hull_Normal_raw.1002.png',
            'hull_Normal_raw.1001.png',
        ));

        expect(sets).toHaveLength(1);
        expect(sets[0].name).toBe('hull');
        expect(sets[0].isTiled).toBe(true);
        expect(sets[0].maps.map(m => m.mapName)).toEqual(['BaseColor', 'Roughness', 'Normal']);

        const normal = sets[0].maps[2];
        expect(normal.isTiled).toBe(true);
        expect(normal.tiles).toEqual([1001, 1002]);
        expect(normal.files.map(f => f.filename)).toEqual(['hull_Normal_raw.1001.png', 'hull_Normal_raw.1002.png']);
        expect(sets[0].maps[0].tiles).toEqual([]);
    });

    it('keeps sets in first-seen order', () => {
        const sets = aggregateTextureSets(parse('deck_Metal_raw.png', 'hull_Metal_raw.png', 'deck_Normal_raw.png'));
        expect(sets.map(s => s.name)).toEqual(['deck', 'hull']);
        expect(sets[0].maps).toHaveLength(2);
        expect(sets[1].isTiled).toBe(false);
    });

    it('treats one map name under two colour spaces as two maps', () => {
        const sets = aggregateTextureSets(parse('hull_BaseColor_sRGB.png', 'hull_BaseColor_linear.png'));
        expect(sets[0].maps.map(m => m.colorSpace)).toEqual(['sRGB', 'linear']);
    });

    it('rejects two colour spaces when the template has one slot per map', () => {
        expect(() => aggregateTextureSets(
            parse('hull_BaseColor_sRGB.png', 'hull_BaseColor_linear.png'),
            { singleSlotPerMap: true },
        )).toThrow(
            "Texture set 'hull' is inconsistent: map 'BaseColor' was exported with several colour spaces " +
            '(sRGB, linear) but the publish template has one slot per map name.',
        );
    });

    it('rejects duplicates that differ only by extension', () => {
        expect(() => aggregateTextureSets(parse('hull_BaseColor_sRGB.png', 'hull_BaseColor_sRGB.exr'))).toThrow(
            "Texture set 'hull' is inconsistent: map 'BaseColor' (sRGB) has more than one file for the same slot.",
        );
    });

    it('rejects a repeated tile', () => {
        expect(() => aggregateTextureSets(parse('hull_Normal_raw.1001.png', 'hull_Normal_raw.1001.tif'))).toThrow(
            'has more than one file for tile 1001',
        );
    });

    it('rejects a map mixing tiles and an untiled file', () => {
        expect(() => aggregateTextureSets(parse('hull_Normal_raw.png', 'hull_Normal_raw.1001.png'))).toThrow(
            "map 'Normal' (raw) mixes UDIM tiles with an untiled file",
        );
    });

    it('rejects mixed extensions within a tile sequence', () => {
        expect(() => aggregateTextureSets(parse('hull_Normal_raw.1001.png', 'hull_Normal_raw.1002.exr'))).toThrow(
            "map 'Normal' (raw) mixes file extensions",
        );
    });

    it('rejects map names containing a separator', () => {
        const [file] = parse('hull_BaseColor_sRGB.png');
        expect(() => aggregateTextureSets([{ ...file, mapName: 'Base_Color' }])).toThrow(InconsistentTextureSetError);
    });

    it('returns nothing for no files', () => {
        expect(aggregateTextureSets([])).toEqual([]);
    });
});

describe('publishedTextureSetName', () => {
    it('drops underscores', () => {
        expect(publishedTextureSetName('hull_trim_01')).toBe('hulltrim01');
        expect(publishedTextureSetName('hull')).toBe('hull');
    });
});
