import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { PNG } from 'pngjs';
import { generateThumbnail } from './thumbnail-io.js';

function writeCheckerPng(filePath: string, width: number, height: number): Promise<void> {
    const png = new PNG({ width, height });
    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            const i = (y * width + x) * 4;
            const on = x < width / 2 ? 255 : 0;
            png.data[i] = on;
            png.data[i + 1] = 0;
            png.data[i + 2] = 255 - on;
            png.data[i + 3] = 255;
        }
    }
    return fs.writeFile(filePath, PNG.sync.write(png));
}

describe('generateThumbnail', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'texpub-thumb-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('scales the longest side down to maxSize', async () => {
        const source = path.join(tempDir, 'Body_BaseColor_sRGB.png');
        await writeCheckerPng(source, 64, 32);

        const thumbPath = await generateThumbnail(source, { maxSize: 16, outputDir: path.join(tempDir, 'thumbs') });

        expect(thumbPath).toBeDefined();
        expect(path.basename(thumbPath ?? '')).toMatch(/^Body_BaseColor_sRGB\.[0-9a-f]{8}\.thumb\.png$/);
        const thumb = PNG.sync.read(await fs.readFile(thumbPath ?? ''));
        expect([thumb.width, thumb.height]).toEqual([16, 8]);
        // left half red, right half blue
        expect([...thumb.data.subarray(0, 4)]).toEqual([255, 0, 0, 255]);
        expect([...thumb.data.subarray(15 * 4, 16 * 4)]).toEqual([0, 0, 255, 255]);
    });

    it('keeps small images at their size', async () => {
        const source = path.join(tempDir, 'small.png');
        await writeCheckerPng(source, 4, 4);

        const thumbPath = await generateThumbnail(source, { outputDir: tempDir });
        const thumb = PNG.sync.read(await fs.readFile(thumbPath ?? ''));
        expect([thumb.width, thumb.height]).toEqual([4, 4]);
    });

    it('returns undefined for files that are not PNG', async () => {
        expect(await generateThumbnail(path.join(tempDir, 'Body_Height_raw.exr'))).toBeUndefined();
    });
});
