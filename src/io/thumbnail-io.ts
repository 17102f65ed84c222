import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { randomUUID } from 'crypto';
import { PNG } from 'pngjs';

export const DEFAULT_THUMBNAIL_SIZE = 512;

export interface ThumbnailOptions {
    /** Longest side of the thumbnail in pixels. */
    maxSize?: number;
    /** Defaults to a `texpub-thumbnails` directory under the OS temp directory. */
    outputDir?: string;
}

/**
 * Writes a downscaled copy of a PNG texture, nearest-neighbour sampled.
 * Images already within `maxSize` are copied at their size.
 *
 * @returns The thumbnail path, or undefined for files that are not PNG.
 */
export async function generateThumbnail(sourcePath: string, options: ThumbnailOptions = {}): Promise<string | undefined> {
    if (path.extname(sourcePath).toLowerCase() !== '.png') return undefined;

    const maxSize = options.maxSize ?? DEFAULT_THUMBNAIL_SIZE;
    const source = PNG.sync.read(await fs.readFile(sourcePath));

    const scale = Math.min(1, maxSize / Math.max(source.width, source.height));
    const width = Math.max(1, Math.round(source.width * scale));
    const height = Math.max(1, Math.round(source.height * scale));

    const thumb = new PNG({ width, height });
    for (let y = 0; y < height; y++) {
        const sy = Math.floor((y * source.height) / height);
        for (let x = 0; x < width; x++) {
            const sx = Math.floor((x * source.width) / width);
            const from = (sy * source.width + sx) * 4;
            source.data.copy(thumb.data, (y * width + x) * 4, from, from + 4);
        }
    }

    const outputDir = options.outputDir ?? path.join(os.tmpdir(), 'texpub-thumbnails');
    await fs.mkdir(outputDir, { recursive: true });
    const outputPath = path.join(
        outputDir,
        `${path.basename(sourcePath, path.extname(sourcePath))}.${randomUUID().slice(0, 8)}.thumb.png`,
    );
    await fs.writeFile(outputPath, PNG.sync.write(thumb));
    return outputPath;
}
