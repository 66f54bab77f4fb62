import ffmpeg from 'fluent-ffmpeg';
import fs from 'fs';
import { PassThrough } from 'stream';
import { FontResource, RasterImage, Size } from '../../../types';

// Helper: width and height of the first video stream using ffprobe
export function probeImageSize(filePath: string): Promise<Size> {
    return new Promise((resolve, reject) => {
        ffmpeg.ffprobe(filePath, (err, metadata) => {
            if (err) return reject(new Error(`Failed to probe ${filePath}: ${err.message}`));
            const stream = metadata.streams.find(s => s.codec_type === 'video');
            if (!stream || !stream.width || !stream.height) {
                return reject(new Error(`No picture found in ${filePath}`));
            }
            resolve({ width: stream.width, height: stream.height });
        });
    });
}

function decodeRgba(filePath: string): Promise<Buffer> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        const sink = new PassThrough();
        sink.on('data', (chunk: Buffer) => chunks.push(chunk));
        sink.on('end', () => resolve(Buffer.concat(chunks)));

        ffmpeg(filePath)
            .outputOptions(['-frames:v', '1', '-f', 'rawvideo', '-pix_fmt', 'rgba'])
            .on('error', (err: Error) => reject(new Error(`Failed to decode ${filePath}: ${err.message}`)))
            .pipe(sink, { end: true });
    });
}

// Decodes a still into RGBA pixels; the raster stays shared and read-only for the whole render
export async function loadStillImage(filePath: string): Promise<RasterImage> {
    const size = await probeImageSize(filePath);
    const buffer = await decodeRgba(filePath);
    const expected = size.width * size.height * 4;
    if (buffer.byteLength !== expected) {
        throw new Error(`Decoded ${buffer.byteLength} bytes from ${filePath}, expected ${expected}`);
    }
    return {
        width: size.width,
        height: size.height,
        data: new Uint8ClampedArray(buffer.buffer, buffer.byteOffset, buffer.byteLength),
    };
}

/**
 * `family` must be the family name stored inside the font file: libass looks fonts up
 * by that name in `fontsdir`, and the file name often differs (`Inter-Bold.ttf` is "Inter").
 */
export function loadFont(fontPath: string, family: string): FontResource {
    if (!fs.existsSync(fontPath)) {
        throw new Error(`Font file not found: ${fontPath}`);
    }
    return { path: fontPath, family };
}
