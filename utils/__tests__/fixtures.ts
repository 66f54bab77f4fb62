import { RasterImage, SegmentInput } from '../../types';

export function solidImage(width: number, height: number, rgba: [number, number, number, number]): RasterImage {
    const data = new Uint8ClampedArray(width * height * 4);
    for (let i = 0; i < data.length; i += 4) data.set(rgba, i);
    return { width, height, data };
}

// Red grows left to right, green top to bottom
export function gradientImage(width: number, height: number): RasterImage {
    const data = new Uint8ClampedArray(width * height * 4);
    for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
            const i = (y * width + x) * 4;
            data[i] = Math.round((x / Math.max(1, width - 1)) * 255);
            data[i + 1] = Math.round((y / Math.max(1, height - 1)) * 255);
            data[i + 2] = 64;
            data[i + 3] = 255;
        }
    }
    return { width, height, data };
}

export function makeSegments(durations: number[], image: RasterImage = solidImage(4, 4, [0, 0, 0, 255])): SegmentInput[] {
    return durations.map((duration, i) => ({ text: `Segment ${i + 1} narration.`, image, duration }));
}
