
import { CropRect, MotionDescriptor, MotionPattern, PixelRect, RasterImage, Size } from '../types';
import { InvalidTimelineError } from './errors';

export const MOTION_PATTERNS: readonly MotionPattern[] = ['zoom-in', 'zoom-out', 'pan-left', 'pan-right', 'pan-up', 'pan-down'];
export const FULL_FRAME: CropRect = { left: 0, top: 0, right: 1, bottom: 1 };

// Zoom factor range for generated motion
const MIN_ZOOM = 1.1;
const MAX_ZOOM = 1.25;

export interface AnimationEngine {
    sample(image: RasterImage, from: CropRect, to: CropRect, t: number, output: Size): RasterImage;
}

export function mulberry32(seed: number): () => number {
    let a = seed >>> 0;
    return () => {
        a = (a + 0x6d2b79f5) | 0;
        let t = Math.imul(a ^ (a >>> 15), 1 | a);
        t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

// Mixes project seed and segment index into one 32-bit PRNG seed
export function motionSeed(seed: number, index: number): number {
    let h = (Math.trunc(seed) ^ 0x9e3779b9) >>> 0;
    h = Math.imul(h ^ (index + 1), 0x85ebca6b) >>> 0;
    h ^= h >>> 13;
    h = Math.imul(h, 0xc2b2ae35) >>> 0;
    h ^= h >>> 16;
    return h >>> 0;
}

function centered(size: number): CropRect {
    const margin = (1 - size) / 2;
    return { left: margin, top: margin, right: margin + size, bottom: margin + size };
}

export function motionForPattern(pattern: MotionPattern, zoom: number): MotionDescriptor {
    const size = 1 / zoom;
    const mid = (1 - size) / 2;

    switch (pattern) {
        case 'zoom-in':
            return { pattern, from: { ...FULL_FRAME }, to: centered(size) };
        case 'zoom-out':
            return { pattern, from: centered(size), to: { ...FULL_FRAME } };
        case 'pan-left':
            return {
                pattern,
                from: { left: 1 - size, top: mid, right: 1, bottom: mid + size },
                to: { left: 0, top: mid, right: size, bottom: mid + size },
            };
        case 'pan-right':
            return {
                pattern,
                from: { left: 0, top: mid, right: size, bottom: mid + size },
                to: { left: 1 - size, top: mid, right: 1, bottom: mid + size },
            };
        case 'pan-up':
            return {
                pattern,
                from: { left: mid, top: 1 - size, right: mid + size, bottom: 1 },
                to: { left: mid, top: 0, right: mid + size, bottom: size },
            };
        case 'pan-down':
            return {
                pattern,
                from: { left: mid, top: 0, right: mid + size, bottom: size },
                to: { left: mid, top: 1 - size, right: mid + size, bottom: 1 },
            };
    }
}

/**
 * Picks the pan/zoom for one segment. Pure in (seed, index): re-rendering a
 * project with the same seed reproduces the same motion.
 */
export function chooseMotion(seed: number, index: number): MotionDescriptor {
    const random = mulberry32(motionSeed(seed, index));
    const pattern = MOTION_PATTERNS[Math.floor(random() * MOTION_PATTERNS.length)];
    const zoom = MIN_ZOOM + random() * (MAX_ZOOM - MIN_ZOOM);
    return motionForPattern(pattern, zoom);
}

export function assertCropRect(rect: CropRect): void {
    const bounds = [rect.left, rect.top, rect.right, rect.bottom];
    if (bounds.some(v => !Number.isFinite(v) || v < 0 || v > 1)) {
        throw new InvalidTimelineError(`Crop bounds must lie within [0, 1], got ${JSON.stringify(rect)}`);
    }
    if (rect.right <= rect.left || rect.bottom <= rect.top) {
        throw new InvalidTimelineError(`Crop rectangle is empty: ${JSON.stringify(rect)}`);
    }
}

export function interpolateRect(from: CropRect, to: CropRect, t: number): CropRect {
    const k = Math.min(1, Math.max(0, t));
    const lerp = (a: number, b: number) => a + (b - a) * k;
    return {
        left: lerp(from.left, to.left),
        top: lerp(from.top, to.top),
        right: lerp(from.right, to.right),
        bottom: lerp(from.bottom, to.bottom),
    };
}

// Largest centred region of the source with the output's aspect ratio
export function coverRegion(image: Size, output: Size): PixelRect {
    const targetAspect = output.width / output.height;
    if (image.width / image.height > targetAspect) {
        const width = image.height * targetAspect;
        return { x: (image.width - width) / 2, y: 0, width, height: image.height };
    }
    const height = image.width / targetAspect;
    return { x: 0, y: (image.height - height) / 2, width: image.width, height };
}

export function cropRegionAt(image: Size, from: CropRect, to: CropRect, t: number, output: Size): PixelRect {
    assertCropRect(from);
    assertCropRect(to);
    const cover = coverRegion(image, output);
    const rect = interpolateRect(from, to, t);
    return {
        x: cover.x + rect.left * cover.width,
        y: cover.y + rect.top * cover.height,
        width: (rect.right - rect.left) * cover.width,
        height: (rect.bottom - rect.top) * cover.height,
    };
}

export function createRaster(size: Size): RasterImage {
    return { width: size.width, height: size.height, data: new Uint8ClampedArray(size.width * size.height * 4) };
}

// Bilinear crop-and-scale of `region` into a new raster of `output` size
export function resampleRegion(image: RasterImage, region: PixelRect, output: Size): RasterImage {
    const out = createRaster(output);
    const src = image.data;
    const maxX = image.width - 1;
    const maxY = image.height - 1;
    const scaleX = region.width / output.width;
    const scaleY = region.height / output.height;

    for (let oy = 0; oy < output.height; oy++) {
        const sy = Math.min(maxY, Math.max(0, region.y + (oy + 0.5) * scaleY - 0.5));
        const y0 = Math.floor(sy);
        const y1 = Math.min(y0 + 1, maxY);
        const fy = sy - y0;

        for (let ox = 0; ox < output.width; ox++) {
            const sx = Math.min(maxX, Math.max(0, region.x + (ox + 0.5) * scaleX - 0.5));
            const x0 = Math.floor(sx);
            const x1 = Math.min(x0 + 1, maxX);
            const fx = sx - x0;

            const i00 = (y0 * image.width + x0) * 4;
            const i10 = (y0 * image.width + x1) * 4;
            const i01 = (y1 * image.width + x0) * 4;
            const i11 = (y1 * image.width + x1) * 4;
            const o = (oy * output.width + ox) * 4;

            for (let c = 0; c < 4; c++) {
                const top = src[i00 + c] * (1 - fx) + src[i10 + c] * fx;
                const bottom = src[i01 + c] * (1 - fx) + src[i11 + c] * fx;
                out.data[o + c] = top * (1 - fy) + bottom * fy;
            }
        }
    }
    return out;
}

/**
 * Frame of one segment at `t` (fraction of the segment's own window, 0..1).
 * `from` equal to `to` gives a static crop.
 */
export function sample(image: RasterImage, from: CropRect, to: CropRect, t: number, output: Size): RasterImage {
    return resampleRegion(image, cropRegionAt(image, from, to, t, output), output);
}

export const kenBurns: AnimationEngine = { sample };
