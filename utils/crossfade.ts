
import { RasterImage, Size, Timeline, Transition } from '../types';
import { AnimationEngine, createRaster, kenBurns } from './kenBurns';

// Keeps float noise in total * fps from adding a frame past the end
const FRAME_EPSILON = 1e-9;

export interface CompositeLayer {
    segmentIndex: number;
    localT: number; // fraction of the segment's own window elapsed
    weight: number;
}

export interface CompositePlan {
    t: number;
    layers: CompositeLayer[];
}

export interface VisualSample {
    index: number;
    t: number;
    image: RasterImage;
}

export interface Compositor {
    readonly timeline: Timeline;
    readonly output: Size;
    planAt(t: number): CompositePlan;
    sampleAt(t: number): RasterImage;
    frames(fps: number, fromFrame?: number): Generator<VisualSample>;
}

export function frameCount(totalDuration: number, fps: number): number {
    return Math.max(0, Math.ceil(totalDuration * fps - FRAME_EPSILON));
}

// A zero-length transition is a hard cut: the incoming segment is fully shown.
export function transitionAlpha(transition: Transition, t: number): number {
    if (transition.duration <= 0) return 1;
    const alpha = (t - transition.start) / transition.duration;
    return Math.min(1, Math.max(0, alpha));
}

// Weighted sum of same-sized rasters, rounded per channel
export function mixLayers(images: readonly RasterImage[], weights: readonly number[]): RasterImage {
    const [first] = images;
    if (!first || images.length !== weights.length) {
        throw new Error(`Cannot mix ${images.length} images with ${weights.length} weights`);
    }
    for (const image of images) {
        if (image.width !== first.width || image.height !== first.height) {
            throw new Error(`Cannot blend ${first.width}x${first.height} with ${image.width}x${image.height}`);
        }
    }
    const out = createRaster(first);
    for (let i = 0; i < out.data.length; i++) {
        let value = 0;
        for (let l = 0; l < images.length; l++) value += weights[l] * images[l].data[i];
        out.data[i] = value;
    }
    return out;
}

export function blendImages(a: RasterImage, b: RasterImage, alpha: number): RasterImage {
    const k = Math.min(1, Math.max(0, alpha));
    return mixLayers([a, b], [1 - k, k]);
}

function localTime(timeline: Timeline, index: number, t: number): number {
    const segment = timeline.segments[index];
    return Math.min(1, Math.max(0, (t - segment.start) / segment.duration));
}

/**
 * Layers visible at `t`. Transitions are applied in order: each one still
 * running fades its incoming segment over everything before it, and a finished
 * one leaves its incoming segment alone. A segment shorter than two overlaps
 * can therefore sit under two running crossfades at once.
 */
export function planAt(timeline: Timeline, t: number): CompositePlan {
    let weights = new Map<number, number>([[0, 1]]);
    for (const transition of timeline.transitions) {
        if (t >= transition.end) {
            weights = new Map([[transition.to, 1]]);
            continue;
        }
        // alpha is 0 at the overlap start: still purely the outgoing layers
        if (t <= transition.start) break;
        const alpha = transitionAlpha(transition, t);
        for (const [index, weight] of weights) weights.set(index, weight * (1 - alpha));
        weights.set(transition.to, alpha);
    }
    return {
        t,
        layers: Array.from(weights, ([segmentIndex, weight]) => ({
            segmentIndex,
            localT: localTime(timeline, segmentIndex, t),
            weight,
        })),
    };
}

export function createCompositor(timeline: Timeline, output: Size, engine: AnimationEngine = kenBurns): Compositor {
    const render = (index: number, localT: number): RasterImage => {
        const segment = timeline.segments[index];
        return engine.sample(segment.image, segment.motion.from, segment.motion.to, localT, output);
    };

    const sampleAt = (t: number): RasterImage => {
        const { layers } = planAt(timeline, t);
        if (layers.length === 1) return render(layers[0].segmentIndex, layers[0].localT);
        return mixLayers(
            layers.map(layer => render(layer.segmentIndex, layer.localT)),
            layers.map(layer => layer.weight)
        );
    };

    function* frames(fps: number, fromFrame = 0): Generator<VisualSample> {
        const count = frameCount(timeline.totalDuration(), fps);
        for (let index = Math.max(0, fromFrame); index < count; index++) {
            const t = index / fps;
            yield { index, t, image: sampleAt(t) };
        }
    }

    return {
        timeline,
        output,
        planAt: (t: number) => planAt(timeline, t),
        sampleAt,
        frames,
    };
}
