import { setImmediate as yieldToLoop } from 'timers/promises';

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

export interface OrderedRunOptions<T> {
    count: number;
    concurrency: number;
    produce: (index: number) => T | Promise<T>;
    consume: (index: number, value: T) => Promise<void>;
    // Checked between items; the run stops before producing or consuming the next one
    signal?: AbortSignal;
}

export class AbortedError extends Error {
    constructor() {
        super('Run was aborted');
        this.name = 'AbortedError';
    }
}

function settle<T>(fn: () => T | Promise<T>): Promise<Settled<T>> {
    return Promise.resolve()
        .then(fn)
        .then(
            value => ({ ok: true as const, value }),
            error => ({ ok: false as const, error })
        );
}

/**
 * Bounded pool with an in-order sink. Up to `concurrency` items are produced
 * ahead and may finish out of order; the reorder window hands them to `consume`
 * strictly by index, one at a time, so a slow consumer throttles producers.
 */
export async function runOrdered<T>(options: OrderedRunOptions<T>): Promise<void> {
    const { count, produce, consume, signal } = options;
    const concurrency = Math.max(1, Math.floor(options.concurrency));
    const inFlight = new Map<number, Promise<Settled<T>>>();
    let nextToProduce = 0;

    const fill = () => {
        while (nextToProduce < count && inFlight.size < concurrency) {
            const index = nextToProduce++;
            inFlight.set(index, settle(() => produce(index)));
        }
    };

    for (let index = 0; index < count; index++) {
        if (signal?.aborted) throw new AbortedError();
        fill();
        const pending = inFlight.get(index);
        if (!pending) throw new Error(`Frame ${index} was never scheduled`);
        const result = await pending;
        inFlight.delete(index);
        if (!result.ok) throw result.error;

        if (signal?.aborted) throw new AbortedError();
        fill();
        await consume(index, result.value);
        // Let I/O callbacks (encoder drain, abort requests) run between frames
        await yieldToLoop();
    }
}
