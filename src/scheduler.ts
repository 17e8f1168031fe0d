import { EventEmitter } from 'node:events';
import { createLogger, describeError } from './logger.js';

// ——————————————————————————————————————————————————————————————————————————————————————————
// Background work: single-flight guard + fixed-interval tasks with result listeners
// ——————————————————————————————————————————————————————————————————————————————————————————

const log = createLogger('Scheduler');

/** At most one holder at a time. Lives in memory only, so a crash leaves it released. */
export class SingleFlight {
    private busy = false;

    get inFlight(): boolean {
        return this.busy;
    }

    /** Compare-and-set false → true; false means someone else holds it */
    tryAcquire(): boolean {
        if (this.busy) { return false; }
        this.busy = true;
        return true;
    }

    release(): void {
        this.busy = false;
    }

    /** Runs the task unless one is already running; `skipped` tells which happened */
    async run<T>(task: () => Promise<T>): Promise<{ skipped: true } | { skipped: false; value: T }> {
        if (!this.tryAcquire()) {
            return { skipped: true };
        }
        try {
            return { skipped: false, value: await task() };
        } finally {
            this.release();
        }
    }
}

type Unsubscribe = () => void;

export class PeriodicTask<T> {
    private timer: NodeJS.Timeout | undefined;
    private readonly events = new EventEmitter();

    constructor(
        readonly name: string,
        private readonly intervalMs: number,
        private readonly work: () => Promise<T>
    ) {}

    get running(): boolean {
        return this.timer !== undefined;
    }

    onResult(listener: (result: T) => void): Unsubscribe {
        this.events.on('result', listener);
        return () => { this.events.off('result', listener); };
    }

    onError(listener: (err: unknown) => void): Unsubscribe {
        this.events.on('failure', listener);
        return () => { this.events.off('failure', listener); };
    }

    /** Starts the timer; with `immediate` the first unit runs right away */
    start(immediate = false): void {
        if (this.timer) { return; }
        log.debug(`${this.name}: every ${this.intervalMs}ms`);
        this.timer = setInterval(() => { void this.tick(); }, this.intervalMs);
        if (immediate) { void this.tick(); }
    }

    stop(): void {
        if (!this.timer) { return; }
        clearInterval(this.timer);
        this.timer = undefined;
    }

    /** One unit of work; never rejects, outcomes go to the listeners */
    async tick(): Promise<void> {
        try {
            const result = await this.work();
            this.events.emit('result', result);
        } catch (err) {
            if (this.events.listenerCount('failure') === 0) {
                log.warn(`${this.name} failed:`, describeError(err));
                return;
            }
            this.events.emit('failure', err);
        }
    }
}
