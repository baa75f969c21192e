import { recordsEqual } from './status-records';

interface PublishedSnapshot<V> {
    readonly value: V;
    readonly publishedAt: number;
}

export type RateCeilings<R> = Partial<Record<keyof R, number>>;

/**
 * Decides, per category, whether the current record should be published:
 * only when it differs from the last published value (or a manual refresh is
 * pending), and for rate-limited categories no more than once per period.
 *
 * `R` maps each category to its record type.
 */
export class ChangeGate<R extends { [K in keyof R]: object }> {
    private readonly snapshots: Map<keyof R, PublishedSnapshot<R[keyof R]>>;
    private readonly periodsMs: Map<string, number>;

    constructor(ceilingsHz: RateCeilings<R> = {}) {
        this.snapshots = new Map();
        this.periodsMs = new Map();
        for (const [category, hz] of Object.entries(ceilingsHz)) {
            if (typeof hz === 'number' && Number.isFinite(hz) && hz > 0) {
                this.periodsMs.set(category, 1000 / hz);
            }
        }
    }

    /**
     * Set the startup baseline. The first publish then needs a change or a manual refresh.
     */
    seed<K extends keyof R>(category: K, initial: R[K], now: number): void {
        this.snapshots.set(category, { value: initial, publishedAt: now });
    }

    shouldPublish<K extends keyof R>(category: K, current: R[K], manualOverride: boolean, now: number): boolean {
        const snapshot = this.snapshots.get(category);
        if (manualOverride) {
            return true;
        }
        if (snapshot && recordsEqual(current, snapshot.value)) {
            return false;
        }
        const periodMs = this.periodsMs.get(String(category));
        if (snapshot && periodMs !== undefined && now - snapshot.publishedAt < periodMs) {
            return false;
        }
        return true;
    }

    recordPublished<K extends keyof R>(category: K, current: R[K], now: number): void {
        // One assignment so value and time never disagree
        this.snapshots.set(category, { value: current, publishedAt: now });
    }

    /**
     * Decide, publish and record in one step. Returns whether a publish happened.
     */
    publishIfNeeded<K extends keyof R>(
        category: K,
        current: R[K],
        manualOverride: boolean,
        now: number,
        publish: (value: R[K]) => void
    ): boolean {
        if (!this.shouldPublish(category, current, manualOverride, now)) {
            return false;
        }
        publish(current);
        this.recordPublished(category, current, now);
        return true;
    }
}
