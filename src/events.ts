/** An arrival of `processName` at `arrivalTime` that lasts `duration` time units. */
export interface Event {
    readonly processName: string;
    readonly arrivalTime: number;
    readonly duration: number;
}

export function event(processName: string, arrivalTime: number, duration: number): Event {
    return Object.freeze({processName, arrivalTime, duration});
}

/** Scheduling results written by whoever consumes the events. */
export interface Annotation {
    startTime: number;
    waitTime: number;
}

/**
 * Per-event scheduling record, keyed by event identity.
 * Events without an entry read as started and waited at 0.
 */
export class EventAnnotations {
    #entries = new WeakMap<Event, Annotation>();

    get(e: Event): Annotation {
        const entry = this.#entries.get(e);
        return entry === undefined ? {startTime: 0, waitTime: 0} : {...entry};
    }

    set(e: Event, annotation: Partial<Annotation>): Annotation {
        const entry = {...this.get(e), ...annotation};
        this.#entries.set(e, entry);
        return {...entry};
    }

    has(e: Event): boolean {
        return this.#entries.has(e);
    }
}
