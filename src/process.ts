import type { Event } from "./events.ts";
import { event } from "./events.ts";
import { InvalidParameterError, requireInt, requireNonNegativeInt, requirePositive } from "./errors.ts";
import type { SamplerFactory } from "./random.ts";
import { exponential } from "./random.ts";

/** Anything that can produce a finite, ordered stream of events under its own name. */
export interface Process {
    readonly name: string;
    generateEvents(): Event[];
}

export type ArrivalModel = SingletonProcess | PeriodicProcess | StochasticProcess;

/** One event at a fixed time. */
export class SingletonProcess implements Process {
    readonly kind = "singleton";

    constructor(
        readonly name: string,
        readonly duration: number,
        readonly arrival: number,
    ) {
        requireNonNegativeInt("duration", duration);
        requireNonNegativeInt("arrival", arrival);
    }

    generateEvents(): Event[] {
        return [event(this.name, this.arrival, this.duration)];
    }
}

/** `numRepetitions` events spaced `interarrivalTime` apart, starting at `firstArrival`. */
export class PeriodicProcess implements Process {
    readonly kind = "periodic";

    constructor(
        readonly name: string,
        readonly duration: number,
        readonly interarrivalTime: number,
        readonly firstArrival: number,
        readonly numRepetitions: number,
    ) {
        requireNonNegativeInt("duration", duration);
        requireNonNegativeInt("interarrivalTime", interarrivalTime);
        requireNonNegativeInt("firstArrival", firstArrival);
        requireNonNegativeInt("numRepetitions", numRepetitions);
        if(numRepetitions > 0 && firstArrival + (numRepetitions - 1) * interarrivalTime > Number.MAX_SAFE_INTEGER){
            throw new InvalidParameterError("numRepetitions", numRepetitions, "last arrival must be within the safe integer range");
        }
    }

    generateEvents(): Event[] {
        const events: Event[] = [];
        for(let i=0; i<this.numRepetitions; ++i){
            events.push(event(this.name, this.firstArrival + i * this.interarrivalTime, this.duration));
        }
        return events;
    }
}

/**
 * Renewal process with exponential inter-arrival times and durations, both truncated
 * to whole time units. Arrivals stop once the cursor reaches `endTime`; an event that
 * arrives before `endTime` is kept even if it runs past it.
 *
 * Two fresh samplers are requested from `sampler` on every call. With the default
 * factory the draws come from `Math.random`; pass `seededExponential(seed)` for
 * reproducible streams.
 */
export class StochasticProcess implements Process {
    readonly kind = "stochastic";

    constructor(
        readonly name: string,
        readonly meanDuration: number,
        readonly meanInterarrivalTime: number,
        readonly firstArrival: number,
        readonly endTime: number,
        readonly sampler: SamplerFactory = mean => exponential(mean),
    ) {
        requirePositive("meanDuration", meanDuration);
        requirePositive("meanInterarrivalTime", meanInterarrivalTime);
        requireNonNegativeInt("firstArrival", firstArrival);
        requireInt("endTime", endTime);
    }

    generateEvents(): Event[] {
        const durations = this.sampler(this.meanDuration);
        const gaps = this.sampler(this.meanInterarrivalTime);
        const events: Event[] = [];
        let arrivalTime = this.firstArrival;
        while(arrivalTime < this.endTime){
            events.push(event(this.name, arrivalTime, Math.trunc(durations.next())));
            arrivalTime += Math.trunc(gaps.next());
        }
        return events;
    }
}
