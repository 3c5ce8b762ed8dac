import { z } from "zod";
import { InvalidParameterError } from "./errors.ts";
import type { ArrivalModel } from "./process.ts";
import { PeriodicProcess, SingletonProcess, StochasticProcess } from "./process.ts";
import { MAX_SEED, seededExponential } from "./random.ts";

const time = z.number().int().safe().nonnegative();

export const singletonSchema = z.object({
    type: z.literal("singleton"),
    name: z.string(),
    duration: time,
    arrival: time,
});

export const periodicSchema = z.object({
    type: z.literal("periodic"),
    name: z.string(),
    duration: time,
    interarrivalTime: time,
    firstArrival: time,
    numRepetitions: time,
});

export const stochasticSchema = z.object({
    type: z.literal("stochastic"),
    name: z.string(),
    meanDuration: z.number().positive().finite(),
    meanInterarrivalTime: z.number().positive().finite(),
    firstArrival: time,
    endTime: z.number().int().safe(),
});

export const definitionSchema = z.discriminatedUnion("type", [
    singletonSchema,
    periodicSchema,
    stochasticSchema,
]);

/** A set of process definitions, optionally seeded for reproducible stochastic streams. */
export const workloadSchema = z.object({
    seed: z.number().int().min(1).max(MAX_SEED).optional(),
    processes: z.array(definitionSchema),
});

export type Definition = z.infer<typeof definitionSchema>;
export type Workload = z.infer<typeof workloadSchema>;

export function parseDefinitions(input: unknown): Workload {
    const result = workloadSchema.safeParse(input);
    if(!result.success){
        const issues = result.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
        throw new InvalidParameterError("workload", input, issues.join("; "));
    }
    return result.data;
}

/** Seed of the definition at `index`, distinct for every index of one workload. */
export function processSeed(seed: number, index: number): number {
    return (seed - 1 + index) % MAX_SEED + 1;
}

export function buildProcesses(workload: Workload): ArrivalModel[] {
    return workload.processes.map((d, index) => {
        switch(d.type){
            case "singleton":
                return new SingletonProcess(d.name, d.duration, d.arrival);
            case "periodic":
                return new PeriodicProcess(d.name, d.duration, d.interarrivalTime, d.firstArrival, d.numRepetitions);
            case "stochastic":
                return workload.seed === undefined
                    ? new StochasticProcess(d.name, d.meanDuration, d.meanInterarrivalTime, d.firstArrival, d.endTime)
                    : new StochasticProcess(d.name, d.meanDuration, d.meanInterarrivalTime, d.firstArrival, d.endTime, seededExponential(processSeed(workload.seed, index)));
        }
    });
}
