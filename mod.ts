export type {
    Event,
    Annotation,
} from "./src/events.ts";

export {
    event,
    EventAnnotations,
} from "./src/events.ts";

export type {
    Process,
    ArrivalModel,
} from "./src/process.ts";

export {
    SingletonProcess,
    PeriodicProcess,
    StochasticProcess,
} from "./src/process.ts";

export type {
    Sampler,
    SamplerFactory,
} from "./src/random.ts";

export {
    expovariate,
    exponential,
    seededRandom,
    seededExponential,
    MAX_SEED,
} from "./src/random.ts";

export {InvalidParameterError} from "./src/errors.ts";

export {BinaryHeap, ascend} from "./src/eventq.ts";
export {mergeEvents, generateAll} from "./src/merge.ts";

export type {
    Definition,
    Workload,
} from "./src/definitions.ts";

export {
    definitionSchema,
    workloadSchema,
    parseDefinitions,
    processSeed,
    buildProcesses,
} from "./src/definitions.ts";

export type {StreamSummary, Comparison} from "./src/analysis.ts";
export {summarize, compareDurations} from "./src/analysis.ts";
