import { test } from "node:test";
import { deepStrictEqual as assertEquals, ok as assert, throws as assertThrows } from "node:assert";
import { readFileSync } from "node:fs";
import {
    InvalidParameterError,
    MAX_SEED,
    PeriodicProcess,
    SingletonProcess,
    StochasticProcess,
    buildProcesses,
    parseDefinitions,
    processSeed,
} from "../mod.ts";

const workload = {
    processes: [
        {type: "singleton", name: "A", duration: 5, arrival: 10},
        {type: "periodic", name: "B", duration: 2, interarrivalTime: 10, firstArrival: 0, numRepetitions: 3},
        {type: "stochastic", name: "C", meanDuration: 3, meanInterarrivalTime: 4, firstArrival: 0, endTime: 200},
    ],
};

const siblings = {
    processes: [
        {type: "stochastic", name: "X", meanDuration: 3, meanInterarrivalTime: 4, firstArrival: 0, endTime: 500},
        {type: "stochastic", name: "Y", meanDuration: 3, meanInterarrivalTime: 4, firstArrival: 0, endTime: 500},
    ],
};

test("parseDefinitions accepts every process type", () => {
    const parsed = parseDefinitions(workload);
    assertEquals(parsed.processes.map(d => d.type), ["singleton", "periodic", "stochastic"]);
    assertEquals(parsed.seed, undefined);
});

test("buildProcesses creates the matching variants", () => {
    const [a, b, c] = buildProcesses(parseDefinitions(workload));
    assert(a instanceof SingletonProcess);
    assert(b instanceof PeriodicProcess);
    assert(c instanceof StochasticProcess);
    assertEquals(a.generateEvents().map(e => [e.processName, e.arrivalTime, e.duration]), [["A", 10, 5]]);
    assertEquals(b.generateEvents().length, 3);
});

test("a seeded workload builds reproducible processes", () => {
    const seeded = parseDefinitions({...workload, seed: 11});
    const first = buildProcesses(seeded).map(p => p.generateEvents());
    const second = buildProcesses(seeded).map(p => p.generateEvents());
    assertEquals(first, second);
});

test("stochastic processes in one seeded workload get their own streams", () => {
    const seeded = parseDefinitions({
        seed: 3,
        processes: [
            {type: "stochastic", name: "X", meanDuration: 3, meanInterarrivalTime: 4, firstArrival: 0, endTime: 500},
            {type: "stochastic", name: "Y", meanDuration: 3, meanInterarrivalTime: 4, firstArrival: 0, endTime: 500},
        ],
    });
    const [x, y] = buildProcesses(seeded).map(p => p.generateEvents().map(e => [e.arrivalTime, e.duration]));
    assert(JSON.stringify(x) !== JSON.stringify(y));
});

test("parseDefinitions rejects invalid definitions", () => {
    const cases: unknown[] = [
        {processes: [{type: "singleton", name: "A", duration: -1, arrival: 0}]},
        {processes: [{type: "periodic", name: "B", duration: 1, interarrivalTime: 1, firstArrival: 0, numRepetitions: 1.5}]},
        {processes: [{type: "stochastic", name: "C", meanDuration: 0, meanInterarrivalTime: 1, firstArrival: 0, endTime: 10}]},
        {processes: [{type: "bursty", name: "D"}]},
        {processes: "none"},
        null,
    ];
    for(const input of cases){
        assertThrows(() => parseDefinitions(input), InvalidParameterError);
    }
});

test("validation messages point at the offending field", () => {
    assertThrows(
        () => parseDefinitions({processes: [{type: "singleton", name: "A", duration: -1, arrival: 0}]}),
        (e: unknown) => e instanceof InvalidParameterError && e.message.startsWith("Invalid workload: processes.0.duration: "),
    );
});

test("the example workload file is valid", () => {
    const raw: unknown = JSON.parse(readFileSync(new URL("../examples/workload.json", import.meta.url), "utf8"));
    const parsed = parseDefinitions(raw);
    assertEquals(buildProcesses(parsed).length, parsed.processes.length);
});

test("workload seeds outside the generator's range are rejected", () => {
    for(const seed of [0, -1, MAX_SEED + 1, 1.5]){
        assertThrows(
            () => parseDefinitions({...siblings, seed}),
            (e: unknown) => e instanceof InvalidParameterError && e.message.startsWith("Invalid workload: seed: "),
        );
    }
});

test("sibling seeds stay in range and never repeat", () => {
    assertEquals(processSeed(1, 0), 1);
    assertEquals(processSeed(1, 1), 2);
    assertEquals(processSeed(MAX_SEED, 0), MAX_SEED);
    assertEquals(processSeed(MAX_SEED, 1), 1);
});

test("stochastic siblings differ at the largest seed", () => {
    const [x, y] = buildProcesses(parseDefinitions({...siblings, seed: MAX_SEED}))
        .map(p => p.generateEvents().map(e => [e.arrivalTime, e.duration]));
    assert(JSON.stringify(x) !== JSON.stringify(y));
});

test("unsafe integers are rejected in definitions", () => {
    const cases: unknown[] = [
        {processes: [{type: "singleton", name: "A", duration: 1, arrival: 2 ** 53}]},
        {processes: [{type: "stochastic", name: "C", meanDuration: 1, meanInterarrivalTime: 10, firstArrival: 2 ** 60, endTime: 2 ** 60 + 1000}]},
    ];
    for(const input of cases){
        assertThrows(() => parseDefinitions(input), InvalidParameterError);
    }
});

test("a periodic definition overflowing the safe range fails to build", () => {
    const parsed = parseDefinitions({
        processes: [{type: "periodic", name: "P", duration: 1, interarrivalTime: 2 ** 40, firstArrival: 0, numRepetitions: 2 ** 14}],
    });
    assertThrows(() => buildProcesses(parsed), InvalidParameterError);
});
