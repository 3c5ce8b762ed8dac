/*
Mixed workload.

Covers: Process definitions, Seeded stochastic streams, Merging, Summaries

Scenario:
  A server receives a one-off backup job, a periodic heartbeat and two
  streams of randomly arriving requests and reports. The definitions are
  read from workload.json and the merged arrival stream is printed in
  arrival order, followed by per-process statistics.
*/

import { readFileSync } from "node:fs";
import { buildProcesses, generateAll, parseDefinitions, summarize } from "../mod.ts";

const DEFINITIONS = new URL("./workload.json", import.meta.url);

const workload = parseDefinitions(JSON.parse(readFileSync(DEFINITIONS, "utf8")));
const events = generateAll(buildProcesses(workload));

console.log("Arrivals");
for(const e of events){
    console.log(`${e.arrivalTime.toString().padStart(4)} ${e.processName.padEnd(10)} runs for ${e.duration}`);
}

console.log("Summary");
for(const s of summarize(events)){
    console.log(`${s.processName.padEnd(10)} n=${s.count} mean duration=${s.meanDuration.toFixed(2)} mean gap=${s.meanInterarrival.toFixed(2)}`);
}
