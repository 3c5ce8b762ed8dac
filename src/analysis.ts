import ttest2 from "@stdlib/stats-ttest2";
import anova1 from "@stdlib/stats-anova1";
import type { Event } from "./events.ts";

export interface StreamSummary {
    processName: string;
    count: number;
    totalDuration: number;
    meanDuration: number;
    meanInterarrival: number;
    firstArrival: number;
    lastArrival: number;
}

export interface Comparison {
    method: "t-test" | "anova";
    pValue: number;
    rejected: boolean;
}

function groupBy(events: readonly Event[]): Map<string, Event[]> {
    const groups = new Map<string, Event[]>();
    for(const e of events){
        const group = groups.get(e.processName);
        if(group === undefined) groups.set(e.processName, [e]);
        else group.push(e);
    }
    return groups;
}

/** Per-process counts and means, in order of each process's first event. */
export function summarize(events: readonly Event[]): StreamSummary[] {
    return [...groupBy(events)].map(([processName, group]) => {
        const totalDuration = group.reduce((p, e) => p + e.duration, 0);
        const firstArrival = group[0].arrivalTime;
        const lastArrival = group[group.length - 1].arrivalTime;
        return {
            processName,
            count: group.length,
            totalDuration,
            meanDuration: totalDuration / group.length,
            meanInterarrival: group.length < 2 ? 0 : (lastArrival - firstArrival) / (group.length - 1),
            firstArrival,
            lastArrival,
        };
    });
}

/**
 * Tests whether the processes in `events` share a mean duration:
 * a two-sample t-test for two processes, a one-way ANOVA for more.
 * Needs two processes with at least two events each, and some spread in
 * durations within at least one of them; otherwise returns undefined.
 */
export function compareDurations(events: readonly Event[], alpha = 0.05): Comparison | undefined {
    const groups = [...groupBy(events)];
    if(groups.length < 2 || groups.some(([, g]) => g.length < 2)) {
        console.log("nothing to compare");
        return undefined;
    }
    if(groups.every(([, g]) => g.every(e => e.duration === g[0].duration))) {
        console.log("no variance within processes");
        return undefined;
    }
    if(groups.length == 2) {
        const [[, a], [, b]] = groups;
        const t = ttest2(a.map(e => e.duration), b.map(e => e.duration), {alpha});
        console.log(t.print());
        return {method: "t-test", pValue: t.pValue, rejected: t.rejected};
    }
    const obs = groups.flatMap(([, g]) => g.map(e => e.duration));
    const lbl = groups.flatMap(([name, g]) => g.map(() => name));
    const a = anova1(obs, lbl, {alpha});
    console.log(a.print());
    return {method: "anova", pValue: a.pValue, rejected: a.rejected};
}
