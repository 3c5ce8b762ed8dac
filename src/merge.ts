import type { Event } from "./events.ts";
import type { Process } from "./process.ts";
import { BinaryHeap, ascend } from "./eventq.ts";

// [arrival time, stream index, position in stream]
type Cursor = [number, number, number];

/**
 * Merges event streams into one stream ordered by arrival time.
 * Equal arrivals keep stream order, then their order within the stream.
 */
export function mergeEvents(streams: readonly (readonly Event[])[]): Event[] {
    const heap = new BinaryHeap<Cursor>(
        ([ta, sa, pa], [tb, sb, pb]) => ascend(ta, tb) || ascend(sa, sb) || ascend(pa, pb)
    );
    streams.forEach((stream, s) => {
        if(stream.length > 0) heap.push([stream[0].arrivalTime, s, 0]);
    });
    const merged: Event[] = [];
    for(const [_t, s, p] of heap){
        const stream = streams[s];
        merged.push(stream[p]);
        if(p + 1 < stream.length) heap.push([stream[p + 1].arrivalTime, s, p + 1]);
    }
    return merged;
}

export function generateAll(processes: readonly Process[]): Event[] {
    return mergeEvents(processes.map(p => p.generateEvents()));
}
