import { describe, expect, it } from "vitest";

import { TransportEventQueue, type TransportEvent } from "../event-queue";

const createManualQueue = () => {
  const scheduled: (() => void)[] = [];
  const queue = new TransportEventQueue((drain) => {
    scheduled.push(drain);
  });
  const runScheduled = (): void => {
    for (const drain of scheduled.splice(0)) {
      drain();
    }
  };
  return { queue, scheduled, runScheduled };
};

describe("TransportEventQueue", () => {
  it("delivers events in push order on a later turn", () => {
    const { queue, runScheduled } = createManualQueue();
    const seen: TransportEvent[] = [];
    queue.attach((event) => seen.push(event));

    queue.push({ kind: "opened" });
    queue.push({ kind: "message", text: "a" });
    expect(seen).toEqual([]);

    runScheduled();
    expect(seen).toEqual([{ kind: "opened" }, { kind: "message", text: "a" }]);
    expect(queue.size).toBe(0);
  });

  it("schedules a single drain for a burst of events", () => {
    const { queue, scheduled } = createManualQueue();
    queue.attach(() => undefined);

    queue.push({ kind: "opened" });
    queue.push({ kind: "message", text: "a" });
    queue.push({ kind: "message", text: "b" });

    expect(scheduled).toHaveLength(1);
  });

  it("holds events until a consumer attaches", () => {
    const { queue, scheduled, runScheduled } = createManualQueue();
    queue.push({ kind: "closed", code: 1006, reason: "" });
    expect(scheduled).toHaveLength(0);
    expect(queue.size).toBe(1);

    const seen: TransportEvent[] = [];
    queue.attach((event) => seen.push(event));
    runScheduled();

    expect(seen).toEqual([{ kind: "closed", code: 1006, reason: "" }]);
  });

  it("stops delivering after detach and drops pending events on clear", () => {
    const { queue, runScheduled } = createManualQueue();
    const seen: TransportEvent[] = [];
    queue.attach((event) => seen.push(event));
    queue.push({ kind: "opened" });
    queue.detach();

    runScheduled();
    expect(seen).toEqual([]);
    expect(queue.size).toBe(1);

    queue.clear();
    expect(queue.size).toBe(0);
  });
});
