import { describe, expect, it, vi } from "vitest";

import {
  DEFAULT_INPUT_BINDINGS,
  KeyboardInputController,
  directionToVector,
  type KeypressListener,
  type KeypressSource,
} from "../input";

interface FakeKeypressSource extends KeypressSource {
  readonly press: (sequence: string | undefined, key?: { name?: string; ctrl?: boolean; meta?: boolean }) => void;
  readonly listenerCount: () => number;
  readonly setRawMode: ReturnType<typeof vi.fn>;
}

const createSource = (isTTY = true): FakeKeypressSource => {
  const listeners = new Set<KeypressListener>();
  return {
    isTTY,
    setRawMode: vi.fn(),
    on: (_event, listener) => {
      listeners.add(listener);
    },
    off: (_event, listener) => {
      listeners.delete(listener);
    },
    press: (sequence, key) => {
      for (const listener of Array.from(listeners)) {
        listener(sequence, key);
      }
    },
    listenerCount: () => listeners.size,
  };
};

const createController = (source: KeypressSource) => {
  const dispatcher = { move: vi.fn(), requestExit: vi.fn() };
  const controller = new KeyboardInputController({ source, dispatcher, bindings: DEFAULT_INPUT_BINDINGS });
  return { controller, dispatcher };
};

describe("directionToVector", () => {
  it("maps screen directions to unit steps with y growing downwards", () => {
    expect(directionToVector("up")).toEqual({ dx: 0, dy: -1 });
    expect(directionToVector("down")).toEqual({ dx: 0, dy: 1 });
    expect(directionToVector("left")).toEqual({ dx: -1, dy: 0 });
    expect(directionToVector("right")).toEqual({ dx: 1, dy: 0 });
  });
});

describe("KeyboardInputController", () => {
  it("turns WASD and arrow keys into moves", () => {
    const source = createSource();
    const { controller, dispatcher } = createController(source);
    controller.register();

    source.press("w", { name: "w" });
    source.press(undefined, { name: "left" });
    source.press("D", { name: "d" });

    expect(dispatcher.move.mock.calls).toEqual([
      [0, -1],
      [-1, 0],
      [1, 0],
    ]);
  });

  it("requests an exit for q, escape and ctrl+c", () => {
    const source = createSource();
    const { controller, dispatcher } = createController(source);
    controller.register();

    source.press("q", { name: "q" });
    source.press(undefined, { name: "escape" });
    source.press("\u0003", { name: "c", ctrl: true });

    expect(dispatcher.requestExit).toHaveBeenCalledTimes(3);
    expect(dispatcher.move).not.toHaveBeenCalled();
  });

  it("ignores other modified and unbound keys", () => {
    const source = createSource();
    const { controller, dispatcher } = createController(source);
    controller.register();

    source.press("\u0017", { name: "w", ctrl: true });
    source.press("x", { name: "x" });

    expect(dispatcher.move).not.toHaveBeenCalled();
    expect(dispatcher.requestExit).not.toHaveBeenCalled();
  });

  it("switches raw mode on and off around its listener", () => {
    const source = createSource();
    const { controller } = createController(source);

    controller.register();
    controller.register();
    expect(source.listenerCount()).toBe(1);
    expect(source.setRawMode).toHaveBeenLastCalledWith(true);

    controller.unregister();
    expect(source.listenerCount()).toBe(0);
    expect(source.setRawMode).toHaveBeenLastCalledWith(false);
  });

  it("leaves raw mode alone when input is not a terminal", () => {
    const source = createSource(false);
    const { controller } = createController(source);

    controller.register();

    expect(source.setRawMode).not.toHaveBeenCalled();
  });
});
