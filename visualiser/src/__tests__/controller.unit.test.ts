import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { LayoutController, VIEWPORT_MAX_RETRIES, isViewportReady } from "../controller.js";
import { AdminClient, MemoryModuleService } from "../api.js";
import type { Module, ModuleService, Viewport } from "../types.js";
import {
  makeModule,
  makeModules,
  makeRecordingRenderer,
  makeManualScheduler,
} from "./fixtures.js";

// ── Helpers ──

function setup(modules: Module[] = makeModules(["cache", "rate_limiter", "waf"]), service?: ModuleService) {
  let viewport: Viewport = { width: 1200, height: 800 };
  const renderer = makeRecordingRenderer();
  const scheduler = makeManualScheduler();
  const controller = new LayoutController({
    surface: { measure: () => viewport },
    renderer,
    service: service ?? new MemoryModuleService(modules),
    schedule: scheduler.schedule,
  });
  return {
    controller,
    renderer,
    scheduler,
    setViewport: (v: Viewport) => {
      viewport = v;
    },
    lastView: () => renderer.views[renderer.views.length - 1],
  };
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

// ── Tests ──

describe("isViewportReady", () => {
  it("requires both sides above 50px", () => {
    expect(isViewportReady({ width: 51, height: 51 })).toBe(true);
    expect(isViewportReady({ width: 50, height: 400 })).toBe(false);
    expect(isViewportReady({ width: 400, height: 0 })).toBe(false);
  });
});

describe("LayoutController recompute", () => {
  it("builds one node per module and renders the layout", () => {
    const { controller, lastView } = setup();
    const modules = makeModules(["cache", "rate_limiter", "waf"]);

    controller.recompute(modules);

    const state = controller.getState();
    expect(state?.nodes).toHaveLength(4);
    expect(state?.nodes[0].coord).toEqual({ q: 0, r: 0 });
    expect(lastView()).toEqual({ kind: "layout", state, popup: { kind: "closed" } });
  });

  it("scenario A: seven modules fill the origin and ring 1 only", () => {
    const { controller } = setup();
    controller.recompute(makeModules(["a", "b", "c", "d", "e", "f"]));

    const coords = controller.getState()?.nodes.map((n) => n.coord) ?? [];
    expect(coords).toHaveLength(7);
    for (const c of coords) {
      expect(Math.max(Math.abs(c.q), Math.abs(c.r), Math.abs(c.q + c.r))).toBeLessThanOrEqual(1);
    }
  });

  it("renders the empty placeholder for no modules", () => {
    const { controller, lastView } = setup();
    controller.recompute([]);
    expect(lastView()).toEqual({ kind: "empty" });
    expect(controller.getState()).toBeNull();
  });

  it("closes an open popup", () => {
    const { controller } = setup();
    controller.recompute(makeModules(["cache"]));
    controller.clickNode("cache");
    expect(controller.getPopup().kind).toBe("open");

    controller.recompute(makeModules(["cache"]));
    expect(controller.getPopup()).toEqual({ kind: "closed" });
  });

  it("resize recomputes with the new viewport while active", () => {
    const { controller, setViewport } = setup();
    controller.recompute(makeModules(["cache"]));

    setViewport({ width: 640, height: 480 });
    controller.resize();

    expect(controller.getState()?.viewport).toEqual({ width: 640, height: 480 });
  });
});

describe("LayoutController viewport retries", () => {
  it("waits for the surface to get a size", () => {
    const { controller, scheduler, setViewport, lastView } = setup();
    setViewport({ width: 0, height: 0 });

    controller.recompute(makeModules(["cache"]));
    expect(lastView()).toEqual({ kind: "waiting", viewport: { width: 0, height: 0 }, attempt: 1 });
    expect(scheduler.pending()).toBe(1);

    scheduler.flushOne();
    expect(lastView().kind).toBe("waiting");

    setViewport({ width: 800, height: 600 });
    scheduler.flushOne();

    expect(lastView().kind).toBe("layout");
    expect(scheduler.pending()).toBe(0);
  });

  it("gives up after the retry limit", () => {
    const { controller, scheduler, setViewport, lastView } = setup();
    setViewport({ width: 20, height: 20 });

    controller.recompute(makeModules(["cache"]));
    scheduler.flushAll();

    expect(scheduler.scheduled()).toBe(VIEWPORT_MAX_RETRIES);
    expect(lastView()).toEqual({ kind: "unavailable", viewport: { width: 20, height: 20 } });
  });

  it("scenario E: a stale retry never renders after a newer recompute", () => {
    const { controller, scheduler, setViewport, renderer, lastView } = setup();
    setViewport({ width: 0, height: 0 });
    controller.recompute(makeModules(["stale"]));
    expect(scheduler.pending()).toBe(1);

    setViewport({ width: 1200, height: 800 });
    controller.recompute(makeModules(["fresh"]));
    const rendered = renderer.views.length;
    expect(controller.getState()?.nodes.map((n) => n.module.name)).toEqual(["server", "fresh"]);

    scheduler.flushAll();

    expect(renderer.views.length).toBe(rendered);
    const view = lastView();
    expect(view.kind === "layout" && view.state.nodes[1].module.name).toBe("fresh");
  });
});

describe("LayoutController popup state machine", () => {
  it("scenario B: open, close, and switch between modules", () => {
    const { controller } = setup();
    controller.recompute(makeModules(["cache", "rate_limiter"]));

    controller.clickNode("cache");
    const open = controller.getPopup();
    expect(open.kind === "open" && open.moduleName).toBe("cache");

    controller.clickNode("cache");
    expect(controller.getPopup()).toEqual({ kind: "closed" });

    controller.clickNode("cache");
    controller.clickNode("rate_limiter");
    const switched = controller.getPopup();
    expect(switched.kind === "open" && switched.moduleName).toBe("rate_limiter");
  });

  it("anchors the popup at the node center and places it beside the hex", () => {
    const { controller } = setup();
    controller.recompute(makeModules(["cache"]));
    controller.clickNode("cache");

    const state = controller.getState();
    const popup = controller.getPopup();
    const node = state?.nodes[1];
    expect(node).toBeDefined();
    if (!state || !node || popup.kind !== "open") return;
    expect(popup.anchor).toEqual(node.center);
    expect(popup.position.x).toBeCloseTo(node.center.x + state.hexSize + 24, 6);
    expect(popup.position.y).toBeCloseTo(node.center.y - 50, 6);
  });

  it("renders the popup with the layout", () => {
    const { controller, lastView } = setup();
    controller.recompute(makeModules(["cache"]));
    controller.clickNode("cache");

    const view = lastView();
    expect(view.kind).toBe("layout");
    if (view.kind === "layout") {
      expect(view.popup).toEqual(controller.getPopup());
    }
  });

  it("clickOutside closes the popup", () => {
    const { controller, lastView } = setup();
    controller.recompute(makeModules(["cache"]));
    controller.clickNode("cache");

    controller.clickOutside();

    expect(controller.getPopup()).toEqual({ kind: "closed" });
    const view = lastView();
    expect(view.kind === "layout" && view.popup.kind).toBe("closed");
  });

  it("ignores clicks on unknown modules", () => {
    const { controller, renderer } = setup();
    controller.recompute(makeModules(["cache"]));
    const count = renderer.views.length;

    controller.clickNode("missing");

    expect(controller.getPopup()).toEqual({ kind: "closed" });
    expect(renderer.views.length).toBe(count);
  });
});

describe("LayoutController edits", () => {
  it("toggle refetches and closes the popup", async () => {
    const modules = makeModules(["cache"]);
    const { controller } = setup(modules);
    await controller.refresh();
    controller.clickNode("cache");

    await controller.toggle("cache");

    expect(controller.getPopup()).toEqual({ kind: "closed" });
    const cache = controller.getState()?.nodes.find((n) => n.module.name === "cache");
    expect(cache?.module.enabled).toBe(false);
    expect(cache?.category).toBe("off");
  });

  it("save coerces fields before sending them", async () => {
    const service = new MemoryModuleService([
      makeModule({ name: "cache", settings: { ttl: 30, ratio: 0.1, shared: false, mode: "lru" } }),
    ]);
    const update = vi.spyOn(service, "updateModule");
    const { controller } = setup([], service);
    await controller.refresh();

    await controller.save("cache", { ttl: "42", ratio: "3.5", shared: "true", mode: "foo" });

    expect(update).toHaveBeenCalledWith("cache", { ttl: 42, ratio: 3.5, shared: true, mode: "foo" });
    expect(controller.getState()?.nodes[0].module.settings).toEqual({
      ttl: 42,
      ratio: 3.5,
      shared: true,
      mode: "foo",
    });
  });

  it("a rejected toggle still refetches", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const { controller } = setup(makeModules(["cache"]));
    await controller.refresh();
    const before = controller.getState();

    await controller.toggle("server");

    expect(warn).toHaveBeenCalledWith('Toggle of "server" was rejected');
    expect(controller.getState()).not.toBe(before);
    warn.mockRestore();
  });
});

describe("LayoutController failures", () => {
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it("keeps the previous layout when geometry fails", () => {
    const { controller, setViewport, lastView } = setup();
    controller.recompute(makeModules(["cache"]));
    const previous = controller.getState();

    setViewport({ width: Infinity, height: 800 });
    controller.resize();

    const view = lastView();
    expect(view.kind).toBe("error");
    if (view.kind === "error") {
      expect(view.message).toContain("non-finite position");
      expect(view.previous).toBe(previous);
    }
    expect(controller.getState()).toBe(previous);
  });

  it("does not apply anything when a toggle throws", async () => {
    const service = new MemoryModuleService(makeModules(["cache"]));
    vi.spyOn(service, "toggleModule").mockRejectedValue(new Error("connection refused"));
    const fetchSpy = vi.spyOn(service, "fetchModules");
    const { controller, lastView } = setup([], service);
    await controller.refresh();
    const previous = controller.getState();

    await controller.toggle("cache");

    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(controller.getState()).toBe(previous);
    expect(lastView()).toEqual({
      kind: "error",
      message: 'Failed to toggle "cache": connection refused',
      previous,
    });
  });

  it("surfaces fetch failures inline", async () => {
    const service = new MemoryModuleService([]);
    vi.spyOn(service, "fetchModules").mockRejectedValue(new Error("GET /api/config failed: 500"));
    const { controller, lastView } = setup([], service);

    await controller.refresh();

    expect(lastView()).toEqual({
      kind: "error",
      message: "Failed to load modules: GET /api/config failed: 500",
      previous: null,
    });
  });

  it("shows the empty placeholder when the admin server has no config", async () => {
    const fetchStub = vi.fn(async () => new Response("null\n", { status: 200 }));
    const { controller, lastView } = setup([], new AdminClient("http://admin", { fetch: fetchStub }));

    await controller.refresh();

    expect(errorSpy).not.toHaveBeenCalled();
    expect(lastView()).toEqual({ kind: "empty" });
  });

  it("only the latest refresh applies", async () => {
    const first = deferred<Module[]>();
    const second = deferred<Module[]>();
    const service = new MemoryModuleService([]);
    vi.spyOn(service, "fetchModules")
      .mockReturnValueOnce(first.promise)
      .mockReturnValueOnce(second.promise);
    const { controller } = setup([], service);

    const a = controller.refresh();
    const b = controller.refresh();
    second.resolve(makeModules(["newer"]));
    await b;
    first.resolve(makeModules(["older"]));
    await a;

    expect(controller.getState()?.nodes.map((n) => n.module.name)).toEqual(["server", "newer"]);
  });
});

describe("LayoutController activation", () => {
  it("defers drawing while hidden and draws on activation", () => {
    const { controller, renderer, lastView } = setup();
    controller.deactivate();

    controller.recompute(makeModules(["cache"]));
    expect(renderer.views).toHaveLength(0);

    controller.activate();
    expect(lastView().kind).toBe("layout");
    expect(controller.getState()?.nodes).toHaveLength(2);
  });

  it("ignores resize while hidden", () => {
    const { controller, renderer } = setup();
    controller.recompute(makeModules(["cache"]));
    controller.deactivate();
    const count = renderer.views.length;

    controller.resize();

    expect(renderer.views.length).toBe(count);
  });

  it("drops a pending retry when hidden", () => {
    const { controller, scheduler, setViewport, renderer } = setup();
    setViewport({ width: 0, height: 0 });
    controller.recompute(makeModules(["cache"]));
    controller.deactivate();
    const count = renderer.views.length;

    setViewport({ width: 1200, height: 800 });
    scheduler.flushAll();

    expect(renderer.views.length).toBe(count);
  });
});
