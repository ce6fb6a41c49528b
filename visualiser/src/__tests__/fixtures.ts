import type { LayoutNode, LayoutRenderer, LayoutView, Module } from '../types.js';

export function makeModule(overrides: Partial<Module> & { name: string }): Module {
  return {
    enabled: true,
    isCore: false,
    settings: {},
    ...overrides,
  };
}

/**
 * A core "server" module followed by plain modules with the given names,
 * in the order the admin API returns them.
 */
export function makeModules(names: string[], withCore = true): Module[] {
  const mods = names.map((name) => makeModule({ name }));
  return withCore ? [makeModule({ name: 'server', isCore: true }), ...mods] : mods;
}

export function makeLayoutNode(
  overrides: Partial<LayoutNode> & { module: Module }
): LayoutNode {
  return {
    coord: { q: 0, r: 0 },
    center: { x: 100, y: 100 },
    category: overrides.module.isCore ? 'core' : overrides.module.enabled ? 'on' : 'off',
    ...overrides,
  };
}

/** Renderer that records every view it is given. */
export function makeRecordingRenderer(): LayoutRenderer & { views: LayoutView[] } {
  const views: LayoutView[] = [];
  return {
    views,
    render: (view) => {
      views.push(view);
    },
  };
}

/** Scheduler that queues callbacks until flushed by the test. */
export function makeManualScheduler(): {
  schedule: (cb: () => void) => void;
  pending: () => number;
  scheduled: () => number;
  flushOne: () => void;
  flushAll: () => void;
} {
  const queue: Array<() => void> = [];
  let total = 0;
  const flushOne = () => {
    const cb = queue.shift();
    if (cb) cb();
  };
  return {
    schedule: (cb) => {
      total++;
      queue.push(cb);
    },
    pending: () => queue.length,
    scheduled: () => total,
    flushOne,
    flushAll: () => {
      while (queue.length > 0) flushOne();
    },
  };
}
