import debug from "debug";
import graphlib from "graphlib";
import { CycleError, UnknownTargetError } from "../errors";
import type { TargetDefinition, TargetRegistry } from "../types";

const { Graph, alg } = graphlib;

type TargetGraph = InstanceType<typeof Graph>;

// A target whose dependencies are being walked; `next` indexes the next one
type Frame = { name: string; target: TargetDefinition; next: number };

const log = debug("trun:graph");

/**
 * The closure of the requested roots, in an order where every target comes
 * after all of its dependencies. Immutable once built.
 */
export class ExecutionPlan {
  readonly roots: readonly string[];
  readonly order: readonly string[];
  private readonly graph: TargetGraph;
  private readonly targets: ReadonlyMap<string, TargetDefinition>;
  private readonly discoveredFrom: ReadonlyMap<string, string | undefined>;

  constructor(init: {
    roots: readonly string[];
    order: readonly string[];
    graph: TargetGraph;
    targets: ReadonlyMap<string, TargetDefinition>;
    discoveredFrom: ReadonlyMap<string, string | undefined>;
  }) {
    this.roots = Object.freeze([...init.roots]);
    this.order = Object.freeze([...init.order]);
    this.graph = init.graph;
    this.targets = init.targets;
    this.discoveredFrom = init.discoveredFrom;
  }

  get size(): number {
    return this.order.length;
  }

  has(name: string): boolean {
    return this.targets.has(name);
  }

  target(name: string): TargetDefinition {
    const target = this.targets.get(name);
    if (!target) {
      throw new UnknownTargetError(name);
    }
    return target;
  }

  dependenciesOf(name: string): readonly string[] {
    return this.target(name).dependencies;
  }

  dependentsOf(name: string): string[] {
    const predecessors = this.graph.predecessors(name);
    const dependents = new Set(Array.isArray(predecessors) ? predecessors : []);
    return this.order.filter((candidate) => dependents.has(candidate));
  }

  /**
   * The dependency chain from the root that first reached `name` down to it.
   */
  chainTo(name: string): string[] {
    const chain: string[] = [];
    let current: string | undefined = name;
    while (current !== undefined && this.discoveredFrom.has(current)) {
      chain.unshift(current);
      current = this.discoveredFrom.get(current);
    }
    return chain;
  }
}

export class GraphBuilder {
  /**
   * Build the execution plan for `roots`. Only targets reachable from the
   * roots are included. Throws before anything runs when a dependency is
   * unknown or the closure contains a cycle.
   */
  build(registry: TargetRegistry, roots: readonly string[]): ExecutionPlan {
    const graph: TargetGraph = new Graph();
    const order: string[] = [];
    const state = new Map<string, "visiting" | "done">();
    const stack: Frame[] = [];
    const discoveredFrom = new Map<string, string | undefined>();
    const targets = new Map<string, TargetDefinition>();

    log("=== Starting graph build ===");
    log("Roots:", roots);

    const enter = (name: string, parent: string | undefined): void => {
      const mark = state.get(name);
      if (mark === "done") {
        log(`Already visited ${name}, skipping`);
        return;
      }
      if (mark === "visiting") {
        const path = stack.map((frame) => frame.name);
        throw new CycleError([...path.slice(path.indexOf(name)), name]);
      }

      const target = registry.get(name);
      if (!target) {
        throw new UnknownTargetError(name, parent);
      }

      state.set(name, "visiting");
      discoveredFrom.set(name, parent);
      targets.set(name, target);
      graph.setNode(name);
      stack.push({ name, next: 0, target });
    };

    const uniqueRoots = [...new Set(roots)];
    for (const root of uniqueRoots) {
      enter(root, undefined);

      // Depth-first, emitting each target after all of its dependencies
      for (let frame = stack.at(-1); frame; frame = stack.at(-1)) {
        const dep = frame.target.dependencies[frame.next];
        if (dep === undefined) {
          stack.pop();
          state.set(frame.name, "done");
          order.push(frame.name);
          continue;
        }

        frame.next++;
        log(`Adding edge from ${frame.name} to ${dep}`);
        graph.setEdge(frame.name, dep);
        enter(dep, frame.name);
      }
    }

    log("Nodes:", graph.nodes());
    log("Edges:", graph.edges());
    log("Execution order:", order);
    log("=== End graph build ===");

    return new ExecutionPlan({
      discoveredFrom,
      graph,
      order,
      roots: uniqueRoots,
      targets,
    });
  }

  /**
   * Find a dependency cycle anywhere in the registry, as the shortest loop
   * through the first target (in registry order) that sits on one.
   * References to unknown targets are ignored here; they are reported when a
   * plan is built.
   */
  findCycle(registry: TargetRegistry): string[] | undefined {
    const graph: TargetGraph = new Graph();
    for (const target of registry.values()) {
      graph.setNode(target.name);
      for (const dep of target.dependencies) {
        if (registry.has(dep)) {
          graph.setEdge(target.name, dep);
        }
      }
    }

    if (alg.isAcyclic(graph)) {
      return undefined;
    }

    const members = new Set(alg.findCycles(graph).flat());
    const start = [...registry.keys()].find((name) => members.has(name));
    if (start === undefined) {
      return undefined;
    }

    const paths = alg.dijkstra(graph, start);
    let closing: string | undefined;
    let shortest = Number.POSITIVE_INFINITY;
    for (const name of registry.keys()) {
      const distance = paths[name]?.distance ?? Number.POSITIVE_INFINITY;
      if (graph.hasEdge(name, start) && distance < shortest) {
        closing = name;
        shortest = distance;
      }
    }

    const tail: string[] = [];
    let node = closing;
    while (node !== undefined && node !== start) {
      tail.unshift(node);
      node = paths[node]?.predecessor;
    }
    log("Cycle found:", [start, ...tail, start]);
    return [start, ...tail, start];
  }
}
