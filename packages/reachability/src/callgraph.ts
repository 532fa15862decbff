// packages/reachability/src/callgraph.ts

/** Call graph keyed by function name. */
export interface CallGraph {
  functions: Set<string>;
  calls: Map<string, Set<string>>;
}

const EDGE = /^\s*"?([\w.]+)"?(?::\w+)?\s*->\s*"?([\w.]+)"?/;
const NODE = /^\s*"?([\w.]+)"?\s*\[(.*)\]\s*;?\s*$/;
const FUN = /fun:\s*([^\\}|\s]+)/;

/**
 * Reads an SVF `callgraph_final.dot`. Nodes carry `{fun: name}` in their
 * label; edges may hang off record ports (`Node0x1:s0 -> Node0x2`).
 */
export function parseCallGraphDot(dot: string): CallGraph {
  const names = new Map<string, string>();
  const edges: Array<[string, string]> = [];

  for (const line of dot.split(/\r?\n/)) {
    const edge = EDGE.exec(line);
    if (edge) {
      edges.push([edge[1], edge[2]]);
      continue;
    }
    const node = NODE.exec(line);
    const fun = node ? FUN.exec(node[2]) : null;
    if (node && fun) names.set(node[1], fun[1]);
  }

  const graph: CallGraph = { functions: new Set(names.values()), calls: new Map() };
  for (const [from, to] of edges) {
    const caller = names.get(from);
    const callee = names.get(to);
    if (!caller || !callee) continue;
    const callees = graph.calls.get(caller) ?? new Set<string>();
    callees.add(callee);
    graph.calls.set(caller, callees);
  }
  return graph;
}

/**
 * Graph node for a source-level name. C++ nodes are mangled, so a node
 * containing the unqualified name is accepted when no exact match exists.
 */
export function resolveFunction(graph: CallGraph, name: string): string | undefined {
  if (graph.functions.has(name)) return name;
  const short = name.split('::').pop() ?? name;
  return [...graph.functions].sort().find((fn) => fn.includes(short));
}

/** Shortest call chain from `from` to `to` (BFS), inclusive; undefined when unreachable. */
export function shortestCallPath(graph: CallGraph, from: string, to: string): string[] | undefined {
  if (!graph.functions.has(from) || !graph.functions.has(to)) return undefined;

  const parent = new Map<string, string | null>([[from, null]]);
  const queue = [from];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    if (current === to) {
      const chain: string[] = [];
      for (let at: string | null | undefined = to; at; at = parent.get(at)) chain.unshift(at);
      return chain;
    }
    for (const callee of [...(graph.calls.get(current) ?? [])].sort()) {
      if (parent.has(callee)) continue;
      parent.set(callee, current);
      queue.push(callee);
    }
  }
  return undefined;
}

const NOT_FUNCTIONS = new Set(['if', 'for', 'while', 'switch', 'return', 'sizeof', 'else', 'do', 'case']);
const DEFINITION = /^(?=[A-Za-z_])(?:[\w\s*&:<>,]*?[\s*&])?([A-Za-z_][\w:~]*)\s*\(([^;]*)$/;

/**
 * Name of the C/C++ function whose body contains `line` (1-based), found by
 * scanning upwards for a definition header starting in column 0.
 */
export function enclosingFunction(source: string, line: number): string | undefined {
  const lines = source.split(/\r?\n/);
  for (let i = Math.min(line, lines.length) - 1; i >= 0; i--) {
    const text = lines[i];
    if (i < line - 1 && text.startsWith('}')) return undefined;
    const match = DEFINITION.exec(text);
    if (match && !NOT_FUNCTIONS.has(match[1])) return match[1];
  }
  return undefined;
}

/** Fully qualified class name from the file's `package` declaration. */
export function javaClassName(source: string, relPath: string): string {
  const base = relPath.split('/').pop()?.replace(/\.java$/, '') ?? relPath;
  const pkg = /^\s*package\s+([\w.]+)\s*;/m.exec(source);
  return pkg ? `${pkg[1]}.${base}` : base;
}
