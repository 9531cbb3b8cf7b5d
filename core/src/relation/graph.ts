/**
 * Relation graphs
 *
 * A Graph is a root plus child nodes loaded together. The root is loaded
 * once; each node is then evaluated once against the whole loaded root set,
 * never once per root tuple. A Curried node receives the root `Loaded` as its
 * final argument, so a view such as `tasks.forUsers(users)` can restrict by
 * every parent key in a single pass. Pairing parents with children is the
 * job of the view and of the mappers applied afterwards.
 *
 * @example
 * ```typescript
 * const graph = users.combine(tasks.view('forUsers'));
 * const loaded = graph.call();
 * loaded.collection; // users
 * loaded.nodes[0].collection; // tasks of those users
 * ```
 */

import type { Mapper } from '../mappers.js';
import { assertNever, type Tuple } from '../types.js';
import { Composite } from './composite.js';
import type { Curried } from './curried.js';
import { Loaded } from './loaded.js';
import type { Materializable } from './materializable.js';
import type { Relation } from './relation.js';

export type GraphRoot = Relation | Curried;
export type GraphNode = Relation | Curried | Graph;

/**
 * Loaded graph: `collection` holds the root tuples, `nodes` the loaded children
 * in the order they were combined.
 */
export class LoadedGraph extends Loaded<Tuple> {
  constructor(
    readonly root: Loaded<Tuple>,
    readonly nodes: readonly Loaded<Tuple>[],
    source: Graph
  ) {
    super(root.collection, source);
  }
}

export class Graph implements Materializable<Tuple> {
  readonly kind = 'graph' as const;

  constructor(
    readonly root: GraphRoot,
    readonly nodes: readonly GraphNode[]
  ) {}

  static build(root: GraphRoot, nodes: readonly GraphNode[]): Graph {
    return new Graph(root, [...nodes]);
  }

  isCurried(): false {
    return false;
  }

  isGraph(): true {
    return true;
  }

  get name(): string {
    return this.root.name;
  }

  /**
   * New graph with `others` appended to the nodes.
   */
  combine(...others: GraphNode[]): Graph {
    return new Graph(this.root, [...this.nodes, ...others]);
  }

  /**
   * Load the root (completing a Curried root with `args`), then every node
   * against the loaded root. Nodes of an empty root are not evaluated.
   */
  call(...args: unknown[]): LoadedGraph {
    const root = this.root.kind === 'curried' ? this.root.load(...args) : this.root.call();

    const nodes = root.isEmpty()
      ? this.nodes.map(node => emptyLoaded(node))
      : this.nodes.map(node => loadNode(node, root));

    return new LoadedGraph(root, nodes, this);
  }

  toArray(): Tuple[] {
    return this.call().toArray();
  }

  pipe<O>(mapper: Mapper<Tuple, O>): Composite<Tuple, O> {
    return new Composite(this, mapper);
  }
}

function loadNode(node: GraphNode, parent: Loaded<Tuple>): Loaded<Tuple> {
  switch (node.kind) {
    case 'relation':
      return node.call();
    case 'curried':
      return node.load(parent);
    case 'graph':
      return node.call(parent);
    default:
      return assertNever(node, 'Unknown graph node');
  }
}

function emptyLoaded(node: GraphNode): Loaded<Tuple> {
  if (node.kind === 'graph') {
    return new LoadedGraph(new Loaded([], node.root), node.nodes.map(emptyLoaded), node);
  }
  return new Loaded([], node);
}
