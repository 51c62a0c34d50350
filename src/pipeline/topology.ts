import { UnknownPeer } from "./errors.js";
import type { NodeIdentity, NodeRole, PeerAddress } from "./types.js";

export type TopologyNode = {
  name: string;
  host: string;
  port: number;
  role: NodeRole;
  /** Name of the downstream node; omitted for a terminal node. */
  destination?: string;
};

export type TopologyEdge = {
  readonly from: string;
  readonly to: string;
};

export type NodeRoute = {
  identity: NodeIdentity;
  upstream: PeerAddress[];
  downstream: PeerAddress | null;
};

export type TopologyWalk = {
  /** Node names in traversal order, starting at the origin. */
  path: string[];
  /** True when the walk returns to a node already on the path. */
  closesRing: boolean;
};

export function listenAddressFor(node: Pick<TopologyNode, "host" | "port">): string {
  return `ws://${node.host}:${node.port}`;
}

/**
 * Static routing table resolved once at startup. Nodes and edges are frozen;
 * traversal is always by name lookup over the edge list.
 */
export class TopologyRouter {
  readonly edges: ReadonlyArray<TopologyEdge>;
  private readonly identities: ReadonlyMap<string, NodeIdentity>;

  private constructor(identities: Map<string, NodeIdentity>, edges: TopologyEdge[]) {
    this.identities = identities;
    this.edges = Object.freeze(edges.map((edge) => Object.freeze({ ...edge })));
  }

  static resolve(nodes: TopologyNode[]): TopologyRouter {
    const byName = new Map<string, TopologyNode>();
    for (const node of nodes) {
      if (byName.has(node.name)) {
        throw new Error(`duplicate node name "${node.name}" in topology`);
      }
      byName.set(node.name, node);
    }

    const edges: TopologyEdge[] = [];
    const identities = new Map<string, NodeIdentity>();
    for (const node of nodes) {
      let sendAddress: string | null = null;
      if (node.destination !== undefined) {
        const target = byName.get(node.destination);
        if (!target) {
          throw new UnknownPeer(node.destination, `destination of "${node.name}" is not in the topology`);
        }
        sendAddress = listenAddressFor(target);
        edges.push({ from: node.name, to: target.name });
      }
      identities.set(
        node.name,
        Object.freeze({
          name: node.name,
          listenAddress: listenAddressFor(node),
          sendAddress,
          role: node.role,
        }),
      );
    }
    return new TopologyRouter(identities, edges);
  }

  identity(name: string): NodeIdentity {
    const identity = this.identities.get(name);
    if (!identity) {
      throw new UnknownPeer(name, "no such node in the topology");
    }
    return identity;
  }

  route(name: string): NodeRoute {
    const identity = this.identity(name);
    const upstream = this.edges
      .filter((edge) => edge.to === name)
      .map((edge) => this.peerAddress(edge.from));
    const out = this.edges.find((edge) => edge.from === name);
    return {
      identity,
      upstream,
      downstream: out ? this.peerAddress(out.to) : null,
    };
  }

  /** Follow destinations from an origin until a terminal node or a repeated node. */
  walk(origin: string): TopologyWalk {
    const path: string[] = [];
    const seen = new Set<string>();
    let current: string | undefined = this.identity(origin).name;
    while (current !== undefined) {
      if (seen.has(current)) {
        return { path, closesRing: true };
      }
      seen.add(current);
      path.push(current);
      const name: string = current;
      current = this.edges.find((edge) => edge.from === name)?.to;
    }
    return { path, closesRing: false };
  }

  /** Node names in declaration order. */
  names(): string[] {
    return [...this.identities.keys()];
  }

  private peerAddress(name: string): PeerAddress {
    return { name, address: this.identity(name).listenAddress };
  }
}

export function createTopologyRouter(nodes: TopologyNode[]): TopologyRouter {
  return TopologyRouter.resolve(nodes);
}
