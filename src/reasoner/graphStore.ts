import type { GraphNode, GraphRelationship, GraphSchema, NodeKind } from '../types.js';

export class GraphLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GraphLoadError';
  }
}

const KIND_BY_TYPE: Record<string, NodeKind> = {
  Disease: 'Disease',
  PlantDisease: 'Disease',
  Symptom: 'Symptom',
  Solution: 'Solution'
};

const RESERVED_NODE_FIELDS = new Set(['id', 'type', 'name', 'description']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function asCollection(snapshot: Record<string, unknown>, key: string): Record<string, unknown>[] {
  const raw = snapshot[key];
  if (raw === undefined || raw === null) return [];
  if (!Array.isArray(raw)) throw new GraphLoadError(`"${key}" must be an array of records`);
  return raw.map((item, i) => {
    if (!isRecord(item)) throw new GraphLoadError(`${key}[${i}] is not a record`);
    return item;
  });
}

function toNode(raw: Record<string, unknown>, index: number): GraphNode {
  if (typeof raw.id !== 'string' || !raw.id) {
    throw new GraphLoadError(`nodes[${index}] has no string id`);
  }
  const type = str(raw.type) || 'Unknown';
  const extra: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (RESERVED_NODE_FIELDS.has(key) || value === undefined || value === null) continue;
    extra[key] = typeof value === 'string' ? value : JSON.stringify(value);
  }
  return {
    id: raw.id,
    kind: KIND_BY_TYPE[type] ?? 'Other',
    type,
    name: str(raw.name),
    description: str(raw.description),
    extra
  };
}

function push<K, V>(index: Map<K, V[]>, key: K, value: V) {
  const list = index.get(key);
  if (list) list.push(value);
  else index.set(key, [value]);
}

/**
 * Read-only snapshot of the knowledge graph. All indices are built in the
 * constructor; nothing mutates the store afterwards, so one instance can
 * back any number of sessions.
 */
export class GraphStore {
  private readonly nodes: readonly GraphNode[];
  private readonly relationships: readonly GraphRelationship[];
  private readonly byId = new Map<string, GraphNode>();
  private readonly byKind = new Map<NodeKind, GraphNode[]>();
  private readonly bySource = new Map<string, GraphRelationship[]>();
  private readonly byRelKind = new Map<string, GraphRelationship[]>();

  private constructor(nodes: GraphNode[], relationships: GraphRelationship[]) {
    this.nodes = nodes;
    this.relationships = relationships;
    for (const node of nodes) {
      this.byId.set(node.id, node);
      push(this.byKind, node.kind, node);
    }
    for (const rel of relationships) {
      if (rel.source) push(this.bySource, rel.source, rel);
      if (rel.kind) push(this.byRelKind, rel.kind, rel);
    }
  }

  static load(snapshot: unknown): GraphStore {
    if (!isRecord(snapshot)) throw new GraphLoadError('Graph snapshot must be a record with nodes and relationships');

    const seen = new Set<string>();
    const nodes = asCollection(snapshot, 'nodes').map((raw, i) => {
      const node = toNode(raw, i);
      if (seen.has(node.id)) throw new GraphLoadError(`Duplicate node id "${node.id}"`);
      seen.add(node.id);
      return node;
    });
    const relationships = asCollection(snapshot, 'relationships').map(raw => ({
      source: str(raw.source),
      target: str(raw.target),
      kind: str(raw.type)
    }));

    return new GraphStore(nodes, relationships);
  }

  static empty(): GraphStore {
    return new GraphStore([], []);
  }

  nodesByKind(kind: NodeKind): readonly GraphNode[] {
    return this.byKind.get(kind) ?? [];
  }

  relationshipsFrom(nodeId: string): readonly GraphRelationship[] {
    return this.bySource.get(nodeId) ?? [];
  }

  relationshipsOfKind(kind: string): readonly GraphRelationship[] {
    return this.byRelKind.get(kind) ?? [];
  }

  nodeById(id: string): GraphNode | null {
    return this.byId.get(id) ?? null;
  }

  get size() {
    return { nodes: this.nodes.length, relationships: this.relationships.length };
  }

  schema(): GraphSchema {
    const counts = new Map<string, number>();
    for (const node of this.nodes) counts.set(node.type, (counts.get(node.type) ?? 0) + 1);

    const relTypes = new Set<string>();
    for (const rel of this.relationships) relTypes.add(rel.kind || 'Unknown');

    return {
      nodeTypes: [...counts.keys()].sort(),
      relationshipTypes: [...relTypes].sort(),
      nodeCounts: [...counts.entries()]
        .map(([type, count]) => ({ type, count }))
        .sort((a, b) => b.count - a.count || a.type.localeCompare(b.type))
    };
  }
}
