/**
 * Node registry contract consumed by the map engine.
 */

/** A mesh node as read from the registry. Position fields are optional. */
export interface MapNode {
  nodeId: string;
  longName?: string;
  shortName?: string;
  latitude?: number | null;
  longitude?: number | null;
  /** Infrastructure nodes that cannot receive direct messages */
  isUnmessageable?: boolean;
}

export interface NodeRegistry {
  /** Current nodes, in display order */
  snapshot(): MapNode[];
  /** Register a change listener; returns an unsubscribe function */
  subscribe(listener: () => void): () => void;
}

/**
 * Human-readable node name: "[short] long", "long", "[short]" or the node ID.
 */
export function nodeDisplayName(node: MapNode): string {
  const shortName = node.shortName?.trim() ?? "";
  const longName = node.longName?.trim() ?? "";

  let base: string;
  if (shortName && longName) {
    base = `[${shortName}] ${longName}`;
  } else if (longName) {
    base = longName;
  } else if (shortName) {
    base = `[${shortName}]`;
  } else {
    base = node.nodeId;
  }

  return node.isUnmessageable ? `${base} {INFRA}` : base;
}
