/**
 * Node row of a graph projection.
 */
export interface GraphNode {
    id: string;
    kind: string;
    name: string;
}

/**
 * Edge row of a graph projection, from a group key to one grouped item.
 */
export interface GraphEdge {
    src: string;
    srcKind: string;
    dst: string;
    dstKind: string;
    relationship: string;
}

export interface GraphTables {
    nodes: GraphNode[];
    edges: GraphEdge[];
}
