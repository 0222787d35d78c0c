export interface SearchOptions {
    // Budgets; once exceeded the last completed iteration is returned
    maxTime?: number;
    maxNodes?: number;
    // Disable to get a plain minimax traversal (same result, more nodes)
    pruning?: boolean;
    captureTree?: boolean;
    debug?: boolean;
}

// A visited node of the decision tree, from the perspective of the side to move there
export interface SearchNode {
    column: number | null;
    score: number;
    children: SearchNode[];
}

export interface SearchResult {
    column: number | null; // null when the root position is already over
    score: number;
    depth: number;
    nodes: number;
    time: number;
    tree?: SearchNode;
}

export interface MoveScore {
    column: number;
    score: number;
}

export const SCORE_WIN = 100000;
export const SCORE_LOSS = -100000;
export const SCORE_MATE = 90000;
export const HEURISTIC_LIMIT = 50000;
