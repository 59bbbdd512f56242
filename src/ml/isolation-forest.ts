import type { StatisticalVerdict } from '../rules/types.js';
import type { FeatureVector, StatisticalClassifier } from './statistical-classifier.js';

export interface SplitNode {
    feature: number;
    threshold: number;
    left: number;
    right: number;
}

export interface LeafNode {
    /** Training samples that reached this leaf. */
    samples: number;
}

export type TreeNode = SplitNode | LeafNode;

export interface IsolationTree {
    nodes: TreeNode[];
}

export interface IsolationForestArtifact {
    kind: 'isolation_forest';
    features: string[];
    trained_at?: string;
    scaler: {
        mean: number[];
        scale: number[];
    };
    max_samples: number;
    offset: number;
    trees: IsolationTree[];
}

const EULER_GAMMA = 0.5772156649;

/**
 * Expected path length of an unsuccessful search in a binary search tree
 * built from n points.
 */
export function averagePathLength(n: number): number {
    if (n <= 1) return 0;
    if (n === 2) return 1;
    return 2 * (Math.log(n - 1) + EULER_GAMMA) - (2 * (n - 1)) / n;
}

function isLeaf(node: TreeNode): node is LeafNode {
    return 'samples' in node;
}

export class IsolationForestClassifier implements StatisticalClassifier {
    readonly name = 'isolation-forest';
    readonly available = true;
    private readonly normalizer: number;

    constructor(private artifact: IsolationForestArtifact) {
        if (artifact.trees.length === 0) {
            throw new Error('Isolation forest artifact has no trees');
        }
        if (artifact.scaler.mean.length !== 4 || artifact.scaler.scale.length !== 4) {
            throw new Error('Scaler must provide exactly 4 mean and scale values');
        }
        artifact.trees.forEach((tree, index) => this.checkTree(tree, index));
        this.normalizer = averagePathLength(artifact.max_samples);
    }

    private checkTree(tree: IsolationTree, index: number): void {
        tree.nodes.forEach((node, position) => {
            if (isLeaf(node)) return;
            const children = [node.left, node.right];
            if (children.some((child) => child <= position || child >= tree.nodes.length)) {
                throw new Error(`Tree ${index} node ${position} has an invalid child reference`);
            }
            if (node.feature < 0 || node.feature > 3) {
                throw new Error(`Tree ${index} node ${position} splits on unknown feature ${node.feature}`);
            }
        });
    }

    /**
     * Apply the standard scaler the model was trained with.
     */
    scale(features: FeatureVector): number[] {
        const { mean, scale } = this.artifact.scaler;
        return features.map((value, i) => (scale[i] === 0 ? value - mean[i] : (value - mean[i]) / scale[i]));
    }

    private pathLength(tree: IsolationTree, sample: number[]): number {
        let index = 0;
        let depth = 0;

        for (;;) {
            const node = tree.nodes[index];
            if (isLeaf(node)) {
                return depth + averagePathLength(node.samples);
            }
            index = sample[node.feature] <= node.threshold ? node.left : node.right;
            depth++;
        }
    }

    /**
     * Anomaly score in [-1, 0); lower means more isolated.
     */
    score(features: FeatureVector): number {
        const sample = this.scale(features);
        const total = this.artifact.trees.reduce((sum, tree) => sum + this.pathLength(tree, sample), 0);
        const meanPath = total / this.artifact.trees.length;
        return -Math.pow(2, -meanPath / this.normalizer);
    }

    decision(features: FeatureVector): number {
        return this.score(features) - this.artifact.offset;
    }

    async classify(features: FeatureVector): Promise<StatisticalVerdict> {
        return this.decision(features) < 0 ? 'ANOMALOUS' : 'NORMAL';
    }
}
