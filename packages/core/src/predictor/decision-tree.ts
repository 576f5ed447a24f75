import type { ClassifierCache, ClassifierConfig, DecisionNode } from '../types/index.js';
import { ClassifierCacheSchema, PREDICTOR_CONFIG } from '../types/index.js';
import { fingerprint } from '../utils/hash.js';
import type { TrainingExample } from './features.js';

/**
 * Strategy interface for the account model. Matching and candidate
 * ranking never depend on the concrete model.
 */
export interface AccountClassifier {
    train(examples: readonly TrainingExample[]): void;
    /** Predicted account, or null on cold start or an unfamiliar input. */
    predict(features: readonly string[]): string | null;
    /** Human-readable decision path for `features`. */
    explain(features: readonly string[]): string[];
    toJSON(): ClassifierCache;
}

interface Sample {
    features: ReadonlySet<string>;
    label: string;
}

function compareText(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Fingerprint of a training set, order-sensitive.
 */
export function trainingFingerprint(examples: readonly TrainingExample[]): string {
    return fingerprint(examples.map(example => `${example.label}\t${example.features.join(' ')}`));
}

function labelCounts(samples: readonly Sample[]): Map<string, number> {
    const counts = new Map<string, number>();
    for (const sample of samples) {
        counts.set(sample.label, (counts.get(sample.label) ?? 0) + 1);
    }
    return counts;
}

/**
 * Most frequent label; ties go to the lexicographically smallest.
 */
function majority(counts: Map<string, number>): string {
    let best = '';
    let bestCount = -1;
    for (const [label, count] of [...counts.entries()].sort(([a], [b]) => compareText(a, b))) {
        if (count > bestCount) {
            best = label;
            bestCount = count;
        }
    }
    return best;
}

function gini(counts: Map<string, number>, total: number): number {
    let sum = 0;
    for (const count of counts.values()) {
        const p = count / total;
        sum += p * p;
    }
    return 1 - sum;
}

/**
 * Binary decision tree over feature presence, split by Gini impurity.
 *
 * Deterministic: candidate features are scanned in sorted order and only a
 * strictly better gain replaces the current split, so ties resolve to the
 * smallest feature name; leaf ties resolve to the smallest account name.
 */
export class DecisionTreeClassifier implements AccountClassifier {
    private root: DecisionNode | null = null;
    private vocabulary = new Set<string>();
    private trainedFingerprint = trainingFingerprint([]);
    private readonly maxDepth: number;
    private readonly minSamplesSplit: number;

    constructor(config: Partial<ClassifierConfig> = {}) {
        this.maxDepth = config.maxDepth ?? PREDICTOR_CONFIG.MAX_DEPTH;
        this.minSamplesSplit = config.minSamplesSplit ?? PREDICTOR_CONFIG.MIN_SAMPLES_SPLIT;
    }

    /**
     * Restore a tree written by `toJSON`.
     *
     * @throws ZodError if the cache does not match the schema
     */
    static fromJSON(cache: unknown, config: Partial<ClassifierConfig> = {}): DecisionTreeClassifier {
        const parsed = ClassifierCacheSchema.parse(cache);
        const classifier = new DecisionTreeClassifier(config);
        classifier.root = parsed.root;
        classifier.vocabulary = new Set(parsed.vocabulary);
        classifier.trainedFingerprint = parsed.fingerprint;
        return classifier;
    }

    get fingerprint(): string {
        return this.trainedFingerprint;
    }

    get trained(): boolean {
        return this.root !== null;
    }

    train(examples: readonly TrainingExample[]): void {
        this.trainedFingerprint = trainingFingerprint(examples);
        this.vocabulary = new Set(examples.flatMap(example => example.features));
        const samples: Sample[] = examples.map(example => ({ features: new Set(example.features), label: example.label }));
        this.root = samples.length > 0 ? this.build(samples, 0) : null;
    }

    predict(features: readonly string[]): string | null {
        if (!this.root || !features.some(feature => this.vocabulary.has(feature))) return null;
        const present = new Set(features);
        let node = this.root;
        while (node.kind === 'split') {
            node = present.has(node.feature) ? node.present : node.absent;
        }
        return node.label;
    }

    explain(features: readonly string[]): string[] {
        if (!this.root) return ['no training data'];
        if (!features.some(feature => this.vocabulary.has(feature))) return ['no known features'];
        const present = new Set(features);
        const lines: string[] = [];
        let node = this.root;
        while (node.kind === 'split') {
            const has = present.has(node.feature);
            lines.push(`${has ? 'has' : 'lacks'} ${node.feature} (${node.samples} samples)`);
            node = has ? node.present : node.absent;
        }
        lines.push(`=> ${node.label} (${node.samples} samples)`);
        return lines;
    }

    toJSON(): ClassifierCache {
        return {
            version: PREDICTOR_CONFIG.CACHE_VERSION,
            fingerprint: this.trainedFingerprint,
            vocabulary: [...this.vocabulary].sort(compareText),
            root: this.root,
        };
    }

    private build(samples: Sample[], depth: number): DecisionNode {
        const counts = labelCounts(samples);
        const leaf: DecisionNode = { kind: 'leaf', label: majority(counts), samples: samples.length };
        if (counts.size === 1 || depth >= this.maxDepth || samples.length < this.minSamplesSplit) {
            return leaf;
        }

        const impurity = gini(counts, samples.length);
        const candidates = [...new Set(samples.flatMap(sample => [...sample.features]))].sort(compareText);
        let bestFeature: string | null = null;
        let bestGain = 0;

        for (const feature of candidates) {
            const present = samples.filter(sample => sample.features.has(feature));
            if (present.length === 0 || present.length === samples.length) continue;
            const absent = samples.filter(sample => !sample.features.has(feature));
            const weighted =
                (present.length / samples.length) * gini(labelCounts(present), present.length)
                + (absent.length / samples.length) * gini(labelCounts(absent), absent.length);
            const gain = impurity - weighted;
            if (gain > bestGain) {
                bestGain = gain;
                bestFeature = feature;
            }
        }

        if (bestFeature === null) return leaf;
        const feature = bestFeature;
        return {
            kind: 'split',
            feature,
            samples: samples.length,
            absent: this.build(samples.filter(sample => !sample.features.has(feature)), depth + 1),
            present: this.build(samples.filter(sample => sample.features.has(feature)), depth + 1),
        };
    }
}
