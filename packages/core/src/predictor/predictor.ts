import type { ClassifierConfig, Posting, TransactionEntry } from '../types/index.js';
import { PREDICTOR_CONFIG } from '../types/index.js';
import type { Ledger } from '../journal/ledger.js';
import type { SourceCapabilities } from '../sources/types.js';
import { isUnknownAccount, unknownGroupNumbers } from '../model/posting.js';
import { sourcePostingFeatures } from './features.js';
import { extractTrainingExamples } from './training.js';
import { DecisionTreeClassifier, trainingFingerprint, type AccountClassifier } from './decision-tree.js';

export interface PredictorOptions {
    sources: readonly SourceCapabilities[];
    ignoreAccountPattern?: string;
    classifier?: Partial<ClassifierConfig>;
    /** Replaces the default decision tree. */
    model?: AccountClassifier;
}

export interface TrainResult {
    examples: number;
    fingerprint: string;
    /** False when the model already matched the training data. */
    retrained: boolean;
}

/**
 * Supplies default accounts for unknown postings.
 *
 * Never throws on prediction: cold start and failures give the sentinel
 * account, and failures are recorded in `warnings`.
 */
export class Predictor {
    readonly model: AccountClassifier;
    readonly warnings: string[] = [];
    private readonly sources: readonly SourceCapabilities[];
    private readonly ignoreAccountPattern: RegExp;

    constructor(options: PredictorOptions) {
        this.sources = options.sources;
        this.ignoreAccountPattern = new RegExp(options.ignoreAccountPattern ?? PREDICTOR_CONFIG.IGNORE_ACCOUNT_PATTERN);
        this.model = options.model ?? new DecisionTreeClassifier(options.classifier);
    }

    /**
     * Retrain from the whole ledger. A model restored from a cache of the
     * same training data is kept unless `force` is set.
     */
    train(ledger: Ledger, force = false): TrainResult {
        const examples = extractTrainingExamples(ledger, {
            sources: this.sources,
            ignoreAccountPattern: this.ignoreAccountPattern,
        });
        const fingerprint = trainingFingerprint(examples);
        if (!force && this.model.toJSON().fingerprint === fingerprint) {
            return { examples: examples.length, fingerprint, retrained: false };
        }
        this.model.train(examples);
        return { examples: examples.length, fingerprint, retrained: true };
    }

    /**
     * The posting a prediction is drawn from: the known side of a
     * transaction with exactly two postings outside the ignore pattern,
     * when it belongs to a source.
     */
    private sourcePosting(transaction: TransactionEntry): { posting: Posting; source: SourceCapabilities } | null {
        const postings = transaction.postings.filter(posting => !this.ignoreAccountPattern.test(posting.account));
        if (postings.length !== 2) return null;
        const [first, second] = postings;
        const posting = isUnknownAccount(second.account) ? first : second;
        const source = this.sources.find(candidate => candidate.isMine(posting.account));
        return source ? { posting, source } : null;
    }

    features(transaction: TransactionEntry): string[] {
        const found = this.sourcePosting(transaction);
        return found ? sourcePostingFeatures(transaction, found.posting, found.source) : [];
    }

    /**
     * Predicted account for the unknown leg of `transaction`, or null when
     * the model has nothing to go on.
     */
    predict(transaction: TransactionEntry): string | null {
        try {
            const features = this.features(transaction);
            if (features.length === 0) return null;
            const predicted = this.model.predict(features);
            return predicted !== null && !isUnknownAccount(predicted) ? predicted : null;
        } catch (err) {
            this.warnings.push(`Prediction failed for transaction on ${transaction.date}: ${err instanceof Error ? err.message : String(err)}`);
            return null;
        }
    }

    /**
     * Prediction per unknown-account group, indexed by group number. Only a
     * transaction with a single unknown posting gets one; other groups
     * stay null.
     */
    predictGroups(transaction: TransactionEntry): Array<string | null> {
        const groups = unknownGroupNumbers(transaction.postings);
        if (groups.length === 1) return [this.predict(transaction)];
        return new Array<string | null>(new Set(groups).size).fill(null);
    }

    explain(transaction: TransactionEntry): string[] {
        return this.model.explain(this.features(transaction));
    }
}
