import type { UsedTransaction } from '../types/index.js';
import type { MatchableTransaction } from '../clearing/posting-index.js';

/**
 * The transactions referenced by a candidate set, each listed once.
 */
export class UsedTransactionRegistry {
    readonly list: UsedTransaction[] = [];
    private readonly ids = new Map<string, number>();

    idFor(owner: MatchableTransaction): number {
        const existing = this.ids.get(owner.key);
        if (existing !== undefined) return existing;
        const id = this.list.length;
        this.list.push({ transaction: owner.transaction, pendingIndex: owner.pendingIndex });
        this.ids.set(owner.key, id);
        return id;
    }
}
