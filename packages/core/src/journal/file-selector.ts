import type { Entry, OutputConfig } from '../types/index.js';

/**
 * Choose the file a newly staged entry is written to.
 *
 * Transactions go to the first `transactionOutputMap` file whose pattern
 * matches one of their posting accounts, else to `defaultOutput`.
 */
export function selectOutputFile(entry: Entry, output: OutputConfig): string {
    switch (entry.type) {
        case 'open':
            return output.openOutput ?? output.defaultOutput;
        case 'balance':
            return output.balanceOutput ?? output.defaultOutput;
        case 'price':
            return output.priceOutput ?? output.defaultOutput;
        case 'transaction':
            for (const [pattern, filename] of output.transactionOutputMap) {
                const re = new RegExp(pattern);
                if (entry.postings.some(posting => re.test(posting.account))) {
                    return filename;
                }
            }
            return output.defaultOutput;
    }
}
