export { DescriptionSource } from './description-source.js';
export type { DescriptionSourceOptions } from './description-source.js';
export { IdentitySource } from './identity-source.js';
export type { IdentitySourceOptions } from './identity-source.js';
export { makeImportTransaction, makeDirectivesResult } from './records.js';
export { createSourceResults } from './types.js';
export type {
    Source,
    SourceCapabilities,
    SourceContext,
    SourceResults,
    ImportResult,
} from './types.js';
