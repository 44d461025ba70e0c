import { Classification } from '../../guardrails/types';

export type QueryState =
    | 'received'
    | 'classified'
    | 'short_circuited'
    | 'retrieved'
    | 'composed'
    | 'generated'
    | 'validated'
    | 'delivered';

export type QueryStatus =
    | 'answered'
    | 'security_notice'
    | 'domain_notice'
    | 'no_context'
    | 'generation_unavailable';

/**
 * Outcome of one query. Every status carries a response text; `sources` lists the
 * citation tags of the chunks that went into the prompt and is empty for notices.
 */
export interface QueryResult {
    status: QueryStatus;
    response: string;
    sources: string[];
    classification: Classification;
    isJailbreak: boolean;
    isOutOfDomain: boolean;
    states: QueryState[];
}
