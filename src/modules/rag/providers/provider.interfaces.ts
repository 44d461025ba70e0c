/**
 * Capability interfaces for the external models. The pipeline only depends on these,
 * so providers can be swapped without touching retrieval or orchestration.
 */

export const EMBEDDING_PROVIDER = Symbol('EMBEDDING_PROVIDER');
export const GENERATION_PROVIDER = Symbol('GENERATION_PROVIDER');

export interface ProviderCallOptions {
    signal?: AbortSignal;
}

export interface EmbeddingProvider {
    embed(text: string, options?: ProviderCallOptions): Promise<number[]>;
    embedBatch(texts: string[], options?: ProviderCallOptions): Promise<number[][]>;
}

export interface GenerationProvider {
    /**
     * Must reject with `GenerationProviderError` for failures the client should classify;
     * any other rejection is treated as non-transient.
     */
    generate(prompt: string, options?: ProviderCallOptions): Promise<string>;
    readonly model: string;
}
