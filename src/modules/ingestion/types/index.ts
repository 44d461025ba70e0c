/**
 * A knowledge record parsed from an upload, before chunking and embedding
 */
export interface KnowledgeRecord {
    content: string;
    category: string;
    source: string;
    metadata: Record<string, string>;
}

/**
 * Response body of the ingestion endpoints
 */
export interface IngestionResult {
    success: boolean;
    message: string;
    document_count?: number;
}
