import { Inject, Injectable, Logger } from '@nestjs/common';
import ingestionConfig, { IngestionSettings } from '../../../config/ingestion.config';
import { ChunkingOptions, TextChunk } from '../types';

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;

/**
 * Text Chunker Service - splits long passages on paragraph and sentence boundaries
 */
@Injectable()
export class ChunkerService {
    private readonly logger = new Logger(ChunkerService.name);
    private readonly defaults: ChunkingOptions;

    constructor(@Inject(ingestionConfig.KEY) settings: IngestionSettings) {
        this.defaults = {
            chunkSize: settings.chunkSize,
            minChunkSize: settings.minChunkSize,
            overlap: settings.chunkOverlap,
        };
    }

    /**
     * Chunk text with overlap.
     *
     * Paragraphs (blank-line separated) are packed into chunks of at most `chunkSize`
     * characters; a paragraph longer than that is packed sentence by sentence. Each new
     * chunk starts with the last `overlap` characters of the previous one. Chunks
     * shorter than `minChunkSize` are dropped. Text that already fits is returned whole.
     */
    chunkText(text: string, options: Partial<ChunkingOptions> = {}): TextChunk[] {
        const { chunkSize, minChunkSize, overlap } = { ...this.defaults, ...options };
        const trimmed = text.trim();

        if (trimmed.length === 0) {
            return [];
        }
        if (trimmed.length <= chunkSize) {
            return [{ text: trimmed, chunkIndex: 0, totalChunks: 1 }];
        }

        this.logger.debug(`📄 Chunking text (${trimmed.length} chars) with size=${chunkSize}, overlap=${overlap}`);

        const texts: string[] = [];
        let current: string[] = [];
        let currentSize = 0;

        const append = (piece: string) => {
            if (currentSize + piece.length > chunkSize && current.length > 0) {
                const chunk = current.join(' ');
                if (chunk.length >= minChunkSize) {
                    texts.push(chunk);
                }
                const tail = overlap > 0 ? chunk.slice(Math.max(0, chunk.length - overlap)) : '';
                current = tail ? [tail] : [];
                currentSize = tail.length;
            }
            current.push(piece);
            currentSize += piece.length;
        };

        for (const paragraph of trimmed.split('\n\n')) {
            if (paragraph.length > chunkSize) {
                for (const raw of paragraph.split(SENTENCE_BOUNDARY)) {
                    const sentence = raw.trim();
                    if (sentence) {
                        append(sentence);
                    }
                }
            } else {
                append(paragraph);
            }
        }

        if (current.length > 0) {
            const chunk = current.join(' ');
            if (chunk.length >= minChunkSize) {
                texts.push(chunk);
            }
        }

        this.logger.log(`✅ Created ${texts.length} chunks`);

        return texts.map((chunkText, chunkIndex) => ({
            text: chunkText,
            chunkIndex,
            totalChunks: texts.length,
        }));
    }
}
