import { Inject, Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { readFile } from 'fs/promises';
import * as path from 'path';
import guardrailsConfig, { GuardrailsSettings } from '../../config/guardrails.config';
import ingestionConfig, { IngestionSettings } from '../../config/ingestion.config';
import { UnsupportedUploadError } from '../../common/errors/rag.errors';
import { createContentHash } from '../../common/utils/hash.util';
import { redactText } from '../../common/utils/redaction.util';
import { DocumentIndexService } from '../knowledge/document-index.service';
import { ChunkInput } from '../knowledge/types';
import { ChunkerService } from '../rag/services/chunker.service';
import { AddDocumentDto } from './dto/add-document.dto';
import { parseCsvRecords } from './parsers/csv-records.parser';
import { parseJsonRecords, qaContent } from './parsers/json-records.parser';
import { parseSpreadsheetRecords } from './parsers/spreadsheet-records.parser';
import { IngestionResult, KnowledgeRecord } from './types';

/**
 * Ingestion Service - turns uploads and manual additions into index insertions.
 *
 * Records are parsed, stripped of account identifiers, de-duplicated by content hash,
 * split when longer than the chunk size and handed to the index as one atomic batch.
 */
@Injectable()
export class IngestionService implements OnApplicationBootstrap {
    private readonly logger = new Logger(IngestionService.name);

    constructor(
        @Inject(ingestionConfig.KEY) private readonly settings: IngestionSettings,
        @Inject(guardrailsConfig.KEY) private readonly guardrails: GuardrailsSettings,
        private readonly index: DocumentIndexService,
        private readonly chunker: ChunkerService,
    ) { }

    /**
     * Seed the index from `RAG_SEED_FILE`. A seed failure aborts startup.
     */
    async onApplicationBootstrap(): Promise<void> {
        if (!this.settings.seedFile) {
            this.logger.log('📭 No seed file configured; starting with an empty index');
            return;
        }
        await this.seedFromFile(this.settings.seedFile);
    }

    async seedFromFile(filePath: string): Promise<IngestionResult> {
        this.logger.log(`🌱 Seeding index from ${filePath}`);
        const buffer = await readFile(filePath);
        return this.ingestFile(buffer, path.basename(filePath));
    }

    async ingestFile(buffer: Buffer, originalName: string): Promise<IngestionResult> {
        const fileName = path.basename(originalName);
        const extension = path.extname(fileName).slice(1).toLowerCase();
        if (!this.settings.allowedExtensions.includes(extension)) {
            throw new UnsupportedUploadError(
                `File type not allowed. Allowed types: ${this.settings.allowedExtensions.join(', ')}`,
            );
        }

        this.logger.log(`📄 Processing ${fileName} (${buffer.length} bytes)`);
        const records = await this.parse(extension, buffer, fileName);
        const unique = this.deduplicate(records.map((record) => this.redact(record)));

        const perRecord = unique.map((record) => this.toChunkInputs(record));
        const documentCount = perRecord.filter((inputs) => inputs.length > 0).length;
        if (documentCount < unique.length) {
            this.logger.warn(
                `⚠️ Skipped ${unique.length - documentCount} record(s) whose chunks were all below ${this.settings.minChunkSize} chars`,
            );
        }
        if (documentCount === 0) {
            throw new UnsupportedUploadError(`No documents found in ${fileName}`);
        }

        const inputs = perRecord.flat();
        await this.index.bulkInsert(inputs);

        this.logger.log(`✅ Ingested ${fileName}: ${documentCount} documents, ${inputs.length} chunks`);
        return {
            success: true,
            message: `Successfully processed ${fileName}: ${documentCount} documents added`,
            document_count: documentCount,
        };
    }

    async addDocument(dto: AddDocumentDto): Promise<IngestionResult> {
        const { content, category, metadata } = this.redact({
            content: qaContent(dto.question, dto.answer),
            category: dto.category,
            source: this.settings.manualSource,
            metadata: { question: dto.question, answer: dto.answer },
        });
        const chunk = await this.index.insert({ text: content, category, source: this.settings.manualSource, metadata });

        this.logger.log(`✅ Manual document added: ${chunk.id} (${category})`);
        return { success: true, message: 'Document added successfully' };
    }

    private parse(extension: string, buffer: Buffer, fileName: string): Promise<KnowledgeRecord[]> | KnowledgeRecord[] {
        switch (extension) {
            case 'csv':
                return parseCsvRecords(buffer, fileName);
            case 'xlsx':
                return parseSpreadsheetRecords(buffer, fileName);
            default:
                return parseJsonRecords(buffer.toString('utf8'), fileName);
        }
    }

    /**
     * Card numbers, IBANs and account numbers never reach the index.
     */
    private redact(record: KnowledgeRecord): KnowledgeRecord {
        const { redactionPatterns, redactionPlaceholder } = this.guardrails;
        const content = redactText(record.content, redactionPatterns, redactionPlaceholder);
        const metadata = Object.fromEntries(
            Object.entries(record.metadata).map(([key, value]) => [
                key,
                redactText(value, redactionPatterns, redactionPlaceholder).text,
            ]),
        );

        const total = content.counts.reduce((sum, { count }) => sum + count, 0);
        if (total > 0) {
            this.logger.warn(`🛡️ Redacted ${total} identifier(s) from a ${record.category} record in ${record.source}`);
        }
        return { ...record, content: content.text, metadata };
    }

    private deduplicate(records: KnowledgeRecord[]): KnowledgeRecord[] {
        const seen = new Set<string>();
        const unique = records.filter((record) => {
            const hash = createContentHash(record.category, record.content);
            if (seen.has(hash)) {
                return false;
            }
            seen.add(hash);
            return true;
        });

        if (unique.length < records.length) {
            this.logger.warn(`⚠️ Skipped ${records.length - unique.length} duplicate record(s)`);
        }
        return unique;
    }

    private toChunkInputs(record: KnowledgeRecord): ChunkInput[] {
        const base = { category: record.category, source: record.source };
        if (record.content.length <= this.settings.chunkSize) {
            return [{ ...base, text: record.content, metadata: record.metadata }];
        }

        return this.chunker.chunkText(record.content).map((chunk) => ({
            ...base,
            text: chunk.text,
            metadata: {
                ...record.metadata,
                chunkIndex: String(chunk.chunkIndex),
                totalChunks: String(chunk.totalChunks),
            },
        }));
    }
}
