import {
    BadRequestException,
    Body,
    Controller,
    HttpCode,
    Logger,
    Post,
    UploadedFile,
    UseFilters,
    UseInterceptors,
    UsePipes,
    ValidationPipe,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ApiBody, ApiConsumes, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { AddDocumentDto } from './dto/add-document.dto';
import { IngestionExceptionFilter } from './filters/ingestion-exception.filter';
import { IngestionService } from './ingestion.service';
import { IngestionResult } from './types';

export const MISSING_FIELDS_MESSAGE = 'Missing required fields: category, question, and answer are required';

@Controller()
@UseFilters(IngestionExceptionFilter)
export class IngestionController {
    private readonly logger = new Logger(IngestionController.name);

    constructor(private readonly ingestionService: IngestionService) { }

    @Post('upload')
    @HttpCode(200)
    @UseInterceptors(FileInterceptor('file'))
    @ApiConsumes('multipart/form-data')
    @ApiOperation({ summary: 'Upload a knowledge file', description: 'Parses a JSON, CSV or XLSX file and adds its records to the knowledge index.' })
    @ApiBody({
        description: 'The JSON, CSV or XLSX file to ingest. Each XLSX sheet becomes a category.',
        schema: {
            type: 'object',
            properties: {
                file: { type: 'string', format: 'binary' },
            },
        },
    })
    @ApiResponse({ status: 200, description: 'The file was ingested.' })
    @ApiResponse({ status: 400, description: 'Missing file, unsupported type or unrecognised content.' })
    async upload(@UploadedFile() file?: Express.Multer.File): Promise<IngestionResult> {
        if (!file) {
            throw new BadRequestException('No file part in the request');
        }
        if (!file.originalname) {
            throw new BadRequestException('No file selected');
        }

        this.logger.log(`Received file upload: ${file.originalname} (${file.size} bytes)`);
        return this.ingestionService.ingestFile(file.buffer, file.originalname);
    }

    @Post('add-document')
    @HttpCode(200)
    @ApiOperation({ summary: 'Add a single Q&A document', description: 'Embeds one question/answer pair and adds it to the knowledge index.' })
    @ApiResponse({ status: 200, description: 'The document was added.' })
    @ApiResponse({ status: 400, description: 'A required field is missing.' })
    @UsePipes(new ValidationPipe({ transform: true, exceptionFactory: () => new BadRequestException(MISSING_FIELDS_MESSAGE) }))
    async addDocument(@Body() dto: AddDocumentDto): Promise<IngestionResult> {
        return this.ingestionService.addDocument(dto);
    }
}
