import {
  BadRequestException,
  Controller,
  Delete,
  HttpCode,
  Logger,
  Param,
  Post,
  Query,
  ServiceUnavailableException,
  UploadedFiles,
  UseInterceptors,
} from '@nestjs/common';
import { FilesInterceptor } from '@nestjs/platform-express';
import { ApiBody, ApiConsumes, ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { randomUUID } from 'crypto';
import { toHttpException } from '../../common/errors/http-error.mapper';
import { DocumentIngestionEvent } from '../kafka/ingestion-event';
import { KafkaService } from '../kafka/kafka.service';
import { MinioService } from '../minio/minio.service';
import { RagService } from '../rag/services/rag.service';
import { DocumentSource, IndexingResult } from '../rag/types';

const MAX_FILES_PER_REQUEST = 10;

const filesBody = {
  description: 'Text or markdown files. Form feeds separate pages.',
  schema: {
    type: 'object',
    properties: {
      files: {
        type: 'array',
        items: { type: 'string', format: 'binary' },
      },
    },
  },
};

export interface QueuedUpload {
  fileName: string;
  documentLocation: string;
  size: number;
}

export interface QueuedIngestion {
  batchId: string;
  filesCount: number;
  uploadedFiles: QueuedUpload[];
}

@ApiTags('documents')
@Controller('documents')
export class DocumentsController {
  private readonly logger = new Logger(DocumentsController.name);

  constructor(
    private readonly ragService: RagService,
    private readonly minioService: MinioService,
    private readonly kafkaService: KafkaService,
  ) { }

  @Post()
  @UseInterceptors(FilesInterceptor('files', MAX_FILES_PER_REQUEST))
  @ApiConsumes('multipart/form-data')
  @ApiOperation({ summary: 'Index documents', description: 'Extracts, chunks, embeds and stores each file before responding.' })
  @ApiBody(filesBody)
  @ApiResponse({ status: 201, description: 'One indexing result per file.' })
  async indexDocuments(@UploadedFiles() files: Express.Multer.File[] | undefined): Promise<IndexingResult[]> {
    const uploads = requireFiles(files);
    this.logger.log(`🌐 HTTP REQUEST: Indexing ${uploads.length} files`);

    const sources: DocumentSource[] = uploads.map((file) => ({
      fileName: file.originalname,
      filePath: file.originalname,
      content: file.buffer,
      mimeType: file.mimetype,
    }));

    try {
      return await this.ragService.indexDocuments(sources);
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Post('async')
  @HttpCode(202)
  @UseInterceptors(FilesInterceptor('files', MAX_FILES_PER_REQUEST))
  @ApiConsumes('multipart/form-data')
  @ApiOperation({
    summary: 'Queue documents for indexing',
    description: 'Stores each file in MinIO and publishes one ingestion event per file to Kafka.',
  })
  @ApiBody(filesBody)
  @ApiResponse({ status: 202, description: 'The files were stored and their ingestion events published.' })
  @ApiResponse({ status: 503, description: 'Ingestion events are disabled.' })
  async queueDocuments(@UploadedFiles() files: Express.Multer.File[] | undefined): Promise<QueuedIngestion> {
    const uploads = requireFiles(files);
    if (!this.kafkaService.isEnabled()) {
      throw new ServiceUnavailableException('Asynchronous ingestion is disabled');
    }

    const batchId = randomUUID();
    const uploadedFiles: QueuedUpload[] = [];
    const events: DocumentIngestionEvent[] = [];

    for (const [i, file] of uploads.entries()) {
      const objectName = `${Date.now()}-${i}-${file.originalname}`;
      this.logger.log(`Uploading file ${i + 1}/${uploads.length}: ${file.originalname} (${file.size} bytes)`);

      try {
        const documentLocation = await this.minioService.putDocument(objectName, file.buffer, file.mimetype);
        uploadedFiles.push({ fileName: file.originalname, documentLocation, size: file.size });
        events.push({
          sourceService: 'API',
          documentLocation,
          documentMimeType: file.mimetype,
          fileName: file.originalname,
          timestamp: new Date().toISOString(),
          batchId,
          fileIndex: i + 1,
          totalFiles: uploads.length,
        });
      } catch (error) {
        this.logger.error(`Failed to upload file ${i + 1}/${uploads.length}: ${file.originalname}`);
        throw toHttpException(error);
      }
    }

    try {
      await this.kafkaService.publishIngestionEvents(events);
    } catch (error) {
      throw toHttpException(error);
    }

    this.logger.log(`📨 Batch ${batchId}: ${uploads.length} files uploaded and ${events.length} events published`);
    return { batchId, filesCount: uploads.length, uploadedFiles };
  }

  @Delete()
  @ApiOperation({ summary: 'Delete every document', description: 'Removes all stored chunks. Requires confirm=true.' })
  @ApiQuery({ name: 'confirm', required: true, type: Boolean })
  @ApiResponse({ status: 200, description: 'Number of chunks deleted.' })
  @ApiResponse({ status: 400, description: 'Missing confirmation.' })
  async clearDocuments(@Query('confirm') confirm: string | undefined): Promise<{ deletedChunks: number }> {
    if (confirm !== 'true') {
      throw new BadRequestException('Confirmation required. Set confirm=true to clear all documents.');
    }

    try {
      const deletedChunks = await this.ragService.clearAll();
      this.logger.warn(`🗑️ All documents cleared (${deletedChunks} chunks)`);
      return { deletedChunks };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Delete(':fileName')
  @ApiOperation({ summary: 'Delete a document', description: 'Removes every stored chunk of the named file.' })
  @ApiResponse({ status: 200, description: 'Number of chunks deleted.' })
  async deleteDocument(@Param('fileName') fileName: string): Promise<{ fileName: string; deletedChunks: number }> {
    try {
      const deletedChunks = await this.ragService.deleteDocument(fileName);
      return { fileName, deletedChunks };
    } catch (error) {
      throw toHttpException(error);
    }
  }
}

function requireFiles(files: Express.Multer.File[] | undefined): Express.Multer.File[] {
  if (!files || files.length === 0) {
    throw new BadRequestException('No files provided');
  }
  return files;
}
