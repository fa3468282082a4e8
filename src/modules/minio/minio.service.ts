import { Injectable, Logger, OnModuleInit, Inject } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import * as Minio from 'minio';
import { Readable } from 'stream';
import minioConfig from '../../config/minio.config';
import { describeError } from '../../common/utils/error.util';

/**
 * Object storage for documents awaiting asynchronous ingestion. Only touches
 * the server when ingestion events are enabled.
 */
@Injectable()
export class MinioService implements OnModuleInit {
  private readonly logger = new Logger(MinioService.name);
  private readonly client: Minio.Client;
  private readonly bucketName: string;

  constructor(
    @Inject(minioConfig.KEY) private readonly config: ConfigType<typeof minioConfig>,
  ) {
    this.client = new Minio.Client({
      endPoint: config.endpoint,
      port: config.port,
      useSSL: config.useSSL,
      accessKey: config.accessKey,
      secretKey: config.secretKey,
    });
    this.bucketName = config.bucket;
  }

  async onModuleInit() {
    if (!this.config.enabled) {
      return;
    }

    this.logger.log(`Checking for MinIO bucket: '${this.bucketName}'...`);
    try {
      const bucketExists = await this.client.bucketExists(this.bucketName);
      if (!bucketExists) {
        this.logger.warn(`Bucket '${this.bucketName}' does not exist. Creating...`);
        await this.client.makeBucket(this.bucketName, 'us-east-1');
        this.logger.log(`Bucket '${this.bucketName}' created successfully.`);
      } else {
        this.logger.log(`MinIO bucket '${this.bucketName}' found.`);
      }
    } catch (err) {
      this.logger.error(`Failed to initialize MinIO bucket: ${describeError(err)}`);
      throw err;
    }
  }

  /**
   * Returns the `minio://bucket/object` location of the stored document.
   */
  async putDocument(objectName: string, content: Buffer, mimeType: string): Promise<string> {
    await this.client.putObject(this.bucketName, objectName, content, content.length, {
      'Content-Type': mimeType,
    });
    this.logger.log(`Uploaded '${objectName}' to MinIO bucket '${this.bucketName}'`);
    return `minio://${this.bucketName}/${objectName}`;
  }

  async getDocument(objectName: string): Promise<Buffer> {
    const stream = await this.client.getObject(this.bucketName, objectName);
    return readStream(stream);
  }
}

function readStream(stream: Readable): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = [];
    stream.on('data', (chunk: Buffer) => chunks.push(chunk));
    stream.on('end', () => resolve(Buffer.concat(chunks)));
    stream.on('error', reject);
  });
}
