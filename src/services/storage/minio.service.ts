import { S3Client, PutObjectCommand, GetObjectCommand } from '@aws-sdk/client-s3';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { Errors } from '../../utils/errors.js';

/**
 * Write-once object store for uploaded file content.
 */
export interface FileStorage {
  put(key: string, content: Buffer, contentType: string): Promise<void>;
  get(key: string): Promise<Buffer>;
}

export class MinioStorageService implements FileStorage {
  private client = new S3Client({
    endpoint: config.minioEndpoint,
    region: 'us-east-1', // MinIO requires this for s3 compat but ignores it
    credentials: {
      accessKeyId: config.minioAccessKey,
      secretAccessKey: config.minioSecretKey,
    },
    forcePathStyle: true,
  });

  async put(key: string, content: Buffer, contentType: string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: config.minioBucket,
        Key: key,
        Body: content,
        ContentType: contentType,
      })
    );
    logger.debug({ key, bytes: content.length }, 'Stored file content');
  }

  async get(key: string): Promise<Buffer> {
    const response = await this.client.send(
      new GetObjectCommand({
        Bucket: config.minioBucket,
        Key: key,
      })
    );
    const bytes = await response.Body?.transformToByteArray();
    if (!bytes) {
      throw Errors.notFound('File content');
    }
    return Buffer.from(bytes);
  }
}
