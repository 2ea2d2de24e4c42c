// DR Backup Object Store
// Blob storage for table snapshots (S3)

import { ListObjectsV2Command, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';

export interface BackupObjectStore {
  readonly bucket: string;

  putObject(key: string, body: string, contentType: string, signal?: AbortSignal): Promise<void>;
  /** Cheap reachability check: lists at most one key. */
  ping(signal?: AbortSignal): Promise<void>;
}

export class S3BackupObjectStore implements BackupObjectStore {
  constructor(
    private readonly client: S3Client,
    readonly bucket: string,
    private readonly kmsKeyId?: string
  ) {}

  async putObject(key: string, body: string, contentType: string, signal?: AbortSignal): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
        ServerSideEncryption: this.kmsKeyId ? 'aws:kms' : 'AES256',
        SSEKMSKeyId: this.kmsKeyId,
      }),
      { abortSignal: signal }
    );
  }

  async ping(signal?: AbortSignal): Promise<void> {
    await this.client.send(new ListObjectsV2Command({ Bucket: this.bucket, MaxKeys: 1 }), { abortSignal: signal });
  }
}
