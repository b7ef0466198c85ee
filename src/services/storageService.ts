import * as Minio from 'minio';
import { Readable } from 'stream';
import { config, StorageConfig } from '../config';
import { RemoteFailure, toError } from '../errors';
import { ObjectStore, Visibility } from '../types';

export type StorageClient = Pick<Minio.Client, 'bucketExists' | 'makeBucket' | 'getObject' | 'putObject'>;

export class StorageService implements ObjectStore {
  private minioClient: StorageClient | null;
  private readonly bucketName: string;

  constructor(private readonly options: StorageConfig, client: StorageClient | null = null) {
    this.bucketName = options.bucket;
    this.minioClient = client;
  }

  /**
   * Initialize MinIO client and ensure bucket exists
   */
  async initialize(): Promise<void> {
    try {
      if (!this.minioClient) {
        this.minioClient = new Minio.Client({
          endPoint: this.options.endPoint,
          port: this.options.port,
          useSSL: this.options.useSSL,
          accessKey: this.options.accessKey,
          secretKey: this.options.secretKey
        });
      }

      const bucketExists = await this.minioClient.bucketExists(this.bucketName);
      if (!bucketExists) {
        await this.minioClient.makeBucket(this.bucketName, this.options.region);
        console.log(`Created bucket: ${this.bucketName}`);
      } else {
        console.log(`Bucket ${this.bucketName} already exists`);
      }

      console.log('MinIO storage service initialized');
    } catch (error) {
      console.error('Failed to initialize MinIO:', error);
      throw error;
    }
  }

  /**
   * Check if MinIO is healthy
   */
  async checkHealth(): Promise<boolean> {
    try {
      if (!this.minioClient) {
        return false;
      }
      await this.minioClient.bucketExists(this.bucketName);
      return true;
    } catch (error) {
      console.error('MinIO health check failed:', error);
      return false;
    }
  }

  /**
   * Open a stream on an object in the bucket
   * @param remotePath - Object name in MinIO
   */
  async fetch(remotePath: string): Promise<Readable> {
    const client = this.requireClient();
    try {
      return await client.getObject(this.bucketName, remotePath);
    } catch (error) {
      console.error(`[Storage] Error fetching ${remotePath}:`, toError(error).message);
      throw new RemoteFailure(`Could not fetch ${remotePath}`, { remotePath }, toError(error));
    }
  }

  /**
   * Write a stream of known size to the bucket
   * @param remotePath - Object name in MinIO
   * @param visibility - Canned ACL sent as x-amz-acl
   */
  async store(
    remotePath: string,
    body: Readable,
    size: number,
    contentType: string,
    visibility: Visibility
  ): Promise<void> {
    const client = this.requireClient();
    try {
      await client.putObject(this.bucketName, remotePath, body, size, {
        'Content-Type': contentType,
        'x-amz-acl': visibility
      });
      console.log(`[Storage] Uploaded ${this.bucketName}/${remotePath} (${size} bytes)`);
    } catch (error) {
      console.error(`[Storage] Error uploading ${remotePath}:`, toError(error).message);
      throw new RemoteFailure(`Could not store ${remotePath}`, { remotePath }, toError(error));
    }
  }

  private requireClient(): StorageClient {
    if (!this.minioClient) {
      throw new RemoteFailure('MinIO client not initialized');
    }
    return this.minioClient;
  }
}

export default new StorageService(config.storage);
