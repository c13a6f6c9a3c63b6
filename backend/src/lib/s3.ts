import { S3Client, GetObjectCommand, PutObjectCommand } from '@aws-sdk/client-s3';
import { config } from './config.js';

// Create S3 client
export const s3Client = new S3Client({ region: config.region });

// Read an object body as UTF-8 text; null when the key does not exist
export async function getObjectText(bucket: string, key: string): Promise<string | null> {
  try {
    const command = new GetObjectCommand({
      Bucket: bucket,
      Key: key,
    });
    const response = await s3Client.send(command);
    return (await response.Body?.transformToString('utf-8')) ?? null;
  } catch (error: unknown) {
    if (error && typeof error === 'object' && 'name' in error && error.name === 'NoSuchKey') {
      return null;
    }
    throw error;
  }
}

// Upload object
export async function putObject(
  bucket: string,
  key: string,
  body: string | Buffer,
  contentType: string
): Promise<void> {
  const command = new PutObjectCommand({
    Bucket: bucket,
    Key: key,
    Body: body,
    ContentType: contentType,
  });
  await s3Client.send(command);
}
