import fs from 'fs';
import { pipeline } from 'stream/promises';
import { Readable } from 'stream';
import { GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { env } from '../config.js';
import { logger } from '../utils/logger.js';

export interface S3Location {
  bucket: string;
  key: string;
}

export function isS3Url(value: string): boolean {
  return value.startsWith('s3://');
}

export function parseS3Url(url: string): S3Location {
  if (!isS3Url(url)) throw new Error(`Not an S3 URL: ${url}`);
  const rest = url.slice('s3://'.length);
  const slash = rest.indexOf('/');
  const bucket = slash === -1 ? rest : rest.slice(0, slash);
  const key = slash === -1 ? '' : rest.slice(slash + 1);
  if (!bucket) throw new Error(`S3 URL has no bucket: ${url}`);
  return { bucket, key };
}

/** Append `name` to an `s3://bucket/prefix` URL, with exactly one slash between. */
export function joinS3Url(prefix: string, name: string): string {
  const base = prefix.endsWith('/') ? prefix : `${prefix}/`;
  return `${base}${name.replace(/^\/+/, '')}`;
}

let client: S3Client | null = null;

function getClient(): S3Client {
  if (!client) {
    client = new S3Client({
      region: env.AWS_REGION,
      endpoint: env.S3_ENDPOINT,
      forcePathStyle: env.S3_FORCE_PATH_STYLE,
    });
  }
  return client;
}

export async function downloadS3ToPath(url: string, destPath: string, signal?: AbortSignal): Promise<void> {
  const { bucket, key } = parseS3Url(url);
  if (!key) throw new Error(`S3 URL has no object key: ${url}`);
  logger.info('S3: downloading object', { bucket, key, destPath });

  const res = await getClient().send(new GetObjectCommand({ Bucket: bucket, Key: key }), { abortSignal: signal });
  if (!(res.Body instanceof Readable)) {
    throw new Error(`S3 object ${url} returned no readable body`);
  }
  await pipeline(res.Body, fs.createWriteStream(destPath), { signal });
}

export async function uploadPathToS3(
  localPath: string,
  url: string,
  contentType: string,
): Promise<void> {
  const { bucket, key } = parseS3Url(url);
  if (!key) throw new Error(`S3 URL has no object key: ${url}`);
  logger.info('S3: uploading object', { localPath, bucket, key });

  await getClient().send(
    new PutObjectCommand({
      Bucket: bucket,
      Key: key,
      Body: fs.createReadStream(localPath),
      ContentType: contentType,
    }),
  );
}

export async function uploadBufferToS3(body: Buffer, url: string, contentType: string): Promise<void> {
  const { bucket, key } = parseS3Url(url);
  if (!key) throw new Error(`S3 URL has no object key: ${url}`);
  logger.info('S3: uploading object', { bucket, key, bytes: body.length });
  await getClient().send(new PutObjectCommand({ Bucket: bucket, Key: key, Body: body, ContentType: contentType }));
}
