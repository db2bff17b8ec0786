import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  DeleteObjectCommand,
  NoSuchBucket,
  NotFound,
  S3Client,
  S3ServiceException,
  type ServiceInputTypes,
  type ServiceOutputTypes,
} from '@aws-sdk/client-s3';
import { S3FileStorage, objectLocation } from '../s3FileStorage.js';
import { silentLogger } from '../../logger.js';
import { isMissingObject, translateS3Error } from '../errors.js';
import { ErrorKind } from '../../../domain/errors.js';

describe('objectLocation', () => {
  it('should use the virtual-hosted AWS url by default', () => {
    const location = objectLocation(
      { bucketName: 'probe-bucket', region: 'eu-west-1' },
      'probes/probe-0a1b2c3d.txt'
    );

    expect(location).toBe('https://probe-bucket.s3.eu-west-1.amazonaws.com/probes/probe-0a1b2c3d.txt');
  });

  it('should use path style under an endpoint override', () => {
    const location = objectLocation(
      { bucketName: 'probe-bucket', region: 'us-east-1', endpoint: 'http://localhost:4566/' },
      'a/b.txt'
    );

    expect(location).toBe('http://localhost:4566/probe-bucket/a/b.txt');
  });

  it('should encode each key segment', () => {
    const location = objectLocation(
      { bucketName: 'b', region: 'us-east-1' },
      'reports/march 2024/summary#1.txt'
    );

    expect(location).toBe('https://b.s3.us-east-1.amazonaws.com/reports/march%202024/summary%231.txt');
  });
});

describe('isMissingObject', () => {
  it('should recognise the HeadObject 404', () => {
    const error = new NotFound({ message: 'NotFound', $metadata: { httpStatusCode: 404 } });

    expect(isMissingObject(error)).toBe(true);
  });

  it('should not take a missing bucket for a missing object', () => {
    const error = new NoSuchBucket({ message: 'The specified bucket does not exist', $metadata: { httpStatusCode: 404 } });

    expect(isMissingObject(error)).toBe(false);
  });

  it('should ignore other failures', () => {
    expect(isMissingObject(new Error('socket hang up'))).toBe(false);
    expect(isMissingObject('NotFound')).toBe(false);
  });
});

describe('translateS3Error', () => {
  it('should map a 403 to PermissionDenied', () => {
    const error = new S3ServiceException({
      name: 'AccessDenied',
      $fault: 'client',
      $metadata: { httpStatusCode: 403 },
      message: 'Access Denied',
    });

    const failure = translateS3Error(error, 'put');

    expect(failure.kind).toBe(ErrorKind.PermissionDenied);
    expect(failure.message).toBe('S3 put denied: Access Denied');
    expect(failure.details).toEqual({ operation: 'put', code: 'AccessDenied', status: 403 });
  });

  it('should map a missing bucket to Unavailable', () => {
    const error = new NoSuchBucket({ message: 'The specified bucket does not exist', $metadata: {} });

    const failure = translateS3Error(error, 'ping');

    expect(failure.kind).toBe(ErrorKind.Unavailable);
    expect(failure.message).toBe('S3 ping failed: bucket not found');
  });

  it('should map network failures to Unavailable', () => {
    const failure = translateS3Error(new Error('connect ECONNREFUSED'), 'exists');

    expect(failure.kind).toBe(ErrorKind.Unavailable);
    expect(failure.message).toBe('S3 exists failed: connect ECONNREFUSED');
    expect(failure.details).toEqual({ operation: 'exists', code: 'Error', status: undefined });
  });
});

/**
 * Client whose commands are answered in order from `replies` at the
 * initialize step, before anything is signed or sent.
 */
function scriptedClient() {
  const replies: Array<ServiceOutputTypes | Error> = [];
  const calls: Array<{ command: string | undefined; input: ServiceInputTypes }> = [];
  const client = new S3Client({
    region: 'eu-west-1',
    credentials: { accessKeyId: 'test', secretAccessKey: 'test-secret' },
  });

  client.middlewareStack.add(
    (_next, context) => async (args) => {
      calls.push({ command: context.commandName, input: args.input });
      const reply = replies.shift();
      if (reply === undefined) {
        throw new Error(`No reply scripted for ${String(context.commandName)}`);
      }
      if (reply instanceof Error) {
        throw reply;
      }
      return { output: reply, response: {} };
    },
    { step: 'initialize', name: 'scriptedReplies' }
  );

  return { client, replies, calls };
}

function bareNotFound(): NotFound {
  return new NotFound({ message: 'NotFound', $metadata: { httpStatusCode: 404 } });
}

describe('S3FileStorage', () => {
  let scripted: ReturnType<typeof scriptedClient>;
  let storage: S3FileStorage;

  beforeEach(() => {
    scripted = scriptedClient();
    storage = new S3FileStorage({
      client: scripted.client,
      bucketName: 'probe-bucket',
      region: 'eu-west-1',
      logger: silentLogger(),
    });
  });

  it('should put an object and return its location', async () => {
    scripted.replies.push({ $metadata: {} });
    const body = new TextEncoder().encode('hello');

    const result = await storage.put('probes/a.txt', body, 'text/plain');

    expect(result).toEqual({
      ok: true,
      value: 'https://probe-bucket.s3.eu-west-1.amazonaws.com/probes/a.txt',
    });
    expect(scripted.calls[0]?.command).toBe('PutObjectCommand');
    expect(scripted.calls[0]?.input).toMatchObject({
      Bucket: 'probe-bucket',
      Key: 'probes/a.txt',
      Body: body,
      ContentType: 'text/plain',
    });
  });

  it('should report an existing object', async () => {
    scripted.replies.push({ $metadata: {} });

    expect(await storage.exists('probes/a.txt')).toEqual({ ok: true, value: true });
    expect(scripted.calls.map((call) => call.command)).toEqual(['HeadObjectCommand']);
  });

  it('should report a missing object once the bucket is confirmed', async () => {
    scripted.replies.push(bareNotFound(), { $metadata: {} });

    expect(await storage.exists('probes/gone.txt')).toEqual({ ok: true, value: false });
    expect(scripted.calls.map((call) => call.command)).toEqual([
      'HeadObjectCommand',
      'HeadBucketCommand',
    ]);
  });

  it('should report a missing bucket as Unavailable rather than a missing object', async () => {
    scripted.replies.push(bareNotFound(), bareNotFound());

    const result = await storage.exists('probes/a.txt');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe(ErrorKind.Unavailable);
    expect(result.error.message).toBe('S3 ping failed: bucket not found');
  });

  it('should delete an object', async () => {
    scripted.replies.push({ $metadata: {} });

    expect(await storage.delete('probes/a.txt')).toEqual({ ok: true, value: undefined });
    expect(scripted.calls[0]).toEqual({
      command: 'DeleteObjectCommand',
      input: { Bucket: 'probe-bucket', Key: 'probes/a.txt' },
    });
  });

  it('should map a denied delete to PermissionDenied', async () => {
    scripted.replies.push(
      new S3ServiceException({
        name: 'AccessDenied',
        $fault: 'client',
        $metadata: { httpStatusCode: 403 },
        message: 'Access Denied',
      })
    );

    const result = await storage.delete('probes/a.txt');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe(ErrorKind.PermissionDenied);
    expect(result.error.message).toBe('S3 delete denied: Access Denied');
  });

  it('should pass the caller signal to the client', async () => {
    const send = vi.spyOn(scripted.client, 'send');
    const controller = new AbortController();
    scripted.replies.push({ $metadata: {} });

    await storage.delete('probes/a.txt', { signal: controller.signal });

    expect(send).toHaveBeenCalledWith(expect.any(DeleteObjectCommand), {
      abortSignal: controller.signal,
    });
  });
});
