import { randomUUID } from 'crypto';
import axios, { type AxiosBasicCredentials, type AxiosInstance, isAxiosError } from 'axios';
import type { IPushClient, PushMessage } from '../../application/ports/IPushClient';
import type { PushCredentials } from '../../domain/types';
import { PushUploadResponseSchema } from '../../../../shared/validation/schemas';
import { UpstreamError } from '../../../../domain/errors/UpstreamError';
import { logger } from '../../../../shared/logger';

const PUBLISH_TIMEOUT_MS = 10000;
const UPLOAD_TIMEOUT_MS = 30000;

/**
 * PushNotificationAdapter
 *
 * HTTP implementation of IPushClient for a topic-based push service.
 *
 * - Upload: `PUT {base}/upload-{uuid}` with the raw bytes and a `Filename`
 *   header; the service answers with the attachment URL
 * - Publish: `POST {base}/{topic}` with the message as UTF-8 body and
 *   `Title`, `Tags`, `Priority`, `Click`, `Attach` headers
 *
 * HTTP header values must be ASCII, so a title with other characters is
 * percent-encoded.
 *
 * @see IPushClient for interface contract
 */
export class PushNotificationAdapter implements IPushClient {
  private readonly http: AxiosInstance;

  public constructor(baseUrl: string) {
    this.http = axios.create({
      baseURL: baseUrl.replace(/\/+$/, ''),
      timeout: PUBLISH_TIMEOUT_MS,
    });
  }

  public async uploadAttachment(
    data: Buffer,
    filename: string,
    auth: PushCredentials | null
  ): Promise<string | null> {
    const path = `/upload-${randomUUID()}`;

    try {
      const response = await this.http.put<unknown>(path, data, {
        headers: { Filename: filename, 'Content-Type': 'application/octet-stream' },
        auth: toAxiosAuth(auth),
        timeout: UPLOAD_TIMEOUT_MS,
      });

      const decoded = PushUploadResponseSchema.safeParse(response.data);
      if (!decoded.success) {
        logger.warn({ msg: 'Unexpected upload response from push service', path, error: decoded.error.message });
        return null;
      }
      return decoded.data.attachment?.url ?? null;
    } catch (error) {
      throw toUpstreamError(error, 'upload');
    }
  }

  public async publish(message: PushMessage, auth: PushCredentials | null): Promise<void> {
    const headers: Record<string, string> = {
      Title: encodeHeaderValue(message.title),
      Tags: message.tags.join(','),
      Priority: 'default',
      'Content-Type': 'text/plain; charset=utf-8',
    };
    if (message.clickUrl) {
      headers.Click = message.clickUrl;
    }
    if (message.attachmentUrl) {
      headers.Attach = message.attachmentUrl;
    }

    const startTime = Date.now();
    try {
      const response = await this.http.post(`/${encodeURIComponent(message.topic)}`, Buffer.from(message.message, 'utf-8'), {
        headers,
        auth: toAxiosAuth(auth),
      });
      logger.debug({
        msg: 'Push notification accepted',
        topic: message.topic,
        statusCode: response.status,
        durationMs: Date.now() - startTime,
      });
    } catch (error) {
      throw toUpstreamError(error, 'publish');
    }
  }
}

/**
 * Percent-encodes values that contain anything outside printable ASCII
 */
export function encodeHeaderValue(value: string): string {
  return /^[\x20-\x7e]*$/.test(value) ? value : encodeURIComponent(value);
}

function toAxiosAuth(auth: PushCredentials | null): AxiosBasicCredentials | undefined {
  return auth ? { username: auth.username, password: auth.password } : undefined;
}

function toUpstreamError(error: unknown, operation: string): UpstreamError {
  if (isAxiosError(error)) {
    const status = error.response?.status;
    return new UpstreamError(
      status !== undefined
        ? `Push service ${operation} failed with HTTP ${status}`
        : `Push service ${operation} failed: ${error.message}`,
      status
    );
  }
  return new UpstreamError(
    `Push service ${operation} failed: ${error instanceof Error ? error.message : String(error)}`
  );
}
