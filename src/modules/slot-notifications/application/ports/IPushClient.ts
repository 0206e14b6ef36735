import type { PushCredentials } from '../../domain/types';

export interface PushMessage {
  topic: string;
  title: string;
  message: string;
  tags: string[];
  clickUrl?: string;
  attachmentUrl?: string;
}

/**
 * IPushClient Port Interface
 *
 * Delivers notifications through the push service.
 *
 * **Error Handling:**
 * - publish: UpstreamError on non-2xx, timeout or network failure
 * - uploadAttachment: UpstreamError on failure; resolves null when the
 *   service accepted the upload but returned no attachment URL
 *
 * Implementations do NOT retry; the dispatcher wraps each call.
 *
 * @see PushNotificationAdapter for the HTTP implementation
 */
export interface IPushClient {
  uploadAttachment(data: Buffer, filename: string, auth: PushCredentials | null): Promise<string | null>;

  publish(message: PushMessage, auth: PushCredentials | null): Promise<void>;
}
