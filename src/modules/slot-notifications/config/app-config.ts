import type { AppConfig, UserConfig } from '../domain/types';
import type { ConfigFile, UserFile } from '../../../shared/validation/schemas';

/**
 * Application configuration
 *
 * Maps the validated snake_case configuration document onto the camelCase
 * AppConfig the use cases read. Defaults are already applied by the schema.
 */
export function toAppConfig(file: ConfigFile): AppConfig {
  const { settings } = file;

  return {
    photoServiceUrl: stripTrailingSlash(file.photo_service.url),
    pushServiceUrl: stripTrailingSlash(file.push_service.url),
    clickUrl: file.push_service.click_url ?? null,
    users: file.users.map(toUserConfig),
    settings: {
      retry: {
        maxAttempts: settings.retry.max_attempts,
        delaySeconds: settings.retry.delay_seconds,
      },
      stateFile: settings.state_file,
      logLevel: settings.log_level,
      logFile: settings.log_file ?? null,
      memorySlots: settings.memory_notifications,
      personSlots: settings.person_notifications,
      fallbackSlots: settings.fallback_notifications,
      topPersonsLimit: settings.top_persons_limit,
      excludeRecentDays: settings.exclude_recent_days,
      videoEmoji: settings.video_emoji,
      notificationWindows: settings.notification_windows.map((window) => ({
        start: window.start,
        end: window.end,
      })),
    },
    templates: {
      memory: file.messages,
      person: file.person_messages,
      videoMemory: file.video_messages,
      videoPerson: file.video_person_messages,
    },
  };
}

function toUserConfig(user: UserFile): UserConfig {
  return {
    name: user.name,
    apiKey: user.api_key,
    pushTopic: user.push_topic,
    // Basic auth only when both halves are configured
    pushAuth:
      user.push_username && user.push_password
        ? { username: user.push_username, password: user.push_password }
        : null,
    enabled: user.enabled,
  };
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}
