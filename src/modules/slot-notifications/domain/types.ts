import type { DateTime } from 'luxon';

/**
 * Domain types for slot dispatch. All camelCase; adapters map the snake_case
 * config file, the JSON state file and the photo service payloads onto these.
 */

export type AssetType = 'IMAGE' | 'VIDEO';

export interface Asset {
  id: string;
  type: AssetType;
  /** Creation time when the photo service reports one */
  createdAt: DateTime | null;
}

/**
 * One memory record as returned by the photo service, narrowed to the fields
 * the selector reads. Assets are kept raw-ish: id may be missing, type may be
 * missing (parseMemories drops / defaults them).
 */
export interface MemoryRecord {
  showAt: string | null;
  year: number | null;
  assets: Array<{ id: string | null; type: string | null }>;
}

export interface Person {
  id: string;
  name: string;
  /** Approximate asset count; 0 until ranked or when the count lookup failed */
  assetCount: number;
}

export interface YearMemories {
  images: number;
  videos: number;
  assets: Asset[];
}

export interface ParsedMemories {
  totalAssets: number;
  imageCount: number;
  videoCount: number;
  /** Distinct years, newest first */
  years: number[];
  byYear: Map<number, YearMemories>;
}

export interface NotificationWindow {
  start: string;
  end: string;
}

export interface RetrySettings {
  maxAttempts: number;
  delaySeconds: number;
}

export interface Settings {
  retry: RetrySettings;
  stateFile: string;
  logLevel: string;
  /** Extra JSON log destination next to the console */
  logFile: string | null;
  memorySlots: number;
  personSlots: number;
  fallbackSlots: number;
  topPersonsLimit: number;
  excludeRecentDays: number;
  videoEmoji: boolean;
  notificationWindows: NotificationWindow[];
}

export interface PushCredentials {
  username: string;
  password: string;
}

export interface UserConfig {
  name: string;
  apiKey: string;
  pushTopic: string;
  pushAuth: PushCredentials | null;
  enabled: boolean;
}

export interface MessageTemplates {
  memory: string[];
  person: string[];
  videoMemory: string[];
  videoPerson: string[];
}

export interface AppConfig {
  photoServiceUrl: string;
  pushServiceUrl: string;
  clickUrl: string | null;
  users: UserConfig[];
  settings: Settings;
  templates: MessageTemplates;
}

export type NotificationKind = 'memory' | 'person';

/**
 * What the selector decided to send for one user and one slot
 */
export type SlotContent =
  | { kind: 'memory'; year: number; asset: Asset }
  | { kind: 'person'; person: Person; asset: Asset };

export interface RenderedNotification {
  kind: NotificationKind;
  title: string;
  message: string;
  assetId: string;
  tags: string[];
}
