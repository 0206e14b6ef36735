/**
 * Memory Slot Notifier
 *
 * Library entry point. The command-line entry point is
 * `adapters/primary/cli/main.ts`.
 */

export { createSlotRunner, runSlot } from './adapters/primary/cli/main';
export { createProgram, parseCliArgs, type CliOptions } from './adapters/primary/cli/slotCommand';

export { DispatchSlotUseCase } from './modules/slot-notifications/application/use-cases/DispatchSlotUseCase';
export type {
  DispatchOptions,
  DispatchSummary,
  UserDispatchResult,
} from './modules/slot-notifications/application/use-cases/DispatchSlotUseCase';
export { RunSlotUseCase } from './modules/slot-notifications/application/use-cases/RunSlotUseCase';
export type { RunSlotOptions, RunSlotResult } from './modules/slot-notifications/application/use-cases/RunSlotUseCase';
export { ContentSelector } from './modules/slot-notifications/application/services/ContentSelector';
export { PersonRanker } from './modules/slot-notifications/application/services/PersonRanker';

export type { IConfigProvider } from './modules/slot-notifications/application/ports/IConfigProvider';
export type {
  IPhotoLibraryClient,
  PhotoLibraryClientFactory,
} from './modules/slot-notifications/application/ports/IPhotoLibraryClient';
export type { IPushClient, PushMessage } from './modules/slot-notifications/application/ports/IPushClient';
export type { IStateStore } from './modules/slot-notifications/application/ports/IStateStore';

export { YamlConfigProvider } from './modules/slot-notifications/adapters/config/YamlConfigProvider';
export { JsonFileStateStore } from './modules/slot-notifications/adapters/persistence/JsonFileStateStore';
export { PhotoLibraryAdapter } from './modules/slot-notifications/adapters/photo-library/PhotoLibraryAdapter';
export { PushNotificationAdapter } from './modules/slot-notifications/adapters/push/PushNotificationAdapter';

export { NotificationState } from './modules/slot-notifications/domain/entities/NotificationState';
export { SlotState } from './modules/slot-notifications/domain/entities/SlotState';
export { DelayWindowService } from './modules/slot-notifications/domain/services/DelayWindowService';
export { filterForDate, parseMemories } from './modules/slot-notifications/domain/services/MemoryParser';
export { MessageRenderer, fillTemplate } from './modules/slot-notifications/domain/services/MessageRenderer';
export { RetryPolicy, withRetry } from './modules/slot-notifications/domain/services/RetryPolicy';
export { SlotStateTracker } from './modules/slot-notifications/domain/services/SlotStateTracker';
export { DispatchOutcome, isSuccessfulOutcome } from './modules/slot-notifications/domain/value-objects/DispatchOutcome';
export type {
  AppConfig,
  Asset,
  MemoryRecord,
  MessageTemplates,
  NotificationWindow,
  ParsedMemories,
  Person,
  RenderedNotification,
  Settings,
  SlotContent,
  UserConfig,
} from './modules/slot-notifications/domain/types';

export { ConfigError } from './domain/errors/ConfigError';
export { CredentialMissingError } from './domain/errors/CredentialMissingError';
export { DomainError } from './domain/errors/DomainError';
export { StateIOError } from './domain/errors/StateIOError';
export { UpstreamError } from './domain/errors/UpstreamError';
export { ValidationError } from './domain/errors/ValidationError';
