import { z } from 'zod';
import { ClockTime } from '../value-objects/ClockTime';

/**
 * Zod schemas for every document that crosses a process boundary:
 * - the YAML configuration file (snake_case, after env expansion)
 * - the JSON state file
 * - photo service responses
 * - push service upload responses
 *
 * Each schema is the single source of truth for its runtime validation and
 * its compile-time type (via z.infer<>). Adapters parse with these schemas and
 * map to camelCase domain types; callers never see raw shapes.
 */

// ---------------------------------------------------------------------------
// Configuration file
// ---------------------------------------------------------------------------

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value : undefined));

const clockTime = z
  .string()
  .refine(ClockTime.isValid, { message: 'Time must be HH:MM (00:00 - 23:59)' });

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const NotificationWindowSchema = z
  .object({
    start: clockTime,
    end: clockTime,
  })
  .refine(
    (window) =>
      !ClockTime.isValid(window.start) ||
      !ClockTime.isValid(window.end) ||
      !ClockTime.parse(window.end).isBefore(ClockTime.parse(window.start)),
    { message: 'Window end must not be earlier than start (overnight windows are not supported)' }
  );

export type NotificationWindowFile = z.infer<typeof NotificationWindowSchema>;

const count = z.number().int().min(0);

/**
 * Settings block. Defaults match the values the service ships with.
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const SettingsSchema = z.object({
  retry: z
    .object({
      max_attempts: z.number().int().min(1).default(3),
      delay_seconds: z.number().min(0).default(5),
    })
    .default({}),
  state_file: z.string().min(1).default('state.json'),
  log_level: z.string().default('info'),
  log_file: optionalText,
  memory_notifications: count.default(3),
  person_notifications: count.default(2),
  fallback_notifications: count.default(3),
  top_persons_limit: count.default(5),
  exclude_recent_days: count.default(30),
  video_emoji: z.boolean().default(true),
  notification_windows: z.array(NotificationWindowSchema).default([]),
});

export type SettingsFile = z.infer<typeof SettingsSchema>;

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const UserSchema = z.object({
  name: z.string().min(1, 'User name is required'),
  api_key: z.string().default(''),
  push_topic: z.string().min(1, 'Push topic is required'),
  push_username: optionalText,
  push_password: optionalText,
  enabled: z.boolean().default(true),
});

export type UserFile = z.infer<typeof UserSchema>;

const templates = z.array(z.string()).nullish().transform((value) => value ?? []);

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const ConfigFileSchema = z.object({
  photo_service: z.object({
    url: z.string().url('photo_service.url must be a URL'),
  }),
  push_service: z.object({
    url: z.string().url('push_service.url must be a URL'),
    click_url: optionalText.pipe(z.string().url().optional()),
  }),
  users: z
    .array(UserSchema)
    .default([])
    .refine((users) => new Set(users.map((user) => user.name)).size === users.length, {
      message: 'User names must be unique',
    }),
  settings: SettingsSchema.default({}),
  messages: templates,
  person_messages: templates,
  video_messages: templates,
  video_person_messages: templates,
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ---------------------------------------------------------------------------
// State file
// ---------------------------------------------------------------------------

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const UserSlotStateSchema = z.object({
  slots_date: z.string().nullish().transform((value) => value ?? null),
  slots_sent: z.array(z.number().int()).default([]),
  assets_sent_today: z.array(z.string()).default([]),
  last_slot_time: z.string().nullish().transform((value) => value ?? null),
});

export type UserSlotStateFile = z.infer<typeof UserSlotStateSchema>;

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const StateFileSchema = z.object({
  users: z.record(UserSlotStateSchema).default({}),
});

export type StateFile = z.infer<typeof StateFileSchema>;

/**
 * Outer shape of the state file only. Records are checked one at a time with
 * UserSlotStateSchema so that one bad record does not discard the others.
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const StateDocumentSchema = z.object({
  users: z.record(z.unknown()).default({}),
});

// ---------------------------------------------------------------------------
// Photo service responses
// ---------------------------------------------------------------------------

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const RawAssetSchema = z
  .object({
    id: z.string().nullish(),
    type: z.string().nullish(),
    fileCreatedAt: z.string().nullish(),
    localDateTime: z.string().nullish(),
    createdAt: z.string().nullish(),
  })
  .passthrough();

export type RawAsset = z.infer<typeof RawAssetSchema>;

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const RawMemorySchema = z
  .object({
    showAt: z.string().nullish(),
    data: z
      .object({
        year: z.number().int().nullish(),
      })
      .passthrough()
      .nullish(),
    assets: z.array(RawAssetSchema).nullish(),
  })
  .passthrough();

export type RawMemory = z.infer<typeof RawMemorySchema>;

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const MemoriesResponseSchema = z.array(RawMemorySchema);

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const RawPersonSchema = z
  .object({
    id: z.string(),
    name: z.string().nullish(),
  })
  .passthrough();

export type RawPerson = z.infer<typeof RawPersonSchema>;

/**
 * GET /api/people answers either with a bare array or with `{ people: [...] }`
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const PeopleResponseSchema = z.union([
  z.array(RawPersonSchema),
  z.object({ people: z.array(RawPersonSchema) }).passthrough(),
]);

export type PeopleResponse = z.infer<typeof PeopleResponseSchema>;

/**
 * POST /api/search/metadata answers with `{ assets: { items, total } }` or `{ assets: [...] }`
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const SearchResponseSchema = z.object({
  assets: z.union([
    z
      .object({
        items: z.array(RawAssetSchema).default([]),
        total: z.number().int().nullish(),
      })
      .passthrough(),
    z.array(RawAssetSchema),
  ]),
});

export type SearchResponse = z.infer<typeof SearchResponseSchema>;

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const AssetDetailResponseSchema = z
  .object({
    people: z.array(RawPersonSchema).nullish(),
  })
  .passthrough();

// ---------------------------------------------------------------------------
// Push service responses
// ---------------------------------------------------------------------------

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const PushUploadResponseSchema = z
  .object({
    attachment: z
      .object({
        url: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();
