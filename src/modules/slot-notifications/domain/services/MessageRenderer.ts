import { mathRandom, pickOne, type RandomSource } from '../../../../shared/random';
import type { MessageTemplates, RenderedNotification, SlotContent } from '../types';

const DEFAULT_MEMORY_MESSAGE = 'You have memories from {year}!';
const DEFAULT_PERSON_MESSAGE = "Here's a photo of {person_name}!";

const MEMORY_TAGS = ['camera', 'calendar'];
const PERSON_TAGS = ['camera', 'busts_in_silhouette'];

export interface RenderOptions {
  /** Year of the run's target date, used for {years_ago} */
  targetYear: number;
  testMode: boolean;
  videoEmoji: boolean;
}

/**
 * MessageRenderer - turns selected content into title, body and tags
 *
 * Templates use `{year}`, `{years_ago}` and `{person_name}`. Any other
 * `{placeholder}` is left as written.
 */
export class MessageRenderer {
  public constructor(
    private readonly templates: MessageTemplates,
    private readonly random: RandomSource = mathRandom
  ) {}

  public render(content: SlotContent, options: RenderOptions): RenderedNotification {
    const isVideo = content.asset.type === 'VIDEO';

    let title: string;
    let message: string;
    let tags: string[];

    if (content.kind === 'memory') {
      const template = this.pickTemplate(
        isVideo ? this.templates.videoMemory : [],
        this.templates.memory,
        DEFAULT_MEMORY_MESSAGE
      );
      const values = {
        year: String(content.year),
        years_ago: String(options.targetYear - content.year),
      };
      title = `Memories from ${content.year}`;
      message = fillTemplate(template, values);
      tags = MEMORY_TAGS;
    } else {
      const template = this.pickTemplate(
        isVideo ? this.templates.videoPerson : [],
        this.templates.person,
        DEFAULT_PERSON_MESSAGE
      );
      title = `Photo of ${content.person.name}`;
      message = fillTemplate(template, { person_name: content.person.name });
      tags = PERSON_TAGS;
    }

    if (isVideo && options.videoEmoji) {
      title = `🎥 ${title}`;
    }
    if (options.testMode) {
      title = `[TEST] ${title}`;
    }

    return { kind: content.kind, title, message, assetId: content.asset.id, tags: [...tags] };
  }

  private pickTemplate(preferred: readonly string[], regular: readonly string[], fallback: string): string {
    return pickOne(this.random, preferred) ?? pickOne(this.random, regular) ?? fallback;
  }
}

/**
 * Replaces `{name}` with values[name]; unknown names stay untouched
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder: string, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? (values[name] ?? placeholder) : placeholder
  );
}
