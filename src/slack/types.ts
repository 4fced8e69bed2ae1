import { z } from "zod";

// ============================================
// Slack payloads — parsed once at the ingestion boundary
// ============================================

export const slackFileSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  title: z.string().optional(),
  filetype: z.string().optional(),
  permalink: z.string().optional(),
  url_private: z.string().optional(),
});

export type SlackFile = z.infer<typeof slackFileSchema>;

/** Slack sends numeric attachment ids; either form is accepted */
export const slackAttachmentSchema = z.object({
  id: z.union([z.number(), z.string()]).optional(),
  original_url: z.string().optional(),
  from_url: z.string().optional(),
  author_id: z.string().optional(),
  title: z.string().optional(),
  text: z.string().optional(),
  service_name: z.string().optional(),
  files: z.array(slackFileSchema).optional(),
});

export type SlackAttachment = z.infer<typeof slackAttachmentSchema>;

export const slackMessageSchema = z.object({
  type: z.string().optional(),
  subtype: z.string().optional(),
  user: z.string().optional(),
  bot_id: z.string().optional(),
  text: z.string().default(""),
  ts: z.string(),
  thread_ts: z.string().optional(),
  edited: z.object({ user: z.string().optional(), ts: z.string() }).optional(),
  attachments: z.array(slackAttachmentSchema).optional(),
  files: z.array(slackFileSchema).optional(),
});

export type SlackMessage = z.infer<typeof slackMessageSchema>;

// ============================================
// Event envelopes
// ============================================

const authorizationSchema = z.object({
  user_id: z.string(),
});

function envelopeOf<T extends z.ZodTypeAny>(event: T) {
  return z.object({
    team_id: z.string(),
    event_id: z.string().optional(),
    event_time: z.number(),
    authorizations: z.array(authorizationSchema).min(1),
    event,
  });
}

export const MESSAGE_SUBTYPES = [
  "message_changed",
  "message_deleted",
  "channel_topic",
  "channel_purpose",
  "file_share",
] as const;

export type MessageSubtype = (typeof MESSAGE_SUBTYPES)[number];

export function isHandledMessageSubtype(subtype: string | undefined): subtype is MessageSubtype | undefined {
  return subtype === undefined || MESSAGE_SUBTYPES.some((handled) => handled === subtype);
}

/**
 * Message events share a shape across subtypes: the message itself is
 * inlined for new messages and nested under `message` for edits.
 */
export const messageEventSchema = slackMessageSchema.extend({
  channel: z.string(),
  channel_type: z.string(),
  event_ts: z.string().optional(),
  topic: z.string().optional(),
  purpose: z.string().optional(),
  message: slackMessageSchema.optional(),
  previous_message: slackMessageSchema.optional(),
});

export type MessageEvent = z.infer<typeof messageEventSchema>;

export const appMentionEventSchema = slackMessageSchema.extend({
  channel: z.string(),
  event_ts: z.string().optional(),
});

export type AppMentionEvent = z.infer<typeof appMentionEventSchema>;

export const fileSharedEventSchema = z.object({
  file_id: z.string(),
  user_id: z.string(),
  channel_id: z.string(),
  event_ts: z.string(),
});

export type FileSharedEvent = z.infer<typeof fileSharedEventSchema>;

export const fileDeletedEventSchema = z.object({
  file_id: z.string(),
  event_ts: z.string().optional(),
});

export const channelDeletedEventSchema = z.object({
  channel: z.string(),
});

export const appHomeOpenedEventSchema = z.object({
  user: z.string(),
  tab: z.string().optional(),
});

export const messageEnvelopeSchema = envelopeOf(messageEventSchema);
export const appMentionEnvelopeSchema = envelopeOf(appMentionEventSchema);
export const fileSharedEnvelopeSchema = envelopeOf(fileSharedEventSchema);
export const fileDeletedEnvelopeSchema = envelopeOf(fileDeletedEventSchema);
export const channelDeletedEnvelopeSchema = envelopeOf(channelDeletedEventSchema);
export const appHomeOpenedEnvelopeSchema = envelopeOf(appHomeOpenedEventSchema);
export const appUninstalledEnvelopeSchema = envelopeOf(z.object({ type: z.literal("app_uninstalled") }));

export type MessageEnvelope = z.infer<typeof messageEnvelopeSchema>;
export type AppMentionEnvelope = z.infer<typeof appMentionEnvelopeSchema>;
export type FileSharedEnvelope = z.infer<typeof fileSharedEnvelopeSchema>;
export type FileDeletedEnvelope = z.infer<typeof fileDeletedEnvelopeSchema>;
export type ChannelDeletedEnvelope = z.infer<typeof channelDeletedEnvelopeSchema>;
export type AppHomeOpenedEnvelope = z.infer<typeof appHomeOpenedEnvelopeSchema>;
export type AppUninstalledEnvelope = z.infer<typeof appUninstalledEnvelopeSchema>;

// ============================================
// Block actions from the App Home
// ============================================

const actionStateSchema = z.object({
  selected_option: z.object({ value: z.string() }).nullish(),
  value: z.string().nullish(),
});

export const blockActionBodySchema = z.object({
  team: z.object({ id: z.string() }).nullish(),
  user: z.object({ id: z.string(), team_id: z.string().optional() }),
  view: z
    .object({
      state: z.object({
        values: z.record(z.record(actionStateSchema)),
      }),
    })
    .optional(),
  actions: z.array(
    z.object({
      action_id: z.string(),
      selected_option: z.object({ value: z.string() }).nullish(),
      value: z.string().optional(),
    })
  ),
});

export type BlockActionBody = z.infer<typeof blockActionBodySchema>;

// ============================================
// Channel information
// ============================================

export type ChannelType = "channel" | "group" | "im" | "mpim" | "unknown";

export interface ChannelInfo {
  id: string;
  channelType: ChannelType;
  isPrivate: boolean;
  topic: string;
  purpose: string;
}
