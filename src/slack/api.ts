// ============================================
// Slack API — the calls the handlers need, over @slack/web-api
// Every failure surfaces as SLACK_API_ERROR
// ============================================

import type { KnownBlock, WebClient } from "@slack/web-api";
import { z } from "zod";
import { slackError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { createFileDownloader, htmlToText, type FileDownloader } from "./files.js";
import {
  slackFileSchema,
  slackMessageSchema,
  type ChannelInfo,
  type ChannelType,
  type SlackFile,
  type SlackMessage,
} from "./types.js";

export interface SlackFileInfo {
  file: SlackFile;
  /** Raw content, or the HTML rendition converted to text */
  text: string;
}

export interface OutgoingMessage {
  channel: string;
  text: string;
  threadTs?: string;
  blocks?: KnownBlock[];
}

export interface SlackApi {
  getPermalink(channel: string, messageTs: string): Promise<string>;
  getChannelInfo(channel: string): Promise<ChannelInfo>;
  /** Whole thread, oldest first */
  getThreadMessages(channel: string, threadTs: string): Promise<SlackMessage[]>;
  getFileInfo(fileId: string): Promise<SlackFileInfo>;
  postMessage(message: OutgoingMessage): Promise<void>;
  publishHomeView(userId: string, blocks: KnownBlock[]): Promise<void>;
  downloadFile: FileDownloader;
}

const conversationSchema = z.object({
  id: z.string().optional(),
  is_channel: z.boolean().optional(),
  is_group: z.boolean().optional(),
  is_im: z.boolean().optional(),
  is_mpim: z.boolean().optional(),
  is_private: z.boolean().optional(),
  topic: z.object({ value: z.string().optional() }).optional(),
  purpose: z.object({ value: z.string().optional() }).optional(),
});

type ConversationFlags = Pick<
  z.infer<typeof conversationSchema>,
  "is_channel" | "is_group" | "is_im" | "is_mpim" | "is_private"
>;

const fileInfoSchema = z.object({
  file: slackFileSchema,
  content: z.string().optional(),
  content_html: z.string().optional(),
});

/** Private channels report as "group", matching message event channel_type */
export function channelTypeOf(flags: ConversationFlags): ChannelType {
  if (flags.is_im) return "im";
  if (flags.is_mpim) return "mpim";
  if (flags.is_group || flags.is_private) return "group";
  if (flags.is_channel) return "channel";
  return "unknown";
}

const REPLIES_PAGE_SIZE = 200;

async function call<T>(method: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error("Slack API call failed", { stage: "slack", method, error: err });
    throw slackError(`Slack ${method} failed: ${message}`, err);
  }
}

export function createSlackApi(client: WebClient, botToken: string): SlackApi {
  return {
    async getPermalink(channel, messageTs) {
      const result = await call("chat.getPermalink", () =>
        client.chat.getPermalink({ channel, message_ts: messageTs })
      );
      if (!result.permalink) {
        throw slackError(`Slack chat.getPermalink returned no permalink for ${channel}/${messageTs}`);
      }
      return result.permalink;
    },

    async getChannelInfo(channel) {
      const result = await call("conversations.info", () => client.conversations.info({ channel }));
      const parsed = conversationSchema.safeParse(result.channel);
      if (!parsed.success) {
        throw slackError(`Slack conversations.info returned no usable channel for ${channel}`, parsed.error);
      }
      const info = parsed.data;
      return {
        id: info.id ?? channel,
        channelType: channelTypeOf(info),
        isPrivate: info.is_private ?? false,
        topic: info.topic?.value ?? "",
        purpose: info.purpose?.value ?? "",
      };
    },

    async getThreadMessages(channel, threadTs) {
      const messages: SlackMessage[] = [];
      let cursor: string | undefined;

      do {
        const page = await call("conversations.replies", () =>
          client.conversations.replies({ channel, ts: threadTs, limit: REPLIES_PAGE_SIZE, cursor })
        );

        for (const raw of page.messages ?? []) {
          const parsed = slackMessageSchema.safeParse(raw);
          if (parsed.success) {
            messages.push(parsed.data);
          } else {
            logger.warn("Skipping unreadable thread message", { stage: "slack", channelId: channel, threadTs });
          }
        }

        cursor = page.response_metadata?.next_cursor || undefined;
      } while (cursor);

      return messages.sort((a, b) => Number(a.ts) - Number(b.ts));
    },

    async getFileInfo(fileId) {
      const result = await call("files.info", () => client.files.info({ file: fileId }));
      const parsed = fileInfoSchema.safeParse(result);
      if (!parsed.success) {
        throw slackError(`Slack files.info returned no usable file for ${fileId}`, parsed.error);
      }
      const { file, content, content_html } = parsed.data;
      const text = content ?? (content_html ? htmlToText(content_html) : "");
      return { file, text };
    },

    async postMessage({ channel, text, threadTs, blocks }) {
      await call("chat.postMessage", () =>
        blocks
          ? client.chat.postMessage({ channel, text, blocks, thread_ts: threadTs })
          : client.chat.postMessage({ channel, text, thread_ts: threadTs })
      );
    },

    async publishHomeView(userId, blocks) {
      await call("views.publish", () =>
        client.views.publish({ user_id: userId, view: { type: "home", blocks } })
      );
    },

    downloadFile: createFileDownloader(botToken),
  };
}
