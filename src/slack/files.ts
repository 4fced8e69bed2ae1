// ============================================
// Private file download — Slack-hosted files need the bot token
// ============================================

import { parse } from "node-html-parser";
import { RecallError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

export type FileDownloader = (url: string) => Promise<Uint8Array>;

/**
 * Download url_private with a bearer token.
 * Redirects are followed by hand: the Authorization header is dropped on
 * cross-origin hops, and Slack's redirect target carries its own auth.
 */
export async function downloadPrivateFile(url: string, botToken: string): Promise<Uint8Array> {
  const authHeader = `Bearer ${botToken}`;
  let finalResponse: Response;

  const initialResponse = await fetch(url, {
    headers: { Authorization: authHeader },
    redirect: "manual",
  });

  if (initialResponse.status >= 300 && initialResponse.status < 400) {
    const redirectUrl = initialResponse.headers.get("location");
    if (!redirectUrl) {
      throw new RecallError({
        code: "FILE_DOWNLOAD_ERROR",
        message: "Failed to download file. redirect without location header",
        context: { url },
      });
    }
    finalResponse = await fetch(redirectUrl);
  } else {
    finalResponse = initialResponse;
  }

  if (finalResponse.status !== 200) {
    throw new RecallError({
      code: "FILE_DOWNLOAD_ERROR",
      message: `Failed to download file. status code: ${finalResponse.status}`,
      context: { url, status: finalResponse.status },
    });
  }

  const bytes = new Uint8Array(await finalResponse.arrayBuffer());

  logger.debug("Downloaded private file", { stage: "slack", bytes: bytes.byteLength });

  return bytes;
}

export function createFileDownloader(botToken: string): FileDownloader {
  return (url) => downloadPrivateFile(url, botToken);
}

/** Slack returns rich-text snippets as HTML when no raw content is available */
export function htmlToText(html: string): string {
  return parse(html).structuredText;
}
