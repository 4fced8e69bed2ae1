// ============================================
// Link Document Tests — Slack links and web previews
// ============================================

import { describe, it, expect } from "vitest";
import {
  attachmentDocumentId,
  loadMessageSlackLinkDocuments,
  loadSlackLinkDocuments,
} from "../src/documents/loaders/slackLink.js";
import { loadMessageUnfurlingLinkDocuments, loadUnfurlingLinkDocuments } from "../src/documents/loaders/unfurlingLink.js";
import { TextBudgeter } from "../src/documents/textBudget.js";
import type { SlackAttachment, SlackMessage } from "../src/slack/types.js";

const budgeter = new TextBudgeter("gpt-3.5-turbo");

const quoted: SlackAttachment = {
  id: 1,
  original_url: "https://example.slack.com/archives/C2/p1629400000000100",
  author_id: "U2",
  text: "The release is on Friday",
  files: [{ id: "F9", name: "plan.md", filetype: "markdown", permalink: "https://example.slack.com/files/F9" }],
};

const preview: SlackAttachment = {
  id: 2,
  original_url: "https://example.com/changelog",
  title: "Changelog",
  text: "Version 2 ships dark mode",
  service_name: "Example",
};

const message: SlackMessage = {
  ts: "1629470261.000200",
  user: "U1",
  text: "see these",
  attachments: [quoted, preview],
};

const base = { message, channelId: "C1", channelType: "channel", eventTime: 1629470261 };

describe("attachmentDocumentId", () => {
  it("joins the message ts and attachment id", () => {
    expect(attachmentDocumentId(message, quoted)).toBe("1629470261.000200-1");
  });
});

describe("loadSlackLinkDocuments", () => {
  it("normalizes a quoted message", () => {
    const [document] = loadSlackLinkDocuments({ ...base, attachment: quoted }, budgeter);

    expect(JSON.parse(document?.content ?? "{}")).toEqual({
      content_type: "slack_link",
      user: "U1",
      author: "U2",
      channel: "C1",
      content: "The release is on Friday",
      permalink: "https://example.slack.com/archives/C2/p1629400000000100",
      timestamp: "2021-08-20T14:37:41+00:00",
      files: [{ title: "plan.md", permalink: "https://example.slack.com/files/F9" }],
    });
    expect(document?.metadata).toEqual({
      file_or_attachment_id: "1629470261.000200-1",
      content_type: "slack_link",
      channel_type: "channel",
      channel_id: "C1",
      thread_ts: "0000000000.000000",
      ts: "1629470261.000200",
      permalink: "https://example.slack.com/archives/C2/p1629400000000100",
      timestamp: "2021-08-20T14:37:41+00:00",
    });
  });

  it("ignores attachments that are not Slack links", () => {
    expect(loadSlackLinkDocuments({ ...base, attachment: preview }, budgeter)).toEqual([]);
  });
});

describe("loadUnfurlingLinkDocuments", () => {
  it("normalizes a web preview", () => {
    const [document] = loadUnfurlingLinkDocuments({ ...base, attachment: preview }, budgeter);

    expect(JSON.parse(document?.content ?? "{}")).toEqual({
      content_type: "unfurling_link",
      user: "U1",
      title: "Changelog",
      channel: "C1",
      content: "Version 2 ships dark mode",
      permalink: "https://example.com/changelog",
      timestamp: "2021-08-20T14:37:41+00:00",
      service_name: "Example",
    });
    expect(document?.metadata.file_or_attachment_id).toBe("1629470261.000200-2");
    expect(document?.metadata.thread_ts).toBe("0000000000.000000");
  });

  it("ignores attachments that are not previews", () => {
    expect(loadUnfurlingLinkDocuments({ ...base, attachment: quoted }, budgeter)).toEqual([]);
  });
});

describe("message-level link loaders", () => {
  it("collect each kind from all attachments", () => {
    expect(loadMessageSlackLinkDocuments(base, budgeter).map((d) => d.metadata.content_type)).toEqual(["slack_link"]);
    expect(loadMessageUnfurlingLinkDocuments(base, budgeter).map((d) => d.metadata.content_type)).toEqual([
      "unfurling_link",
    ]);
  });

  it("produce nothing for messages without attachments", () => {
    const plain = { ...base, message: { ts: "1629470261.000200", text: "hi" } };
    expect(loadMessageSlackLinkDocuments(plain, budgeter)).toEqual([]);
    expect(loadMessageUnfurlingLinkDocuments(plain, budgeter)).toEqual([]);
  });
});
