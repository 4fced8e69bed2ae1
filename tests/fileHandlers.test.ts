// ============================================
// File, Channel and Uninstall Handler Tests
// ============================================

import { describe, it, expect, vi } from "vitest";
import { handleAppUninstalled } from "../src/handlers/appUninstalled.js";
import { handleChannelDeleted } from "../src/handlers/channelDeleted.js";
import { handleFileDeleted } from "../src/handlers/fileDeleted.js";
import { handleFileShared } from "../src/handlers/fileShared.js";
import { FakeSlack } from "./helpers/fakeSlack.js";
import { createTestServices, envelope } from "./helpers/services.js";

vi.mock("../src/documents/pdfText.js", () => ({
  extractPdfText: vi.fn(async () => "Incident review notes"),
}));

const sharedEvent = envelope({
  file_id: "F1",
  user_id: "U1",
  channel_id: "C1",
  event_ts: "1629470261.000300",
});

function storedIds(services: ReturnType<typeof createTestServices>): string[] {
  return Array.from(services.vectorEngine.stored("MessageT1").values())
    .filter((d) => d.metadata.channel_type !== "placeholder")
    .map((d) => d.metadata.file_or_attachment_id);
}

describe("handleFileShared", () => {
  it("indexes a shared text file", async () => {
    const services = createTestServices();
    const slack = new FakeSlack({
      channel: { channelType: "group", isPrivate: true },
      file: { file: { id: "F1", name: "notes.txt", filetype: "text" }, text: "hello team" },
    });

    await handleFileShared(services, slack, sharedEvent);

    const documents = Array.from(services.vectorEngine.stored("MessageT1").values()).filter(
      (d) => d.metadata.file_or_attachment_id === "F1"
    );
    expect(documents).toHaveLength(1);
    expect(documents[0]?.metadata).toMatchObject({ channel_type: "group", ts: "1629470261.000300" });
    expect(slack.downloadFile).not.toHaveBeenCalled();
  });

  it("downloads and indexes a shared PDF", async () => {
    const services = createTestServices();
    const slack = new FakeSlack({
      file: {
        file: { id: "F1", name: "review.pdf", filetype: "pdf", url_private: "https://files.slack.com/F1" },
        text: "",
      },
    });

    await handleFileShared(services, slack, sharedEvent);

    expect(slack.downloadFile).toHaveBeenCalledWith("https://files.slack.com/F1");
    expect(storedIds(services)).toEqual(["F1"]);
  });

  it("skips files it cannot read", async () => {
    const services = createTestServices();
    const slack = new FakeSlack({ file: { file: { id: "F1", name: "cat.png", filetype: "png" }, text: "" } });

    await handleFileShared(services, slack, sharedEvent);

    expect(services.vectorEngine.collections.size).toBe(0);
  });
});

describe("handleFileDeleted", () => {
  it("removes every page of the file", async () => {
    const services = createTestServices();
    const slack = new FakeSlack({ file: { file: { id: "F1", filetype: "text" }, text: "hello" } });
    await handleFileShared(services, slack, sharedEvent);

    await handleFileDeleted(services, envelope({ file_id: "F1" }));

    expect(storedIds(services)).toEqual([]);
  });
});

describe("handleChannelDeleted", () => {
  it("removes the channel's documents", async () => {
    const services = createTestServices();
    const slack = new FakeSlack({ file: { file: { id: "F1", filetype: "text" }, text: "hello" } });
    await handleFileShared(services, slack, sharedEvent);

    await handleChannelDeleted(services, envelope({ channel: "C1" }));

    expect(storedIds(services)).toEqual([]);
  });
});

describe("handleAppUninstalled", () => {
  it("removes the workspace configuration and its index", async () => {
    const services = createTestServices();
    const slack = new FakeSlack({ file: { file: { id: "F1", filetype: "text" }, text: "hello" } });
    await handleFileShared(services, slack, sharedEvent);
    expect(services.workspaces.workspaces.has("T1")).toBe(true);

    await handleAppUninstalled(services, envelope({ type: "app_uninstalled" as const }));

    expect(services.workspaces.workspaces.has("T1")).toBe(false);
    expect(services.vectorEngine.collections.has("MessageT1")).toBe(false);
  });
});
