import { describe, it, expect, vi, beforeEach } from "vitest";
import { MeetingLifecycle } from "../../src/services/meeting-lifecycle.js";
import { ReportRenderer } from "../../src/services/report-renderer.js";
import {
  StandupCommandHandler,
  buildOpenMeetingsResponse,
  normalizeMeetingId,
  type CommandOutcome,
  type ReportLinkProvider,
  type SubmissionOutcome,
} from "../../src/slack/commands.js";
import { CREATE_MEETING_CALLBACK_ID, SUBMIT_UPDATE_CALLBACK_ID } from "../../src/slack/modals.js";
import type { ModalStateValues, SlashCommandInput } from "../../src/slack/types.js";
import { deliverPrivately, type NoticeClient } from "../../src/slack/bolt-app.js";
import type { ArchivalOutcome } from "../../src/services/archival-publisher.js";
import { InMemoryMeetingStore, SAMPLE_FIELDS, sequenceIds } from "../fixtures/meetings.js";

/**
 * Slack adapter tests
 *
 * Drives the command handler against a real lifecycle over an in-memory store:
 * - subcommand routing and usage errors
 * - modal submissions and form errors
 * - private delivery fallback
 */

const ID_A = "2026-08-01-aaaa0001";
const ID_B = "2026-08-01-bbbb0002";
const NOW = new Date("2026-08-01T16:00:00.000Z");

function command(text: string, userName = "alice"): SlashCommandInput {
  return { text, userId: `U-${userName}`, userName, channelId: "C-standup", triggerId: "trigger-1" };
}

function inputs(values: Record<string, string>): ModalStateValues {
  const state: ModalStateValues = {};
  for (const [blockId, value] of Object.entries(values)) {
    state[blockId] = { value: { value } };
  }
  return state;
}

function responseText(outcome: CommandOutcome): string {
  if (outcome.type !== "respond") {
    throw new Error(`Expected a response, got ${outcome.type}`);
  }
  return outcome.response.text;
}

function formErrors(outcome: SubmissionOutcome): Record<string, string> {
  if (outcome.type !== "errors") {
    throw new Error("Expected form errors");
  }
  return outcome.errors;
}

describe("StandupCommandHandler", () => {
  let lifecycle: MeetingLifecycle;
  let reports: ReportLinkProvider;
  let handler: StandupCommandHandler;

  beforeEach(() => {
    lifecycle = new MeetingLifecycle({
      store: new InMemoryMeetingStore(),
      renderer: new ReportRenderer({ template: "{{page_title}}{{meeting_id}}{{header}}{{updates}}" }),
      publisher: {
        publish: async (): Promise<ArchivalOutcome> => ({ snapshot: "uploaded", report: "uploaded" }),
      },
      clock: () => NOW,
      generateId: sequenceIds(ID_A, ID_B),
    });
    reports = {
      isAvailable: () => true,
      getReportUrl: async (meetingId: string) => `https://archive.example.test/meetings/${meetingId}/index.html`,
    };
    handler = new StandupCommandHandler(lifecycle, reports, "/standup");
  });

  describe("routing", () => {
    it("should show help for an empty command", async () => {
      expect(responseText(await handler.handleCommand(command("")))).toBe("Standup commands");
    });

    it("should show help for an unknown subcommand", async () => {
      const outcome = await handler.handleCommand(command("dance"));
      expect(outcome).toMatchObject({ type: "respond", response: { response_type: "ephemeral", text: "Standup commands" } });
    });

    it("should open the create modal for new", async () => {
      const outcome = await handler.handleCommand(command("NEW"));

      expect(outcome.type).toBe("open_modal");
      if (outcome.type === "open_modal") {
        expect(outcome.view.callback_id).toBe(CREATE_MEETING_CALLBACK_ID);
        expect(JSON.parse(outcome.view.private_metadata ?? "")).toEqual({ channelId: "C-standup" });
      }
    });

    it("should require a meeting id for update and close", async () => {
      expect(responseText(await handler.handleCommand(command("update")))).toBe(
        ":x: Meeting ID is required. Usage: `/standup update <meeting-id>`"
      );
      expect(responseText(await handler.handleCommand(command("close")))).toBe(
        ":x: Meeting ID is required. Usage: `/standup close <meeting-id>`"
      );
    });

    it("should report unknown meetings", async () => {
      expect(responseText(await handler.handleCommand(command(`update ${ID_A}`)))).toBe(
        `:x: Meeting ${ID_A} not found.`
      );
    });
  });

  describe("update", () => {
    it("should open the update modal for an open meeting", async () => {
      await lifecycle.create("alice");

      const outcome = await handler.handleCommand(command(`update \`${ID_A.toUpperCase()}\``, "bob"));

      expect(outcome.type).toBe("open_modal");
      if (outcome.type === "open_modal") {
        expect(outcome.view.callback_id).toBe(SUBMIT_UPDATE_CALLBACK_ID);
        expect(JSON.parse(outcome.view.private_metadata ?? "")).toEqual({ meetingId: ID_A, channelId: "C-standup" });
        expect(outcome.view.submit?.text).toBe("Submit");
      }
    });

    it("should prefill the modal with the caller's current update", async () => {
      await lifecycle.create("alice");
      await lifecycle.submitUpdate(ID_A, "U-bob", SAMPLE_FIELDS, "bob");

      const outcome = await handler.handleCommand(command(`update ${ID_A}`, "bob"));

      expect(outcome.type).toBe("open_modal");
      if (outcome.type === "open_modal") {
        expect(outcome.view.submit?.text).toBe("Replace");
        expect(outcome.view.blocks).toContainEqual(
          expect.objectContaining({
            block_id: "progress",
            element: expect.objectContaining({ initial_value: SAMPLE_FIELDS.progress }),
          })
        );
      }
    });

    it("should refuse to open the modal for a closed meeting", async () => {
      await lifecycle.create("alice");
      await lifecycle.close(ID_A, "alice");

      expect(responseText(await handler.handleCommand(command(`update ${ID_A}`, "bob")))).toBe(
        `:x: Meeting \`${ID_A}\` is closed and cannot be updated.`
      );
    });
  });

  describe("close", () => {
    it("should close the meeting and link the report", async () => {
      await lifecycle.create("alice");
      await lifecycle.submitUpdate(ID_A, "bob", SAMPLE_FIELDS);

      const outcome = await handler.handleCommand(command(`close ${ID_A}`, "carol"));

      expect(outcome.type).toBe("respond");
      if (outcome.type === "respond") {
        expect(outcome.response.text).toBe(`Meeting ${ID_A} closed`);
        expect(outcome.response.response_type).toBe("ephemeral");
        expect(JSON.stringify(outcome.response.blocks)).toContain(
          `<https://archive.example.test/meetings/${ID_A}/index.html|View meeting report>`
        );
      }
      expect((await lifecycle.getMeeting(ID_A)).closedBy).toBe("carol");
      await lifecycle.drain();
    });

    it("should say the link is unavailable when archival is off", async () => {
      reports.isAvailable = () => false;
      await lifecycle.create("alice");

      const outcome = await handler.handleCommand(command(`close ${ID_A}`));

      expect(outcome.type).toBe("respond");
      if (outcome.type === "respond") {
        expect(JSON.stringify(outcome.response.blocks)).toContain("*Report:* link unavailable");
      }
      await lifecycle.drain();
    });

    it("should reject closing twice", async () => {
      await lifecycle.create("alice");
      await handler.handleCommand(command(`close ${ID_A}`));

      expect(responseText(await handler.handleCommand(command(`close ${ID_A}`, "bob")))).toBe(
        `:x: Meeting ${ID_A} is already closed.`
      );
      await lifecycle.drain();
    });

    it("should answer with a generic message on unexpected failures", async () => {
      vi.spyOn(lifecycle, "close").mockRejectedValueOnce(new Error("disk full"));

      expect(responseText(await handler.handleCommand(command(`close ${ID_A}`)))).toBe(
        ":x: Something went wrong. Please try again."
      );
    });
  });

  describe("list", () => {
    it("should say when nothing is open", async () => {
      expect(responseText(await handler.handleCommand(command("list")))).toBe("There are no open meetings.");
    });

    it("should count open meetings", async () => {
      await lifecycle.create("alice", { title: "Daily" });
      await lifecycle.create("bob");

      expect(responseText(await handler.handleCommand(command("list")))).toBe("2 open meetings");
    });
  });

  describe("create submission", () => {
    it("should create the meeting and notify the creator privately", async () => {
      const outcome = await handler.handleCreateSubmission({
        userId: "U-alice",
        userName: "alice",
        values: inputs({ title: "Daily", link: "" }),
        privateMetadata: JSON.stringify({ channelId: "C-standup" }),
      });

      expect(outcome.type).toBe("notify");
      if (outcome.type === "notify") {
        expect(outcome.notice.channelId).toBe("C-standup");
        expect(outcome.notice.userId).toBe("U-alice");
        expect(outcome.notice.text).toBe(`New meeting created: ${ID_A}`);
      }
      const meeting = await lifecycle.getMeeting(ID_A);
      expect(meeting.title).toBe("Daily");
      expect(meeting.createdBy).toBe("alice");
    });

    it("should return form errors for an invalid title", async () => {
      const outcome = await handler.handleCreateSubmission({
        userId: "U-alice",
        userName: "alice",
        values: inputs({ title: "x".repeat(51) }),
        privateMetadata: JSON.stringify({ channelId: "C-standup" }),
      });

      expect(formErrors(outcome)).toEqual({ title: "Title must be 50 characters or less" });
    });
  });

  describe("update submission", () => {
    const metadata = JSON.stringify({ meetingId: ID_A, channelId: "C-standup" });

    it("should save the update under the caller's user id with the handle for display", async () => {
      await lifecycle.create("alice");

      const outcome = await handler.handleUpdateSubmission({
        userId: "U-bob",
        userName: "bob",
        values: inputs(SAMPLE_FIELDS),
        privateMetadata: metadata,
      });

      expect(outcome.type).toBe("notify");
      if (outcome.type === "notify") {
        expect(outcome.notice.text).toBe(`Your update has been saved to meeting ${ID_A}`);
      }
      expect((await lifecycle.getMeeting(ID_A)).updates.get("U-bob")).toMatchObject({
        authorName: "bob",
        progress: SAMPLE_FIELDS.progress,
      });
    });

    it("should keep one update per person after a handle change", async () => {
      await lifecycle.create("alice");
      const submit = (userName: string, progress: string) =>
        handler.handleUpdateSubmission({
          userId: "U-bob",
          userName,
          values: inputs({ ...SAMPLE_FIELDS, progress }),
          privateMetadata: metadata,
        });

      await submit("bob", "Before the rename");
      await submit("robert", "After the rename");

      const meeting = await lifecycle.getMeeting(ID_A);
      expect([...meeting.updates.keys()]).toEqual(["U-bob"]);
      expect(meeting.updates.get("U-bob")).toMatchObject({ authorName: "robert", progress: "After the rename" });
    });

    it("should fall back to the user id when there is no handle", async () => {
      await lifecycle.create("alice");

      await handler.handleUpdateSubmission({
        userId: "U-nohandle",
        userName: "",
        values: inputs(SAMPLE_FIELDS),
        privateMetadata: metadata,
      });

      const meeting = await lifecycle.getMeeting(ID_A);
      expect([...meeting.updates.keys()]).toEqual(["U-nohandle"]);
      expect(meeting.updates.get("U-nohandle")?.authorName).toBeNull();
    });

    it("should return every field error", async () => {
      await lifecycle.create("alice");

      const outcome = await handler.handleUpdateSubmission({
        userId: "U-bob",
        userName: "bob",
        values: inputs({ progress: "  ", blockers: "none", goals: "g".repeat(501) }),
        privateMetadata: metadata,
      });

      expect(formErrors(outcome)).toEqual({
        progress: "Progress field is required",
        goals: "Goals field must be 500 characters or less",
      });
      expect((await lifecycle.getMeeting(ID_A)).updates.size).toBe(0);
    });

    it("should tell the caller privately when the meeting closed meanwhile", async () => {
      await lifecycle.create("alice");
      await lifecycle.close(ID_A, "alice");

      const outcome = await handler.handleUpdateSubmission({
        userId: "U-bob",
        userName: "bob",
        values: inputs(SAMPLE_FIELDS),
        privateMetadata: metadata,
      });

      expect(outcome).toEqual({
        type: "notify",
        notice: {
          channelId: "C-standup",
          userId: "U-bob",
          text: `:x: Meeting ${ID_A} is closed and cannot be updated.`,
        },
      });
      await lifecycle.drain();
    });

    it("should not leak internals for malformed metadata", async () => {
      const outcome = await handler.handleUpdateSubmission({
        userId: "U-bob",
        userName: "bob",
        values: inputs(SAMPLE_FIELDS),
        privateMetadata: "not json",
      });

      expect(formErrors(outcome)).toEqual({ progress: "Something went wrong. Please try again." });
    });
  });
});

describe("helpers", () => {
  it("should strip backticks and lowercase meeting ids", () => {
    expect(normalizeMeetingId("`2026-08-01-AAAA0001`")).toBe("2026-08-01-aaaa0001");
  });

  it("should pluralize the open meeting count", () => {
    const summary = { id: ID_A, title: null, createdBy: "alice", createdAt: NOW, updateCount: 1 };
    const response = buildOpenMeetingsResponse([summary]);

    expect(response.text).toBe("1 open meeting");
    expect(JSON.stringify(response.blocks)).toContain(`\`${ID_A}\` (by alice, 1 update)`);
  });
});

describe("deliverPrivately", () => {
  const notice = { channelId: "C-standup", userId: "U-bob", text: "Saved" };

  it("should post an ephemeral message in the channel", async () => {
    const client: NoticeClient = {
      chat: { postEphemeral: vi.fn().mockResolvedValue({ ok: true }), postMessage: vi.fn() },
    };

    await deliverPrivately(client, notice);

    expect(client.chat.postEphemeral).toHaveBeenCalledWith({
      channel: "C-standup",
      user: "U-bob",
      text: "Saved",
      blocks: undefined,
    });
    expect(client.chat.postMessage).not.toHaveBeenCalled();
  });

  it("should fall back to a direct message", async () => {
    const client: NoticeClient = {
      chat: {
        postEphemeral: vi.fn().mockRejectedValue(new Error("not_in_channel")),
        postMessage: vi.fn().mockResolvedValue({ ok: true }),
      },
    };

    await deliverPrivately(client, notice);

    expect(client.chat.postMessage).toHaveBeenCalledWith({ channel: "U-bob", text: "Saved", blocks: undefined });
  });

  it("should not throw when both deliveries fail", async () => {
    const client: NoticeClient = {
      chat: {
        postEphemeral: vi.fn().mockRejectedValue(new Error("not_in_channel")),
        postMessage: vi.fn().mockRejectedValue(new Error("ratelimited")),
      },
    };

    await expect(deliverPrivately(client, notice)).resolves.toBeUndefined();
  });
});
